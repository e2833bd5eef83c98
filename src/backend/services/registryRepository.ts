// Persistencia del registro en un archivo JSON (historias, contador, dueños y balances)
import fs from 'fs/promises';
import path from 'path';
import { Address, Hex, getAddress, isAddress, isHex } from 'viem';
import { RegistrySnapshot, Story, toStoryResponse } from '../../shared/types';
import type { InMemoryFundsLedger } from './balanceService';
import type { InMemoryOwnershipLedger } from './ownershipLedger';
import { StoryRegistry, validateStoryInput } from './storyRegistry';

export interface RegistryState {
  lastTokenId: bigint;
  stories: Array<[bigint, Story]>;
  owners: Array<[bigint, Address]>;
  balances: Array<[Address, bigint]>;
}

export const EMPTY_STATE: RegistryState = {
  lastTokenId: 0n,
  stories: [],
  owners: [],
  balances: [],
};

type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readUint(value: unknown, field: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new Error(`Campo ${field} inválido: se esperaba un entero sin signo en string`);
  }
  return BigInt(value);
}

function readAddress(value: unknown, field: string): Address {
  if (typeof value !== 'string' || !isAddress(value, { strict: false })) {
    throw new Error(`Campo ${field} inválido: se esperaba una dirección`);
  }
  return getAddress(value);
}

function readHex(value: unknown, field: string): Hex {
  if (typeof value !== 'string' || !isHex(value, { strict: true })) {
    throw new Error(`Campo ${field} inválido: se esperaba hex`);
  }
  return value;
}

function readString(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new Error(`Campo ${field} inválido: se esperaba texto`);
  }
  return value;
}

function readArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Campo ${field} inválido: se esperaba un array`);
  }
  return value;
}

function readStory(value: unknown): [bigint, Story] {
  if (!isRecord(value)) {
    throw new Error('Historia inválida en el snapshot');
  }
  const royaltyPercent = value.royaltyPercent;
  if (typeof royaltyPercent !== 'number' || !Number.isInteger(royaltyPercent)) {
    throw new Error('Campo royaltyPercent inválido: se esperaba un entero');
  }
  const tokenId = readUint(value.tokenId, 'tokenId');
  const story: Story = {
    title: readString(value.title, 'title'),
    description: readString(value.description, 'description'),
    audioCid: readHex(value.audioCid, 'audioCid'),
    imageCid: readHex(value.imageCid, 'imageCid'),
    creator: readAddress(value.creator, 'creator'),
    royaltyPercent,
  };

  // Mismas reglas que al mintear
  try {
    validateStoryInput(story);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Historia ${tokenId} inválida en el snapshot: ${reason}`);
  }
  return [tokenId, story];
}

function uniqueIds(ids: bigint[], field: string): Set<bigint> {
  const set = new Set(ids);
  if (set.size !== ids.length) {
    throw new Error(`Campo ${field} inválido: token IDs repetidos`);
  }
  return set;
}

// Historias y dueños deben tener el mismo conjunto de IDs, y el contador cubrirlos a todos
function checkConsistency(state: RegistryState): void {
  const storyIds = uniqueIds(state.stories.map(([tokenId]) => tokenId), 'stories');
  const ownerIds = uniqueIds(state.owners.map(([tokenId]) => tokenId), 'owners');

  for (const tokenId of storyIds) {
    if (!ownerIds.has(tokenId)) {
      throw new Error(`Snapshot inconsistente: la historia ${tokenId} no tiene dueño`);
    }
  }
  for (const tokenId of ownerIds) {
    if (!storyIds.has(tokenId)) {
      throw new Error(`Snapshot inconsistente: el token ${tokenId} tiene dueño pero no historia`);
    }
  }

  for (const tokenId of storyIds) {
    if (tokenId > state.lastTokenId) {
      throw new Error(`Snapshot inconsistente: lastTokenId ${state.lastTokenId} es menor que el token ${tokenId}`);
    }
  }
}

/**
 * Convierte el JSON crudo del archivo en estado tipado, validando cada campo
 * y la coherencia entre historias, dueños y contador
 */
export function parseRegistrySnapshot(raw: unknown): RegistryState {
  if (!isRecord(raw)) {
    throw new Error('El snapshot del registro no es un objeto válido');
  }

  const stories = readArray(raw.stories, 'stories').map(readStory);
  const owners = readArray(raw.owners, 'owners').map((entry): [bigint, Address] => {
    if (!isRecord(entry)) {
      throw new Error('Entrada de owners inválida');
    }
    return [readUint(entry.tokenId, 'owners.tokenId'), readAddress(entry.owner, 'owners.owner')];
  });
  const balances = readArray(raw.balances, 'balances').map((entry): [Address, bigint] => {
    if (!isRecord(entry)) {
      throw new Error('Entrada de balances inválida');
    }
    return [readAddress(entry.address, 'balances.address'), readUint(entry.amount, 'balances.amount')];
  });

  const state: RegistryState = {
    lastTokenId: readUint(raw.lastTokenId, 'lastTokenId'),
    stories,
    owners,
    balances,
  };
  checkConsistency(state);
  return state;
}

export function buildRegistrySnapshot(
  registry: StoryRegistry,
  ownership: InMemoryOwnershipLedger,
  funds: InMemoryFundsLedger
): RegistrySnapshot {
  return {
    lastTokenId: registry.getLastTokenId().toString(),
    stories: registry.entries().map(([tokenId, story]) => toStoryResponse(tokenId, story)),
    owners: ownership.entries().map(([tokenId, owner]) => ({ tokenId: tokenId.toString(), owner })),
    balances: funds.entries().map(([address, amount]) => ({ address, amount: amount.toString() })),
  };
}

// Asegurar que el directorio existe
async function ensureDataDir(file: string): Promise<void> {
  const dataDir = path.dirname(file);
  try {
    await fs.access(dataDir);
  } catch {
    await fs.mkdir(dataDir, { recursive: true });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Carga el estado desde disco. Si el archivo no existe se arranca vacío.
 * Si el JSON está corrupto se intenta recuperar desde el backup.
 */
export async function loadRegistryState(file: string): Promise<RegistryState> {
  let content: string;
  try {
    content = await fs.readFile(file, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      console.log(`📂 No existe ${file}, iniciando registro vacío`);
      return EMPTY_STATE;
    }
    throw error;
  }

  if (content.trim() === '') {
    console.warn('⚠️  Archivo del registro está vacío, iniciando registro vacío');
    return EMPTY_STATE;
  }

  try {
    return parseRegistrySnapshot(JSON.parse(content));
  } catch (parseError) {
    console.error('❌ Error parseando el registro:', parseError);

    const backupFile = file + '.backup';
    const backupContent = await fs.readFile(backupFile, 'utf-8');
    const state = parseRegistrySnapshot(JSON.parse(backupContent));
    console.log('✅ Recuperado desde archivo de respaldo');
    return state;
  }
}

/**
 * Escribe el snapshot de forma atómica: backup del anterior, archivo temporal y rename
 */
export async function saveRegistrySnapshot(file: string, snapshot: RegistrySnapshot): Promise<void> {
  await ensureDataDir(file);

  const jsonContent = JSON.stringify(snapshot, null, 2);
  const tempFile = file + '.tmp';

  try {
    const currentContent = await fs.readFile(file, 'utf-8');
    if (currentContent.trim() !== '') {
      await fs.writeFile(file + '.backup', currentContent, 'utf-8');
    }
  } catch (error) {
    if (!isMissingFile(error)) {
      console.warn('⚠️  No se pudo crear backup:', error);
    }
  }

  try {
    await fs.writeFile(tempFile, jsonContent, 'utf-8');
    await fs.rename(tempFile, file);
  } catch (error) {
    console.error('❌ Error guardando el registro:', error);
    await fs.rm(tempFile, { force: true });
    throw error;
  }
}
