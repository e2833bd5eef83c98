// Registro de historias: minteo, transferencia con regalía y propinas
import { Address, Hex, getAddress, isAddressEqual, isHex, size } from 'viem';
import type { Story, StoryInput } from '../../shared/types';
import type { FundsLedger } from './balanceService';
import type { OwnershipLedger } from './ownershipLedger';
import { SerialQueue } from './serialQueue';
import { StoryRegistryError } from './storyErrors';

export const MAX_TITLE_LENGTH = 100;
export const MAX_DESCRIPTION_LENGTH = 500;
export const MAX_CID_BYTES = 64;
export const MAX_ROYALTY_PERCENT = 100;

export interface StoryRegistryOptions {
  ownership: OwnershipLedger;
  funds: FundsLedger;
  tokenUri: string;
  lastTokenId?: bigint;
  stories?: Iterable<[bigint, Story]>;
  // Se ejecuta dentro de la cola después de cada operación exitosa
  onCommit?: (registry: StoryRegistry) => Promise<void>;
}

// Longitud en code points, no en unidades UTF-16
function codePointLength(text: string): number {
  return Array.from(text).length;
}

function isValidCid(cid: Hex): boolean {
  return isHex(cid, { strict: true }) && cid.length % 2 === 0 && size(cid) <= MAX_CID_BYTES;
}

export function validateStoryInput(input: StoryInput): void {
  const titleLength = codePointLength(input.title);
  if (titleLength < 1 || titleLength > MAX_TITLE_LENGTH) {
    throw new StoryRegistryError('InvalidStory', `El título debe tener entre 1 y ${MAX_TITLE_LENGTH} caracteres`);
  }
  if (codePointLength(input.description) > MAX_DESCRIPTION_LENGTH) {
    throw new StoryRegistryError(
      'InvalidStory',
      `La descripción no puede superar ${MAX_DESCRIPTION_LENGTH} caracteres`
    );
  }
  if (!isValidCid(input.audioCid) || !isValidCid(input.imageCid)) {
    throw new StoryRegistryError('InvalidStory', `Los CID deben ser hex de hasta ${MAX_CID_BYTES} bytes`);
  }
  const { royaltyPercent } = input;
  if (!Number.isInteger(royaltyPercent) || royaltyPercent < 0 || royaltyPercent > MAX_ROYALTY_PERCENT) {
    throw new StoryRegistryError('InvalidStory', `La regalía debe ser un entero entre 0 y ${MAX_ROYALTY_PERCENT}`);
  }
}

/**
 * Regalía = porcentaje del balance actual del remitente (no hay precio de venta).
 */
export function computeRoyalty(senderBalance: bigint, royaltyPercent: number): bigint {
  return (senderBalance * BigInt(royaltyPercent)) / 100n;
}

export class StoryRegistry {
  private readonly stories = new Map<bigint, Story>();
  private readonly queue = new SerialQueue();
  private readonly ownership: OwnershipLedger;
  private readonly funds: FundsLedger;
  private readonly tokenUri: string;
  private readonly onCommit?: (registry: StoryRegistry) => Promise<void>;
  private lastTokenId: bigint;

  constructor(options: StoryRegistryOptions) {
    this.ownership = options.ownership;
    this.funds = options.funds;
    this.tokenUri = options.tokenUri;
    this.onCommit = options.onCommit;
    this.lastTokenId = options.lastTokenId ?? 0n;
    for (const [tokenId, story] of options.stories ?? []) {
      this.stories.set(tokenId, { ...story });
    }
  }

  /**
   * Mintea una historia nueva a nombre de `caller` y devuelve su token ID.
   * Si la validación falla no se consume ningún ID.
   */
  mint(caller: Address, input: StoryInput): Promise<bigint> {
    return this.atomically(async () => {
      validateStoryInput(input);

      const tokenId = this.lastTokenId + 1n;
      // Primero el ledger: si falla, el contador y el store quedan intactos
      await this.ownership.mint(tokenId, caller);

      this.stories.set(tokenId, {
        title: input.title,
        description: input.description,
        audioCid: input.audioCid,
        imageCid: input.imageCid,
        creator: getAddress(caller),
        royaltyPercent: input.royaltyPercent,
      });
      this.lastTokenId = tokenId;

      console.log(`✅ Historia minteada: token ${tokenId} - "${input.title}" (creador: ${caller})`);
      return tokenId;
    });
  }

  /**
   * Transfiere el token de `sender` a `recipient` y paga la regalía al creador.
   * La regalía se calcula sobre el balance del remitente en ese momento.
   */
  transfer(caller: Address, tokenId: bigint, sender: Address, recipient: Address): Promise<boolean> {
    return this.atomically(async () => {
      const story = this.requireStory(tokenId);
      if (!isAddressEqual(caller, sender)) {
        throw new StoryRegistryError('Unauthorized', `${caller} no puede transferir en nombre de ${sender}`);
      }

      const senderBalance = await this.funds.balanceOf(sender);
      const royalty = computeRoyalty(senderBalance, story.royaltyPercent);

      await this.ownership.transfer(tokenId, sender, recipient);

      // Si el remitente es el creador, la regalía se la pagaría a sí mismo
      if (royalty > 0n && !isAddressEqual(sender, story.creator)) {
        try {
          await this.funds.transfer(sender, story.creator, royalty);
        } catch (error) {
          await this.revertOwnership(tokenId, sender, recipient, error);
          throw error;
        }
        console.log(`💰 Regalía de ${royalty} pagada a ${story.creator} por token ${tokenId}`);
      }

      console.log(`✅ Token ${tokenId} transferido de ${sender} a ${recipient}`);
      return true;
    });
  }

  /**
   * Envía una propina directa al creador de la historia.
   */
  tip(caller: Address, tokenId: bigint, amount: bigint): Promise<boolean> {
    return this.atomically(async () => {
      const story = this.requireStory(tokenId);
      if (amount <= 0n) {
        throw new StoryRegistryError('InsufficientFunds', 'El monto de la propina debe ser mayor que cero');
      }

      await this.funds.transfer(caller, story.creator, amount);

      console.log(`🎁 Propina de ${amount} enviada a ${story.creator} por token ${tokenId}`);
      return true;
    });
  }

  getStoryDetails(tokenId: bigint): Story | undefined {
    const story = this.stories.get(tokenId);
    return story ? { ...story } : undefined;
  }

  getOwner(tokenId: bigint): Promise<Address | undefined> {
    return this.ownership.ownerOf(tokenId);
  }

  getLastTokenId(): bigint {
    return this.lastTokenId;
  }

  // Stub: todos los tokens resuelven a la misma URI base
  getTokenUri(_tokenId: bigint): string {
    return this.tokenUri;
  }

  getBalance(address: Address): Promise<bigint> {
    return this.funds.balanceOf(address);
  }

  entries(): Array<[bigint, Story]> {
    return Array.from(this.stories.entries(), ([tokenId, story]): [bigint, Story] => [tokenId, { ...story }]);
  }

  private requireStory(tokenId: bigint): Story {
    const story = this.stories.get(tokenId);
    if (!story) {
      throw new StoryRegistryError('StoryNotFound', `La historia ${tokenId} no existe`);
    }
    return story;
  }

  private async revertOwnership(tokenId: bigint, sender: Address, recipient: Address, cause: unknown): Promise<void> {
    console.warn(`⚠️  Pago de regalía falló para token ${tokenId}, revirtiendo transferencia...`);
    try {
      await this.ownership.transfer(tokenId, recipient, sender);
    } catch (rollbackError) {
      console.error(`❌ No se pudo revertir la transferencia del token ${tokenId}:`, rollbackError);
      throw new AggregateError([cause, rollbackError], `No se pudo revertir la transferencia del token ${tokenId}`);
    }
  }

  /**
   * Ejecuta una mutación externa al registro (p. ej. el faucet) en la misma cola
   * y con el mismo commit que las operaciones propias.
   */
  runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    return this.atomically(operation);
  }

  // Foto del registro y de los ledgers que la soportan, para deshacer un commit fallido
  private checkpoint(): () => void {
    const lastTokenId = this.lastTokenId;
    const stories = this.entries();
    const restoreOwnership = this.ownership.checkpoint?.();
    const restoreFunds = this.funds.checkpoint?.();

    return () => {
      this.lastTokenId = lastTokenId;
      this.stories.clear();
      for (const [tokenId, story] of stories) {
        this.stories.set(tokenId, story);
      }
      restoreOwnership?.();
      restoreFunds?.();
    };
  }

  private atomically<T>(operation: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const restore = this.onCommit ? this.checkpoint() : undefined;
      const result = await operation();
      if (this.onCommit) {
        try {
          await this.onCommit(this);
        } catch (error) {
          console.error('❌ Error persistiendo el registro, revirtiendo la operación:', error);
          restore?.();
          throw error;
        }
      }
      return result;
    });
  }
}
