import type { AppConfig } from './config';
import { InMemoryFundsLedger } from './services/balanceService';
import { InMemoryOwnershipLedger } from './services/ownershipLedger';
import {
  EMPTY_STATE,
  buildRegistrySnapshot,
  loadRegistryState,
  saveRegistrySnapshot,
} from './services/registryRepository';
import { StoryRegistry } from './services/storyRegistry';

export interface OpenedRegistry {
  registry: StoryRegistry;
  ownership: InMemoryOwnershipLedger;
  funds: InMemoryFundsLedger;
}

/**
 * Arma el registro con sus ledgers. Con STORY_DATA_FILE carga el estado
 * guardado y lo reescribe después de cada operación.
 */
export async function openStoryRegistry(config: Pick<AppConfig, 'tokenUri' | 'dataFile'>): Promise<OpenedRegistry> {
  const { dataFile } = config;
  const state = dataFile ? await loadRegistryState(dataFile) : EMPTY_STATE;

  const ownership = new InMemoryOwnershipLedger(state.owners);
  const funds = new InMemoryFundsLedger(state.balances);
  const registry = new StoryRegistry({
    ownership,
    funds,
    tokenUri: config.tokenUri,
    lastTokenId: state.lastTokenId,
    stories: state.stories,
    onCommit: dataFile
      ? (current) => saveRegistrySnapshot(dataFile, buildRegistrySnapshot(current, ownership, funds))
      : undefined,
  });

  if (dataFile) {
    console.log(`💾 Registro persistido en ${dataFile} (último token: ${state.lastTokenId})`);
  } else {
    console.warn('⚠️  STORY_DATA_FILE no está configurado. El registro vive solo en memoria.');
  }

  return { registry, ownership, funds };
}
