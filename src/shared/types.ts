import type { Address, Hex } from 'viem';

export interface Story {
  title: string;
  description: string;
  audioCid: Hex; // Hasta 64 bytes, opaco
  imageCid: Hex; // Hasta 64 bytes, opaco
  creator: Address;
  royaltyPercent: number; // Entero entre 0 y 100
}

// Datos que envía el creador al mintear; creator sale de la sesión
export type StoryInput = Omit<Story, 'creator'>;

// Forma en que una historia viaja por la API (bigint como string decimal)
export interface StoryResponse extends Story {
  tokenId: string;
}

export function toStoryResponse(tokenId: bigint, story: Story): StoryResponse {
  return { tokenId: tokenId.toString(), ...story };
}

export interface RegistrySnapshot {
  lastTokenId: string;
  stories: StoryResponse[];
  owners: Array<{ tokenId: string; owner: Address }>;
  balances: Array<{ address: Address; amount: string }>;
}
