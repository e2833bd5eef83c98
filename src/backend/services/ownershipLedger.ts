// Ledger de propiedad de los tokens (equivalente a un contrato NFT)
import { Address, getAddress, isAddressEqual } from 'viem';
import { LedgerError } from './storyErrors';

export interface OwnershipLedger {
  mint(tokenId: bigint, owner: Address): Promise<void>;
  transfer(tokenId: bigint, from: Address, to: Address): Promise<void>;
  ownerOf(tokenId: bigint): Promise<Address | undefined>;
  // Devuelve una función que restaura el estado actual
  checkpoint?(): () => void;
}

/**
 * Implementación en memoria. Un token tiene exactamente un dueño desde que se mintea.
 */
export class InMemoryOwnershipLedger implements OwnershipLedger {
  private readonly owners = new Map<bigint, Address>();

  constructor(initial: Iterable<[bigint, Address]> = []) {
    for (const [tokenId, owner] of initial) {
      this.owners.set(tokenId, getAddress(owner));
    }
  }

  async mint(tokenId: bigint, owner: Address): Promise<void> {
    if (this.owners.has(tokenId)) {
      throw new LedgerError('token-exists', `El token ${tokenId} ya existe`);
    }
    this.owners.set(tokenId, getAddress(owner));
  }

  async transfer(tokenId: bigint, from: Address, to: Address): Promise<void> {
    const owner = this.owners.get(tokenId);
    if (!owner) {
      throw new LedgerError('token-not-found', `El token ${tokenId} no existe`);
    }
    if (isAddressEqual(from, to)) {
      throw new LedgerError('sender-is-recipient', 'El remitente y el destinatario son la misma dirección');
    }
    if (!isAddressEqual(owner, from)) {
      throw new LedgerError('not-owner', `${from} no es dueño del token ${tokenId}`);
    }
    this.owners.set(tokenId, getAddress(to));
  }

  async ownerOf(tokenId: bigint): Promise<Address | undefined> {
    return this.owners.get(tokenId);
  }

  checkpoint(): () => void {
    const saved = this.entries();
    return () => {
      this.owners.clear();
      for (const [tokenId, owner] of saved) {
        this.owners.set(tokenId, owner);
      }
    };
  }

  entries(): Array<[bigint, Address]> {
    return Array.from(this.owners.entries());
  }
}
