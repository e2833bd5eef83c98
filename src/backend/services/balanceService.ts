// Servicio de balances (fondos líquidos de cada dirección)
import { Address, getAddress, isAddressEqual } from 'viem';
import { LedgerError } from './storyErrors';

export interface FundsLedger {
  balanceOf(address: Address): Promise<bigint>;
  transfer(from: Address, to: Address, amount: bigint): Promise<void>;
  // Devuelve una función que restaura el estado actual
  checkpoint?(): () => void;
}

/**
 * Ledger de fondos en memoria. Los montos están en la unidad mínima y nunca son negativos.
 */
export class InMemoryFundsLedger implements FundsLedger {
  private readonly balances = new Map<Address, bigint>();

  constructor(initial: Iterable<[Address, bigint]> = []) {
    for (const [address, amount] of initial) {
      this.balances.set(getAddress(address), amount);
    }
  }

  async balanceOf(address: Address): Promise<bigint> {
    return this.balances.get(getAddress(address)) ?? 0n;
  }

  async transfer(from: Address, to: Address, amount: bigint): Promise<void> {
    if (amount <= 0n) {
      throw new LedgerError('non-positive-amount', 'El monto debe ser mayor que cero');
    }
    if (isAddressEqual(from, to)) {
      throw new LedgerError('sender-is-recipient', 'El remitente y el destinatario son la misma dirección');
    }

    const fromBalance = await this.balanceOf(from);
    if (fromBalance < amount) {
      throw new LedgerError(
        'insufficient-balance',
        `Balance insuficiente: ${from} tiene ${fromBalance} y necesita ${amount}`
      );
    }

    const toBalance = await this.balanceOf(to);
    this.balances.set(getAddress(from), fromBalance - amount);
    this.balances.set(getAddress(to), toBalance + amount);
  }

  /**
   * Acredita fondos a una dirección (faucet de desarrollo)
   */
  async credit(address: Address, amount: bigint): Promise<bigint> {
    if (amount <= 0n) {
      throw new LedgerError('non-positive-amount', 'El monto debe ser mayor que cero');
    }
    const balance = (await this.balanceOf(address)) + amount;
    this.balances.set(getAddress(address), balance);
    return balance;
  }

  checkpoint(): () => void {
    const saved = this.entries();
    return () => {
      this.balances.clear();
      for (const [address, amount] of saved) {
        this.balances.set(address, amount);
      }
    };
  }

  entries(): Array<[Address, bigint]> {
    return Array.from(this.balances.entries());
  }
}
