/**
 * Balance Ledger
 *
 * Per-identity internal balances. Mutated by job escrow, refunds and
 * settlement (through the job ledger) and by deposits and withdrawals.
 */

import type { TransferAdapter } from '../adapters/transfer-adapter.js';
import { insufficientFunds, paymentFailed } from './errors.js';
import type { MarketplaceTransaction } from './persistence.js';
import type { Identity } from './types.js';
import { addAmounts } from './validation.js';

export class BalanceLedger {
  constructor(private readonly transfers: TransferAdapter) {}

  async balanceOf(tx: MarketplaceTransaction, identity: Identity): Promise<number> {
    return tx.loadBalance(identity);
  }

  async credit(tx: MarketplaceTransaction, identity: Identity, amount: number): Promise<number> {
    const balance = addAmounts(await tx.loadBalance(identity), amount);
    await tx.saveBalance(identity, balance);
    return balance;
  }

  async debit(tx: MarketplaceTransaction, identity: Identity, amount: number): Promise<number> {
    const current = await tx.loadBalance(identity);
    if (current < amount) {
      throw insufficientFunds(`balance ${current} is below required ${amount}`);
    }
    const balance = current - amount;
    await tx.saveBalance(identity, balance);
    return balance;
  }

  /**
   * Credit `amount` to the caller, pulling it from their external holding.
   * The new balance is computed before the pull, so the pull is the last
   * step that can fail.
   */
  async deposit(tx: MarketplaceTransaction, caller: Identity, amount: number): Promise<void> {
    const balance = addAmounts(await tx.loadBalance(caller), amount);

    const transfer = await this.transfers.pull(caller, amount);
    if (!transfer.ok) {
      throw paymentFailed(`deposit transfer rejected: ${transfer.reason}`);
    }
    await tx.saveBalance(caller, balance);
  }

  /**
   * Debit first, then push funds out. A rejected push fails the transaction,
   * which discards the debit.
   */
  async withdraw(tx: MarketplaceTransaction, caller: Identity, amount: number): Promise<void> {
    await this.debit(tx, caller, amount);
    const transfer = await this.transfers.push(caller, amount);
    if (!transfer.ok) {
      throw paymentFailed(`withdrawal transfer rejected: ${transfer.reason}`);
    }
  }
}
