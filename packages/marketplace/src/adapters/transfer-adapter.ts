/**
 * External value-transfer adapters.
 *
 * `pull` moves funds from a participant's external holding into marketplace
 * custody (deposit); `push` moves them back out (withdraw). Failures resolve
 * to `{ ok: false }` rather than rejecting, so the balance ledger can map
 * them to PaymentFailed and roll back.
 */

import { ethers } from 'ethers';
import { v4 as uuidv4 } from 'uuid';
import type { Identity } from '../marketplace/types.js';

// =============================================================================
// INTERFACE
// =============================================================================

export type TransferResult =
  | { ok: true; reference: string }
  | { ok: false; reason: string };

export interface TransferAdapter {
  pull(from: Identity, amount: number): Promise<TransferResult>;
  push(to: Identity, amount: number): Promise<TransferResult>;
}

// =============================================================================
// IN-MEMORY ADAPTER
// =============================================================================

export interface InMemoryTransferOptions {
  /** Accept every pull regardless of external holdings (local development). */
  unlimited?: boolean;
}

export class InMemoryTransferAdapter implements TransferAdapter {
  private holdings = new Map<Identity, number>();
  private unlimited: boolean;

  constructor(options: InMemoryTransferOptions = {}) {
    this.unlimited = options.unlimited ?? false;
  }

  fund(identity: Identity, amount: number): void {
    this.holdings.set(identity, this.holdingOf(identity) + amount);
  }

  holdingOf(identity: Identity): number {
    return this.holdings.get(identity) ?? 0;
  }

  async pull(from: Identity, amount: number): Promise<TransferResult> {
    if (!this.unlimited) {
      const holding = this.holdingOf(from);
      if (holding < amount) {
        return { ok: false, reason: `external holding of ${from} is ${holding}, needs ${amount}` };
      }
      this.holdings.set(from, holding - amount);
    }
    return { ok: true, reference: uuidv4() };
  }

  async push(to: Identity, amount: number): Promise<TransferResult> {
    this.fund(to, amount);
    return { ok: true, reference: uuidv4() };
  }
}

// =============================================================================
// ERC-20 ADAPTER
// =============================================================================

const ERC20_ABI = [
  'function transfer(address to, uint256 amount) returns (bool)',
  'function transferFrom(address from, address to, uint256 amount) returns (bool)',
] as const;

interface MinedTransaction {
  wait(confirmations?: number): Promise<{ hash: string; status: number | null } | null>;
}

/**
 * The two token calls the adapter needs.
 * Built from an ethers Contract by `Erc20TransferAdapter.fromContract`.
 */
export interface Erc20Methods {
  transfer(to: string, amount: bigint): Promise<MinedTransaction>;
  transferFrom(from: string, to: string, amount: bigint): Promise<MinedTransaction>;
}

/**
 * Moves an ERC-20 token between participants and a custody wallet.
 * Deposits need a prior `approve` from the participant to the custody address.
 */
export class Erc20TransferAdapter implements TransferAdapter {
  constructor(
    private readonly token: Erc20Methods,
    private readonly custodyAddress: string,
    private readonly confirmations: number = 1
  ) {}

  static fromContract(
    tokenAddress: string,
    custody: ethers.Wallet,
    confirmations?: number
  ): Erc20TransferAdapter {
    const contract = new ethers.Contract(tokenAddress, ERC20_ABI, custody);
    const transfer = contract.getFunction('transfer');
    const transferFrom = contract.getFunction('transferFrom');
    return new Erc20TransferAdapter(
      {
        transfer: (to, amount) => transfer.send(to, amount),
        transferFrom: (from, to, amount) => transferFrom.send(from, to, amount),
      },
      custody.address,
      confirmations
    );
  }

  async pull(from: Identity, amount: number): Promise<TransferResult> {
    return this.settle(() => this.token.transferFrom(from, this.custodyAddress, BigInt(amount)));
  }

  async push(to: Identity, amount: number): Promise<TransferResult> {
    return this.settle(() => this.token.transfer(to, BigInt(amount)));
  }

  private async settle(submit: () => Promise<MinedTransaction>): Promise<TransferResult> {
    try {
      const tx = await submit();
      const receipt = await tx.wait(this.confirmations);
      if (!receipt || receipt.status !== 1) {
        return { ok: false, reason: 'token transfer reverted' };
      }
      return { ok: true, reference: receipt.hash };
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    }
  }
}
