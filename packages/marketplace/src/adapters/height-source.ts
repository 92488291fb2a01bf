/**
 * Ledger height sources.
 *
 * Heights stamp `createdAt` / `completedAt`. They never decrease.
 */

import { ethers } from 'ethers';

export interface HeightSource {
  currentHeight(): Promise<number>;
}

/**
 * Height derived from wall-clock time since a genesis instant (the Unix
 * epoch by default, so heights keep growing across restarts).
 * Used when no RPC endpoint is configured.
 */
export class LocalHeightSource implements HeightSource {
  private last = 0;

  constructor(
    private readonly blockTimeMs: number = 1000,
    private readonly genesisMs: number = 0,
    private readonly now: () => number = Date.now
  ) {}

  async currentHeight(): Promise<number> {
    const height = Math.floor((this.now() - this.genesisMs) / this.blockTimeMs) + 1;
    this.last = Math.max(this.last, height);
    return this.last;
  }
}

/**
 * Block number of an EVM chain, read through an ethers provider.
 */
export class ChainHeightSource implements HeightSource {
  private last = 0;

  constructor(private readonly provider: Pick<ethers.Provider, 'getBlockNumber'>) {}

  async currentHeight(): Promise<number> {
    const block = await this.provider.getBlockNumber();
    this.last = Math.max(this.last, block);
    return this.last;
  }
}
