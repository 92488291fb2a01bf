/**
 * Shared fixtures for marketplace unit tests.
 */

import type { HeightSource } from '../../src/adapters/height-source.js';
import { InMemoryTransferAdapter } from '../../src/adapters/transfer-adapter.js';
import {
  InMemoryMarketplaceStore,
  Marketplace,
  MarketplaceError,
  type MarketplaceFailure,
  type OperationResult,
  type SettlementPolicy,
} from '../../src/marketplace/index.js';

export const OWNER = '0x1111111111111111111111111111111111111111';
export const CREATOR = '0x2222222222222222222222222222222222222222';
export const PROVIDER = '0x3333333333333333333333333333333333333333';
export const STRANGER = '0x4444444444444444444444444444444444444444';
export const SECOND_OWNER = '0x5555555555555555555555555555555555555555';
export const TREASURY = '0x9999999999999999999999999999999999999999';

export class FixedHeightSource implements HeightSource {
  constructor(public height: number = 100) {}

  async currentHeight(): Promise<number> {
    return this.height;
  }
}

export interface MarketplaceHarness {
  marketplace: Marketplace;
  store: InMemoryMarketplaceStore;
  heights: FixedHeightSource;
  transfers: InMemoryTransferAdapter;
}

export function createHarness(settlement?: SettlementPolicy): MarketplaceHarness {
  const store = new InMemoryMarketplaceStore();
  const heights = new FixedHeightSource();
  const transfers = new InMemoryTransferAdapter({ unlimited: true });
  const marketplace = new Marketplace({ store, heights, transfers, settlement });
  return { marketplace, store, heights, transfers };
}

export function expectOk<T>(result: OperationResult<T>): T {
  if (!result.ok) {
    throw new Error(`expected success, got ${result.error.code}: ${result.error.message}`);
  }
  return result.value;
}

export function expectFailure<T>(result: OperationResult<T>): MarketplaceFailure {
  if (result.ok) {
    throw new Error(`expected failure, got ${String(result.value)}`);
  }
  return result.error;
}

/** Failure raised synchronously by `fn`. */
export function failureOf(fn: () => unknown): MarketplaceFailure {
  try {
    fn();
  } catch (err) {
    if (err instanceof MarketplaceError) return err.toFailure();
    throw err;
  }
  throw new Error('expected a MarketplaceError');
}
