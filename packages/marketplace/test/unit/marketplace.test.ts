/**
 * Marketplace Facade — Unit Tests
 *
 * Tests for:
 *   - Operation events (a throwing handler is logged, never fatal)
 *   - Rollback and propagation of non-domain errors
 *   - Settlement configuration
 */

import { describe, it, expect, vi } from 'vitest';
import type { HeightSource } from '../../src/adapters/height-source.js';
import { InMemoryTransferAdapter, type TransferAdapter } from '../../src/adapters/transfer-adapter.js';
import {
  InMemoryMarketplaceStore,
  Marketplace,
  PLATFORM_FEE_PERCENT,
  type MarketplaceEvent,
} from '../../src/marketplace/index.js';
import { createLogger } from '../../src/utils/index.js';
import { CREATOR, FixedHeightSource, OWNER, STRANGER, createHarness, expectOk } from './fixtures.js';

describe('Marketplace events', () => {
  it('emits a committed event per successful operation', async () => {
    const { marketplace } = createHarness();
    const events: MarketplaceEvent[] = [];
    marketplace.onEvent((event) => events.push(event));

    expectOk(await marketplace.registerDataset(OWNER, 'Faces', 'ipfs://faces', 20, 'vision'));
    expectOk(await marketplace.depositFunds(CREATOR, 30));

    expect(events).toEqual([
      { type: 'OPERATION_COMMITTED', operation: 'registerDataset', caller: OWNER, value: 1, amount: undefined },
      { type: 'OPERATION_COMMITTED', operation: 'depositFunds', caller: CREATOR, value: true, amount: 30 },
    ]);
  });

  it('emits a rejected event with the failure', async () => {
    const { marketplace } = createHarness();
    const handler = vi.fn();
    marketplace.onEvent(handler);

    await marketplace.updateDataset(STRANGER, 5, 'x', 'y', 1, true, 'z');
    await marketplace.acceptTrainingJob('nobody', 1);

    expect(handler).toHaveBeenNthCalledWith(1, {
      type: 'OPERATION_REJECTED',
      operation: 'updateDataset',
      caller: STRANGER,
      error: { code: 'NotFound', message: 'dataset 5 does not exist' },
    });
    expect(handler).toHaveBeenNthCalledWith(2, {
      type: 'OPERATION_REJECTED',
      operation: 'acceptTrainingJob',
      caller: 'nobody',
      error: { code: 'InvalidParameters', message: 'caller must be a 0x-prefixed 20-byte address' },
    });
  });

  it('does not emit for read operations', async () => {
    const { marketplace } = createHarness();
    const handler = vi.fn();
    marketplace.onEvent(handler);

    await marketplace.getDataset(1);
    await marketplace.getTrainingJob(1);
    await marketplace.getUserBalance(CREATOR);

    expect(handler).not.toHaveBeenCalled();
  });

  it('keeps a committed result when a handler throws', async () => {
    const logger = createLogger({ level: 'silent', service: 'test' });
    const logError = vi.spyOn(logger, 'error');
    const marketplace = new Marketplace({
      store: new InMemoryMarketplaceStore(),
      heights: new FixedHeightSource(),
      transfers: new InMemoryTransferAdapter({ unlimited: true }),
      logger,
    });
    const after = vi.fn();
    marketplace.onEvent(() => {
      throw new Error('listener broke');
    });
    marketplace.onEvent(after);

    expect(await marketplace.registerDataset(OWNER, 'Faces', 'ipfs://faces', 20, 'vision')).toEqual({
      ok: true,
      value: 1,
    });
    expect((await marketplace.getDataset(1))?.name).toBe('Faces');
    expect(after).toHaveBeenCalledTimes(1);
    expect(logError).toHaveBeenCalledTimes(1);
  });
});

describe('non-domain failures', () => {
  it('rejects when the height source fails and stores nothing', async () => {
    const store = new InMemoryMarketplaceStore();
    const heights: HeightSource = { currentHeight: vi.fn(async () => Promise.reject(new Error('rpc down'))) };
    const marketplace = new Marketplace({ store, heights, transfers: new InMemoryTransferAdapter() });
    const handler = vi.fn();
    marketplace.onEvent(handler);

    await expect(marketplace.registerDataset(OWNER, 'Faces', 'ipfs://faces', 20, 'vision')).rejects.toThrow('rpc down');
    expect(store.counters().lastDatasetId).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });

  it('rolls back the debit when the transfer adapter throws', async () => {
    const transfers: TransferAdapter = {
      pull: async () => ({ ok: true, reference: 'ref-1' }),
      push: async () => {
        throw new Error('socket hang up');
      },
    };
    const marketplace = new Marketplace({
      store: new InMemoryMarketplaceStore(),
      heights: new FixedHeightSource(),
      transfers,
    });
    expectOk(await marketplace.depositFunds(CREATOR, 50));

    await expect(marketplace.withdrawFunds(CREATOR, 20)).rejects.toThrow('socket hang up');
    expect(await marketplace.getUserBalance(CREATOR)).toBe(50);
  });
});

describe('settlement configuration', () => {
  it('requires a treasury for release settlement', () => {
    expect(
      () =>
        new Marketplace({
          store: new InMemoryMarketplaceStore(),
          heights: new FixedHeightSource(),
          transfers: new InMemoryTransferAdapter(),
          settlement: { mode: 'release' },
        })
    ).toThrow('release settlement requires a valid treasury identity');
  });
});

describe('getPlatformFee', () => {
  it('returns the fixed platform percentage', () => {
    const { marketplace } = createHarness();
    expect(marketplace.getPlatformFee()).toBe(3);
    expect(PLATFORM_FEE_PERCENT).toBe(3);
  });
});
