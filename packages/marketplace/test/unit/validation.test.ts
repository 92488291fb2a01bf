/**
 * Validation & Cost Aggregation — Unit Tests
 */

import { describe, it, expect, vi } from 'vitest';
import type { Dataset } from '../../src/marketplace/index.js';
import {
  addAmounts,
  allDatasetsAvailable,
  countOccurrences,
  entryPrices,
  normalizeIdentity,
  platformFee,
  resolveDatasets,
  sumCost,
  validateAmount,
  validateBoundedString,
  validateIdList,
  validateIdentity,
  validatePositiveAmount,
} from '../../src/marketplace/validation.js';
import { OWNER, failureOf } from './fixtures.js';

function dataset(id: number, pricePerUse: number, active = true): Dataset {
  return {
    id,
    owner: OWNER,
    name: `dataset-${id}`,
    metadataUrl: `ipfs://dataset-${id}`,
    category: 'vision',
    pricePerUse,
    accessCount: 0,
    active,
    createdAt: 1,
  };
}

// =============================================================================
// Identities
// =============================================================================

describe('normalizeIdentity', () => {
  it('lowercases an upper-case address', () => {
    expect(normalizeIdentity('0xABCDEF0000000000000000000000000000000000')).toBe(
      '0xabcdef0000000000000000000000000000000000'
    );
  });

  it('adds the 0x prefix when missing', () => {
    expect(normalizeIdentity('1111111111111111111111111111111111111111')).toBe(OWNER);
  });

  it('returns null for non-addresses', () => {
    expect(normalizeIdentity('alice')).toBeNull();
    expect(normalizeIdentity('0x1234')).toBeNull();
    expect(normalizeIdentity(42)).toBeNull();
    expect(normalizeIdentity(undefined)).toBeNull();
  });

  it('validateIdentity rejects with InvalidParameters', () => {
    expect(failureOf(() => validateIdentity('bob', 'caller'))).toEqual({
      code: 'InvalidParameters',
      message: 'caller must be a 0x-prefixed 20-byte address',
    });
  });
});

// =============================================================================
// Field validators
// =============================================================================

describe('field validators', () => {
  it('accepts a string at the length limit', () => {
    expect(validateBoundedString('x'.repeat(100), 'name', 100)).toBe('x'.repeat(100));
  });

  it('rejects a string one over the limit', () => {
    expect(failureOf(() => validateBoundedString('x'.repeat(101), 'name', 100))).toEqual({
      code: 'InvalidParameters',
      message: 'name must be at most 100 characters',
    });
  });

  it('accepts zero as an amount', () => {
    expect(validateAmount(0, 'pricePerUse')).toBe(0);
  });

  it('rejects negative, fractional and unsafe amounts', () => {
    for (const value of [-1, 1.5, Number.MAX_SAFE_INTEGER + 1, Number.NaN]) {
      expect(failureOf(() => validateAmount(value, 'pricePerUse')).code).toBe('InvalidParameters');
    }
  });

  it('rejects a zero positive amount', () => {
    expect(failureOf(() => validatePositiveAmount(0, 'amount'))).toEqual({
      code: 'InvalidParameters',
      message: 'amount must be greater than zero',
    });
  });

  it('names the offending list entry', () => {
    expect(failureOf(() => validateIdList([1, 2, '3'], 'datasetIds', 20))).toEqual({
      code: 'InvalidParameters',
      message: 'datasetIds[2] must be a non-negative safe integer',
    });
  });

  it('rejects lists over the entry limit', () => {
    const ids = Array.from({ length: 21 }, (_, i) => i + 1);
    expect(failureOf(() => validateIdList(ids, 'datasetIds', 20))).toEqual({
      code: 'InvalidParameters',
      message: 'datasetIds must contain at most 20 entries',
    });
  });

  it('rejects sums past the safe integer range', () => {
    expect(failureOf(() => addAmounts(Number.MAX_SAFE_INTEGER, 1)).code).toBe('InvalidParameters');
    expect(addAmounts(2, 3)).toBe(5);
  });
});

// =============================================================================
// Dataset list folds
// =============================================================================

describe('dataset list folds', () => {
  it('resolves every entry in order, loading each id once', async () => {
    const load = vi.fn(async (id: number) => (id === 1 ? dataset(1, 10) : null));

    const resolved = await resolveDatasets([1, 7, 1], load);

    expect(resolved.map((entry) => entry?.id ?? null)).toEqual([1, null, 1]);
    expect(load).toHaveBeenCalledTimes(2);
  });

  it('requires every entry to exist and be active', () => {
    expect(allDatasetsAvailable([])).toBe(true);
    expect(allDatasetsAvailable([dataset(1, 10), dataset(2, 5)])).toBe(true);
    expect(allDatasetsAvailable([dataset(1, 10), null])).toBe(false);
    expect(allDatasetsAvailable([dataset(1, 10), dataset(2, 5, false)])).toBe(false);
  });

  it('charges duplicates once per occurrence', () => {
    const a = dataset(1, 10);
    const b = dataset(2, 15);

    const prices = entryPrices([a, a, b]);

    expect(prices).toEqual([10, 10, 15]);
    expect(sumCost(prices)).toBe(35);
  });

  it('prices an unresolved entry at zero', () => {
    expect(entryPrices([dataset(1, 10), null])).toEqual([10, 0]);
  });

  it('counts occurrences in first-seen order', () => {
    expect([...countOccurrences([2, 1, 2])]).toEqual([
      [2, 2],
      [1, 1],
    ]);
  });
});

// =============================================================================
// Platform fee
// =============================================================================

describe('platformFee', () => {
  it('rounds the fee down', () => {
    expect(platformFee(20, 3)).toBe(0);
    expect(platformFee(99, 3)).toBe(2);
    expect(platformFee(100, 3)).toBe(3);
    expect(platformFee(150, 3)).toBe(4);
  });

  it('stays exact for amounts near the safe integer limit', () => {
    expect(platformFee(Number.MAX_SAFE_INTEGER, 3)).toBe(270215977642229);
  });
});
