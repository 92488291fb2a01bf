/**
 * Shared validation and cost aggregation.
 *
 * Validators throw MarketplaceError('InvalidParameters') and return the
 * normalized value. Cost helpers fold over a job's dataset list in its given
 * order, one step per entry, so repeated ids are charged once per occurrence.
 */

import { ethers } from 'ethers';
import { invalidParameters } from './errors.js';
import type { Dataset, Identity } from './types.js';

// =============================================================================
// FIELD VALIDATORS
// =============================================================================

/** Lowercase address, or null when `value` is not one. */
export function normalizeIdentity(value: unknown): Identity | null {
  if (typeof value !== 'string' || !ethers.isAddress(value)) return null;
  return ethers.getAddress(value).toLowerCase();
}

export function validateIdentity(value: unknown, fieldName: string): Identity {
  const identity = normalizeIdentity(value);
  if (!identity) {
    throw invalidParameters(`${fieldName} must be a 0x-prefixed 20-byte address`);
  }
  return identity;
}

export function validateBoundedString(value: unknown, fieldName: string, maxLength: number): string {
  if (typeof value !== 'string') {
    throw invalidParameters(`${fieldName} must be a string`);
  }
  if (value.length > maxLength) {
    throw invalidParameters(`${fieldName} must be at most ${maxLength} characters`);
  }
  return value;
}

export function validateAmount(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
    throw invalidParameters(`${fieldName} must be a non-negative safe integer`);
  }
  return value;
}

export function validatePositiveAmount(value: unknown, fieldName: string): number {
  const amount = validateAmount(value, fieldName);
  if (amount === 0) {
    throw invalidParameters(`${fieldName} must be greater than zero`);
  }
  return amount;
}

export function validateRecordId(value: unknown, fieldName: string): number {
  return validateAmount(value, fieldName);
}

export function validateBoolean(value: unknown, fieldName: string): boolean {
  if (typeof value !== 'boolean') {
    throw invalidParameters(`${fieldName} must be a boolean`);
  }
  return value;
}

export function validateIdList(value: unknown, fieldName: string, maxLength: number): number[] {
  if (!Array.isArray(value)) {
    throw invalidParameters(`${fieldName} must be an array`);
  }
  if (value.length > maxLength) {
    throw invalidParameters(`${fieldName} must contain at most ${maxLength} entries`);
  }
  const ids: number[] = [];
  for (let i = 0; i < value.length; i++) {
    ids.push(validateRecordId(value[i], `${fieldName}[${i}]`));
  }
  return ids;
}

// =============================================================================
// ARITHMETIC
// =============================================================================

export function addAmounts(a: number, b: number): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw invalidParameters('amount exceeds the maximum representable balance');
  }
  return sum;
}

// =============================================================================
// DATASET LIST FOLDS
// =============================================================================

/**
 * Resolve every entry of a dataset list, in order.
 * Missing ids resolve to null. Each distinct id is loaded once.
 */
export async function resolveDatasets(
  ids: readonly number[],
  load: (id: number) => Promise<Dataset | null>
): Promise<Array<Dataset | null>> {
  const cache = new Map<number, Dataset | null>();
  const resolved: Array<Dataset | null> = [];
  for (const id of ids) {
    if (!cache.has(id)) {
      cache.set(id, await load(id));
    }
    resolved.push(cache.get(id) ?? null);
  }
  return resolved;
}

/** Conjunction over the list: every entry exists and is active. */
export function allDatasetsAvailable(datasets: ReadonlyArray<Dataset | null>): boolean {
  return datasets.reduce<boolean>(
    (available, dataset) => available && dataset !== null && dataset.active,
    true
  );
}

/** Per-entry price; an unresolved entry contributes nothing. */
export function entryPrices(datasets: ReadonlyArray<Dataset | null>): number[] {
  return datasets.map((dataset) => (dataset ? dataset.pricePerUse : 0));
}

export function sumCost(prices: readonly number[]): number {
  return prices.reduce((total, price) => addAmounts(total, price), 0);
}

/**
 * Occurrences per dataset id, in first-seen order.
 * Used to bump access counts once per entry.
 */
export function countOccurrences(ids: readonly number[]): Map<number, number> {
  const counts = new Map<number, number>();
  for (const id of ids) {
    counts.set(id, (counts.get(id) ?? 0) + 1);
  }
  return counts;
}

/**
 * Platform share of a single payment, rounded down.
 * Split into hundreds and remainder so large amounts stay exact.
 */
export function platformFee(amount: number, percent: number): number {
  const hundreds = Math.floor(amount / 100);
  const remainder = amount % 100;
  return hundreds * percent + Math.floor((remainder * percent) / 100);
}
