/**
 * Dataset Registry
 *
 * Creates and updates dataset listings. Only the owner may change a listing;
 * ids, owners, creation heights and access counts are never rewritten here
 * except for the access bump on job completion.
 */

import { notAuthorized, notFound } from './errors.js';
import type { MarketplaceTransaction } from './persistence.js';
import {
  MAX_CATEGORY_LENGTH,
  MAX_NAME_LENGTH,
  MAX_URL_LENGTH,
  type Dataset,
  type DatasetInput,
  type DatasetUpdate,
  type Identity,
} from './types.js';
import {
  addAmounts,
  countOccurrences,
  validateAmount,
  validateBoolean,
  validateBoundedString,
} from './validation.js';

function validateListing(input: DatasetInput): DatasetInput {
  return {
    name: validateBoundedString(input.name, 'name', MAX_NAME_LENGTH),
    metadataUrl: validateBoundedString(input.metadataUrl, 'metadataUrl', MAX_URL_LENGTH),
    pricePerUse: validateAmount(input.pricePerUse, 'pricePerUse'),
    category: validateBoundedString(input.category, 'category', MAX_CATEGORY_LENGTH),
  };
}

export class DatasetRegistry {
  async register(
    tx: MarketplaceTransaction,
    caller: Identity,
    input: DatasetInput,
    height: number
  ): Promise<number> {
    const listing = validateListing(input);
    const id = await tx.nextId('lastDatasetId');

    await tx.saveDataset({
      id,
      owner: caller,
      ...listing,
      accessCount: 0,
      active: true,
      createdAt: height,
    });
    return id;
  }

  async update(
    tx: MarketplaceTransaction,
    caller: Identity,
    datasetId: number,
    update: DatasetUpdate
  ): Promise<void> {
    const existing = await this.require(tx, datasetId);
    if (existing.owner !== caller) {
      throw notAuthorized(`dataset ${datasetId} is owned by another identity`);
    }

    const listing = validateListing(update);
    await tx.saveDataset({
      ...existing,
      ...listing,
      active: validateBoolean(update.active, 'active'),
    });
  }

  async get(tx: MarketplaceTransaction, datasetId: number): Promise<Dataset | null> {
    return tx.loadDataset(datasetId);
  }

  async require(tx: MarketplaceTransaction, datasetId: number): Promise<Dataset> {
    const dataset = await tx.loadDataset(datasetId);
    if (!dataset) {
      throw notFound(`dataset ${datasetId} does not exist`);
    }
    return dataset;
  }

  /**
   * Bump access counts once per list entry.
   * Inactive datasets still count a job that was created while they were active.
   */
  async recordAccess(tx: MarketplaceTransaction, datasetIds: readonly number[]): Promise<void> {
    for (const [id, occurrences] of countOccurrences(datasetIds)) {
      const dataset = await this.require(tx, id);
      await tx.saveDataset({
        ...dataset,
        accessCount: addAmounts(dataset.accessCount, occurrences),
      });
    }
  }
}
