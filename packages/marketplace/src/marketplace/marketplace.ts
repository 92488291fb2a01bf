/**
 * Marketplace
 *
 * Public operation surface. Every mutating operation:
 * 1. validates the caller identity
 * 2. runs its sub-model logic inside ONE store transaction
 * 3. commits on success, rolls back on any thrown error
 * 4. returns a tagged OperationResult for domain failures
 *
 * Errors that are not MarketplaceError (storage outages, broken invariants)
 * still roll back, then propagate as a rejected promise.
 */

import type { HeightSource } from '../adapters/height-source.js';
import type { TransferAdapter } from '../adapters/transfer-adapter.js';
import { createLogger, type Logger } from '../utils/index.js';
import { BalanceLedger } from './balance-ledger.js';
import { DatasetRegistry } from './dataset-registry.js';
import { MarketplaceError } from './errors.js';
import { JobLedger } from './job-ledger.js';
import type { MarketplaceStore, MarketplaceTransaction } from './persistence.js';
import {
  PLATFORM_FEE_PERCENT,
  type Dataset,
  type Identity,
  type MarketplaceFailure,
  type OperationName,
  type OperationResult,
  type SettlementPolicy,
  type TrainingJob,
} from './types.js';
import {
  normalizeIdentity,
  validateIdentity,
  validatePositiveAmount,
  validateRecordId,
} from './validation.js';

// =============================================================================
// EVENTS
// =============================================================================

export type MarketplaceEvent =
  | {
      type: 'OPERATION_COMMITTED';
      operation: OperationName;
      caller: Identity;
      value: number | boolean;
      amount?: number;          // Funds moved by deposit/withdraw
    }
  | {
      type: 'OPERATION_REJECTED';
      operation: OperationName;
      caller: string;
      error: MarketplaceFailure;
    };

export type EventHandler = (event: MarketplaceEvent) => void;

// =============================================================================
// OPTIONS
// =============================================================================

export interface MarketplaceOptions {
  store: MarketplaceStore;
  heights: HeightSource;
  transfers: TransferAdapter;
  settlement?: SettlementPolicy;
  logger?: Logger;              // Receives event handler failures
}

function resolveSettlement(policy: SettlementPolicy | undefined): SettlementPolicy {
  if (!policy || policy.mode === 'hold') return { mode: 'hold' };

  const treasury = policy.treasury ? normalizeIdentity(policy.treasury) : null;
  if (!treasury) {
    throw new Error('release settlement requires a valid treasury identity');
  }
  return { mode: 'release', treasury };
}

// =============================================================================
// MARKETPLACE
// =============================================================================

export class Marketplace {
  private store: MarketplaceStore;
  private heights: HeightSource;
  private datasets: DatasetRegistry;
  private balances: BalanceLedger;
  private jobs: JobLedger;
  private handlers: EventHandler[] = [];
  private logger: Logger;

  constructor(options: MarketplaceOptions) {
    const settlement = resolveSettlement(options.settlement);

    this.store = options.store;
    this.heights = options.heights;
    this.logger = options.logger ?? createLogger({ level: 'warn', service: 'marketplace' });
    this.datasets = new DatasetRegistry();
    this.balances = new BalanceLedger(options.transfers);
    this.jobs = new JobLedger(this.datasets, this.balances, settlement, PLATFORM_FEE_PERCENT);
  }

  onEvent(handler: EventHandler): void {
    this.handlers.push(handler);
  }

  // ===========================================================================
  // Dataset Registry
  // ===========================================================================

  registerDataset(
    caller: string,
    name: string,
    metadataUrl: string,
    pricePerUse: number,
    category: string
  ): Promise<OperationResult<number>> {
    return this.run('registerDataset', caller, async (tx, identity) =>
      this.datasets.register(
        tx,
        identity,
        { name, metadataUrl, pricePerUse, category },
        await this.heights.currentHeight()
      )
    );
  }

  updateDataset(
    caller: string,
    datasetId: number,
    name: string,
    metadataUrl: string,
    pricePerUse: number,
    active: boolean,
    category: string
  ): Promise<OperationResult<boolean>> {
    return this.run('updateDataset', caller, async (tx, identity) => {
      const id = validateRecordId(datasetId, 'datasetId');
      await this.datasets.update(tx, identity, id, { name, metadataUrl, pricePerUse, active, category });
      return true;
    });
  }

  async getDataset(datasetId: number): Promise<Dataset | null> {
    if (!Number.isSafeInteger(datasetId)) return null;
    return this.store.transaction((tx) => this.datasets.get(tx, datasetId));
  }

  // ===========================================================================
  // Job Ledger
  // ===========================================================================

  createTrainingJob(
    caller: string,
    name: string,
    datasetIds: readonly number[]
  ): Promise<OperationResult<number>> {
    return this.run('createTrainingJob', caller, async (tx, identity) =>
      this.jobs.create(tx, identity, name, datasetIds, await this.heights.currentHeight())
    );
  }

  acceptTrainingJob(caller: string, jobId: number): Promise<OperationResult<boolean>> {
    return this.run('acceptTrainingJob', caller, async (tx, identity) => {
      await this.jobs.accept(tx, identity, validateRecordId(jobId, 'jobId'));
      return true;
    });
  }

  completeTrainingJob(
    caller: string,
    jobId: number,
    resultUrl: string
  ): Promise<OperationResult<boolean>> {
    return this.run('completeTrainingJob', caller, async (tx, identity) => {
      const id = validateRecordId(jobId, 'jobId');
      await this.jobs.complete(tx, identity, id, resultUrl, await this.heights.currentHeight());
      return true;
    });
  }

  cancelTrainingJob(caller: string, jobId: number): Promise<OperationResult<boolean>> {
    return this.run('cancelTrainingJob', caller, async (tx, identity) => {
      const id = validateRecordId(jobId, 'jobId');
      await this.jobs.cancel(tx, identity, id, await this.heights.currentHeight());
      return true;
    });
  }

  async getTrainingJob(jobId: number): Promise<TrainingJob | null> {
    if (!Number.isSafeInteger(jobId)) return null;
    return this.store.transaction((tx) => this.jobs.get(tx, jobId));
  }

  // ===========================================================================
  // Balance Ledger
  // ===========================================================================

  async getUserBalance(identity: string): Promise<number> {
    const normalized = normalizeIdentity(identity);
    if (!normalized) return 0;
    return this.store.transaction((tx) => this.balances.balanceOf(tx, normalized));
  }

  depositFunds(caller: string, amount: number): Promise<OperationResult<boolean>> {
    return this.run(
      'depositFunds',
      caller,
      async (tx, identity) => {
        await this.balances.deposit(tx, identity, validatePositiveAmount(amount, 'amount'));
        return true;
      },
      amount
    );
  }

  withdrawFunds(caller: string, amount: number): Promise<OperationResult<boolean>> {
    return this.run(
      'withdrawFunds',
      caller,
      async (tx, identity) => {
        await this.balances.withdraw(tx, identity, validatePositiveAmount(amount, 'amount'));
        return true;
      },
      amount
    );
  }

  getPlatformFee(): number {
    return PLATFORM_FEE_PERCENT;
  }

  // ===========================================================================
  // PRIVATE
  // ===========================================================================

  private async run<T extends number | boolean>(
    operation: OperationName,
    caller: string,
    work: (tx: MarketplaceTransaction, identity: Identity) => Promise<T>,
    amount?: number
  ): Promise<OperationResult<T>> {
    let committed: { identity: Identity; value: T };
    try {
      const identity = validateIdentity(caller, 'caller');
      committed = { identity, value: await this.store.transaction((tx) => work(tx, identity)) };
    } catch (err) {
      if (!(err instanceof MarketplaceError)) throw err;
      const error = err.toFailure();
      this.emit({ type: 'OPERATION_REJECTED', operation, caller, error });
      return { ok: false, error };
    }

    const { identity, value } = committed;
    this.emit({ type: 'OPERATION_COMMITTED', operation, caller: identity, value, amount });
    return { ok: true, value };
  }

  // Handlers observe outcomes; a failing handler never changes one.
  private emit(event: MarketplaceEvent): void {
    for (const handler of this.handlers) {
      try {
        handler(event);
      } catch (err) {
        this.logger.error({ error: err, operation: event.operation }, 'Event handler failed');
      }
    }
  }
}
