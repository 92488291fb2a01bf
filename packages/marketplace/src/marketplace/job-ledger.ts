/**
 * Job Ledger
 *
 * Training job lifecycle and the balance movements bound to it.
 *
 *   Pending --accept--> Processing --complete--> Completed
 *   Pending --cancel (creator)--> Failed
 *   Processing --cancel (provider)--> Failed
 *
 * Escrow: `totalCost` is debited from the creator at creation. Cancellation
 * refunds it in full. Completion releases it according to the settlement
 * policy.
 */

import type { BalanceLedger } from './balance-ledger.js';
import type { DatasetRegistry } from './dataset-registry.js';
import { invalidParameters, notAuthorized, notFound } from './errors.js';
import type { MarketplaceTransaction } from './persistence.js';
import {
  MAX_JOB_DATASETS,
  MAX_NAME_LENGTH,
  MAX_URL_LENGTH,
  type Identity,
  type JobStatus,
  type SettlementPolicy,
  type TrainingJob,
} from './types.js';
import {
  addAmounts,
  allDatasetsAvailable,
  entryPrices,
  platformFee,
  resolveDatasets,
  sumCost,
  validateBoundedString,
  validateIdList,
} from './validation.js';

// =============================================================================
// STATUS TRANSITIONS
// =============================================================================

type JobAction = 'accept' | 'complete' | 'cancel';

function assertNever(value: never): never {
  throw new Error(`Unexpected job status: ${String(value)}`);
}

/**
 * Status a job moves to when `action` is applied, or null when the action is
 * not allowed from `status`.
 */
export function nextStatus(status: JobStatus, action: JobAction): JobStatus | null {
  switch (status) {
    case 'Pending':
      if (action === 'accept') return 'Processing';
      if (action === 'cancel') return 'Failed';
      return null;
    case 'Processing':
      if (action === 'complete') return 'Completed';
      if (action === 'cancel') return 'Failed';
      return null;
    case 'Completed':
    case 'Failed':
      return null;
    default:
      return assertNever(status);
  }
}

function transition(job: TrainingJob, action: JobAction): JobStatus {
  const next = nextStatus(job.status, action);
  if (!next) {
    throw invalidParameters(`cannot ${action} job ${job.id} in status ${job.status}`);
  }
  return next;
}

// =============================================================================
// JOB LEDGER
// =============================================================================

export class JobLedger {
  constructor(
    private readonly datasets: DatasetRegistry,
    private readonly balances: BalanceLedger,
    private readonly settlement: SettlementPolicy,
    private readonly feePercent: number
  ) {}

  async create(
    tx: MarketplaceTransaction,
    caller: Identity,
    name: string,
    datasetIds: readonly number[],
    height: number
  ): Promise<number> {
    const jobName = validateBoundedString(name, 'name', MAX_NAME_LENGTH);
    const ids = validateIdList(datasetIds, 'datasetIds', MAX_JOB_DATASETS);

    const resolved = await resolveDatasets(ids, (id) => this.datasets.get(tx, id));
    if (!allDatasetsAvailable(resolved)) {
      throw notFound('every referenced dataset must exist and be active');
    }

    const prices = entryPrices(resolved);
    const totalCost = sumCost(prices);

    // Escrow hold
    await this.balances.debit(tx, caller, totalCost);

    const id = await tx.nextId('lastJobId');
    await tx.saveJob({
      id,
      creator: caller,
      name: jobName,
      datasetIds: ids,
      entryPrices: prices,
      computationProvider: null,
      status: 'Pending',
      resultUrl: null,
      totalCost,
      createdAt: height,
      completedAt: null,
    });
    return id;
  }

  async accept(tx: MarketplaceTransaction, caller: Identity, jobId: number): Promise<void> {
    const job = await this.require(tx, jobId);
    const status = transition(job, 'accept');

    await tx.saveJob({ ...job, computationProvider: caller, status });
  }

  async complete(
    tx: MarketplaceTransaction,
    caller: Identity,
    jobId: number,
    resultUrl: string,
    height: number
  ): Promise<void> {
    const job = await this.require(tx, jobId);
    if (job.computationProvider !== caller) {
      throw notAuthorized(`job ${jobId} is not assigned to the caller`);
    }
    const status = transition(job, 'complete');
    const url = validateBoundedString(resultUrl, 'resultUrl', MAX_URL_LENGTH);

    await tx.saveJob({ ...job, status, resultUrl: url, completedAt: height });
    await this.datasets.recordAccess(tx, job.datasetIds);

    if (this.settlement.mode === 'release') {
      await this.release(tx, job);
    }
  }

  async cancel(
    tx: MarketplaceTransaction,
    caller: Identity,
    jobId: number,
    height: number
  ): Promise<void> {
    const job = await this.require(tx, jobId);
    const status = transition(job, 'cancel');

    // Pending jobs belong to their creator, accepted ones to their provider.
    const owner = job.status === 'Pending' ? job.creator : job.computationProvider;
    if (owner !== caller) {
      throw notAuthorized(`caller may not cancel job ${jobId} in status ${job.status}`);
    }

    await tx.saveJob({ ...job, status, completedAt: height });
    await this.balances.credit(tx, job.creator, job.totalCost);
  }

  async get(tx: MarketplaceTransaction, jobId: number): Promise<TrainingJob | null> {
    return tx.loadJob(jobId);
  }

  private async require(tx: MarketplaceTransaction, jobId: number): Promise<TrainingJob> {
    const job = await tx.loadJob(jobId);
    if (!job) {
      throw notFound(`training job ${jobId} does not exist`);
    }
    return job;
  }

  /**
   * Pay each entry's price to its dataset owner, less the platform fee,
   * which goes to the treasury. Credits sum to `totalCost`.
   */
  private async release(tx: MarketplaceTransaction, job: TrainingJob): Promise<void> {
    const treasury = this.settlement.treasury;
    if (!treasury) {
      throw new Error('release settlement requires a treasury identity');
    }

    const credits = new Map<Identity, number>();
    for (let i = 0; i < job.datasetIds.length; i++) {
      const dataset = await this.datasets.require(tx, job.datasetIds[i]);
      const price = job.entryPrices[i] ?? 0;
      const fee = platformFee(price, this.feePercent);
      credits.set(dataset.owner, addAmounts(credits.get(dataset.owner) ?? 0, price - fee));
      credits.set(treasury, addAmounts(credits.get(treasury) ?? 0, fee));
    }

    for (const [identity, amount] of credits) {
      if (amount > 0) {
        await this.balances.credit(tx, identity, amount);
      }
    }
  }
}
