/**
 * Marketplace Persistence Layer
 *
 * Three keyed collections (datasets, jobs, balances) plus two monotonic
 * counters, accessed only through transactions.
 *
 * Guarantees:
 * - Total order: transactions run one at a time
 * - Atomic: every write of a transaction commits, or none does
 * - Counters advance inside the same transaction as the insert
 * - Records are never deleted, only superseded in place
 */

import type { Dataset, Identity, TrainingJob } from './types.js';

// =============================================================================
// PERSISTENCE INTERFACE
// =============================================================================

export type CounterName = 'lastDatasetId' | 'lastJobId';

export interface MarketplaceTransaction {
  /**
   * Load a dataset by ID.
   * Returns null if not found.
   */
  loadDataset(id: number): Promise<Dataset | null>;

  /**
   * Insert or replace a dataset.
   */
  saveDataset(dataset: Dataset): Promise<void>;

  /**
   * Load a training job by ID.
   * Returns null if not found.
   */
  loadJob(id: number): Promise<TrainingJob | null>;

  /**
   * Insert or replace a training job.
   */
  saveJob(job: TrainingJob): Promise<void>;

  /**
   * Internal balance of an identity, 0 if it has none.
   */
  loadBalance(identity: Identity): Promise<number>;

  saveBalance(identity: Identity, amount: number): Promise<void>;

  /**
   * Increment a counter and return its new value.
   */
  nextId(counter: CounterName): Promise<number>;
}

export interface MarketplaceStore {
  /**
   * Run `work` as one atomic unit.
   * Commits when it resolves, rolls back when it rejects (and rethrows).
   */
  transaction<T>(work: (tx: MarketplaceTransaction) => Promise<T>): Promise<T>;

  close(): Promise<void>;
}

// =============================================================================
// IN-MEMORY IMPLEMENTATION
// =============================================================================

interface InMemoryState {
  datasets: Map<number, Dataset>;
  jobs: Map<number, TrainingJob>;
  balances: Map<Identity, number>;
  counters: Record<CounterName, number>;
}

/**
 * Writes are staged in an overlay and merged into the committed state only
 * after the transaction body resolves.
 */
class StagedTransaction implements MarketplaceTransaction {
  private datasets = new Map<number, Dataset>();
  private jobs = new Map<number, TrainingJob>();
  private balances = new Map<Identity, number>();
  private counters: Partial<Record<CounterName, number>> = {};

  constructor(private readonly committed: InMemoryState) {}

  async loadDataset(id: number): Promise<Dataset | null> {
    const record = this.datasets.get(id) ?? this.committed.datasets.get(id);
    return record ? structuredClone(record) : null;
  }

  async saveDataset(dataset: Dataset): Promise<void> {
    this.datasets.set(dataset.id, structuredClone(dataset));
  }

  async loadJob(id: number): Promise<TrainingJob | null> {
    const record = this.jobs.get(id) ?? this.committed.jobs.get(id);
    return record ? structuredClone(record) : null;
  }

  async saveJob(job: TrainingJob): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async loadBalance(identity: Identity): Promise<number> {
    return this.balances.get(identity) ?? this.committed.balances.get(identity) ?? 0;
  }

  async saveBalance(identity: Identity, amount: number): Promise<void> {
    if (amount < 0) {
      throw new Error(`Balance of ${identity} would become negative`);
    }
    this.balances.set(identity, amount);
  }

  async nextId(counter: CounterName): Promise<number> {
    const next = (this.counters[counter] ?? this.committed.counters[counter]) + 1;
    this.counters[counter] = next;
    return next;
  }

  commit(): void {
    for (const [id, dataset] of this.datasets) this.committed.datasets.set(id, dataset);
    for (const [id, job] of this.jobs) this.committed.jobs.set(id, job);
    for (const [identity, amount] of this.balances) this.committed.balances.set(identity, amount);
    Object.assign(this.committed.counters, this.counters);
  }
}

/**
 * In-memory store for development and tests.
 *
 * WARNING: Data is lost on restart.
 * Production should use PostgreSQL.
 */
export class InMemoryMarketplaceStore implements MarketplaceStore {
  private state: InMemoryState = {
    datasets: new Map(),
    jobs: new Map(),
    balances: new Map(),
    counters: { lastDatasetId: 0, lastJobId: 0 },
  };
  private tail: Promise<void> = Promise.resolve();

  transaction<T>(work: (tx: MarketplaceTransaction) => Promise<T>): Promise<T> {
    const run = this.tail.then(() => this.execute(work));
    // The caller observes the outcome through `run`; the queue only orders.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async close(): Promise<void> {}

  // For testing: committed counter values
  counters(): Record<CounterName, number> {
    return { ...this.state.counters };
  }

  private async execute<T>(work: (tx: MarketplaceTransaction) => Promise<T>): Promise<T> {
    const tx = new StagedTransaction(this.state);
    const result = await work(tx);
    tx.commit();
    return result;
  }
}
