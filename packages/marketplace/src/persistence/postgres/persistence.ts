/**
 * PostgreSQL Marketplace Persistence
 *
 * Implements MarketplaceStore using PostgreSQL.
 *
 * Guarantees:
 * - One BEGIN/COMMIT per operation on a single pooled client
 * - Total order: every transaction takes the same advisory lock first
 * - ROLLBACK on any error thrown by the operation
 * - Counters incremented in the same transaction as the insert
 */

import { readFile } from 'node:fs/promises';
import { Pool, type PoolClient } from 'pg';
import type {
  CounterName,
  Dataset,
  Identity,
  JobStatus,
  MarketplaceStore,
  MarketplaceTransaction,
  TrainingJob,
} from '../../marketplace/index.js';

/** Advisory lock key shared by every marketplace transaction. */
const MARKETPLACE_LOCK_KEY = 7_340_021;

const SCHEMA_URL = new URL('./schema.sql', import.meta.url);

// =============================================================================
// ROW TYPES (BIGINT columns arrive as strings)
// =============================================================================

interface DatasetRow {
  id: string;
  owner: string;
  name: string;
  metadata_url: string;
  category: string;
  price_per_use: string;
  access_count: string;
  active: boolean;
  created_at: string;
}

interface JobRow {
  id: string;
  creator: string;
  name: string;
  dataset_ids: string[];
  entry_prices: string[];
  computation_provider: string | null;
  status: string;
  result_url: string | null;
  total_cost: string;
  created_at: string;
  completed_at: string | null;
}

const JOB_STATUSES: readonly JobStatus[] = ['Pending', 'Processing', 'Completed', 'Failed'];

function toJobStatus(value: string): JobStatus {
  const status = JOB_STATUSES.find((candidate) => candidate === value);
  if (!status) {
    throw new Error(`Unknown job status in database: ${value}`);
  }
  return status;
}

// =============================================================================
// TRANSACTION
// =============================================================================

class PostgresTransaction implements MarketplaceTransaction {
  constructor(private readonly client: PoolClient) {}

  async loadDataset(id: number): Promise<Dataset | null> {
    const query = `
      SELECT id, owner, name, metadata_url, category,
             price_per_use, access_count, active, created_at
      FROM datasets
      WHERE id = $1
    `;
    const result = await this.client.query<DatasetRow>(query, [id]);
    return result.rows.length > 0 ? this.rowToDataset(result.rows[0]) : null;
  }

  async saveDataset(dataset: Dataset): Promise<void> {
    const query = `
      INSERT INTO datasets (
        id, owner, name, metadata_url, category,
        price_per_use, access_count, active, created_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
      ON CONFLICT (id) DO UPDATE SET
        name = EXCLUDED.name,
        metadata_url = EXCLUDED.metadata_url,
        category = EXCLUDED.category,
        price_per_use = EXCLUDED.price_per_use,
        access_count = EXCLUDED.access_count,
        active = EXCLUDED.active
    `;
    await this.client.query(query, [
      dataset.id,
      dataset.owner,
      dataset.name,
      dataset.metadataUrl,
      dataset.category,
      dataset.pricePerUse,
      dataset.accessCount,
      dataset.active,
      dataset.createdAt,
    ]);
  }

  async loadJob(id: number): Promise<TrainingJob | null> {
    const query = `
      SELECT id, creator, name, dataset_ids, entry_prices,
             computation_provider, status, result_url,
             total_cost, created_at, completed_at
      FROM training_jobs
      WHERE id = $1
    `;
    const result = await this.client.query<JobRow>(query, [id]);
    return result.rows.length > 0 ? this.rowToJob(result.rows[0]) : null;
  }

  async saveJob(job: TrainingJob): Promise<void> {
    // creator, dataset list, prices and created_at are immutable after insert
    const query = `
      INSERT INTO training_jobs (
        id, creator, name, dataset_ids, entry_prices,
        computation_provider, status, result_url,
        total_cost, created_at, completed_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
      ON CONFLICT (id) DO UPDATE SET
        computation_provider = EXCLUDED.computation_provider,
        status = EXCLUDED.status,
        result_url = EXCLUDED.result_url,
        completed_at = EXCLUDED.completed_at
    `;
    await this.client.query(query, [
      job.id,
      job.creator,
      job.name,
      job.datasetIds,
      job.entryPrices,
      job.computationProvider,
      job.status,
      job.resultUrl,
      job.totalCost,
      job.createdAt,
      job.completedAt,
    ]);
  }

  async loadBalance(identity: Identity): Promise<number> {
    const result = await this.client.query<{ amount: string }>(
      'SELECT amount FROM balances WHERE identity = $1',
      [identity]
    );
    return result.rows.length > 0 ? Number(result.rows[0].amount) : 0;
  }

  async saveBalance(identity: Identity, amount: number): Promise<void> {
    const query = `
      INSERT INTO balances (identity, amount) VALUES ($1, $2)
      ON CONFLICT (identity) DO UPDATE SET amount = EXCLUDED.amount
    `;
    await this.client.query(query, [identity, amount]);
  }

  async nextId(counter: CounterName): Promise<number> {
    const result = await this.client.query<{ value: string }>(
      'UPDATE counters SET value = value + 1 WHERE name = $1 RETURNING value',
      [counter]
    );
    if (result.rows.length === 0) {
      throw new Error(`Counter ${counter} missing; run migrate() first`);
    }
    return Number(result.rows[0].value);
  }

  // ===========================================================================
  // PRIVATE: Row mapping
  // ===========================================================================

  private rowToDataset(row: DatasetRow): Dataset {
    return {
      id: Number(row.id),
      owner: row.owner,
      name: row.name,
      metadataUrl: row.metadata_url,
      category: row.category,
      pricePerUse: Number(row.price_per_use),
      accessCount: Number(row.access_count),
      active: row.active,
      createdAt: Number(row.created_at),
    };
  }

  private rowToJob(row: JobRow): TrainingJob {
    return {
      id: Number(row.id),
      creator: row.creator,
      name: row.name,
      datasetIds: row.dataset_ids.map(Number),
      entryPrices: row.entry_prices.map(Number),
      computationProvider: row.computation_provider,
      status: toJobStatus(row.status),
      resultUrl: row.result_url,
      totalCost: Number(row.total_cost),
      createdAt: Number(row.created_at),
      completedAt: row.completed_at === null ? null : Number(row.completed_at),
    };
  }
}

// =============================================================================
// POSTGRESQL STORE
// =============================================================================

export class PostgresMarketplaceStore implements MarketplaceStore {
  private pool: Pool;

  constructor(pool: Pool) {
    this.pool = pool;
  }

  /**
   * Create tables and seed counters.
   */
  async migrate(): Promise<void> {
    const schema = await readFile(SCHEMA_URL, 'utf8');
    await this.pool.query(schema);
  }

  async transaction<T>(work: (tx: MarketplaceTransaction) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock($1)', [MARKETPLACE_LOCK_KEY]);
      const result = await work(new PostgresTransaction(client));
      await client.query('COMMIT');
      return result;
    } catch (error: unknown) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

// =============================================================================
// FACTORY FUNCTION
// =============================================================================

export function createPostgresStore(connectionString: string): PostgresMarketplaceStore {
  const pool = new Pool({ connectionString });
  return new PostgresMarketplaceStore(pool);
}
