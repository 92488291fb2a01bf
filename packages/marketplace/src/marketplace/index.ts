/**
 * Marketplace Ledger
 *
 * Dataset registry, job ledger and balance ledger over one transactional
 * store.
 *
 * Design invariants:
 * - Every operation commits whole or not at all
 * - Balances never go negative
 * - Job status only moves forward: Pending → Processing → Completed,
 *   or into Failed through cancellation with a full refund
 * - Job cost is the per-entry sum of dataset prices at creation
 */

// Type-only exports
export type {
  Identity,
  Dataset,
  DatasetInput,
  DatasetUpdate,
  JobStatus,
  TrainingJob,
  SettlementMode,
  SettlementPolicy,
  MarketplaceErrorCode,
  MarketplaceFailure,
  OperationResult,
  OperationName,
} from './types.js';

// Value exports from types
export {
  MAX_NAME_LENGTH,
  MAX_URL_LENGTH,
  MAX_CATEGORY_LENGTH,
  MAX_JOB_DATASETS,
  PLATFORM_FEE_PERCENT,
} from './types.js';

export { MarketplaceError } from './errors.js';

// Persistence
export type { CounterName, MarketplaceStore, MarketplaceTransaction } from './persistence.js';
export { InMemoryMarketplaceStore } from './persistence.js';

// Sub-models
export { DatasetRegistry } from './dataset-registry.js';
export { JobLedger, nextStatus } from './job-ledger.js';
export { BalanceLedger } from './balance-ledger.js';

// Facade
export type { MarketplaceEvent, EventHandler, MarketplaceOptions } from './marketplace.js';
export { Marketplace } from './marketplace.js';

// Helpers
export {
  normalizeIdentity,
  validateIdentity,
  resolveDatasets,
  allDatasetsAvailable,
  entryPrices,
  sumCost,
  countOccurrences,
  platformFee,
} from './validation.js';
