/**
 * Marketplace Types
 *
 * Records, error kinds and operation results shared by the dataset registry,
 * the job ledger and the balance ledger.
 */

// =============================================================================
// IDENTITY
// =============================================================================

/**
 * Authenticated principal issuing an operation.
 * Always a lowercase 0x-prefixed 20-byte hex address once validated.
 */
export type Identity = string;

// =============================================================================
// LIMITS
// =============================================================================

export const MAX_NAME_LENGTH = 100;
export const MAX_URL_LENGTH = 256;
export const MAX_CATEGORY_LENGTH = 50;
export const MAX_JOB_DATASETS = 20;

/** Percentage the platform keeps from each dataset payment on release. */
export const PLATFORM_FEE_PERCENT = 3;

// =============================================================================
// DATASET
// =============================================================================

export interface Dataset {
  id: number;
  owner: Identity;
  name: string;
  metadataUrl: string;
  category: string;
  pricePerUse: number;
  accessCount: number;
  active: boolean;
  createdAt: number;          // Ledger height
}

export interface DatasetInput {
  name: string;
  metadataUrl: string;
  pricePerUse: number;
  category: string;
}

export interface DatasetUpdate extends DatasetInput {
  active: boolean;
}

// =============================================================================
// TRAINING JOB
// =============================================================================

export type JobStatus =
  | 'Pending'     // Created, funds escrowed, awaiting a provider
  | 'Processing'  // Accepted by a computation provider
  | 'Completed'   // Result delivered
  | 'Failed';     // Cancelled or abandoned, escrow refunded

export interface TrainingJob {
  id: number;
  creator: Identity;
  name: string;
  datasetIds: number[];
  entryPrices: number[];      // Price charged per datasetIds entry
  computationProvider: Identity | null;
  status: JobStatus;
  resultUrl: string | null;
  totalCost: number;
  createdAt: number;
  completedAt: number | null;
}

// =============================================================================
// SETTLEMENT
// =============================================================================

/**
 * - "hold": escrow stays with the marketplace after completion
 * - "release": dataset owners are paid per entry, minus the platform fee
 */
export type SettlementMode = 'hold' | 'release';

export interface SettlementPolicy {
  mode: SettlementMode;
  treasury?: Identity;        // Required for "release"
}

// =============================================================================
// ERRORS
// =============================================================================

export type MarketplaceErrorCode =
  | 'NotAuthorized'
  | 'NotFound'
  | 'InvalidParameters'
  | 'InsufficientFunds'
  | 'PaymentFailed'
  | 'AlreadyExists';          // Reserved

export interface MarketplaceFailure {
  code: MarketplaceErrorCode;
  message: string;
}

// =============================================================================
// OPERATION RESULT
// =============================================================================

export type OperationResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: MarketplaceFailure };

export type OperationName =
  | 'registerDataset'
  | 'updateDataset'
  | 'createTrainingJob'
  | 'acceptTrainingJob'
  | 'completeTrainingJob'
  | 'cancelTrainingJob'
  | 'depositFunds'
  | 'withdrawFunds';
