/**
 * Dataset marketplace ledger: public entry point.
 */

export * from './marketplace/index.js';

export type { HeightSource } from './adapters/height-source.js';
export { LocalHeightSource, ChainHeightSource } from './adapters/height-source.js';
export type { TransferAdapter, TransferResult, Erc20Methods } from './adapters/transfer-adapter.js';
export { InMemoryTransferAdapter, Erc20TransferAdapter } from './adapters/transfer-adapter.js';

export { PostgresMarketplaceStore, createPostgresStore } from './persistence/postgres/index.js';

export { createPublicApiRoutes } from './routes/public-api.js';
export type { PublicApiConfig, MarketplaceReader } from './routes/public-api.js';

export { createLogger } from './utils/index.js';
export type { Logger, LogLevel } from './utils/index.js';
