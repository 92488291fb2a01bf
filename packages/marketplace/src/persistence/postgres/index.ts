export { PostgresMarketplaceStore, createPostgresStore } from './persistence.js';
