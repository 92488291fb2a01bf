/**
 * Marketplace Application
 *
 * Bootstrap + lifecycle management.
 *
 * Lifecycle:
 * - On startup: migrate the store, wire collaborators, serve the read API
 * - On shutdown: stop HTTP servers, then close the store
 */

// Load environment variables from .env file
import 'dotenv/config';

import express, { Express } from 'express';
import type { Server } from 'http';
import { ethers } from 'ethers';

import { ChainHeightSource, LocalHeightSource, type HeightSource } from './adapters/height-source.js';
import {
  Erc20TransferAdapter,
  InMemoryTransferAdapter,
  type TransferAdapter,
} from './adapters/transfer-adapter.js';
import {
  InMemoryMarketplaceStore,
  Marketplace,
  normalizeIdentity,
  type MarketplaceStore,
  type SettlementMode,
} from './marketplace/index.js';
import { PostgresMarketplaceStore, createPostgresStore } from './persistence/postgres/index.js';
import { errorHandler, rateLimit, TokenBucketRateLimiter } from './http/index.js';
import { createPublicApiRoutes } from './routes/public-api.js';
import { startMetricsServer, trackMarketplaceEvent } from './metrics/index.js';
import { createLogger, type Logger, type LogLevel } from './utils/index.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface MarketplaceConfig {
  // Server
  port: number;
  host: string;
  metricsPort: number;

  // Database (unset = in-memory)
  databaseUrl?: string;

  // Chain height (unset = local clock)
  rpcUrl?: string;

  // Settlement
  settlementMode: SettlementMode;
  platformTreasury?: string;

  // ERC-20 transfers (both unset = in-memory transfers)
  tokenAddress?: string;
  custodyPrivateKey?: string;

  // Logging
  logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function parsePort(value: string | undefined, fallback: number, name: string): number {
  const port = parseInt(value ?? String(fallback), 10);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new Error(`${name} must be a port number, got "${value}"`);
  }
  return port;
}

function parseLogLevel(value: string | undefined): LogLevel {
  const level = LOG_LEVELS.find((candidate) => candidate === (value ?? 'info'));
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return level;
}

function parseSettlementMode(value: string | undefined): SettlementMode {
  const mode = value ?? 'hold';
  if (mode !== 'hold' && mode !== 'release') {
    throw new Error(`SETTLEMENT_MODE must be "hold" or "release", got "${mode}"`);
  }
  return mode;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): MarketplaceConfig {
  const config: MarketplaceConfig = {
    port: parsePort(env.PORT, 3000, 'PORT'),
    host: env.HOST ?? '0.0.0.0',
    metricsPort: parsePort(env.METRICS_PORT, 9090, 'METRICS_PORT'),
    databaseUrl: env.DATABASE_URL || undefined,
    rpcUrl: env.RPC_URL || undefined,
    settlementMode: parseSettlementMode(env.SETTLEMENT_MODE),
    platformTreasury: env.PLATFORM_TREASURY || undefined,
    tokenAddress: env.TOKEN_ADDRESS || undefined,
    custodyPrivateKey: env.CUSTODY_PRIVATE_KEY || undefined,
    logLevel: parseLogLevel(env.LOG_LEVEL),
  };

  if (config.settlementMode === 'release' && !normalizeIdentity(config.platformTreasury)) {
    throw new Error('SETTLEMENT_MODE=release requires PLATFORM_TREASURY to be an address');
  }
  if (config.tokenAddress && !ethers.isAddress(config.tokenAddress)) {
    throw new Error(`TOKEN_ADDRESS is not an address: "${config.tokenAddress}"`);
  }
  if (Boolean(config.tokenAddress) !== Boolean(config.custodyPrivateKey)) {
    throw new Error('TOKEN_ADDRESS and CUSTODY_PRIVATE_KEY must be set together');
  }
  if (config.tokenAddress && !config.rpcUrl) {
    throw new Error('TOKEN_ADDRESS requires RPC_URL');
  }

  return config;
}

// =============================================================================
// MARKETPLACE APPLICATION
// =============================================================================

export class MarketplaceApp {
  private config: MarketplaceConfig;
  private logger: Logger;
  private app: Express;
  private store: MarketplaceStore;
  private readLimiter: TokenBucketRateLimiter;
  private server?: Server;
  private metricsServer?: Server;
  private shutdownPromise?: Promise<void>;

  constructor(config: MarketplaceConfig) {
    this.config = config;
    this.logger = createLogger({ level: config.logLevel, service: 'marketplace' });
    this.app = express();
    this.store = config.databaseUrl
      ? createPostgresStore(config.databaseUrl)
      : new InMemoryMarketplaceStore();
    this.readLimiter = new TokenBucketRateLimiter({ windowMs: 60_000, maxRequests: 120 });
  }

  /**
   * Start the marketplace.
   *
   * 1. Prepare the store
   * 2. Wire height source and transfer adapter
   * 3. Build the marketplace and subscribe to its events
   * 4. Start HTTP + metrics servers
   */
  async start(): Promise<Marketplace> {
    this.logger.info({}, 'Starting marketplace...');

    if (this.store instanceof PostgresMarketplaceStore) {
      await this.store.migrate();
      this.logger.info({}, 'Database schema ready');
    } else {
      this.logger.warn({}, 'No DATABASE_URL configured - using in-memory store, data is lost on restart');
    }

    const heights = this.createHeightSource();
    const transfers = this.createTransferAdapter();

    const marketplace = new Marketplace({
      store: this.store,
      heights,
      transfers,
      logger: this.logger,
      settlement: {
        mode: this.config.settlementMode,
        treasury: this.config.platformTreasury,
      },
    });
    this.logger.info({ settlement: this.config.settlementMode }, 'Marketplace initialized');

    // Subscribe to marketplace events for logging + metrics
    marketplace.onEvent((event) => {
      trackMarketplaceEvent(event);
      const ctx = { operation: event.operation, caller: event.caller };

      switch (event.type) {
        case 'OPERATION_COMMITTED':
          this.logger.info({ ...ctx, value: event.value, amount: event.amount }, 'Operation committed');
          break;
        case 'OPERATION_REJECTED':
          this.logger.warn({ ...ctx, code: event.error.code, reason: event.error.message }, 'Operation rejected');
          break;
      }
    });

    // Public read API (rate limited, no auth)
    this.app.use(
      rateLimit(this.readLimiter),
      createPublicApiRoutes({
        marketplace,
        store: this.store instanceof PostgresMarketplaceStore ? 'postgres' : 'memory',
        settlement: this.config.settlementMode,
        logger: this.logger,
      })
    );
    this.app.use(errorHandler(this.logger));

    await new Promise<void>((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        this.logger.info({ port: this.config.port, host: this.config.host }, 'HTTP server started');
        resolve();
      });
    });

    this.metricsServer = startMetricsServer(this.config.metricsPort);
    this.logger.info({ port: this.config.metricsPort }, 'Internal metrics server started (Prometheus /metrics)');

    this.setupShutdownHandlers();
    this.logger.info({}, 'Marketplace started successfully');
    return marketplace;
  }

  /**
   * Stop gracefully: close servers, then the store.
   */
  async stop(): Promise<void> {
    if (this.shutdownPromise) {
      return this.shutdownPromise;
    }

    this.shutdownPromise = this.doStop();
    return this.shutdownPromise;
  }

  private async doStop(): Promise<void> {
    this.logger.info({}, 'Stopping marketplace...');

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
      this.logger.info({}, 'HTTP server stopped');
    }

    if (this.metricsServer) {
      this.metricsServer.close();
      this.logger.info({}, 'Metrics server stopped');
    }

    this.readLimiter.destroy();
    await this.store.close();
    this.logger.info({}, 'Marketplace stopped');
  }

  private setupShutdownHandlers(): void {
    const shutdown = (signal: string) => {
      this.logger.info({ signal }, 'Received shutdown signal');
      this.stop().then(
        () => process.exit(0),
        (err: unknown) => {
          this.logger.error({ error: err }, 'Shutdown failed');
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  }

  private createHeightSource(): HeightSource {
    if (!this.config.rpcUrl) {
      this.logger.info({}, 'Height source: local clock');
      return new LocalHeightSource();
    }
    this.logger.info({ rpcUrl: this.config.rpcUrl }, 'Height source: chain block number');
    return new ChainHeightSource(new ethers.JsonRpcProvider(this.config.rpcUrl));
  }

  private createTransferAdapter(): TransferAdapter {
    const { tokenAddress, custodyPrivateKey, rpcUrl } = this.config;
    if (!tokenAddress || !custodyPrivateKey || !rpcUrl) {
      this.logger.warn({}, 'No TOKEN_ADDRESS configured - deposits are accepted without an external transfer');
      return new InMemoryTransferAdapter({ unlimited: true });
    }

    const custody = new ethers.Wallet(custodyPrivateKey, new ethers.JsonRpcProvider(rpcUrl));
    this.logger.info({ token: tokenAddress, custody: custody.address }, 'ERC-20 transfer adapter initialized');
    return Erc20TransferAdapter.fromContract(tokenAddress, custody);
  }
}

// =============================================================================
// ENTRY POINT
// =============================================================================

export async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const app = new MarketplaceApp(config);
  await app.start();
}

// Run if this is the main module
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((err) => {
    console.error('Fatal error:', err);
    process.exit(1);
  });
}
