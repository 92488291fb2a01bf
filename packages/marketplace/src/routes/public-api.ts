/**
 * Public API Routes
 *
 * Read-only endpoints for querying datasets, training jobs and balances.
 * No authentication required. No state changes: operations are never
 * submitted over HTTP.
 */

import { Router, Request, Response } from 'express';
import type { Marketplace, SettlementMode } from '../marketplace/index.js';
import { normalizeIdentity } from '../marketplace/index.js';
import type { Logger } from '../utils/index.js';

const API_VERSION = '1.0';

export type MarketplaceReader = Pick<
  Marketplace,
  'getDataset' | 'getTrainingJob' | 'getUserBalance' | 'getPlatformFee'
>;

export interface PublicApiConfig {
  marketplace: MarketplaceReader;
  store: 'memory' | 'postgres';
  settlement: SettlementMode;
  logger: Logger;
}

function sendError(res: Response, status: number, code: string, message: string): void {
  res.status(status).json({ version: API_VERSION, error: { code, message } });
}

function sendInternalError(res: Response, logger: Logger, err: unknown, route: string): void {
  logger.error({ error: err, route }, 'Query failed');
  sendError(res, 500, 'INTERNAL_ERROR', 'An unexpected error occurred');
}

function parseRecordId(raw: string): number | null {
  const id = Number(raw);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}

export function createPublicApiRoutes(config: PublicApiConfig): Router {
  const router = Router();
  const { marketplace, logger } = config;

  // =========================================================================
  // GET /v1/datasets/:id
  // =========================================================================

  router.get('/v1/datasets/:id', async (req: Request, res: Response) => {
    const datasetId = parseRecordId(req.params.id);
    if (datasetId === null) {
      sendError(res, 400, 'INVALID_DATASET_ID', 'datasetId must be a positive integer');
      return;
    }

    try {
      const dataset = await marketplace.getDataset(datasetId);
      if (!dataset) {
        sendError(res, 404, 'DATASET_NOT_FOUND', `No dataset registered with id ${datasetId}`);
        return;
      }
      res.json({ version: API_VERSION, data: dataset });
    } catch (err) {
      sendInternalError(res, logger, err, '/v1/datasets/:id');
    }
  });

  // =========================================================================
  // GET /v1/jobs/:id
  // =========================================================================

  router.get('/v1/jobs/:id', async (req: Request, res: Response) => {
    const jobId = parseRecordId(req.params.id);
    if (jobId === null) {
      sendError(res, 400, 'INVALID_JOB_ID', 'jobId must be a positive integer');
      return;
    }

    try {
      const job = await marketplace.getTrainingJob(jobId);
      if (!job) {
        sendError(res, 404, 'JOB_NOT_FOUND', `No training job with id ${jobId}`);
        return;
      }
      res.json({ version: API_VERSION, data: job });
    } catch (err) {
      sendInternalError(res, logger, err, '/v1/jobs/:id');
    }
  });

  // =========================================================================
  // GET /v1/balances/:identity
  // =========================================================================

  router.get('/v1/balances/:identity', async (req: Request, res: Response) => {
    const identity = normalizeIdentity(req.params.identity);
    if (!identity) {
      sendError(res, 400, 'INVALID_IDENTITY', 'identity must be a 0x-prefixed 20-byte address');
      return;
    }

    try {
      const amount = await marketplace.getUserBalance(identity);
      res.json({ version: API_VERSION, data: { identity, amount } });
    } catch (err) {
      sendInternalError(res, logger, err, '/v1/balances/:identity');
    }
  });

  // =========================================================================
  // GET /v1/platform-fee
  // =========================================================================

  router.get('/v1/platform-fee', (_req: Request, res: Response) => {
    res.json({ version: API_VERSION, data: { percent: marketplace.getPlatformFee() } });
  });

  // =========================================================================
  // GET /health
  // =========================================================================

  router.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      version: API_VERSION,
      store: config.store,
      settlement: config.settlement,
    });
  });

  return router;
}
