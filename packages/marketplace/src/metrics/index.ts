/**
 * Prometheus Metrics — Internal Only
 *
 * Counters for marketplace operations.
 * Served on a separate internal port (default 9090), NOT on the public API path.
 */

import { Counter, Registry, collectDefaultMetrics } from 'prom-client';
import { createServer, Server } from 'http';
import type { MarketplaceEvent } from '../marketplace/index.js';

export const metricsRegistry = new Registry();

collectDefaultMetrics({ register: metricsRegistry });

export const datasetsRegistered = new Counter({
  name: 'datasets_registered_total',
  help: 'Number of datasets registered',
  registers: [metricsRegistry],
});

export const trainingJobsCreated = new Counter({
  name: 'training_jobs_created_total',
  help: 'Number of training jobs created',
  registers: [metricsRegistry],
});

export const trainingJobsCompleted = new Counter({
  name: 'training_jobs_completed_total',
  help: 'Number of training jobs completed',
  registers: [metricsRegistry],
});

export const trainingJobsCancelled = new Counter({
  name: 'training_jobs_cancelled_total',
  help: 'Number of training jobs cancelled or abandoned',
  registers: [metricsRegistry],
});

export const fundsDeposited = new Counter({
  name: 'funds_deposited_total',
  help: 'Total amount deposited into internal balances',
  registers: [metricsRegistry],
});

export const fundsWithdrawn = new Counter({
  name: 'funds_withdrawn_total',
  help: 'Total amount withdrawn from internal balances',
  registers: [metricsRegistry],
});

export const operationFailures = new Counter({
  name: 'operation_failures_total',
  help: 'Number of rejected operations',
  labelNames: ['operation', 'code'] as const,
  registers: [metricsRegistry],
});

/**
 * Update counters from a marketplace event.
 */
export function trackMarketplaceEvent(event: MarketplaceEvent): void {
  if (event.type === 'OPERATION_REJECTED') {
    operationFailures.inc({ operation: event.operation, code: event.error.code });
    return;
  }

  switch (event.operation) {
    case 'registerDataset':
      datasetsRegistered.inc();
      break;
    case 'createTrainingJob':
      trainingJobsCreated.inc();
      break;
    case 'completeTrainingJob':
      trainingJobsCompleted.inc();
      break;
    case 'cancelTrainingJob':
      trainingJobsCancelled.inc();
      break;
    case 'depositFunds':
      fundsDeposited.inc(event.amount ?? 0);
      break;
    case 'withdrawFunds':
      fundsWithdrawn.inc(event.amount ?? 0);
      break;
  }
}

/**
 * Start the internal metrics HTTP server.
 * Serves /metrics in Prometheus exposition format.
 */
export function startMetricsServer(port: number, host: string = '0.0.0.0'): Server {
  const server = createServer(async (req, res) => {
    if (req.url === '/metrics') {
      res.setHeader('Content-Type', metricsRegistry.contentType);
      res.end(await metricsRegistry.metrics());
    } else {
      res.statusCode = 404;
      res.end('Not found');
    }
  });

  server.listen(port, host);
  return server;
}
