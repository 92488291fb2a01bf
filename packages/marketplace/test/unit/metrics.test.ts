/**
 * Prometheus Metrics — Unit Tests
 *
 * Tests for:
 *   - /metrics endpoint returns HTTP 200
 *   - Metrics are exposed in Prometheus format
 *   - Marketplace events update counters
 */

import { describe, it, expect, afterAll } from 'vitest';
import {
  metricsRegistry,
  startMetricsServer,
  trackMarketplaceEvent,
} from '../../src/metrics/index.js';
import type { Server } from 'http';
import { CREATOR, OWNER, STRANGER } from './fixtures.js';

let server: Server | undefined;

afterAll(() => {
  if (server) server.close();
});

describe('Prometheus Metrics', () => {
  it('/metrics returns HTTP 200 with Prometheus content', async () => {
    const port = 19090 + Math.floor(Math.random() * 1000);
    server = startMetricsServer(port, '127.0.0.1');

    await new Promise((r) => setTimeout(r, 200));

    const res = await fetch(`http://127.0.0.1:${port}/metrics`);
    expect(res.status).toBe(200);

    const text = await res.text();
    expect(text).toContain('datasets_registered_total');
    expect(text).toContain('training_jobs_created_total');
    expect(text).toContain('training_jobs_completed_total');
    expect(text).toContain('training_jobs_cancelled_total');
    expect(text).toContain('operation_failures_total');

    server.close();
    server = undefined;
  });

  it('tracks marketplace counters correctly', async () => {
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'registerDataset', caller: OWNER, value: 1 });
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'registerDataset', caller: OWNER, value: 2 });
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'depositFunds', caller: CREATOR, value: true, amount: 50 });
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'withdrawFunds', caller: CREATOR, value: true, amount: 20 });
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'createTrainingJob', caller: CREATOR, value: 1 });
    trackMarketplaceEvent({ type: 'OPERATION_COMMITTED', operation: 'cancelTrainingJob', caller: CREATOR, value: true });
    trackMarketplaceEvent({
      type: 'OPERATION_REJECTED',
      operation: 'updateDataset',
      caller: STRANGER,
      error: { code: 'NotAuthorized', message: 'dataset 1 is owned by another identity' },
    });

    const metrics = await metricsRegistry.metrics();

    expect(metrics).toContain('datasets_registered_total 2');
    expect(metrics).toContain('funds_deposited_total 50');
    expect(metrics).toContain('funds_withdrawn_total 20');
    expect(metrics).toContain('training_jobs_created_total 1');
    expect(metrics).toContain('training_jobs_cancelled_total 1');
    expect(metrics).toContain('training_jobs_completed_total 0');
    expect(metrics).toContain('operation_failures_total{operation="updateDataset",code="NotAuthorized"} 1');
  });

  it('non-/metrics path returns 404', async () => {
    const port = 19090 + Math.floor(Math.random() * 1000);
    server = startMetricsServer(port, '127.0.0.1');

    await new Promise((r) => setTimeout(r, 200));

    const res = await fetch(`http://127.0.0.1:${port}/other`);
    expect(res.status).toBe(404);

    server.close();
    server = undefined;
  });
});
