/**
 * Prometheus exposition endpoint
 */

import express from 'express';
import type { MonitorMetrics } from './metrics.js';

export interface ServerStatus {
  lastHeartbeatAt: number | null;
  storeHealthy: () => Promise<boolean>;
}

export interface ServerOptions {
  /** A heartbeat older than this reports the monitor as stale */
  staleAfterMs: number;
  status: () => ServerStatus;
  now?: () => number;
}

export function createMetricsApp(metrics: MonitorMetrics, options: ServerOptions) {
  const now = options.now ?? Date.now;
  const app = express();

  app.get('/metrics', async (_, res) => {
    try {
      res.set('Content-Type', metrics.contentType);
      res.send(await metrics.metrics());
    } catch (err) {
      console.error('Metrics endpoint error:', err);
      res.status(500).send('metrics unavailable');
    }
  });

  app.get('/health', async (_, res) => {
    const status = options.status();
    const redis = (await status.storeHealthy()) ? 'ok' : 'error';
    const fresh = status.lastHeartbeatAt !== null && now() - status.lastHeartbeatAt <= options.staleAfterMs;

    res.status(fresh ? 200 : 503).json({
      status: fresh ? 'ok' : 'stale',
      service: 'monitor',
      lastRoundAt: status.lastHeartbeatAt === null ? null : new Date(status.lastHeartbeatAt).toISOString(),
      components: { redis },
    });
  });

  return app;
}
