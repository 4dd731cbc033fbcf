import { describe, it, expect, vi, afterEach } from 'vitest';
import request from 'supertest';
import { createMetricsApp, type ServerStatus } from '../server.js';
import { MonitorMetrics } from '../metrics.js';

const NOW = Date.parse('2026-10-19T12:00:00.000Z');

function createApp(status: Partial<ServerStatus> = {}) {
  const metrics = new MonitorMetrics({ collectDefaults: false });
  const app = createMetricsApp(metrics, {
    staleAfterMs: 10000,
    now: () => NOW,
    status: () => ({
      lastHeartbeatAt: NOW - 4000,
      storeHealthy: async () => true,
      ...status,
    }),
  });
  return { app, metrics };
}

describe('metrics server', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('serves the registry in Prometheus text format', async () => {
    const { app, metrics } = createApp();
    metrics.setBlockLag({ proxy_name: 'neon-devnet', rpc_name: 'solana-devnet', chain: 'devnet' }, 50);

    const res = await request(app).get('/metrics');

    expect(res.status).toBe(200);
    expect(res.headers['content-type']).toContain('text/plain');
    const sample = res.text.split('\n').find((line) => line.startsWith('neon_proxy_block_lag{'));
    expect(sample).toMatch(/ 50$/);
    expect(sample).toContain('proxy_name="neon-devnet"');
    expect(sample).toContain('rpc_name="solana-devnet"');
  });

  it('answers 500 when the registry cannot be rendered', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const { app, metrics } = createApp();
    vi.spyOn(metrics, 'metrics').mockRejectedValue(new Error('collect failed'));

    const res = await request(app).get('/metrics');

    expect(res.status).toBe(500);
    expect(res.text).toBe('metrics unavailable');
  });

  it('reports ok while the heartbeat is fresh', async () => {
    const { app } = createApp();

    const res = await request(app).get('/health');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      status: 'ok',
      service: 'monitor',
      lastRoundAt: '2026-10-19T11:59:56.000Z',
      components: { redis: 'ok' },
    });
  });

  it('reports stale when the heartbeat is too old', async () => {
    const { app } = createApp({ lastHeartbeatAt: NOW - 20000, storeHealthy: async () => false });

    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body).toMatchObject({ status: 'stale', components: { redis: 'error' } });
  });

  it('reports stale before the first round completes', async () => {
    const { app } = createApp({ lastHeartbeatAt: null });

    const res = await request(app).get('/health');

    expect(res.status).toBe(503);
    expect(res.body.lastRoundAt).toBeNull();
  });
});
