import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RpcHealthProber, healthFromDrift, HEALTHY, UNREACHABLE } from '../health-prober.js';
import { MonitorMetrics, METRIC_NAMES } from '../metrics.js';
import { RpcError, RpcTimeoutError } from '../rpc/errors.js';
import type { NodeHealthReport, NodeHealthSource } from '../types.js';

function slotSources(slots: Record<string, number | Error>, reports: Record<string, NodeHealthReport | Error> = {}) {
  return (url: string): NodeHealthSource => ({
    getSlotHeight: async () => {
      const slot = slots[url];
      if (slot instanceof Error) throw slot;
      return slot;
    },
    getHealth: async () => {
      const report: NodeHealthReport | Error = reports[url] ?? { status: 'ok' };
      if (report instanceof Error) throw report;
      return report;
    },
  });
}

describe('healthFromDrift', () => {
  it('reports 1 within the threshold and the drift beyond it', () => {
    expect(healthFromDrift(0, 10)).toBe(HEALTHY);
    expect(healthFromDrift(10, 10)).toBe(HEALTHY);
    expect(healthFromDrift(11, 10)).toBe(11);
  });
});

describe('RpcHealthProber', () => {
  let metrics: MonitorMetrics;

  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    metrics = new MonitorMetrics({ collectDefaults: false });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('scores members against the group max slot', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({ 'http://a.test': 500, 'http://b.test': 495, 'http://c.test': 470 }),
      10
    );

    const members = await prober.probeGroup({
      name: 'primary',
      servers: ['http://a.test', 'http://b.test', 'http://c.test'],
    });

    expect(members.map((member) => member.health)).toEqual([1, 1, 30]);
    expect(await metrics.valueOf(METRIC_NAMES.nodeHealth, { address: 'http://c.test', server_group: 'primary' })).toBe(30);
  });

  it('marks unreachable members 0 without affecting the others', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({
        'http://a.test': 500,
        'http://b.test': new RpcTimeoutError('http://b.test', 2000),
      }),
      10
    );

    const members = await prober.probeGroup({ name: 'primary', servers: ['http://a.test', 'http://b.test'] });

    expect(members).toEqual([
      { address: 'http://a.test', health: HEALTHY, slot: 500 },
      { address: 'http://b.test', health: UNREACHABLE, error: 'Request timeout after 2000ms' },
    ]);
    expect(console.warn).toHaveBeenCalledWith('⚠️ [health primary] 1/2 nodes unreachable');
  });

  it('compares only within a group', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({ 'http://a.test': 500, 'http://z.test': 100 }),
      10
    );

    await prober.probeGroup({ name: 'primary', servers: ['http://a.test'] });
    await prober.probeGroup({ name: 'archive', servers: ['http://z.test'] });

    expect(await metrics.valueOf(METRIC_NAMES.nodeHealth, { address: 'http://z.test', server_group: 'archive' })).toBe(1);
  });

  it('reports every member unreachable when the whole group is down', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({
        'http://a.test': new RpcError('HTTP 502: Bad Gateway', { url: 'http://a.test', statusCode: 502 }),
        'http://b.test': new RpcError('HTTP 502: Bad Gateway', { url: 'http://b.test', statusCode: 502 }),
      }),
      10
    );

    const members = await prober.probeGroup({ name: 'primary', servers: ['http://a.test', 'http://b.test'] });

    expect(members.map((member) => member.health)).toEqual([0, 0]);
  });

  it('does not report a lone member as healthy when it says it is behind', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({ 'http://a.test': 5 }, { 'http://a.test': { status: 'behind', slotsBehind: 42 } }),
      10
    );

    const members = await prober.probeGroup({ name: 'solo', servers: ['http://a.test'] });

    expect(members).toEqual([{ address: 'http://a.test', health: 42, slot: 5, reportedBehind: 42 }]);
    expect(await metrics.valueOf(METRIC_NAMES.nodeHealth, { address: 'http://a.test', server_group: 'solo' })).toBe(42);
  });

  it('uses the larger of group drift and the reported distance', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources(
        { 'http://a.test': 500, 'http://b.test': 470, 'http://c.test': 498 },
        { 'http://b.test': { status: 'behind', slotsBehind: 12 }, 'http://c.test': { status: 'behind', slotsBehind: 4 } }
      ),
      10
    );

    const members = await prober.probeGroup({
      name: 'primary',
      servers: ['http://a.test', 'http://b.test', 'http://c.test'],
    });

    expect(members.map((member) => member.health)).toEqual([1, 30, 1]);
  });

  it('puts a node behind by an unknown distance just past the threshold', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources({ 'http://a.test': 5 }, { 'http://a.test': { status: 'behind', slotsBehind: null } }),
      10
    );

    const members = await prober.probeGroup({ name: 'solo', servers: ['http://a.test'] });

    expect(members).toEqual([{ address: 'http://a.test', health: 11, slot: 5, reportedBehind: null }]);
  });

  it('falls back to group drift when getHealth fails', async () => {
    const prober = new RpcHealthProber(
      metrics,
      slotSources(
        { 'http://a.test': 500, 'http://b.test': 499 },
        { 'http://b.test': new RpcError('getHealth error -32601: Method not found', { url: 'http://b.test', code: -32601 }) }
      ),
      10
    );

    const members = await prober.probeGroup({ name: 'primary', servers: ['http://a.test', 'http://b.test'] });

    expect(members).toEqual([
      { address: 'http://a.test', health: HEALTHY, slot: 500 },
      { address: 'http://b.test', health: HEALTHY, slot: 499 },
    ]);
  });

  it('passes the round signal to both calls', async () => {
    const signals: Array<AbortSignal | undefined> = [];
    const source: NodeHealthSource = {
      getSlotHeight: async (signal) => {
        signals.push(signal);
        return 1;
      },
      getHealth: async (signal) => {
        signals.push(signal);
        return { status: 'ok' };
      },
    };
    const controller = new AbortController();

    await new RpcHealthProber(metrics, () => source, 10).probeGroup(
      { name: 'primary', servers: ['http://a.test'] },
      controller.signal
    );

    expect(signals).toEqual([controller.signal, controller.signal]);
  });
});
