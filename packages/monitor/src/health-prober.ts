/**
 * Solana node health per server group
 *
 * A member's distance behind is the larger of its drift from its own group's
 * highest slot and what the node reports about itself through getHealth:
 *   0      unreachable
 *   1      within the drift threshold
 *   n > 1  n slots behind
 */

import { MonitorError } from '@neon-monitor/shared';
import type { MonitorMetrics } from './metrics.js';
import type { NodeHealthReport, NodeHealthSource, ServerGroup } from './types.js';

export const UNREACHABLE = 0;
export const HEALTHY = 1;

export interface MemberHealth {
  address: string;
  health: number;
  slot?: number;
  /** Slots behind as reported by the node itself, when it says it is behind */
  reportedBehind?: number | null;
  error?: string;
}

interface MemberSample {
  slot: PromiseSettledResult<number>;
  report: PromiseSettledResult<NodeHealthReport>;
}

export function healthFromDrift(drift: number, threshold: number): number {
  return drift <= threshold ? HEALTHY : drift;
}

export class RpcHealthProber {
  private metrics: MonitorMetrics;
  private clientFor: (url: string) => NodeHealthSource;
  private driftThreshold: number;

  constructor(metrics: MonitorMetrics, clientFor: (url: string) => NodeHealthSource, driftThreshold: number) {
    this.metrics = metrics;
    this.clientFor = clientFor;
    this.driftThreshold = driftThreshold;
  }

  async probeGroup(group: ServerGroup, signal?: AbortSignal): Promise<MemberHealth[]> {
    const samples = await Promise.all(group.servers.map((url) => this.sample(url, signal)));

    const reachable = samples.flatMap(({ slot }) => (slot.status === 'fulfilled' ? [slot.value] : []));
    const maxSlot = reachable.length > 0 ? Math.max(...reachable) : undefined;

    const members = samples.map(({ slot, report }, i): MemberHealth => {
      const address = group.servers[i];
      if (slot.status === 'rejected') {
        if (!(slot.reason instanceof MonitorError)) throw slot.reason;
        return { address, health: UNREACHABLE, error: slot.reason.message };
      }

      const drift = (maxSlot ?? slot.value) - slot.value;
      const selfReport = this.readReport(report);
      if (selfReport === undefined) {
        return { address, health: healthFromDrift(drift, this.driftThreshold), slot: slot.value };
      }

      // a node that says it is behind without saying how far is past the threshold
      const reported = selfReport ?? this.driftThreshold + 1;
      return {
        address,
        health: healthFromDrift(Math.max(drift, reported), this.driftThreshold),
        slot: slot.value,
        reportedBehind: selfReport,
      };
    });

    for (const member of members) {
      this.metrics.setNodeHealth({ address: member.address, server_group: group.name }, member.health);
    }

    const down = members.filter((member) => member.health === UNREACHABLE).length;
    if (down > 0) {
      console.warn(`⚠️ [health ${group.name}] ${down}/${members.length} nodes unreachable`);
    }
    return members;
  }

  private async sample(url: string, signal?: AbortSignal): Promise<MemberSample> {
    const client = this.clientFor(url);
    const [slot, report] = await Promise.allSettled([client.getSlotHeight(signal), client.getHealth(signal)]);
    return { slot, report };
  }

  /**
   * undefined when the node reports nothing useful (healthy, or getHealth
   * failed), otherwise its own count of slots behind
   */
  private readReport(report: PromiseSettledResult<NodeHealthReport>): number | null | undefined {
    if (report.status === 'rejected') {
      if (!(report.reason instanceof MonitorError)) throw report.reason;
      return undefined;
    }
    return report.value.status === 'behind' ? report.value.slotsBehind : undefined;
  }
}
