/**
 * Round scheduler
 *
 * Each tick fans out every probe concurrently under one deadline. Probes
 * share an AbortSignal that fires at the deadline; a probe still running
 * from an earlier round is not started again, so every key keeps a single
 * owner.
 */

import { MonitorError, errorMessage } from '@neon-monitor/shared';
import type { MonitorMetrics } from './metrics.js';

export interface Probe {
  name: string;
  run(signal: AbortSignal): Promise<unknown>;
}

export type ProbeOutcome = 'ok' | 'failed' | 'timed-out' | 'skipped';

export interface RoundReport {
  startedAt: number;
  finishedAt: number;
  outcomes: Record<string, ProbeOutcome>;
  /** Whether the round advanced the heartbeat */
  heartbeat: boolean;
}

export interface TickSource {
  start(onTick: () => void): void;
  stop(): void;
}

export class IntervalTickSource implements TickSource {
  private intervalMs: number;
  private intervalId: NodeJS.Timeout | null = null;

  constructor(intervalMs: number) {
    this.intervalMs = intervalMs;
  }

  start(onTick: () => void): void {
    if (this.intervalId) return;
    this.intervalId = setInterval(onTick, this.intervalMs);
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }
}

export interface SchedulerOptions {
  /** Probes still running after this are abandoned for the round */
  roundDeadlineMs: number;
  tickSource: TickSource;
  now?: () => number;
}

export class Scheduler {
  private probes: Probe[];
  private metrics: MonitorMetrics;
  private options: SchedulerOptions;
  private now: () => number;
  private inFlight = new Set<string>();
  private roundRunning = false;
  private isRunning = false;
  private lastReport: RoundReport | null = null;
  private lastHeartbeatAt: number | null = null;

  constructor(probes: Probe[], metrics: MonitorMetrics, options: SchedulerOptions) {
    this.probes = probes;
    this.metrics = metrics;
    this.options = options;
    this.now = options.now ?? Date.now;
  }

  /**
   * Run a round now, then one per tick
   */
  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    console.log(`🔄 Starting monitor rounds (${this.probes.length} probes, deadline ${this.options.roundDeadlineMs}ms)`);

    this.tick();
    this.options.tickSource.start(() => this.tick());
  }

  stop(): void {
    if (!this.isRunning) return;

    this.isRunning = false;
    this.options.tickSource.stop();
    console.log('🛑 Monitor rounds stopped');
  }

  private tick(): void {
    if (this.roundRunning) {
      console.warn('⚠️ Previous round still running, skipping tick');
      return;
    }

    this.roundRunning = true;
    this.runRound()
      .catch((err) => console.error('❌ Round failed:', err))
      .finally(() => {
        this.roundRunning = false;
      });
  }

  async runRound(): Promise<RoundReport> {
    const startedAt = this.now();
    const controller = new AbortController();
    const outcomes: Record<string, ProbeOutcome> = {};
    let unexpectedFault = false;

    const tasks = this.probes.map(async (probe) => {
      if (this.inFlight.has(probe.name)) {
        outcomes[probe.name] = 'skipped';
        return;
      }

      this.inFlight.add(probe.name);
      try {
        await probe.run(controller.signal);
        outcomes[probe.name] ??= 'ok';
      } catch (err) {
        outcomes[probe.name] ??= 'failed';
        if (err instanceof MonitorError) {
          console.warn(`⚠️ [${probe.name}] ${err.message}`);
        } else {
          unexpectedFault = true;
          console.error(`❌ [${probe.name}] unexpected failure: ${errorMessage(err)}`, err);
        }
      } finally {
        this.inFlight.delete(probe.name);
      }
    });

    let deadlineTimer: NodeJS.Timeout | undefined;
    const deadline = new Promise<void>((resolve) => {
      deadlineTimer = setTimeout(() => {
        controller.abort();
        resolve();
      }, this.options.roundDeadlineMs);
    });

    await Promise.race([Promise.all(tasks), deadline]);
    clearTimeout(deadlineTimer);

    // freeze the outcome table; late finishers do not change this round
    const snapshot: Record<string, ProbeOutcome> = {};
    for (const probe of this.probes) {
      snapshot[probe.name] = outcomes[probe.name] ?? 'timed-out';
      outcomes[probe.name] ??= 'timed-out';
    }

    const timedOut = Object.values(snapshot).filter((outcome) => outcome === 'timed-out').length;
    if (timedOut > 0) {
      console.warn(`⏱️ ${timedOut} probe(s) exceeded the ${this.options.roundDeadlineMs}ms round deadline`);
    }

    const finishedAt = this.now();
    const heartbeat = !unexpectedFault;
    if (heartbeat) {
      this.lastHeartbeatAt = finishedAt;
      this.metrics.setHeartbeat(Math.floor(finishedAt / 1000));
    }

    const report: RoundReport = { startedAt, finishedAt, outcomes: snapshot, heartbeat };
    this.lastReport = report;
    return report;
  }

  getStatus() {
    return {
      running: this.isRunning,
      roundRunning: this.roundRunning,
      probes: this.probes.length,
      inFlight: Array.from(this.inFlight),
      lastHeartbeatAt: this.lastHeartbeatAt,
      lastReport: this.lastReport,
    };
  }
}
