/**
 * Sampler
 *
 * Pulls the metrics source on a fixed cadence and commits each cycle to the
 * snapshot store in one step. It is the only writer of the store.
 */

import { DashboardError, ErrorCode } from '../types/errors';
import { MIN_REFRESH_RATE_MS } from '../types/schemas';
import { clampPercent } from '../utils/formatters';
import type { ErrorHandler } from '../logging/error-handler';
import type { MetricsSnapshot, SnapshotStore, SnapshotUpdate } from '../metrics/snapshot-store';
import type { MetricCategory, MetricsReading, MetricsSource, ProcessInfo, Reading } from '../types/metrics';

export interface SamplerOptions {
  refreshIntervalMs: number;
  /** Cap applied after sorting; unlimited when omitted */
  maxProcesses?: number;
  enableProcessMonitoring?: boolean;
  logger: ErrorHandler;
  /** Monotonic clock used to timestamp samples */
  clock?: () => number;
}

export interface RefreshTrigger {
  requestRefresh(): void;
}

export interface SamplerStatus {
  running: boolean;
  inFlight: boolean;
  cycles: number;
  refreshIntervalMs: number;
}

/**
 * Sort by CPU descending; equal CPU falls back to ascending PID so the order
 * is stable across cycles. Non-finite CPU values count as 0.
 */
export function sortProcesses(processes: readonly ProcessInfo[], limit?: number): ProcessInfo[] {
  const sorted = processes
    .map(proc => (Number.isFinite(proc.cpuPercent) ? { ...proc } : { ...proc, cpuPercent: 0 }))
    .sort((a, b) => b.cpuPercent - a.cpuPercent || a.pid - b.pid);
  return limit !== undefined ? sorted.slice(0, Math.max(0, limit)) : sorted;
}

export class Sampler implements RefreshTrigger {
  public readonly refreshIntervalMs: number;
  private readonly source: MetricsSource;
  private readonly store: SnapshotStore;
  private readonly options: SamplerOptions;
  private readonly clock: () => number;
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  /** Bumped by stop(); a cycle only commits within the run it started in */
  private generation = 0;
  private inFlight = false;
  private rerunRequested = false;
  private cycles = 0;

  constructor(source: MetricsSource, store: SnapshotStore, options: SamplerOptions) {
    this.source = source;
    this.store = store;
    this.options = options;
    this.refreshIntervalMs = Math.max(MIN_REFRESH_RATE_MS, options.refreshIntervalMs);
    this.clock = options.clock ?? (() => performance.now());
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.options.logger.debug('Sampler started', { refreshIntervalMs: this.refreshIntervalMs });
    void this.runCycle();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.generation++;
    this.rerunRequested = false;
    this.clearTimer();
    this.options.logger.debug('Sampler stopped', { cycles: this.cycles });
  }

  /**
   * Sample now and restart the cadence from this point. While a cycle is in
   * flight the request turns into one extra cycle right after it.
   */
  requestRefresh(): void {
    if (!this.running) return;
    this.options.logger.debug('Forced refresh requested');
    void this.runCycle();
  }

  /** One cycle outside the timer loop */
  async sampleOnce(): Promise<MetricsSnapshot> {
    const update = await this.collect();
    return this.commit(update);
  }

  getStatus(): SamplerStatus {
    return {
      running: this.running,
      inFlight: this.inFlight,
      cycles: this.cycles,
      refreshIntervalMs: this.refreshIntervalMs,
    };
  }

  private async runCycle(): Promise<void> {
    if (!this.running) return;
    if (this.inFlight) {
      this.rerunRequested = true;
      return;
    }

    this.clearTimer();
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.runCycle();
    }, this.refreshIntervalMs);

    const generation = this.generation;
    this.inFlight = true;
    try {
      const update = await this.collect();
      if (this.running && generation === this.generation) {
        this.commit(update);
      }
    } catch (error) {
      this.options.logger.error('Sampling cycle failed', DashboardError.from(error, ErrorCode.METRICS_UNAVAILABLE));
    } finally {
      this.inFlight = false;
    }

    if (this.rerunRequested && this.running) {
      this.rerunRequested = false;
      void this.runCycle();
    }
  }

  private async collect(): Promise<SnapshotUpdate> {
    let reading: MetricsReading;
    try {
      reading = await this.source.collectMetrics();
    } catch (error) {
      this.options.logger.warn(
        'Metrics source failed, keeping previous readings',
        DashboardError.from(error, ErrorCode.METRICS_UNAVAILABLE),
      );
      return {};
    }

    const update: SnapshotUpdate = {};

    const cpu = this.accept('cpu', reading.cpu);
    if (cpu && this.finitePercent('cpu', cpu.usagePercent)) {
      update.cpu = { ...cpu, usagePercent: clampPercent(cpu.usagePercent) };
    }

    const memory = this.accept('memory', reading.memory);
    if (memory && this.finitePercent('memory', memory.usagePercent)) {
      update.memory = { ...memory, usagePercent: clampPercent(memory.usagePercent) };
    }

    if (this.options.enableProcessMonitoring === false) {
      update.processes = [];
    } else {
      const processes = this.accept('processes', reading.processes);
      if (processes) update.processes = sortProcesses(processes, this.options.maxProcesses);
    }

    const disks = this.accept('disks', reading.disks);
    if (disks) update.disks = disks;

    const networks = this.accept('networks', reading.networks);
    if (networks) update.networks = networks;

    const system = this.accept('system', reading.system);
    if (system) update.system = system;

    return update;
  }

  private commit(update: SnapshotUpdate): MetricsSnapshot {
    const snapshot = this.store.commit(update, this.clock());
    this.cycles++;
    return snapshot;
  }

  private accept<T>(category: MetricCategory, reading: Reading<T>): T | null {
    if (reading.ok) return reading.value;
    this.options.logger.warn(`${category} reading unavailable, keeping previous value`, reading.error, { category });
    return null;
  }

  private finitePercent(category: MetricCategory, value: number): boolean {
    if (Number.isFinite(value)) return true;
    this.options.logger.warn(`${category} reading is not a number, keeping previous value`, undefined, { category, value: String(value) });
    return false;
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
