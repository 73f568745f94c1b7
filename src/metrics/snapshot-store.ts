/**
 * Snapshot Store
 *
 * Latest known state of every metric category plus the CPU and memory
 * histories. Writes go through commit(), which publishes a new frozen
 * snapshot by swapping a single reference, so a reader always gets every
 * field from the same cycle.
 */

import { HistoryBuffer } from './history-buffer';
import type {
  CpuReading,
  DiskInfo,
  MemoryReading,
  NetworkInterfaceInfo,
  ProcessInfo,
  Sample,
  SystemInfo,
} from '../types/metrics';

export interface MetricsSnapshot {
  /** Number of commits so far; 0 before the first sample */
  readonly sequence: number;
  /** Monotonic timestamp of the commit, 0 before the first sample */
  readonly sampledAt: number;
  readonly cpuPercent: number;
  readonly memoryPercent: number;
  readonly cpu: Readonly<CpuReading> | null;
  readonly memory: Readonly<MemoryReading> | null;
  readonly cpuHistory: readonly Sample[];
  readonly memoryHistory: readonly Sample[];
  readonly processes: readonly Readonly<ProcessInfo>[];
  readonly disks: readonly Readonly<DiskInfo>[];
  readonly networks: readonly Readonly<NetworkInterfaceInfo>[];
  readonly system: Readonly<SystemInfo> | null;
}

/** Categories absent from an update keep their previous value */
export interface SnapshotUpdate {
  cpu?: CpuReading;
  memory?: MemoryReading;
  processes?: ProcessInfo[];
  disks?: DiskInfo[];
  networks?: NetworkInterfaceInfo[];
  system?: SystemInfo;
}

export interface SnapshotReader {
  read(): MetricsSnapshot;
}

export interface SnapshotStoreOptions {
  cpuHistoryLength: number;
  memoryHistoryLength: number;
}

export class SnapshotStore implements SnapshotReader {
  private readonly cpuHistory: HistoryBuffer;
  private readonly memoryHistory: HistoryBuffer;
  private current: MetricsSnapshot;

  constructor(options: SnapshotStoreOptions) {
    this.cpuHistory = new HistoryBuffer(options.cpuHistoryLength);
    this.memoryHistory = new HistoryBuffer(options.memoryHistoryLength);
    this.current = Object.freeze({
      sequence: 0,
      sampledAt: 0,
      cpuPercent: 0,
      memoryPercent: 0,
      cpu: null,
      memory: null,
      cpuHistory: Object.freeze([]),
      memoryHistory: Object.freeze([]),
      processes: Object.freeze([]),
      disks: Object.freeze([]),
      networks: Object.freeze([]),
      system: null,
    });
  }

  read(): MetricsSnapshot {
    return this.current;
  }

  commit(update: SnapshotUpdate, timestamp: number): MetricsSnapshot {
    const previous = this.current;

    if (update.cpu) this.cpuHistory.push(update.cpu.usagePercent, timestamp);
    if (update.memory) this.memoryHistory.push(update.memory.usagePercent, timestamp);

    const cpu = update.cpu ? Object.freeze({ ...update.cpu }) : previous.cpu;
    const memory = update.memory ? Object.freeze({ ...update.memory }) : previous.memory;

    this.current = Object.freeze({
      sequence: previous.sequence + 1,
      sampledAt: timestamp,
      cpuPercent: cpu?.usagePercent ?? 0,
      memoryPercent: memory?.usagePercent ?? 0,
      cpu,
      memory,
      cpuHistory: update.cpu ? Object.freeze(this.cpuHistory.toArray()) : previous.cpuHistory,
      memoryHistory: update.memory ? Object.freeze(this.memoryHistory.toArray()) : previous.memoryHistory,
      processes: update.processes ? freezeList(update.processes) : previous.processes,
      disks: update.disks ? freezeList(update.disks) : previous.disks,
      networks: update.networks ? freezeList(update.networks) : previous.networks,
      system: update.system ? Object.freeze({ ...update.system }) : previous.system,
    });

    return this.current;
  }
}

function freezeList<T extends object>(items: T[]): readonly Readonly<T>[] {
  return Object.freeze(items.map(item => Object.freeze({ ...item })));
}
