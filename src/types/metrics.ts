/**
 * Metric data model shared by the sampler, the snapshot store and the renderer.
 */

export interface Sample {
  /** Monotonic milliseconds (performance.now()) */
  readonly timestamp: number;
  readonly value: number;
}

export interface CpuReading {
  usagePercent: number;
  coreCount: number;
}

export interface MemoryReading {
  usagePercent: number;
  usedBytes: number;
  totalBytes: number;
  swapUsedBytes: number;
  swapTotalBytes: number;
}

export interface ProcessInfo {
  pid: number;
  name: string;
  cpuPercent: number;
  memoryBytes: number;
}

export interface DiskInfo {
  name: string;
  mountPoint: string;
  fileSystem: string;
  totalBytes: number;
  usedBytes: number;
  availableBytes: number;
  usagePercent: number;
}

export interface NetworkInterfaceInfo {
  name: string;
  rxBytes: number;
  txBytes: number;
  rxPerSecond: number;
  txPerSecond: number;
}

export interface SystemInfo {
  hostname: string;
  platform: string;
  uptimeSeconds: number;
  /** Unix seconds */
  bootTime: number;
  loadAverages: [number, number, number];
  processCount: number | null;
}

export type MetricCategory = 'cpu' | 'memory' | 'processes' | 'disks' | 'networks' | 'system';

export type Reading<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

/** One pull from a metrics source; every category can fail on its own */
export interface MetricsReading {
  cpu: Reading<CpuReading>;
  memory: Reading<MemoryReading>;
  processes: Reading<ProcessInfo[]>;
  disks: Reading<DiskInfo[]>;
  networks: Reading<NetworkInterfaceInfo[]>;
  system: Reading<SystemInfo>;
}

export interface MetricsSource {
  collectMetrics(): Promise<MetricsReading>;
}

export function ok<T>(value: T): Reading<T> {
  return { ok: true, value };
}

export function failed<T>(error: unknown): Reading<T> {
  return { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
}
