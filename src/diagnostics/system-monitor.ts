/**
 * System Diagnostics Monitor
 * Pulls point-in-time host metrics from the OS. Every category is collected
 * independently so one failing call does not fail the others.
 */

import os from 'os';
import * as si from 'systeminformation';
import type { Systeminformation } from 'systeminformation';
import { failed, ok } from '../types/metrics';
import type {
  CpuReading,
  DiskInfo,
  MemoryReading,
  MetricsReading,
  MetricsSource,
  NetworkInterfaceInfo,
  ProcessInfo,
  Reading,
  SystemInfo,
} from '../types/metrics';

export interface SystemMonitorOptions {
  /** Skip the process table query entirely */
  processes?: boolean;
}

export class SystemMonitor implements MetricsSource {
  private readonly collectProcesses: boolean;

  constructor(options: SystemMonitorOptions = {}) {
    this.collectProcesses = options.processes ?? true;
  }

  async collectMetrics(): Promise<MetricsReading> {
    const [load, mem, procs, fsSize, netStats] = await Promise.allSettled([
      si.currentLoad(),
      si.mem(),
      this.collectProcesses ? si.processes() : Promise.resolve(null),
      si.fsSize(),
      si.networkStats('*'),
    ]);

    const processData = procs.status === 'fulfilled' ? procs.value : null;

    return {
      cpu: settle(load, toCpuReading),
      memory: settle(mem, toMemoryReading),
      processes: settle(procs, data => (data ? data.list.map(toProcessInfo) : [])),
      disks: settle(fsSize, list => list.map(toDiskInfo)),
      networks: settle(netStats, list => list.map(toNetworkInfo)),
      system: this.collectSystemInfo(processData ? processData.all : null),
    };
  }

  private collectSystemInfo(processCount: number | null): Reading<SystemInfo> {
    try {
      const uptimeSeconds = os.uptime();
      const [one, five, fifteen] = os.loadavg();
      return ok({
        hostname: os.hostname(),
        platform: `${os.type()} ${os.release()}`,
        uptimeSeconds,
        bootTime: Math.floor(Date.now() / 1000 - uptimeSeconds),
        loadAverages: [one ?? 0, five ?? 0, fifteen ?? 0],
        processCount,
      });
    } catch (error) {
      return failed(error);
    }
  }
}

function settle<T, R>(result: PromiseSettledResult<T>, map: (value: T) => R): Reading<R> {
  if (result.status === 'rejected') {
    return failed(result.reason);
  }
  try {
    return ok(map(result.value));
  } catch (error) {
    return failed(error);
  }
}

function finiteOr(value: number | null | undefined, fallback: number): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

export function toCpuReading(load: Systeminformation.CurrentLoadData): CpuReading {
  return {
    usagePercent: load.currentLoad,
    coreCount: load.cpus.length,
  };
}

export function toMemoryReading(mem: Systeminformation.MemData): MemoryReading {
  return {
    usagePercent: mem.total > 0 ? (mem.active / mem.total) * 100 : Number.NaN,
    usedBytes: mem.active,
    totalBytes: mem.total,
    swapUsedBytes: mem.swapused,
    swapTotalBytes: mem.swaptotal,
  };
}

export function toProcessInfo(proc: Systeminformation.ProcessesProcessData): ProcessInfo {
  return {
    pid: proc.pid,
    name: proc.name,
    cpuPercent: finiteOr(proc.cpu, 0),
    // memRss is reported in KiB
    memoryBytes: finiteOr(proc.memRss, 0) * 1024,
  };
}

export function toDiskInfo(disk: Systeminformation.FsSizeData): DiskInfo {
  return {
    name: disk.fs,
    mountPoint: disk.mount,
    fileSystem: disk.type,
    totalBytes: disk.size,
    usedBytes: disk.used,
    availableBytes: disk.available,
    usagePercent: finiteOr(disk.use, disk.size > 0 ? (disk.used / disk.size) * 100 : 0),
  };
}

export function toNetworkInfo(net: Systeminformation.NetworkStatsData): NetworkInterfaceInfo {
  return {
    name: net.iface,
    rxBytes: net.rx_bytes,
    txBytes: net.tx_bytes,
    // The first reading of an interface reports -1 for both rates
    rxPerSecond: Math.max(0, finiteOr(net.rx_sec, 0)),
    txPerSecond: Math.max(0, finiteOr(net.tx_sec, 0)),
  };
}
