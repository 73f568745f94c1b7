import type { DiskInfo, NetworkInterfaceInfo, ProcessInfo } from "../types/metrics";

export type UsageLevel = "normal" | "elevated" | "critical";

export interface UsageThresholds {
  elevated: number;
  critical: number;
}

export const CPU_THRESHOLDS: UsageThresholds = { elevated: 60, critical: 80 };
export const MEMORY_THRESHOLDS: UsageThresholds = { elevated: 75, critical: 90 };

const KIB = 1024;
const MIB = KIB * 1024;
const GIB = MIB * 1024;

export function clampPercent(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.min(100, Math.max(0, value));
}

/** Strictly above a threshold moves to the next level */
export function classifyUsage(value: number, thresholds: UsageThresholds): UsageLevel {
  if (value > thresholds.critical) {
    return "critical";
  }
  if (value > thresholds.elevated) {
    return "elevated";
  }
  return "normal";
}

export function usageColor(level: UsageLevel): string {
  switch (level) {
    case "critical":
      return "red";
    case "elevated":
      return "yellow";
    default:
      return "green";
  }
}

export function formatPercent(value: number): string {
  const safeValue = Number.isFinite(value) ? value : 0;
  return `${safeValue.toFixed(1)}%`;
}

export function formatBytes(bytes: number): string {
  const safe = Number.isFinite(bytes) && bytes > 0 ? bytes : 0;
  if (safe >= GIB) return `${(safe / GIB).toFixed(1)} GB`;
  if (safe >= MIB) return `${(safe / MIB).toFixed(1)} MB`;
  if (safe >= KIB) return `${(safe / KIB).toFixed(1)} KB`;
  return `${Math.round(safe)} B`;
}

export function formatRate(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

export function formatUptime(seconds: number): string {
  if (!Number.isFinite(seconds) || seconds < 0) {
    return "-";
  }

  const days = Math.floor(seconds / 86400);
  const hours = Math.floor((seconds % 86400) / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);

  if (days > 0) {
    return `${days}d ${hours}h ${minutes}m`;
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`;
  }
  return `${minutes}m`;
}

export function formatLoad(loadAverages: readonly number[]): string {
  return loadAverages.map((load) => load.toFixed(2)).join(" ");
}

function fit(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, Math.max(0, width - 1))}~` : text;
}

export const PROCESS_HEADER = `${"PID".padStart(8)}  ${"CPU".padStart(7)}  ${"MEMORY".padStart(9)}  NAME`;

export function formatProcessRow(proc: ProcessInfo): string {
  return [
    String(proc.pid).padStart(8),
    formatPercent(proc.cpuPercent).padStart(7),
    formatBytes(proc.memoryBytes).padStart(9),
    proc.name,
  ].join("  ");
}

export const DISK_HEADER = `${"MOUNT".padEnd(15)} ${"FS".padEnd(10)} ${"TOTAL".padStart(10)} ${"USED".padStart(10)} ${"USAGE".padStart(7)}`;

export function formatDiskRow(disk: DiskInfo): string {
  return [
    fit(disk.mountPoint, 15).padEnd(15),
    fit(disk.fileSystem, 10).padEnd(10),
    formatBytes(disk.totalBytes).padStart(10),
    formatBytes(disk.usedBytes).padStart(10),
    formatPercent(disk.usagePercent).padStart(7),
  ].join(" ");
}

export const NETWORK_HEADER = `${"INTERFACE".padEnd(14)} ${"RX TOTAL".padStart(10)} ${"TX TOTAL".padStart(10)} ${"RX RATE".padStart(12)} ${"TX RATE".padStart(12)}`;

export function formatNetworkRow(net: NetworkInterfaceInfo): string {
  return [
    fit(net.name, 14).padEnd(14),
    formatBytes(net.rxBytes).padStart(10),
    formatBytes(net.txBytes).padStart(10),
    formatRate(net.rxPerSecond).padStart(12),
    formatRate(net.txPerSecond).padStart(12),
  ].join(" ");
}

/** Horizontal bar in blessed tag markup, colored by usage level */
export function formatGauge(percent: number, width: number, thresholds: UsageThresholds): string {
  const cells = Math.max(0, Math.floor(width));
  const value = clampPercent(percent);
  const filled = Math.round((value / 100) * cells);
  const color = usageColor(classifyUsage(value, thresholds));
  return `{${color}-fg}${"█".repeat(filled)}{/${color}-fg}${"░".repeat(cells - filled)} ${formatPercent(value)}`;
}
