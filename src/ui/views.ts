/**
 * Text content for each dashboard panel, in blessed tag markup.
 * Kept free of widget code so the renderer only positions and paints.
 */

import { KEY_BINDINGS } from '../core/keymap';
import { TAB_ORDER, TAB_TITLES, Tab } from '../core/dashboard-state';
import {
  CPU_THRESHOLDS,
  DISK_HEADER,
  MEMORY_THRESHOLDS,
  NETWORK_HEADER,
  PROCESS_HEADER,
  formatBytes,
  formatDiskRow,
  formatGauge,
  formatLoad,
  formatNetworkRow,
  formatProcessRow,
  formatUptime,
} from '../utils/formatters';
import type { Frame } from '../core/render-driver';
import type { MetricsSnapshot } from '../metrics/snapshot-store';
import type { Sample } from '../types/metrics';
import type { Widgets as ContribWidgets } from 'blessed-contrib';

export type ChartSeries = ContribWidgets.LineData;

/** Neutralise braces so reported names are not read as tags */
export function escapeTags(text: string): string {
  return text.replace(/[{}]/g, ch => (ch === '{' ? '{open}' : '{close}'));
}

export function headerLine(title: string, active: Tab): string {
  const tabs = TAB_ORDER.map((tab, index) => {
    const label = ` ${index + 1} ${TAB_TITLES[tab]} `;
    return tab === active ? `{inverse}${label}{/inverse}` : label;
  });
  return `{bold}${escapeTags(title)}{/bold}  ${tabs.join('|')}`;
}

export function statusLine(frame: Frame): string {
  const { metrics, dashboard } = frame;
  const sampled = metrics.sequence === 0 ? 'waiting for first sample' : `sample #${metrics.sequence}`;
  const scroll = dashboard.activeTab === Tab.Processes ? `  row ${dashboard.processScrollOffset + 1}/${metrics.processes.length}` : '';
  return ` ${sampled}${scroll}  |  r refresh  h help  q quit`;
}

export function cpuGauge(metrics: MetricsSnapshot, width: number): string {
  if (metrics.cpu === null) return 'CPU    n/a';
  return `CPU    ${formatGauge(metrics.cpuPercent, width, CPU_THRESHOLDS)}  ${metrics.cpu.coreCount} cores`;
}

export function memoryGauge(metrics: MetricsSnapshot, width: number): string {
  if (metrics.memory === null) return 'Memory n/a';
  const { usedBytes, totalBytes } = metrics.memory;
  return `Memory ${formatGauge(metrics.memoryPercent, width, MEMORY_THRESHOLDS)}  ${formatBytes(usedBytes)} / ${formatBytes(totalBytes)}`;
}

/** x labels are seconds relative to the newest sample */
export function toChartSeries(title: string, samples: readonly Sample[], color: string): ChartSeries {
  const newest = samples[samples.length - 1];
  return {
    title,
    x: samples.map(sample => (newest ? `${Math.round((sample.timestamp - newest.timestamp) / 1000)}s` : '')),
    y: samples.map(sample => sample.value),
    style: { line: color },
  };
}

export function systemLines(metrics: MetricsSnapshot): string {
  const system = metrics.system;
  if (system === null) return 'System information unavailable';

  const lines = [
    `Host:      ${escapeTags(system.hostname)}`,
    `Platform:  ${system.platform}`,
    `Uptime:    ${formatUptime(system.uptimeSeconds)}`,
    `Load avg:  ${formatLoad(system.loadAverages)}`,
  ];
  if (system.processCount !== null) {
    lines.push(`Processes: ${system.processCount}`);
  }
  if (metrics.memory !== null && metrics.memory.swapTotalBytes > 0) {
    lines.push(`Swap:      ${formatBytes(metrics.memory.swapUsedBytes)} / ${formatBytes(metrics.memory.swapTotalBytes)}`);
  }
  return lines.join('\n');
}

export function diskLines(metrics: MetricsSnapshot): string {
  if (metrics.disks.length === 0) return 'No disks reported';
  return [`{bold}${DISK_HEADER}{/bold}`, ...metrics.disks.map(disk => escapeTags(formatDiskRow(disk)))].join('\n');
}

export function processLines(frame: Frame): string {
  if (frame.metrics.processes.length === 0) return 'No processes reported';
  return [`{bold}${PROCESS_HEADER}{/bold}`, ...frame.visibleProcesses.map(proc => escapeTags(formatProcessRow(proc)))].join('\n');
}

export function networkLines(metrics: MetricsSnapshot): string {
  if (metrics.networks.length === 0) return 'No network interfaces reported';
  return [`{bold}${NETWORK_HEADER}{/bold}`, ...metrics.networks.map(net => escapeTags(formatNetworkRow(net)))].join('\n');
}

export function helpLines(): string {
  const width = Math.max(...KEY_BINDINGS.map(binding => binding.keys.length));
  return [
    '{bold}Keyboard shortcuts{/bold}',
    '',
    ...KEY_BINDINGS.map(binding => `  ${binding.keys.padEnd(width)}  ${binding.description}`),
  ].join('\n');
}
