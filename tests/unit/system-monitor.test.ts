import os from 'os';
import * as si from 'systeminformation';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { SystemMonitor } from '../../src/diagnostics/system-monitor';

const siData = vi.hoisted(() => ({
  values: new Map<string, unknown>(),
  failing: new Set<string>(),
}));

vi.mock('systeminformation', () => {
  const respond = (name: string) =>
    vi.fn(async () => {
      if (siData.failing.has(name)) throw new Error(`${name} failed`);
      return siData.values.get(name);
    });
  return {
    currentLoad: respond('currentLoad'),
    mem: respond('mem'),
    processes: respond('processes'),
    fsSize: respond('fsSize'),
    networkStats: respond('networkStats'),
  };
});

const GIB = 1024 ** 3;

describe('SystemMonitor', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    siData.failing.clear();
    siData.values.clear();
    siData.values.set('currentLoad', { currentLoad: 42.5, cpus: [{ load: 40 }, { load: 45 }] });
    siData.values.set('mem', { total: 8 * GIB, active: 2 * GIB, swapused: 512, swaptotal: 1024 });
    siData.values.set('processes', {
      all: 3,
      list: [
        { pid: 1, name: 'init', cpu: 0.5, memRss: 1024 },
        { pid: 2, name: 'node', cpu: Number.NaN, memRss: 2048 },
      ],
    });
    siData.values.set('fsSize', [
      { fs: '/dev/sda1', type: 'ext4', size: 1000, used: 250, available: 750, use: 25, mount: '/' },
      { fs: 'overlay', type: 'overlay', size: 200, used: 50, available: 150, use: Number.NaN, mount: '/var/lib' },
    ]);
    siData.values.set('networkStats', [{ iface: 'eth0', rx_bytes: 100, tx_bytes: 200, rx_sec: null, tx_sec: 12.5 }]);
  });

  it('maps every category from one pull', async () => {
    const reading = await new SystemMonitor().collectMetrics();

    expect(reading.cpu).toEqual({ ok: true, value: { usagePercent: 42.5, coreCount: 2 } });
    expect(reading.memory).toEqual({
      ok: true,
      value: { usagePercent: 25, usedBytes: 2 * GIB, totalBytes: 8 * GIB, swapUsedBytes: 512, swapTotalBytes: 1024 },
    });
    expect(reading.processes).toEqual({
      ok: true,
      value: [
        { pid: 1, name: 'init', cpuPercent: 0.5, memoryBytes: 1024 * 1024 },
        { pid: 2, name: 'node', cpuPercent: 0, memoryBytes: 2048 * 1024 },
      ],
    });
    expect(reading.disks).toEqual({
      ok: true,
      value: [
        { name: '/dev/sda1', mountPoint: '/', fileSystem: 'ext4', totalBytes: 1000, usedBytes: 250, availableBytes: 750, usagePercent: 25 },
        { name: 'overlay', mountPoint: '/var/lib', fileSystem: 'overlay', totalBytes: 200, usedBytes: 50, availableBytes: 150, usagePercent: 25 },
      ],
    });
    expect(reading.networks).toEqual({
      ok: true,
      value: [{ name: 'eth0', rxBytes: 100, txBytes: 200, rxPerSecond: 0, txPerSecond: 12.5 }],
    });
    expect(si.networkStats).toHaveBeenCalledWith('*');
  });

  it('reports zero rates for a first interface reading', async () => {
    siData.values.set('networkStats', [{ iface: 'wlan0', rx_bytes: 5, tx_bytes: 7, rx_sec: -1, tx_sec: -1 }]);

    const reading = await new SystemMonitor().collectMetrics();

    expect(reading.networks).toEqual({
      ok: true,
      value: [{ name: 'wlan0', rxBytes: 5, txBytes: 7, rxPerSecond: 0, txPerSecond: 0 }],
    });
  });

  it('reads host details from the OS', async () => {
    const reading = await new SystemMonitor().collectMetrics();

    expect(reading.system.ok).toBe(true);
    if (reading.system.ok) {
      expect(reading.system.value.hostname).toBe(os.hostname());
      expect(reading.system.value.processCount).toBe(3);
      expect(reading.system.value.loadAverages).toHaveLength(3);
    }
  });

  it('fails one category without failing the others', async () => {
    siData.failing.add('fsSize');

    const reading = await new SystemMonitor().collectMetrics();

    expect(reading.disks).toEqual({ ok: false, error: expect.objectContaining({ message: 'fsSize failed' }) });
    expect(reading.cpu.ok).toBe(true);
    expect(reading.memory.ok).toBe(true);
    expect(reading.processes.ok).toBe(true);
    expect(reading.networks.ok).toBe(true);
  });

  it('reports memory as NaN when the total is zero', async () => {
    siData.values.set('mem', { total: 0, active: 0, swapused: 0, swaptotal: 0 });

    const reading = await new SystemMonitor().collectMetrics();

    expect(reading.memory.ok && Number.isNaN(reading.memory.value.usagePercent)).toBe(true);
  });

  it('skips the process query when disabled', async () => {
    const reading = await new SystemMonitor({ processes: false }).collectMetrics();

    expect(si.processes).not.toHaveBeenCalled();
    expect(reading.processes).toEqual({ ok: true, value: [] });
    expect(reading.system.ok && reading.system.value.processCount).toBeNull();
  });
});
