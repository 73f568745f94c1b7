import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DashboardOrchestrator } from '../../src/core/orchestrator';
import { Tab } from '../../src/core/dashboard-state';
import { defaultSettings } from '../../src/types/schemas';
import { FakeRenderer, FakeTerminal, createLogger, createReading, proc } from '../helpers/fakes';
import { ok } from '../../src/types/metrics';
import { ErrorCode } from '../../src/types/errors';
import { ErrorLevel } from '../../src/logging/error-handler';
import type { MetricsReading } from '../../src/types/metrics';
import type { Settings } from '../../src/types/schemas';

async function settle(): Promise<void> {
  for (let i = 0; i < 20; i++) {
    await Promise.resolve();
  }
}

function setup(settings: Settings = defaultSettings()) {
  const terminal = new FakeTerminal();
  const renderer = new FakeRenderer();
  const collectMetrics = vi.fn(async (): Promise<MetricsReading> => createReading());
  const { logger, entries } = createLogger();
  const orchestrator = new DashboardOrchestrator(settings, {
    source: { collectMetrics },
    logger,
    ui: () => ({ terminal, renderer }),
  });
  return { orchestrator, terminal, renderer, collectMetrics, entries };
}

describe('DashboardOrchestrator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('samples and paints until the user quits, then stops the sampler', async () => {
    const { orchestrator, terminal, renderer, collectMetrics } = setup();

    const running = orchestrator.run();
    await settle();

    expect(orchestrator.getStatus()).toMatchObject({ running: true, sequence: 1, activeTab: Tab.Overview });
    expect(terminal.opened).toBe(1);

    await vi.advanceTimersByTimeAsync(100);
    expect(renderer.last?.metrics.sequence).toBe(1);

    terminal.press({ name: 'r', ch: 'r' });
    await settle();
    expect(collectMetrics).toHaveBeenCalledTimes(2);

    terminal.press({ name: 'q', ch: 'q' });
    await running;

    expect(terminal.closed).toBe(1);
    expect(orchestrator.getStatus()).toMatchObject({ running: false, activeTab: null });
    expect(orchestrator.getStatus().sampler.running).toBe(false);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('stops on abort()', async () => {
    const { orchestrator, terminal } = setup();

    const running = orchestrator.run();
    await settle();
    orchestrator.abort();
    await running;

    expect(terminal.closed).toBe(1);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('passes the configured limits to the sampler', async () => {
    const settings = defaultSettings();
    settings.system.max_processes_displayed = 1;
    settings.system.cpu_history_length = 2;
    const { orchestrator, collectMetrics } = setup(settings);
    collectMetrics.mockResolvedValue(createReading({ processes: ok([proc(1, 1), proc(2, 9)]) }));

    await orchestrator.snapshot();
    await orchestrator.snapshot();
    const snapshot = await orchestrator.snapshot();

    expect(snapshot.processes.map(p => p.pid)).toEqual([2]);
    expect(snapshot.cpuHistory).toHaveLength(2);
    expect(snapshot.sequence).toBe(3);
  });

  it('logs a fatal entry and rethrows when the terminal cannot be opened', async () => {
    const { orchestrator, terminal, entries } = setup();
    terminal.failOnOpen = true;

    await expect(orchestrator.run()).rejects.toMatchObject({ code: ErrorCode.TERMINAL_ERROR });

    const fatal = entries.filter(entry => entry.level === ErrorLevel.FATAL);
    expect(fatal.map(entry => entry.message)).toEqual(['Dashboard terminated: not a tty']);
    expect(terminal.closed).toBe(1);
    expect(orchestrator.getStatus().running).toBe(false);
    expect(orchestrator.getStatus().sampler.running).toBe(false);
  });

  it('refuses to run twice at once', async () => {
    const { orchestrator } = setup();

    const running = orchestrator.run();
    await expect(orchestrator.run()).rejects.toThrow('Dashboard is already running');

    orchestrator.abort();
    await running;
  });
});
