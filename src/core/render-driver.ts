/**
 * Render Driver
 *
 * Runs the interactive loop: a fixed-rate frame timer paints the active tab
 * from one store read, and key events mutate the dashboard state in between.
 * The terminal is released on every exit path.
 */

import { DashboardError, ErrorCode } from '../types/errors';
import { MIN_FRAME_RATE_MS } from '../types/schemas';
import { resolveKey } from './keymap';
import type { MetricsSnapshot, SnapshotReader } from '../metrics/snapshot-store';
import type { ProcessInfo, Sample } from '../types/metrics';
import type { DashboardState, DashboardStateMachine, Tab } from './dashboard-state';
import type { ErrorHandler } from '../logging/error-handler';
import type { KeyInput } from './keymap';
import type { RefreshTrigger } from './sampler';

export interface Viewport {
  /** Process rows visible on the Processes tab */
  processRows: number;
  /** Columns available to each chart */
  chartColumns: number;
}

export interface Frame {
  tab: Tab;
  dashboard: DashboardState;
  metrics: MetricsSnapshot;
  cpuSeries: readonly Sample[];
  memorySeries: readonly Sample[];
  visibleProcesses: readonly ProcessInfo[];
}

export interface Renderer {
  viewport(): Viewport;
  paint(frame: Frame): void;
}

export interface TerminalSession {
  open(): void;
  close(): void;
}

export interface InputSource {
  /** Subscribe to key events; returns the unsubscribe function */
  onKey(listener: (key: KeyInput) => void): () => void;
}

export interface RenderDriverOptions {
  frameRateMs: number;
  logger: ErrorHandler;
  /** Monotonic clock used for debounce timing */
  clock?: () => number;
}

/**
 * Pick `width` evenly spaced samples, always keeping the first and the last.
 * Series that already fit are returned as they are.
 */
export function decimateSeries(samples: readonly Sample[], width: number): Sample[] {
  const n = samples.length;
  const columns = Math.floor(width);
  if (columns <= 0 || n === 0) return [];
  if (n <= columns) return [...samples];

  const last = samples[n - 1];
  if (columns === 1) return last !== undefined ? [last] : [];

  const picked: Sample[] = [];
  for (let i = 0; i < columns; i++) {
    const sample = samples[Math.round((i * (n - 1)) / (columns - 1))];
    if (sample !== undefined) picked.push(sample);
  }
  return picked;
}

export class RenderDriver {
  private readonly store: SnapshotReader;
  private readonly state: DashboardStateMachine;
  private readonly renderer: Renderer;
  private readonly terminal: TerminalSession;
  private readonly input: InputSource;
  private readonly refresh: RefreshTrigger;
  private readonly logger: ErrorHandler;
  private readonly frameRateMs: number;
  private readonly clock: () => number;
  private finish: (() => void) | null = null;
  private frames = 0;

  constructor(
    deps: {
      store: SnapshotReader;
      state: DashboardStateMachine;
      renderer: Renderer;
      terminal: TerminalSession;
      input: InputSource;
      refresh: RefreshTrigger;
    },
    options: RenderDriverOptions,
  ) {
    this.store = deps.store;
    this.state = deps.state;
    this.renderer = deps.renderer;
    this.terminal = deps.terminal;
    this.input = deps.input;
    this.refresh = deps.refresh;
    this.logger = options.logger;
    this.frameRateMs = Math.max(MIN_FRAME_RATE_MS, options.frameRateMs);
    this.clock = options.clock ?? (() => performance.now());
  }

  get framesPainted(): number {
    return this.frames;
  }

  get activeTab(): Tab {
    return this.state.tab;
  }

  /** Resolves once the user quits or stop() is called */
  async run(): Promise<void> {
    let timer: NodeJS.Timeout | null = null;
    let unsubscribe: (() => void) | null = null;

    try {
      try {
        this.terminal.open();
      } catch (error) {
        throw DashboardError.from(error, ErrorCode.TERMINAL_ERROR);
      }

      const done = new Promise<void>(resolve => {
        this.finish = resolve;
      });

      unsubscribe = this.input.onKey(key => this.handleKey(key));
      this.paintFrame();
      timer = setInterval(() => this.paintFrame(), this.frameRateMs);

      if (!this.state.isShuttingDown) {
        await done;
      }
    } finally {
      this.finish = null;
      if (timer !== null) clearInterval(timer);
      if (unsubscribe !== null) unsubscribe();
      this.terminal.close();
      this.logger.debug('Render loop finished', { frames: this.frames });
    }
  }

  /** Ends the loop from outside, e.g. on a signal */
  stop(): void {
    this.state.shutdown();
    this.finish?.();
  }

  handleKey(key: KeyInput): void {
    const action = resolveKey(key);
    if (action === null) {
      this.logger.debug('Ignored key', { key: key.name ?? key.ch ?? '' });
      return;
    }

    const metrics = this.store.read();
    const changed = this.state.dispatch(action, {
      now: this.clock(),
      processCount: metrics.processes.length,
      viewportHeight: this.safeViewport().processRows,
    });

    if (this.state.takeRefreshRequest()) {
      this.refresh.requestRefresh();
    }

    if (this.state.isShuttingDown) {
      this.finish?.();
      return;
    }

    if (changed) {
      this.paintFrame();
    }
  }

  /** Builds the frame for the current state from one store read */
  buildFrame(viewport: Viewport): Frame {
    const metrics = this.store.read();
    const offset = this.state.clampScroll(metrics.processes.length, viewport.processRows);
    const rows = Math.max(0, viewport.processRows);

    return {
      tab: this.state.tab,
      dashboard: this.state.snapshot(),
      metrics,
      cpuSeries: decimateSeries(metrics.cpuHistory, viewport.chartColumns),
      memorySeries: decimateSeries(metrics.memoryHistory, viewport.chartColumns),
      visibleProcesses: metrics.processes.slice(offset, offset + rows),
    };
  }

  private paintFrame(): void {
    if (this.state.isShuttingDown) return;
    try {
      this.renderer.paint(this.buildFrame(this.renderer.viewport()));
      this.frames++;
    } catch (error) {
      this.logger.error('Failed to paint frame', DashboardError.from(error, ErrorCode.RENDER_ERROR));
    }
  }

  private safeViewport(): Viewport {
    try {
      return this.renderer.viewport();
    } catch (error) {
      this.logger.warn('Viewport unavailable', DashboardError.from(error, ErrorCode.RENDER_ERROR));
      return { processRows: 0, chartColumns: 0 };
    }
  }
}
