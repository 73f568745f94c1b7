import { ErrorHandler, consoleSink, fileSink, parseLevel } from '../logging/error-handler';
import { SnapshotStore } from '../metrics/snapshot-store';
import { SystemMonitor } from '../diagnostics/system-monitor';
import { BlessedTerminal } from '../ui/terminal';
import { BlessedRenderer } from '../ui/blessed-renderer';
import { defaultLogPath } from '../config/settings';
import { DashboardStateMachine } from './dashboard-state';
import { RenderDriver } from './render-driver';
import { Sampler } from './sampler';
import { DashboardError } from '../types/errors';
import type { MetricsSnapshot } from '../metrics/snapshot-store';
import type { MetricsSource } from '../types/metrics';
import type { Settings } from '../types/schemas';
import type { InputSource, Renderer, TerminalSession } from './render-driver';
import type { SamplerStatus } from './sampler';
import type { Tab } from './dashboard-state';

export interface OrchestratorDeps {
  source?: MetricsSource;
  logger?: ErrorHandler;
  /** Terminal plus the renderer that paints onto it */
  ui?: () => { terminal: TerminalSession & InputSource; renderer: Renderer };
  env?: NodeJS.ProcessEnv;
}

export interface OrchestratorStatus {
  running: boolean;
  sampler: SamplerStatus;
  framesPainted: number;
  sequence: number;
  /** null while the dashboard is not running */
  activeTab: Tab | null;
}

/**
 * Wires the sampler, the snapshot store and the render loop together for
 * one dashboard session.
 */
export class DashboardOrchestrator {
  public readonly settings: Settings;
  public readonly logger: ErrorHandler;
  public readonly store: SnapshotStore;
  public readonly sampler: Sampler;
  private readonly deps: OrchestratorDeps;
  private driver: RenderDriver | null = null;
  private running = false;

  constructor(settings: Settings, deps: OrchestratorDeps = {}) {
    this.settings = settings;
    this.deps = deps;
    this.logger = deps.logger ?? new ErrorHandler({ level: parseLevel(settings.logging.level) });

    this.store = new SnapshotStore({
      cpuHistoryLength: settings.system.cpu_history_length,
      memoryHistoryLength: settings.system.memory_history_length,
    });

    const source = deps.source ?? new SystemMonitor({ processes: settings.system.enable_process_monitoring });
    this.sampler = new Sampler(source, this.store, {
      refreshIntervalMs: settings.dashboard.refresh_rate_ms,
      maxProcesses: settings.system.max_processes_displayed,
      enableProcessMonitoring: settings.system.enable_process_monitoring,
      logger: this.logger,
    });
  }

  /** Runs the interactive dashboard until the user quits or abort() is called */
  async run(): Promise<void> {
    if (this.running) {
      throw new Error('Dashboard is already running');
    }

    const { terminal, renderer } = this.createUi();
    const driver = new RenderDriver(
      {
        store: this.store,
        state: new DashboardStateMachine(this.settings.dashboard.tab_debounce_ms),
        renderer,
        terminal,
        input: terminal,
        refresh: this.sampler,
      },
      { frameRateMs: this.settings.dashboard.frame_rate_ms, logger: this.logger },
    );
    this.driver = driver;

    // Anything written to the terminal would corrupt the screen
    if (!this.deps.logger) {
      this.logger.setSink(fileSink(this.settings.logging.file ?? defaultLogPath(this.deps.env)));
    }

    this.logger.info('Dashboard starting', {
      refreshRateMs: this.sampler.refreshIntervalMs,
      frameRateMs: this.settings.dashboard.frame_rate_ms,
    });

    this.running = true;
    this.sampler.start();
    try {
      await driver.run();
    } catch (error) {
      this.logger.fatal('Dashboard terminated', DashboardError.from(error));
      throw error;
    } finally {
      this.sampler.stop();
      this.driver = null;
      this.running = false;
      this.logger.info('Dashboard stopped', { cycles: this.sampler.getStatus().cycles });
      if (!this.deps.logger) {
        this.logger.setSink(consoleSink);
      }
    }
  }

  abort(): void {
    if (this.driver !== null) {
      this.driver.stop();
    } else {
      this.sampler.stop();
    }
  }

  /** One sampling cycle without the interactive UI */
  async snapshot(): Promise<MetricsSnapshot> {
    return this.sampler.sampleOnce();
  }

  getStatus(): OrchestratorStatus {
    return {
      running: this.running,
      sampler: this.sampler.getStatus(),
      framesPainted: this.driver?.framesPainted ?? 0,
      sequence: this.store.read().sequence,
      activeTab: this.driver?.activeTab ?? null,
    };
  }

  private createUi(): { terminal: TerminalSession & InputSource; renderer: Renderer } {
    if (this.deps.ui) return this.deps.ui();

    const terminal = new BlessedTerminal(this.settings.dashboard.title);
    const renderer = new BlessedRenderer(terminal, {
      title: this.settings.dashboard.title,
      display: this.settings.display,
    });
    return { terminal, renderer };
  }
}
