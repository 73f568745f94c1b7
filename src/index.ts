export { HistoryBuffer } from './metrics/history-buffer';
export { SnapshotStore } from './metrics/snapshot-store';
export type { MetricsSnapshot, SnapshotReader, SnapshotUpdate } from './metrics/snapshot-store';
export { Sampler, sortProcesses } from './core/sampler';
export type { RefreshTrigger, SamplerOptions, SamplerStatus } from './core/sampler';
export { DashboardStateMachine, Tab, TAB_ORDER } from './core/dashboard-state';
export type { DashboardAction, DashboardState, DispatchContext } from './core/dashboard-state';
export { resolveKey, KEY_BINDINGS } from './core/keymap';
export type { KeyInput } from './core/keymap';
export { RenderDriver, decimateSeries } from './core/render-driver';
export type { Frame, InputSource, Renderer, TerminalSession, Viewport } from './core/render-driver';
export { DashboardOrchestrator } from './core/orchestrator';
export type { OrchestratorDeps, OrchestratorStatus } from './core/orchestrator';
export { SystemMonitor } from './diagnostics/system-monitor';
export { SettingsManager, defaultConfigPath, defaultLogPath } from './config/settings';
export type { LoadedSettings, SettingsOverrides } from './config/settings';
export { ErrorHandler, ErrorLevel } from './logging/error-handler';
export { DashboardError, ErrorCode } from './types/errors';
export * from './types/metrics';
export * from './types/schemas';
