/**
 * Settings and Configuration Manager
 * Resolves, parses and validates the dashboard configuration once at startup.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import YAML from 'yaml';
import { DashboardError, ErrorCode } from '../types/errors';
import { MIN_REFRESH_RATE_MS, defaultSettings, validateSettingsSafe } from '../types/schemas';
import type { Settings } from '../types/schemas';

export interface SettingsOverrides {
  /** Explicit --config path; must exist when given */
  configPath?: string;
  /** --refresh, in seconds */
  refreshSeconds?: number;
  /** --debug */
  debug?: boolean;
}

export interface LoadedSettings {
  settings: Settings;
  /** File the settings came from; null when built-in defaults were used */
  source: string | null;
  /** Adjustments made while loading, for the caller to log */
  notices: string[];
}

export function xdgConfigHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_CONFIG_HOME || path.join(os.homedir(), '.config');
}

export function xdgStateHome(env: NodeJS.ProcessEnv = process.env): string {
  return env.XDG_STATE_HOME || path.join(os.homedir(), '.local/state');
}

export function defaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(xdgConfigHome(env), 'hostwatch', 'config.yaml');
}

export function defaultLogPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(xdgStateHome(env), 'hostwatch', 'hostwatch.log');
}

export function parseConfigText(raw: string, filePath: string): unknown {
  try {
    const data: unknown = filePath.endsWith('.json') ? JSON.parse(raw) : YAML.parse(raw);
    return data ?? {};
  } catch (parseError) {
    throw new DashboardError(`Failed to parse config file: ${filePath}`, ErrorCode.CONFIG_PARSE_ERROR, {
      originalError: parseError instanceof Error ? parseError : new Error(String(parseError)),
      context: { path: filePath },
    });
  }
}

export function validateConfigData(data: unknown, filePath: string): Settings {
  const result = validateSettingsSafe(data);
  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const where = issue.path.length > 0 ? issue.path.join('.') : 'root';
      return `${where}: ${issue.message}`;
    });
    throw new DashboardError(
      `Invalid config file ${filePath}:\n  - ${issues.join('\n  - ')}`,
      ErrorCode.CONFIG_VALIDATION_ERROR,
      { context: { path: filePath, issues } },
    );
  }
  return result.data;
}

export class SettingsManager {
  private config: Settings;

  constructor(initialConfig: Settings = defaultSettings()) {
    this.config = initialConfig;
  }

  static load(overrides: SettingsOverrides = {}, env: NodeJS.ProcessEnv = process.env): LoadedSettings {
    const notices: string[] = [];
    const explicitPath = overrides.configPath || env.HOSTWATCH_CONFIG || undefined;
    const configPath = path.resolve(explicitPath ?? defaultConfigPath(env));

    let settings: Settings;
    let source: string | null = configPath;

    if (fs.existsSync(configPath)) {
      const raw = fs.readFileSync(configPath, 'utf8');
      settings = validateConfigData(parseConfigText(raw, configPath), configPath);
    } else if (explicitPath) {
      throw new DashboardError(`Config file not found: ${configPath}`, ErrorCode.CONFIG_NOT_FOUND, {
        context: { path: configPath },
      });
    } else {
      settings = defaultSettings();
      source = null;
    }

    const manager = new SettingsManager(settings);
    manager.applyOverrides(overrides, notices);
    return { settings: manager.getConfig(), source, notices };
  }

  getConfig(): Settings {
    return this.config;
  }

  updateConfig(updates: Partial<Settings>): void {
    this.config = { ...this.config, ...updates };
  }

  private applyOverrides(overrides: SettingsOverrides, notices: string[]): void {
    const dashboard = { ...this.config.dashboard };
    const logging = { ...this.config.logging };

    if (overrides.refreshSeconds !== undefined) {
      if (!Number.isFinite(overrides.refreshSeconds) || overrides.refreshSeconds <= 0) {
        throw new DashboardError(
          `Refresh interval must be a positive number of seconds, got ${overrides.refreshSeconds}`,
          ErrorCode.CONFIG_VALIDATION_ERROR,
        );
      }
      dashboard.refresh_rate_ms = Math.round(overrides.refreshSeconds * 1000);
    }

    if (dashboard.refresh_rate_ms < MIN_REFRESH_RATE_MS) {
      notices.push(`refresh_rate_ms ${dashboard.refresh_rate_ms} raised to the ${MIN_REFRESH_RATE_MS} ms minimum`);
      dashboard.refresh_rate_ms = MIN_REFRESH_RATE_MS;
    }

    if (overrides.debug) {
      logging.level = 'debug';
    }

    this.updateConfig({ dashboard, logging });
  }

  toYAML(): string {
    return YAML.stringify(this.config);
  }
}
