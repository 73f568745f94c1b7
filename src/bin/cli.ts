#!/usr/bin/env node
import { Command } from "commander";
import path from "path";
import fs from "fs";
import { DashboardOrchestrator } from "../core/orchestrator";
import { SettingsManager, defaultConfigPath } from "../config/settings";
import { reportFailure } from "./report";
import { formatBytes, formatLoad, formatPercent, formatUptime } from "../utils/formatters";
import type { LoadedSettings } from "../config/settings";
import type { MetricsSnapshot } from "../metrics/snapshot-store";

interface ConfigOption {
  config?: string;
}

interface DashboardOptions extends ConfigOption {
  refresh?: number;
  debug?: boolean;
}

const program = new Command();

function loadSettings(opts: DashboardOptions): LoadedSettings {
  return SettingsManager.load({
    configPath: opts.config,
    refreshSeconds: opts.refresh,
    debug: opts.debug,
  });
}

function summarize(snapshot: MetricsSnapshot): string[] {
  const lines = [
    `CPU:       ${snapshot.cpu ? formatPercent(snapshot.cpuPercent) : "n/a"}`,
    `Memory:    ${snapshot.memory ? `${formatPercent(snapshot.memoryPercent)} (${formatBytes(snapshot.memory.usedBytes)} / ${formatBytes(snapshot.memory.totalBytes)})` : "n/a"}`,
  ];
  if (snapshot.system) {
    lines.push(`Host:      ${snapshot.system.hostname} (${snapshot.system.platform})`);
    lines.push(`Uptime:    ${formatUptime(snapshot.system.uptimeSeconds)}`);
    lines.push(`Load avg:  ${formatLoad(snapshot.system.loadAverages)}`);
  }
  lines.push(`Disks:     ${snapshot.disks.length}`);
  lines.push(`Networks:  ${snapshot.networks.map(net => net.name).join(", ") || "none"}`);
  const top = snapshot.processes.slice(0, 5);
  if (top.length > 0) {
    lines.push("Top processes:");
    top.forEach(proc => lines.push(`  ${String(proc.pid).padStart(7)}  ${formatPercent(proc.cpuPercent).padStart(6)}  ${proc.name}`));
  }
  return lines;
}

program
  .name("hostwatch")
  .description("Terminal dashboard for live host metrics")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to config file")
  .option("-r, --refresh <seconds>", "Refresh interval in seconds", value => Number(value))
  .option("-d, --debug", "Enable debug logging", false)
  .action(async (opts: DashboardOptions) => {
    const { settings, source, notices } = loadSettings(opts);
    const orchestrator = new DashboardOrchestrator(settings);
    notices.forEach(notice => orchestrator.logger.warn(notice));
    orchestrator.logger.debug("Loaded settings", { source: source ?? "built-in defaults" });

    const shutdown = (signal: NodeJS.Signals): void => {
      orchestrator.logger.info(`Received ${signal}, shutting down`);
      orchestrator.abort();
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);

    try {
      await orchestrator.run();
    } finally {
      process.removeListener("SIGINT", shutdown);
      process.removeListener("SIGTERM", shutdown);
    }
  });

program
  .command("config:init")
  .description("Create a starter config")
  .option("-o, --output <path>", "Output path", defaultConfigPath())
  .option("--force", "Overwrite an existing file", false)
  .action((opts: { output: string; force: boolean }) => {
    const out = path.resolve(opts.output);
    if (fs.existsSync(out) && !opts.force) {
      console.error(`❌ ${out} already exists (use --force to overwrite)`);
      process.exitCode = 1;
      return;
    }
    const sample = new SettingsManager().toYAML();
    fs.mkdirSync(path.dirname(out), { recursive: true });
    fs.writeFileSync(out, sample, "utf8");
    console.log(`✅ Wrote starter config to ${out}`);
  });

program
  .command("validate")
  .description("Validate configuration against schema")
  .option("-c, --config <path>", "Path to config file")
  .action((opts: ConfigOption) => {
    const { settings, source, notices } = loadSettings(opts);
    console.log("✅ Configuration is valid.");
    console.log(`📄 Source: ${source ?? "built-in defaults"}`);
    console.log(`⏱️  Refresh: ${settings.dashboard.refresh_rate_ms} ms, frame: ${settings.dashboard.frame_rate_ms} ms`);
    console.log(`📈 History: cpu ${settings.system.cpu_history_length}, memory ${settings.system.memory_history_length}`);
    console.log(`🔧 Panels enabled: ${Object.entries(settings.display).filter(([, on]) => on).map(([name]) => name.replace(/^show_/, "")).join(", ")}`);
    notices.forEach(notice => console.log(`⚠️  ${notice}`));
  });

program
  .command("snapshot")
  .description("Sample the host once and print the result")
  .option("-c, --config <path>", "Path to config file")
  .option("--json", "Print JSON", false)
  .action(async (opts: ConfigOption & { json: boolean }) => {
    const { settings } = loadSettings(opts);
    const orchestrator = new DashboardOrchestrator(settings);
    const snapshot = await orchestrator.snapshot();
    if (opts.json) {
      console.log(JSON.stringify(snapshot, null, 2));
      return;
    }
    summarize(snapshot).forEach(line => console.log(line));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  process.exitCode = reportFailure(error);
});
