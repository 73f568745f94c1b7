#!/usr/bin/env tsx
import fs from "fs";
import path from "path";
import YAML from "yaml";
import { defaultConfigPath } from "../src/config/settings";
import { validateSettingsSafe } from "../src/types/schemas";

const configPath = path.resolve(process.argv[2] || process.env.HOSTWATCH_CONFIG || defaultConfigPath());

if (!fs.existsSync(configPath)) {
  console.error(`❌ Config not found: ${configPath}`);
  console.error(`\nCreate a config file with:\n  hostwatch config:init`);
  process.exit(2);
}

const raw = fs.readFileSync(configPath, "utf8");
let data: unknown;

try {
  data = configPath.endsWith(".json") ? JSON.parse(raw) : YAML.parse(raw);
} catch (parseError) {
  console.error(`❌ Config parse error: ${parseError}`);
  process.exit(3);
}

const result = validateSettingsSafe(data ?? {});

if (!result.success) {
  console.error("❌ Config validation failed:");
  console.error("\n🔍 Issues found:");

  result.error.issues.forEach((issue, index) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "root";
    console.error(`  ${index + 1}. ${where}: ${issue.message}`);

    if (issue.code === "invalid_type") {
      console.error(`     Expected: ${issue.expected}, Received: ${issue.received}`);
    }
  });

  console.error(`\n💡 Fix these ${result.error.issues.length} issues and try again.`);
  process.exit(1);
}

const { dashboard, system } = result.data;
console.log("✅ Config validation passed!");
console.log(`📋 Title: ${dashboard.title}`);
console.log(`⏱️  Refresh: ${dashboard.refresh_rate_ms} ms`);
console.log(`📈 History: cpu ${system.cpu_history_length}, memory ${system.memory_history_length}`);
console.log(`🔧 Processes: ${system.enable_process_monitoring ? `top ${system.max_processes_displayed}` : "disabled"}`);

process.exit(0);
