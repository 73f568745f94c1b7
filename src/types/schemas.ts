import { z } from "zod";

/** Sampling faster than this busy-loops the metrics source */
export const MIN_REFRESH_RATE_MS = 100;
export const MIN_FRAME_RATE_MS = 16;

export const DashboardSchema = z.object({
  title: z.string().min(1).default("System Monitor Dashboard"),
  refresh_rate_ms: z.number().int().positive().default(1000),
  frame_rate_ms: z.number().int().min(MIN_FRAME_RATE_MS).default(100),
  tab_debounce_ms: z.number().int().min(0).default(150),
}).strict();

export const SystemSchema = z.object({
  enable_process_monitoring: z.boolean().default(true),
  max_processes_displayed: z.number().int().min(1).default(20),
  cpu_history_length: z.number().int().min(0).max(10_000).default(60),
  memory_history_length: z.number().int().min(0).max(10_000).default(60),
}).strict();

export const DisplaySchema = z.object({
  show_cpu_graph: z.boolean().default(true),
  show_memory_graph: z.boolean().default(true),
  show_process_list: z.boolean().default(true),
  show_network_info: z.boolean().default(true),
  show_disk_info: z.boolean().default(true),
}).strict();

export const LoggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().min(1).optional(),
}).strict();

export const SettingsSchema = z.object({
  dashboard: DashboardSchema.default({}),
  system: SystemSchema.default({}),
  display: DisplaySchema.default({}),
  logging: LoggingSchema.default({}),
}).strict();

// Export types
export type Settings = z.infer<typeof SettingsSchema>;
export type DisplayConfig = z.infer<typeof DisplaySchema>;

// Validation helpers
export const validateSettingsSafe = (data: unknown) => {
  return SettingsSchema.safeParse(data);
};

export const defaultSettings = (): Settings => SettingsSchema.parse({});
