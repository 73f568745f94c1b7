import { DashboardError } from "../types/errors";

/** Prints a fatal error and returns the exit code it maps to */
export function reportFailure(error: unknown, write: (line: string) => void = line => console.error(line)): number {
  const dashboardError = DashboardError.from(error);
  write(`❌ ${dashboardError.message}`);
  const cause = dashboardError.originalError;
  if (cause && cause.message !== dashboardError.message) {
    write(`   ${cause.message}`);
  }
  return dashboardError.exitCode;
}
