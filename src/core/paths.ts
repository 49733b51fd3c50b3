import path from "node:path";

// =============================================================================
// PATH HELPERS
// =============================================================================

export const DEFAULT_CONFIG_FILENAME = "turnstile.yaml";
export const DEFAULT_LOG_DIR = path.join(".turnstile", "runs");

export function resolveLogDir(logDir: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, logDir);
}

export function runDir(logDir: string, runId: string): string {
  return path.join(logDir, runId);
}

export function runEventsLogPath(logDir: string, runId: string): string {
  return path.join(runDir(logDir, runId), "events.jsonl");
}

export function defaultConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, DEFAULT_CONFIG_FILENAME);
}
