import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow, resolveDebugFlagFromArgv, toSnakeCase } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  run_id: string;
  pid?: string;
};

/** `runId`, `pid` and `ts` override the logger defaults when they are strings. */
export type LogEventInput = JsonObject & {
  type: string;
};

type EventDefaults = {
  runId?: string;
  pid?: string;
};

type LogFailureAction = "write" | "close";

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger {
  private readonly fileDescriptor: number;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
    this.isDebugEnabled = resolveDebugFlagFromArgv(process.argv) ?? false;
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const { runId: providedRunId, pid, ts, type, ...rest } = event;

  const runId = typeof providedRunId === "string" ? providedRunId : defaults.runId;
  if (!runId) {
    throw new Error("run_id is required for log events");
  }

  const result: LogEvent = {
    ts: typeof ts === "string" ? ts : isoNow(),
    type,
    run_id: runId,
  };

  const resolvedPid = typeof pid === "string" ? pid : defaults.pid;
  if (resolvedPid) {
    result.pid = resolvedPid;
  }

  for (const [key, value] of Object.entries(rest)) {
    result[toSnakeCase(key)] = value;
  }

  return result;
}

/**
 * Coerces an arbitrary record into JSON-safe fields. Non-finite numbers and
 * values JSON cannot carry become `null`.
 */
export function toJsonObject(record: Record<string, unknown>): JsonObject {
  const out: JsonObject = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === undefined) continue;
    out[key] = toJsonValue(value);
  }
  return out;
}

function toJsonValue(value: unknown): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item));
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (typeof value === "object") {
    return toJsonObject({ ...value });
  }
  return null;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "write" ? `write log event to ${filePath}` : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stack = formatErrorLines(error, { mode: "debug" }).find((line) => line.kind === "stack");
  return stack ? `${message}\n${stack.text}` : message;
}
