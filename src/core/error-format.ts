/*
Purpose: turn thrown values into structured lines for CLI and log rendering.
Assumptions: UserFacingError carries the curated title/hint; anything else is unexpected.
Usage: formatErrorLines(err, { mode: "debug" }) then render each line by kind.
*/

import { SimulationError, UserFacingError, type SimulationErrorContext } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "context"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
  /** Set on `context` lines so renderers can lay out pid/resource/tick themselves. */
  simulation?: SimulationErrorContext;
};

export type AnsiStyle = "red" | "green" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

const UNEXPECTED_ERROR_TITLE = "Unexpected error.";

const ANSI_CODES: Record<AnsiStyle, [open: number, close: number]> = {
  red: [31, 39],
  green: [32, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

// =============================================================================
// MESSAGES
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  const userError = error instanceof UserFacingError ? error : null;

  lines.push({ kind: "title", text: userError?.title ?? UNEXPECTED_ERROR_TITLE });
  lines.push({ kind: "message", text: formatErrorMessage(error) });

  if (userError?.hint) lines.push({ kind: "hint", text: userError.hint });
  if (userError?.next) lines.push({ kind: "next", text: userError.next });

  if (options.mode !== "debug") {
    return lines;
  }

  if (userError) lines.push({ kind: "code", text: userError.code });
  if (error instanceof Error) lines.push({ kind: "name", text: error.name });

  const context = formatSimulationContext(userError?.cause ?? error);
  if (context) lines.push({ kind: "context", ...context });

  const cause = resolveCause(error);
  if (cause !== undefined) lines.push({ kind: "cause", text: formatErrorMessage(cause) });

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

export function resolveColorEnabled(options: {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (options.useColor === false) return false;
  if (!options.stream?.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (!(error instanceof Error)) return undefined;
  const cause: unknown = error.cause;
  return cause === null ? undefined : cause;
}

function formatSimulationContext(
  error: unknown,
): { text: string; simulation: SimulationErrorContext } | null {
  if (!(error instanceof SimulationError)) return null;

  const { pid, resourceId, tick } = error;
  const parts: string[] = [];
  if (pid !== undefined) parts.push(`pid=${pid}`);
  if (resourceId !== undefined) parts.push(`resource=R${resourceId}`);
  if (tick !== undefined) parts.push(`tick=${tick}`);

  return parts.length > 0 ? { text: parts.join(" "), simulation: { pid, resourceId, tick } } : null;
}
