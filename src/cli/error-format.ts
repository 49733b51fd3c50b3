/*
Purpose: render user-facing errors for CLI output with optional color.
Assumptions: stderr is the default stream; non-TTY output disables color.
Usage: console.error(renderCliError(err, { debug }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type ErrorFormatLine,
  type ErrorFormatMode,
} from "../core/error-format.js";
import type { SimulationErrorContext } from "../core/errors.js";
import { formatResourceId } from "../core/program.js";

import { formatTick } from "./report.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const mode: ErrorFormatMode = options.debug ? "debug" : "short";
  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return formatErrorLines(error, { mode })
    .map((line) => renderLine(line, format))
    .join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const detail = (label: string, text: string): string =>
    `${format(`${label}:`, ["dim"])} ${format(text, ["dim"])}`;

  switch (line.kind) {
    case "title":
      return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
    case "message":
      return line.text;
    case "hint":
      return `${format("Hint:", ["yellow"])} ${line.text}`;
    case "next":
      return `${format("Next:", ["cyan"])} ${line.text}`;
    case "code":
      return detail("Code", line.text);
    case "name":
      return detail("Name", line.text);
    case "context":
      return detail("At", line.simulation ? describeSimulationContext(line.simulation) : line.text);
    case "cause":
      return detail("Cause", line.text);
    case "stack":
      return `${format("Stack:", ["dim"])}\n${format(indent(line.text), ["dim"])}`;
  }
}

/** "[t=004] process P1, resource R12"; either half may be missing. */
export function describeSimulationContext(context: SimulationErrorContext): string {
  const subjects: string[] = [];
  if (context.pid !== undefined) subjects.push(`process ${context.pid}`);
  if (context.resourceId !== undefined) subjects.push(`resource ${formatResourceId(context.resourceId)}`);

  const where = context.tick === undefined ? [] : [formatTick(context.tick)];
  return [...where, subjects.join(", ")].filter((part) => part !== "").join(" ");
}

function indent(value: string): string {
  return value
    .split("\n")
    .map((line) => `  ${line}`)
    .join("\n");
}
