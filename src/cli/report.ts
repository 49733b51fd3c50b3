import type { SimulationEvent } from "../app/simulator/events.js";
import type { SimulationResult } from "../app/simulator/simulation-engine.js";
import type { ProgramDefinition } from "../core/program.js";
import { estimateBurst, formatResourceId } from "../core/program.js";

// =============================================================================
// EVENT TRACE
// =============================================================================

export function formatTick(tick: number): string {
  return `[t=${String(tick).padStart(3, "0")}]`;
}

export function formatEventLine(event: SimulationEvent): string {
  return `${formatTick(event.tick)} ${describeEvent(event)}`;
}

function describeEvent(event: SimulationEvent): string {
  switch (event.type) {
    case "process.admitted":
      return `${event.pid} arrived`;
    case "process.dispatched":
      return `${event.pid} dispatched`;
    case "wait.progress":
      return event.remaining === 0
        ? `${event.pid} finished waiting`
        : `${event.pid} waiting (${event.remaining} tick(s) left)`;
    case "resource.granted":
      return `${event.pid} acquired ${formatResourceId(event.resourceId)}`;
    case "resource.blocked":
      return `${event.pid} blocked on ${formatResourceId(event.resourceId)} (held by ${event.owner ?? "nobody"})`;
    case "resource.released":
      return event.newOwner === null
        ? `${event.pid} released ${formatResourceId(event.resourceId)}`
        : `${event.pid} released ${formatResourceId(event.resourceId)} to ${event.newOwner}`;
    case "deadlock.detected":
      return `DEADLOCK among ${event.involvedPids.join(", ")}; candidates: ${event.candidates
        .map(formatResourceId)
        .join(", ")}`;
    case "resolution.rejected":
      return `rejected ${formatResourceId(event.resourceId)} (attempt ${event.attempt}); not part of the deadlock`;
    case "resource.force_released":
      return `forced release of ${formatResourceId(event.resourceId)} from ${event.formerOwner ?? "nobody"}${
        event.newOwner === null ? "" : ` to ${event.newOwner}`
      }`;
    case "process.preempted":
      return `${event.pid} preempted`;
    case "process.aborted":
      return `${event.pid} aborted: ${event.reason}`;
    case "process.terminated":
      return `${event.pid} ${event.outcome} (turnaround ${event.turnaroundTicks})`;
  }
}

// =============================================================================
// SUMMARY
// =============================================================================

export function formatSummaryLines(result: SimulationResult): string[] {
  const lines = [`Simulation finished under ${result.scheduler} after ${result.totalTicks} tick(s).`];

  lines.push("", "Process completion:");
  lines.push(
    ...formatTable(
      ["Process", "Arrival", "Start", "Completion", "Turnaround", "Burst", "Outcome"],
      result.processes.map((process) => [
        process.id,
        String(process.arrivalTick),
        process.startTick === null ? "-" : String(process.startTick),
        String(process.completionTick),
        String(process.turnaroundTicks),
        String(process.estimatedBurst),
        process.outcome,
      ]),
    ),
  );

  lines.push("", "Final resource allocation:");
  lines.push(
    ...formatTable(
      ["Resource", "Owner"],
      result.allocation.map((resource) => [
        formatResourceId(resource.resourceId),
        resource.owner ?? "free",
      ]),
    ),
  );

  if (result.forcedReleases.length > 0) {
    lines.push("", "Forced releases:");
    for (const release of result.forcedReleases) {
      lines.push(
        `  ${formatTick(release.tick)} ${formatResourceId(release.resourceId)} taken from ${
          release.formerOwner ?? "nobody"
        }`,
      );
    }
  }

  if (result.errors.length > 0) {
    lines.push("", "Errors:");
    for (const error of result.errors) {
      lines.push(`  ${error.message}`);
    }
  }

  return lines;
}

export function formatProgramListing(programs: readonly ProgramDefinition[]): string[] {
  return formatTable(
    ["Program", "Arrival", "Instructions", "Burst"],
    programs.map((program) => [
      program.id,
      String(program.arrivalTick),
      String(program.instructions.length),
      String(estimateBurst(program.instructions)),
    ]),
  );
}

function formatTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => row[column].length)),
  );
  const render = (cells: string[]): string =>
    `  ${cells.map((cell, column) => cell.padEnd(widths[column])).join("  ")}`.trimEnd();

  return [render(headers), ...rows.map(render)];
}
