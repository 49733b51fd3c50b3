import { stdin as input, stdout as output } from "node:process";
import { createInterface, type Interface } from "node:readline/promises";

import type {
  DeadlockContext,
  DeadlockResolver,
  SimulationSnapshot,
} from "../app/simulator/ports.js";
import { DEFAULT_QUANTUM, type SchedulerName } from "../core/config.js";
import { ResolutionUnavailableError } from "../core/errors.js";
import { formatResourceId, type ResourceId } from "../core/program.js";

// =============================================================================
// IO
// =============================================================================

export interface SimulatorIo {
  /** False when nobody can answer a prompt (piped stdin, CI). */
  readonly interactive: boolean;
  note(message: string): void;
  ask(question: string): Promise<string>;
  close(): void;
}

export class ConsoleSimulatorIo implements SimulatorIo {
  readonly interactive = Boolean(input.isTTY && output.isTTY);
  // Opened on the first prompt so non-interactive runs never hold stdin open.
  private rl: Interface | null = null;

  note(message: string): void {
    console.log(message);
  }

  async ask(question: string): Promise<string> {
    if (!this.rl) {
      this.rl = createInterface({ input, output });
    }
    const answer = await this.rl.question(`${question.trim()} `);
    return answer.trim();
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }
}

// =============================================================================
// STARTUP PROMPTS
// =============================================================================

const SCHEDULER_MENU: Array<{ choice: string; name: SchedulerName; label: string }> = [
  { choice: "1", name: "fcfs", label: "First-Come-First-Serve (FCFS)" },
  { choice: "2", name: "sjf", label: "Shortest Job First (SJF)" },
  { choice: "3", name: "rr", label: "Round Robin (RR)" },
];

/** Unrecognized answers fall back to FCFS. */
export async function promptScheduler(io: SimulatorIo): Promise<SchedulerName> {
  io.note("Select a scheduling algorithm:");
  for (const entry of SCHEDULER_MENU) {
    io.note(`${entry.choice}. ${entry.label}`);
  }

  const answer = await io.ask("Enter choice (1-3):");
  const selected = SCHEDULER_MENU.find((entry) => entry.choice === answer);
  if (!selected) {
    io.note("Invalid choice. Defaulting to FCFS.");
    return "fcfs";
  }
  return selected.name;
}

export async function promptQuantum(io: SimulatorIo): Promise<number> {
  const answer = await io.ask(`Enter time quantum for Round Robin (default ${DEFAULT_QUANTUM}):`);
  if (answer === "") return DEFAULT_QUANTUM;

  const quantum = Number(answer);
  if (!Number.isInteger(quantum) || quantum < 1) {
    io.note(`Invalid quantum. Using default quantum of ${DEFAULT_QUANTUM}.`);
    return DEFAULT_QUANTUM;
  }
  return quantum;
}

// =============================================================================
// DEADLOCK PROMPT
// =============================================================================

/**
 * Asks the operator which resource to take away. Shows the allocation table
 * and the waiting list first; non-numeric answers are asked again here, while
 * numeric answers outside the candidates go back to the engine, which rejects
 * them and asks again.
 */
export class PromptingDeadlockResolver implements DeadlockResolver {
  constructor(
    private readonly io: SimulatorIo,
    private readonly maxParseAttempts = 3,
  ) {}

  async chooseResourceToRelease(
    candidates: readonly ResourceId[],
    context: DeadlockContext,
  ): Promise<ResourceId> {
    if (context.attempt === 1) {
      this.io.note(`Deadlock detected at tick ${context.tick} among ${context.cycle.processIds.join(", ")}.`);
      for (const line of formatAllocationStatus(context.snapshot)) {
        this.io.note(line);
      }
    } else if (context.rejected !== undefined) {
      this.io.note(`${formatResourceId(context.rejected)} is not part of the deadlock.`);
    }

    const listed = candidates.map(formatResourceId).join(", ");
    for (let attempt = 1; attempt <= this.maxParseAttempts; attempt += 1) {
      const answer = await this.io.ask(`Enter the resource to release (${listed}):`);
      const resourceId = parseResourceAnswer(answer);
      if (resourceId !== null) return resourceId;
      this.io.note(`"${answer}" is not a resource id.`);
    }

    throw new ResolutionUnavailableError({ candidates, tick: context.tick });
  }
}

/** Accepts "2" or "R2". */
export function parseResourceAnswer(answer: string): ResourceId | null {
  const match = /^r?(\d+)$/i.exec(answer.trim());
  return match ? Number(match[1]) : null;
}

export function formatAllocationStatus(snapshot: SimulationSnapshot): string[] {
  const lines = ["Resource allocation:"];
  const owned = snapshot.resources.filter((resource) => resource.owner !== null);
  if (owned.length === 0) {
    lines.push("  (none)");
  }
  for (const resource of owned) {
    lines.push(`  ${formatResourceId(resource.resourceId)}: ${resource.owner}`);
  }

  lines.push("Waiting processes:");
  const waiting = snapshot.processes.filter((process) => process.blockedOn !== null);
  if (waiting.length === 0) {
    lines.push("  (none)");
  }
  for (const process of waiting) {
    if (process.blockedOn === null) continue;
    lines.push(`  ${process.id} -> ${formatResourceId(process.blockedOn)}`);
  }

  return lines;
}
