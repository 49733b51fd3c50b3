import {
  estimateBurst,
  type Instruction,
  type ProcessId,
  type ProgramDefinition,
  type ResourceId,
} from "./program.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessStatus = "new" | "ready" | "running" | "blocked" | "terminated";

export type ProcessOutcome = "completed" | "aborted";

export type ProcessState = {
  readonly id: ProcessId;
  readonly arrivalOrder: number;
  readonly arrivalTick: number;
  readonly instructions: readonly Instruction[];
  readonly estimatedBurst: number;

  status: ProcessStatus;
  pc: number;
  held: Set<ResourceId>;
  blockedOn: ResourceId | null;
  // Ticks left in an in-progress wait; 0 when no wait is underway.
  waitRemaining: number;
  startTick: number | null;
  completionTick: number | null;
  outcome: ProcessOutcome | null;
};

export type ProcessSnapshot = {
  id: ProcessId;
  status: ProcessStatus;
  pc: number;
  held: ResourceId[];
  blockedOn: ResourceId | null;
  waitRemaining: number;
};

const ALLOWED_TRANSITIONS: Record<ProcessStatus, readonly ProcessStatus[]> = {
  new: ["ready"],
  ready: ["running"],
  running: ["ready", "blocked", "terminated"],
  blocked: ["ready"],
  terminated: [],
};

// =============================================================================
// CONSTRUCTION + QUERIES
// =============================================================================

export function createProcessState(definition: ProgramDefinition): ProcessState {
  return {
    id: definition.id,
    arrivalOrder: definition.arrivalOrder,
    arrivalTick: definition.arrivalTick,
    instructions: definition.instructions,
    estimatedBurst: estimateBurst(definition.instructions),
    status: "new",
    pc: 0,
    held: new Set(),
    blockedOn: null,
    waitRemaining: 0,
    startTick: null,
    completionTick: null,
    outcome: null,
  };
}

export function currentInstruction(process: ProcessState): Instruction | undefined {
  return process.instructions[process.pc];
}

export function remainingInstructions(process: ProcessState): number {
  return Math.max(0, process.instructions.length - process.pc);
}

/** Remaining estimated burst, counting only the unfinished part of a wait in progress. */
export function remainingBurst(process: ProcessState): number {
  const rest = estimateBurst(process.instructions, process.pc);
  const current = currentInstruction(process);
  if (current?.kind === "wait" && process.waitRemaining > 0) {
    return rest - (current.ticks - process.waitRemaining);
  }
  return rest;
}

export function turnaroundTicks(process: ProcessState): number | null {
  if (process.completionTick === null) return null;
  return process.completionTick - process.arrivalTick;
}

export function snapshotProcess(process: ProcessState): ProcessSnapshot {
  return {
    id: process.id,
    status: process.status,
    pc: process.pc,
    held: [...process.held].sort((a, b) => a - b),
    blockedOn: process.blockedOn,
    waitRemaining: process.waitRemaining,
  };
}

// =============================================================================
// TRANSITIONS
// =============================================================================

export function canTransition(from: ProcessStatus, to: ProcessStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function transition(process: ProcessState, to: ProcessStatus): void {
  if (!canTransition(process.status, to)) {
    throw new Error(`Process ${process.id} cannot move from ${process.status} to ${to}.`);
  }
  process.status = to;
}

export function admitProcess(process: ProcessState): void {
  transition(process, "ready");
}

export function dispatchProcess(process: ProcessState, tick: number): void {
  transition(process, "running");
  if (process.startTick === null) process.startTick = tick;
}

export function preemptProcess(process: ProcessState): void {
  transition(process, "ready");
}

export function blockProcess(process: ProcessState, resourceId: ResourceId): void {
  transition(process, "blocked");
  process.blockedOn = resourceId;
}

/**
 * Hands `resourceId` to a blocked process. It becomes ready and will retry
 * the same request instruction, which then succeeds.
 */
export function grantToBlocked(process: ProcessState, resourceId: ResourceId): void {
  if (process.blockedOn !== resourceId) {
    throw new Error(
      `Process ${process.id} is not waiting for R${resourceId} (waiting for ${
        process.blockedOn === null ? "nothing" : `R${process.blockedOn}`
      }).`,
    );
  }
  transition(process, "ready");
  process.blockedOn = null;
  process.held.add(resourceId);
}

export function terminateProcess(
  process: ProcessState,
  tick: number,
  outcome: ProcessOutcome,
): void {
  transition(process, "terminated");
  process.completionTick = tick;
  process.outcome = outcome;
  process.held.clear();
  process.waitRemaining = 0;
}
