import { DEFAULT_QUANTUM, type SchedulerName, type SjfMetric } from "./config.js";
import {
  remainingBurst,
  remainingInstructions,
  type ProcessState,
} from "./process-state.js";
import { compareProcessIds, type ProcessId } from "./program.js";

// =============================================================================
// POLICY CONTRACT
// =============================================================================

/**
 * Picks the next process from the ready queue. The queue is passed in the
 * order processes entered it; policies only read it, admission and removal
 * belong to the engine.
 */
export interface SchedulerPolicy {
  readonly name: SchedulerName;
  readonly label: string;
  pickNext(ready: readonly ProcessState[]): ProcessId;
  /** Whether a running process that used `ticksUsed` this turn must yield. */
  shouldPreempt(ticksUsed: number): boolean;
}

export type SchedulerPolicyOptions = {
  scheduler: SchedulerName;
  quantum?: number;
  sjfMetric?: SjfMetric;
};

// =============================================================================
// POLICIES
// =============================================================================

export class FcfsPolicy implements SchedulerPolicy {
  readonly name = "fcfs";
  readonly label = "FCFS";

  pickNext(ready: readonly ProcessState[]): ProcessId {
    return headOf(ready).id;
  }

  shouldPreempt(_ticksUsed: number): boolean {
    return false;
  }
}

export class SjfPolicy implements SchedulerPolicy {
  readonly name = "sjf";
  readonly label: string;

  constructor(private readonly metric: SjfMetric = "instructions") {
    this.label = metric === "burst" ? "SJF (burst)" : "SJF";
  }

  pickNext(ready: readonly ProcessState[]): ProcessId {
    const sorted = [...ready].sort((a, b) => this.compare(a, b));
    return headOf(sorted).id;
  }

  shouldPreempt(_ticksUsed: number): boolean {
    return false;
  }

  private compare(a: ProcessState, b: ProcessState): number {
    const byLength = this.lengthOf(a) - this.lengthOf(b);
    if (byLength !== 0) return byLength;

    const byArrival = a.arrivalOrder - b.arrivalOrder;
    if (byArrival !== 0) return byArrival;

    return compareProcessIds(a.id, b.id);
  }

  private lengthOf(process: ProcessState): number {
    return this.metric === "burst" ? remainingBurst(process) : remainingInstructions(process);
  }
}

export class RoundRobinPolicy implements SchedulerPolicy {
  readonly name = "rr";
  readonly label: string;

  constructor(readonly quantum: number) {
    if (!Number.isInteger(quantum) || quantum < 1) {
      throw new Error(`Round Robin quantum must be a positive integer (received ${quantum})`);
    }
    this.label = `RR (quantum ${quantum})`;
  }

  pickNext(ready: readonly ProcessState[]): ProcessId {
    return headOf(ready).id;
  }

  shouldPreempt(ticksUsed: number): boolean {
    return ticksUsed >= this.quantum;
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createSchedulerPolicy(options: SchedulerPolicyOptions): SchedulerPolicy {
  switch (options.scheduler) {
    case "fcfs":
      return new FcfsPolicy();
    case "sjf":
      return new SjfPolicy(options.sjfMetric);
    case "rr":
      return new RoundRobinPolicy(options.quantum ?? DEFAULT_QUANTUM);
  }
}

function headOf(ready: readonly ProcessState[]): ProcessState {
  const [head] = ready;
  if (!head) {
    throw new Error("Scheduler asked to pick from an empty ready queue.");
  }
  return head;
}
