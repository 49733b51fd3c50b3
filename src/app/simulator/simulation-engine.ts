/**
 * Simulation engine: the discrete-time loop that moves processes through
 * their programs under one scheduling policy.
 *
 * Purpose: admit arrivals, dispatch through the policy, execute one tick per
 * step, block on contended resources, detect deadlocks after every block and
 * apply the forced releases the resolver chooses.
 * Assumptions: the engine is single-use; `run()` may be awaited once. The
 * resolver may answer synchronously or asynchronously.
 * Usage: `await runSimulation({ programs, resourceIds, policy, resolver })`.
 */

import {
  cycleCandidates,
  detectDeadlock,
  type DeadlockCycle,
} from "../../core/deadlock.js";
import {
  InvalidResolutionError,
  InvariantError,
  ProgramError,
  SimulationError,
  StallWithoutCycleError,
  UnknownResourceError,
} from "../../core/errors.js";
import {
  admitProcess,
  blockProcess,
  createProcessState,
  currentInstruction,
  dispatchProcess,
  grantToBlocked,
  preemptProcess,
  snapshotProcess,
  terminateProcess,
  turnaroundTicks,
  type ProcessOutcome,
  type ProcessState,
} from "../../core/process-state.js";
import type {
  ProcessId,
  ProgramDefinition,
  ResourceId,
  WaitInstruction,
} from "../../core/program.js";
import { ResourceTable, type ResourceSnapshot } from "../../core/resource-table.js";
import type { SchedulerPolicy } from "../../core/scheduler.js";

import type { SimulationEvent } from "./events.js";
import { checkSnapshotInvariants } from "./invariants.js";
import type { DeadlockResolver, EventSink, SimulationSnapshot } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export const DEFAULT_MAX_RESOLUTION_ATTEMPTS = 3;

export type SimulationOptions = {
  programs: readonly ProgramDefinition[];
  resourceIds: Iterable<ResourceId>;
  policy: SchedulerPolicy;
  resolver: DeadlockResolver;
  sinks?: readonly EventSink[];
  maxResolutionAttempts?: number;
  /** Re-check state consistency after every step and throw on the first violation. */
  verifyInvariants?: boolean;
};

export type ProcessSummary = {
  id: ProcessId;
  arrivalOrder: number;
  arrivalTick: number;
  startTick: number | null;
  completionTick: number;
  turnaroundTicks: number;
  estimatedBurst: number;
  outcome: ProcessOutcome;
};

export type ForcedReleaseRecord = {
  resourceId: ResourceId;
  formerOwner: ProcessId | null;
  newOwner: ProcessId | null;
  tick: number;
};

export type SimulationResult = {
  scheduler: string;
  totalTicks: number;
  /** In completion order. */
  processes: ProcessSummary[];
  allocation: ResourceSnapshot[];
  forcedReleases: ForcedReleaseRecord[];
  /** Per-process failures that did not stop the run, such as undeclared resources. */
  errors: SimulationError[];
  events: SimulationEvent[];
};

type StepOutcome = "continued" | "blocked" | "terminated";

// =============================================================================
// ENGINE
// =============================================================================

export class SimulationEngine {
  private readonly processes: ProcessState[];
  private readonly byId = new Map<ProcessId, ProcessState>();
  private readonly table: ResourceTable;
  private readonly policy: SchedulerPolicy;
  private readonly resolver: DeadlockResolver;
  private readonly sinks: EventSink[];
  private readonly maxResolutionAttempts: number;
  private readonly verifyInvariants: boolean;

  private tick = 0;
  private readyQueue: ProcessId[] = [];
  private running: ProcessState | null = null;
  private ticksThisTurn = 0;
  private started = false;

  private readonly completionOrder: ProcessId[] = [];
  private readonly events: SimulationEvent[] = [];
  private readonly errors: SimulationError[] = [];
  private readonly forcedReleases: ForcedReleaseRecord[] = [];

  constructor(options: SimulationOptions) {
    const maxAttempts = options.maxResolutionAttempts ?? DEFAULT_MAX_RESOLUTION_ATTEMPTS;
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new Error(`maxResolutionAttempts must be a positive integer (received ${maxAttempts})`);
    }

    this.table = new ResourceTable(options.resourceIds);
    this.policy = options.policy;
    this.resolver = options.resolver;
    this.sinks = [...(options.sinks ?? [])];
    this.maxResolutionAttempts = maxAttempts;
    this.verifyInvariants = options.verifyInvariants ?? false;

    this.processes = [...options.programs]
      .sort((a, b) => a.arrivalOrder - b.arrivalOrder)
      .map(createProcessState);
    for (const process of this.processes) {
      if (this.byId.has(process.id)) {
        throw new ProgramError(`Duplicate process id "${process.id}".`);
      }
      this.byId.set(process.id, process);
    }
  }

  get currentTick(): number {
    return this.tick;
  }

  /** Registers another sink; the returned function removes it. */
  onEvent(sink: EventSink): () => void {
    this.sinks.push(sink);
    return () => {
      const index = this.sinks.indexOf(sink);
      if (index >= 0) this.sinks.splice(index, 1);
    };
  }

  snapshot(): SimulationSnapshot {
    return {
      tick: this.tick,
      running: this.running?.id ?? null,
      ready: [...this.readyQueue],
      processes: this.processes.map(snapshotProcess),
      resources: this.table.snapshot(),
    };
  }

  async run(): Promise<SimulationResult> {
    if (this.started) {
      throw new Error("SimulationEngine.run() can only be called once.");
    }
    this.started = true;

    while (this.processes.some((process) => process.status !== "terminated")) {
      this.admitArrivals();

      const process = this.running ?? this.dispatchNext();
      if (process) {
        await this.step(process);
      } else {
        await this.handleIdle();
      }

      this.verify();
    }

    return this.buildResult();
  }

  // ===========================================================================
  // LOOP STAGES
  // ===========================================================================

  private admitArrivals(): void {
    for (const process of this.processes) {
      if (process.status !== "new" || process.arrivalTick > this.tick) continue;
      admitProcess(process);
      this.readyQueue.push(process.id);
      this.emit({ type: "process.admitted", pid: process.id, tick: this.tick });
    }
  }

  private dispatchNext(): ProcessState | null {
    if (this.readyQueue.length === 0) return null;

    const ready = this.readyQueue.map((pid) => this.get(pid));
    const pid = this.policy.pickNext(ready);
    if (!this.readyQueue.includes(pid)) {
      throw new Error(`Scheduler ${this.policy.label} picked ${pid}, which is not ready.`);
    }
    this.readyQueue = this.readyQueue.filter((queued) => queued !== pid);

    const process = this.get(pid);
    dispatchProcess(process, this.tick);
    this.running = process;
    this.ticksThisTurn = 0;
    this.emit({ type: "process.dispatched", pid, tick: this.tick });
    return process;
  }

  private async step(process: ProcessState): Promise<void> {
    const outcome = this.execute(process);

    if (outcome === "continued") {
      if (this.policy.shouldPreempt(this.ticksThisTurn)) {
        preemptProcess(process);
        this.readyQueue.push(process.id);
        this.running = null;
        this.emit({ type: "process.preempted", pid: process.id, tick: this.tick });
      }
      return;
    }

    this.running = null;
    if (outcome === "blocked") {
      const cycle = detectDeadlock(this.processes, this.table);
      if (cycle) await this.resolveDeadlocks(cycle);
    }
  }

  /** Nothing is ready: either everyone left is blocked, or the next arrival is in the future. */
  private async handleIdle(): Promise<void> {
    const blocked = this.processes.filter((process) => process.status === "blocked");
    if (blocked.length > 0) {
      const cycle = detectDeadlock(this.processes, this.table);
      if (!cycle) {
        throw new StallWithoutCycleError({
          tick: this.tick,
          blocked: blocked.map((process) => process.id),
        });
      }
      await this.resolveDeadlocks(cycle);
      return;
    }

    const pending = this.processes.filter((process) => process.status === "new");
    if (pending.length === 0) {
      throw new StallWithoutCycleError({ tick: this.tick, blocked: [] });
    }
    this.tick = Math.min(...pending.map((process) => process.arrivalTick));
  }

  // ===========================================================================
  // INSTRUCTIONS
  // ===========================================================================

  private execute(process: ProcessState): StepOutcome {
    const instruction = currentInstruction(process);

    // A program without a trailing end terminates on its next dispatch, at no cost.
    if (!instruction) {
      this.finish(process, "completed");
      return "terminated";
    }

    switch (instruction.kind) {
      case "wait":
        return this.executeWait(process, instruction);
      case "request":
        return this.executeRequest(process, instruction.resourceId);
      case "end":
        this.advanceClock();
        this.finish(process, "completed");
        return "terminated";
    }
  }

  private executeWait(process: ProcessState, instruction: WaitInstruction): StepOutcome {
    this.advanceClock();
    if (process.waitRemaining === 0) {
      process.waitRemaining = Math.max(1, instruction.ticks);
    }
    process.waitRemaining -= 1;
    this.emit({
      type: "wait.progress",
      pid: process.id,
      remaining: process.waitRemaining,
      tick: this.tick,
    });
    if (process.waitRemaining === 0) process.pc += 1;
    return "continued";
  }

  private executeRequest(process: ProcessState, resourceId: ResourceId): StepOutcome {
    this.advanceClock();

    if (!this.table.has(resourceId)) {
      this.abort(process, resourceId);
      return "terminated";
    }

    if (this.table.tryAcquire(resourceId, process.id) === "granted") {
      process.held.add(resourceId);
      process.pc += 1;
      this.emit({ type: "resource.granted", pid: process.id, resourceId, tick: this.tick });
      return "continued";
    }

    blockProcess(process, resourceId);
    this.emit({
      type: "resource.blocked",
      pid: process.id,
      resourceId,
      owner: this.table.ownerOf(resourceId),
      tick: this.tick,
    });
    return "blocked";
  }

  private abort(process: ProcessState, resourceId: ResourceId): void {
    const error = new UnknownResourceError({ pid: process.id, resourceId, tick: this.tick });
    this.errors.push(error);
    this.emit({
      type: "process.aborted",
      pid: process.id,
      resourceId,
      reason: error.message,
      tick: this.tick,
    });
    this.finish(process, "aborted");
  }

  private finish(process: ProcessState, outcome: ProcessOutcome): void {
    const handoffs = this.table.releaseAll(process.id);
    terminateProcess(process, this.tick, outcome);

    for (const handoff of handoffs) {
      this.emit({
        type: "resource.released",
        pid: process.id,
        resourceId: handoff.resourceId,
        newOwner: handoff.newOwner,
        tick: this.tick,
      });
      if (handoff.newOwner !== null) this.handOff(handoff.newOwner, handoff.resourceId);
    }

    this.completionOrder.push(process.id);
    this.emit({
      type: "process.terminated",
      pid: process.id,
      outcome,
      turnaroundTicks: this.tick - process.arrivalTick,
      tick: this.tick,
    });
  }

  private handOff(pid: ProcessId, resourceId: ResourceId): void {
    grantToBlocked(this.get(pid), resourceId);
    this.readyQueue.push(pid);
  }

  private advanceClock(): void {
    this.tick += 1;
    this.ticksThisTurn += 1;
  }

  // ===========================================================================
  // DEADLOCK RESOLUTION
  // ===========================================================================

  private async resolveDeadlocks(initial: DeadlockCycle): Promise<void> {
    let cycle: DeadlockCycle | null = initial;

    while (cycle) {
      const candidates = cycleCandidates(cycle);
      this.emit({
        type: "deadlock.detected",
        involvedPids: [...cycle.processIds],
        candidates,
        tick: this.tick,
      });

      const resourceId = await this.chooseRelease(cycle, candidates);
      this.applyForcedRelease(resourceId);
      this.verify();

      cycle = detectDeadlock(this.processes, this.table);
    }
  }

  private async chooseRelease(
    cycle: DeadlockCycle,
    candidates: ResourceId[],
  ): Promise<ResourceId> {
    let rejected: ResourceId | undefined;

    for (let attempt = 1; ; attempt += 1) {
      const choice = await this.resolver.chooseResourceToRelease(candidates, {
        tick: this.tick,
        cycle,
        attempt,
        rejected,
        snapshot: this.snapshot(),
      });
      if (candidates.includes(choice)) return choice;

      this.emit({
        type: "resolution.rejected",
        resourceId: choice,
        candidates,
        attempt,
        tick: this.tick,
      });
      if (attempt >= this.maxResolutionAttempts) {
        throw new InvalidResolutionError({ resourceId: choice, candidates, tick: this.tick });
      }
      rejected = choice;
    }
  }

  /**
   * The former owner loses the resource for good: it is not re-queued and its
   * program continues as if the release never happened.
   */
  private applyForcedRelease(resourceId: ResourceId): void {
    const result = this.table.forceRelease(resourceId);
    if (result.formerOwner !== null) {
      this.get(result.formerOwner).held.delete(resourceId);
    }
    if (result.newOwner !== null) {
      this.handOff(result.newOwner, resourceId);
    }

    this.forcedReleases.push({ ...result, tick: this.tick });
    this.emit({
      type: "resource.force_released",
      resourceId,
      formerOwner: result.formerOwner,
      newOwner: result.newOwner,
      tick: this.tick,
    });
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private emit(event: SimulationEvent): void {
    this.events.push(event);
    for (const sink of [...this.sinks]) {
      sink.emit(event);
    }
  }

  private verify(): void {
    if (!this.verifyInvariants) return;
    const violations = checkSnapshotInvariants(this.snapshot());
    if (violations.length > 0) {
      throw new InvariantError(this.tick, violations);
    }
  }

  private get(pid: ProcessId): ProcessState {
    const process = this.byId.get(pid);
    if (!process) {
      throw new Error(`Unknown process ${pid}.`);
    }
    return process;
  }

  private buildResult(): SimulationResult {
    const processes = this.completionOrder.map((pid): ProcessSummary => {
      const process = this.get(pid);
      const completionTick = process.completionTick ?? this.tick;
      return {
        id: process.id,
        arrivalOrder: process.arrivalOrder,
        arrivalTick: process.arrivalTick,
        startTick: process.startTick,
        completionTick,
        turnaroundTicks: turnaroundTicks(process) ?? completionTick - process.arrivalTick,
        estimatedBurst: process.estimatedBurst,
        outcome: process.outcome ?? "completed",
      };
    });

    return {
      scheduler: this.policy.label,
      totalTicks: this.tick,
      processes,
      allocation: this.table.snapshot(),
      forcedReleases: [...this.forcedReleases],
      errors: [...this.errors],
      events: [...this.events],
    };
  }
}

export async function runSimulation(options: SimulationOptions): Promise<SimulationResult> {
  return new SimulationEngine(options).run();
}
