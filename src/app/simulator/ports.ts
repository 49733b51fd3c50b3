/**
 * Simulator ports define the boundary between the engine and its collaborators.
 * Purpose: keep operator input and presentation replaceable so the engine
 * runs the same under the CLI and under tests.
 * Usage: pass implementations to SimulationEngine via SimulationOptions.
 */

import type { DeadlockCycle } from "../../core/deadlock.js";
import type { ProcessSnapshot } from "../../core/process-state.js";
import type { ProcessId, ResourceId } from "../../core/program.js";
import type { ResourceSnapshot } from "../../core/resource-table.js";

import type { SimulationEvent } from "./events.js";

// =============================================================================
// SNAPSHOTS
// =============================================================================

export type SimulationSnapshot = {
  tick: number;
  running: ProcessId | null;
  ready: ProcessId[];
  processes: ProcessSnapshot[];
  resources: ResourceSnapshot[];
};

// =============================================================================
// PORTS
// =============================================================================

export type DeadlockContext = {
  tick: number;
  cycle: DeadlockCycle;
  /** 1-based; greater than 1 after the previous choice was rejected. */
  attempt: number;
  rejected?: ResourceId;
  snapshot: SimulationSnapshot;
};

export interface DeadlockResolver {
  chooseResourceToRelease(
    candidates: readonly ResourceId[],
    context: DeadlockContext,
  ): ResourceId | Promise<ResourceId>;
}

export interface EventSink {
  emit(event: SimulationEvent): void;
}
