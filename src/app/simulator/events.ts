/**
 * Events emitted by the simulation engine, in the order they happen.
 * Observers receive them synchronously and never influence engine state.
 */

import type { ProcessOutcome } from "../../core/process-state.js";
import type { ProcessId, ResourceId } from "../../core/program.js";

export type ProcessAdmittedEvent = { type: "process.admitted"; pid: ProcessId; tick: number };

export type ProcessDispatchedEvent = { type: "process.dispatched"; pid: ProcessId; tick: number };

export type WaitProgressEvent = {
  type: "wait.progress";
  pid: ProcessId;
  tick: number;
  remaining: number;
};

export type ResourceGrantedEvent = {
  type: "resource.granted";
  pid: ProcessId;
  resourceId: ResourceId;
  tick: number;
};

export type ResourceBlockedEvent = {
  type: "resource.blocked";
  pid: ProcessId;
  resourceId: ResourceId;
  owner: ProcessId | null;
  tick: number;
};

export type ResourceReleasedEvent = {
  type: "resource.released";
  pid: ProcessId;
  resourceId: ResourceId;
  newOwner: ProcessId | null;
  tick: number;
};

export type DeadlockDetectedEvent = {
  type: "deadlock.detected";
  involvedPids: ProcessId[];
  candidates: ResourceId[];
  tick: number;
};

export type ResolutionRejectedEvent = {
  type: "resolution.rejected";
  resourceId: ResourceId;
  candidates: ResourceId[];
  attempt: number;
  tick: number;
};

export type ForcedReleaseEvent = {
  type: "resource.force_released";
  resourceId: ResourceId;
  formerOwner: ProcessId | null;
  newOwner: ProcessId | null;
  tick: number;
};

export type ProcessPreemptedEvent = { type: "process.preempted"; pid: ProcessId; tick: number };

export type ProcessAbortedEvent = {
  type: "process.aborted";
  pid: ProcessId;
  resourceId: ResourceId;
  reason: string;
  tick: number;
};

export type ProcessTerminatedEvent = {
  type: "process.terminated";
  pid: ProcessId;
  outcome: ProcessOutcome;
  turnaroundTicks: number;
  tick: number;
};

export type SimulationEvent =
  | ProcessAdmittedEvent
  | ProcessDispatchedEvent
  | WaitProgressEvent
  | ResourceGrantedEvent
  | ResourceBlockedEvent
  | ResourceReleasedEvent
  | DeadlockDetectedEvent
  | ResolutionRejectedEvent
  | ForcedReleaseEvent
  | ProcessPreemptedEvent
  | ProcessAbortedEvent
  | ProcessTerminatedEvent;

export type SimulationEventType = SimulationEvent["type"];

export type SimulationEventOf<T extends SimulationEventType> = Extract<SimulationEvent, { type: T }>;

export function eventsOfType<T extends SimulationEventType>(
  events: readonly SimulationEvent[],
  type: T,
): SimulationEventOf<T>[] {
  return events.filter((event): event is SimulationEventOf<T> => event.type === type);
}
