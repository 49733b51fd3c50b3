/**
 * Simulator test fakes.
 * Purpose: deterministic resolvers and sinks that record what the engine asked
 * and emitted.
 * Usage: pass to runSimulation in engine tests.
 */

import type { ProgramDefinition, ResourceId } from "../../../core/program.js";
import { parseProgramText } from "../../../core/program-loader.js";
import type { SimulationEvent } from "../events.js";
import type { DeadlockContext, DeadlockResolver, EventSink } from "../ports.js";

// =============================================================================
// RESOLVER
// =============================================================================

export type ResolverCall = {
  candidates: ResourceId[];
  context: DeadlockContext;
};

export class RecordingResolver implements DeadlockResolver {
  readonly calls: ResolverCall[] = [];
  private readonly answers: ResourceId[];

  constructor(answers: readonly ResourceId[] = []) {
    this.answers = [...answers];
  }

  async chooseResourceToRelease(
    candidates: readonly ResourceId[],
    context: DeadlockContext,
  ): Promise<ResourceId> {
    this.calls.push({ candidates: [...candidates], context });
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new Error(`RecordingResolver has no answer queued for call ${this.calls.length}`);
    }
    return answer;
  }
}

// =============================================================================
// SINK
// =============================================================================

export class RecordingSink implements EventSink {
  readonly events: SimulationEvent[] = [];

  emit(event: SimulationEvent): void {
    this.events.push(event);
  }
}

// =============================================================================
// PROGRAMS
// =============================================================================

export function programs(text: string): ProgramDefinition[] {
  return parseProgramText(text, "<test>");
}

/** Two processes acquiring R1 and R2 in opposite order. */
export const CROSSED_REQUESTS = `
program P1
resource(1, allocate)
wait(2)
resource(2, allocate)
end

program P2
resource(2, allocate)
wait(1)
resource(1, allocate)
end
`;

export function describeEvent(event: SimulationEvent): string {
  switch (event.type) {
    case "process.admitted":
    case "process.dispatched":
    case "process.preempted":
      return `${event.tick} ${event.type} ${event.pid}`;
    case "wait.progress":
      return `${event.tick} ${event.type} ${event.pid} ${event.remaining}`;
    case "resource.granted":
      return `${event.tick} ${event.type} ${event.pid} R${event.resourceId}`;
    case "resource.blocked":
      return `${event.tick} ${event.type} ${event.pid} R${event.resourceId} owner=${event.owner ?? "-"}`;
    case "resource.released":
      return `${event.tick} ${event.type} ${event.pid} R${event.resourceId} next=${event.newOwner ?? "-"}`;
    case "deadlock.detected":
      return `${event.tick} ${event.type} [${event.involvedPids.join(",")}] candidates=${event.candidates.join(",")}`;
    case "resolution.rejected":
      return `${event.tick} ${event.type} R${event.resourceId} attempt=${event.attempt}`;
    case "resource.force_released":
      return `${event.tick} ${event.type} R${event.resourceId} from=${event.formerOwner ?? "-"} to=${event.newOwner ?? "-"}`;
    case "process.aborted":
      return `${event.tick} ${event.type} ${event.pid} R${event.resourceId}`;
    case "process.terminated":
      return `${event.tick} ${event.type} ${event.pid} ${event.outcome} turnaround=${event.turnaroundTicks}`;
  }
}
