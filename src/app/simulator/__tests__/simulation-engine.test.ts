import { describe, expect, it } from "vitest";

import { InvalidResolutionError, ProgramError, UnknownResourceError } from "../../../core/errors.js";
import type { ResourceId } from "../../../core/program.js";
import {
  FcfsPolicy,
  RoundRobinPolicy,
  SjfPolicy,
  type SchedulerPolicy,
} from "../../../core/scheduler.js";
import { eventsOfType } from "../events.js";
import type { DeadlockResolver } from "../ports.js";
import { SimulationEngine, runSimulation } from "../simulation-engine.js";

import {
  CROSSED_REQUESTS,
  RecordingResolver,
  RecordingSink,
  describeEvent,
  programs,
} from "./fakes.js";

function simulate(
  text: string,
  policy: SchedulerPolicy,
  resolver: DeadlockResolver = new RecordingResolver(),
  resourceIds: ResourceId[] = [1, 2, 3],
) {
  return runSimulation({
    programs: programs(text),
    resourceIds,
    policy,
    resolver,
    verifyInvariants: true,
  });
}

describe("SimulationEngine", () => {
  it("detects and resolves a crossed-request deadlock under RR quantum 1", async () => {
    const resolver = new RecordingResolver([1]);
    const result = await simulate(CROSSED_REQUESTS, new RoundRobinPolicy(1), resolver, [1, 2]);

    expect(result.events.map(describeEvent)).toEqual([
      "0 process.admitted P1",
      "0 process.admitted P2",
      "0 process.dispatched P1",
      "1 resource.granted P1 R1",
      "1 process.preempted P1",
      "1 process.dispatched P2",
      "2 resource.granted P2 R2",
      "2 process.preempted P2",
      "2 process.dispatched P1",
      "3 wait.progress P1 1",
      "3 process.preempted P1",
      "3 process.dispatched P2",
      "4 wait.progress P2 0",
      "4 process.preempted P2",
      "4 process.dispatched P1",
      "5 wait.progress P1 0",
      "5 process.preempted P1",
      "5 process.dispatched P2",
      "6 resource.blocked P2 R1 owner=P1",
      "6 process.dispatched P1",
      "7 resource.blocked P1 R2 owner=P2",
      "7 deadlock.detected [P1,P2] candidates=1,2",
      "7 resource.force_released R1 from=P1 to=P2",
      "7 process.dispatched P2",
      "8 resource.granted P2 R1",
      "8 process.preempted P2",
      "8 process.dispatched P2",
      "9 resource.released P2 R1 next=-",
      "9 resource.released P2 R2 next=P1",
      "9 process.terminated P2 completed turnaround=9",
      "9 process.dispatched P1",
      "10 resource.granted P1 R2",
      "10 process.preempted P1",
      "10 process.dispatched P1",
      "11 resource.released P1 R2 next=-",
      "11 process.terminated P1 completed turnaround=11",
    ]);

    expect(resolver.calls).toHaveLength(1);
    expect(resolver.calls[0].candidates).toEqual([1, 2]);
    expect(resolver.calls[0].context.attempt).toBe(1);
    expect(resolver.calls[0].context.tick).toBe(7);
    expect(resolver.calls[0].context.cycle.processIds).toEqual(["P1", "P2"]);

    expect(result.scheduler).toBe("RR (quantum 1)");
    expect(result.totalTicks).toBe(11);
    expect(result.forcedReleases).toEqual([
      { resourceId: 1, formerOwner: "P1", newOwner: "P2", tick: 7 },
    ]);
    expect(result.processes.map((p) => [p.id, p.startTick, p.completionTick, p.turnaroundTicks]))
      .toEqual([
        ["P2", 1, 9, 9],
        ["P1", 0, 11, 11],
      ]);
    expect(result.allocation).toEqual([
      { resourceId: 1, owner: null, waiters: [] },
      { resourceId: 2, owner: null, waiters: [] },
    ]);
    expect(result.errors).toEqual([]);
  });

  it("runs the same programs to completion without deadlock under FCFS", async () => {
    const resolver = new RecordingResolver();
    const result = await simulate(CROSSED_REQUESTS, new FcfsPolicy(), resolver, [1, 2]);

    expect(resolver.calls).toHaveLength(0);
    expect(eventsOfType(result.events, "deadlock.detected")).toEqual([]);
    expect(result.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P1", 5],
      ["P2", 9],
    ]);
    expect(eventsOfType(result.events, "process.preempted")).toEqual([]);
  });

  it("takes the resource away for good when the resolver releases it", async () => {
    const resolver = new RecordingResolver([2]);
    const result = await simulate(CROSSED_REQUESTS, new RoundRobinPolicy(2), resolver, [1, 2]);

    expect(eventsOfType(result.events, "deadlock.detected")).toEqual([
      { type: "deadlock.detected", involvedPids: ["P1", "P2"], candidates: [1, 2], tick: 7 },
    ]);
    expect(result.forcedReleases).toEqual([
      { resourceId: 2, formerOwner: "P2", newOwner: "P1", tick: 7 },
    ]);
    // P2 never gets R2 back, so it only releases R1 at the end.
    expect(
      eventsOfType(result.events, "resource.released").map((e) => [e.pid, e.resourceId, e.newOwner]),
    ).toEqual([
      ["P1", 1, "P2"],
      ["P1", 2, null],
      ["P2", 1, null],
    ]);
    expect(result.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P1", 9],
      ["P2", 11],
    ]);
  });

  it("re-runs detection until a three-process cycle is broken", async () => {
    const text = `
program P1
resource(1, allocate)
resource(2, allocate)
end
program P2
resource(2, allocate)
resource(3, allocate)
end
program P3
resource(3, allocate)
resource(1, allocate)
end
`;
    const resolver = new RecordingResolver([3]);
    const result = await simulate(text, new RoundRobinPolicy(1), resolver);

    expect(eventsOfType(result.events, "deadlock.detected")).toEqual([
      {
        type: "deadlock.detected",
        involvedPids: ["P1", "P2", "P3"],
        candidates: [1, 2, 3],
        tick: 6,
      },
    ]);
    expect(result.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P2", 8],
      ["P1", 10],
      ["P3", 12],
    ]);
  });

  it("lets round robin share the processor evenly", async () => {
    const text = `
program P1
wait(1)
wait(1)
wait(1)
program P2
wait(1)
wait(1)
wait(1)
`;
    const result = await simulate(text, new RoundRobinPolicy(1));

    expect(eventsOfType(result.events, "process.dispatched").map((e) => e.pid)).toEqual([
      "P1",
      "P2",
      "P1",
      "P2",
      "P1",
      "P2",
      "P1",
      "P2",
    ]);
    expect(result.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P1", 6],
      ["P2", 6],
    ]);
  });

  it("orders SJF by remaining instructions, then by arrival", async () => {
    const text = `
program P1
wait(1)
wait(1)
end
program P2
wait(1)
end
program P3
wait(1)
end
`;
    const result = await simulate(text, new SjfPolicy());

    expect(result.scheduler).toBe("SJF");
    expect(result.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P2", 2],
      ["P3", 4],
      ["P1", 7],
    ]);
  });

  it("switches SJF to the burst estimate when asked", async () => {
    const text = `
program P1
wait(5)
end
program P2
resource(1, allocate)
resource(2, allocate)
end
`;
    const byInstructions = await simulate(text, new SjfPolicy("instructions"));
    const byBurst = await simulate(text, new SjfPolicy("burst"));

    expect(eventsOfType(byInstructions.events, "process.dispatched").map((e) => e.pid)).toEqual([
      "P1",
      "P2",
    ]);
    expect(eventsOfType(byBurst.events, "process.dispatched").map((e) => e.pid)).toEqual([
      "P2",
      "P1",
    ]);
    expect(byBurst.processes.map((p) => [p.id, p.completionTick])).toEqual([
      ["P2", 3],
      ["P1", 9],
    ]);
  });

  it("produces identical runs for identical inputs", async () => {
    const first = await simulate(CROSSED_REQUESTS, new RoundRobinPolicy(1), new RecordingResolver([2]));
    const second = await simulate(CROSSED_REQUESTS, new RoundRobinPolicy(1), new RecordingResolver([2]));

    expect(second.events).toEqual(first.events);
    expect(second.processes).toEqual(first.processes);
  });

  it("re-prompts after a choice outside the cycle", async () => {
    const resolver = new RecordingResolver([5, 1]);
    const result = await simulate(CROSSED_REQUESTS, new RoundRobinPolicy(1), resolver, [1, 2, 5]);

    expect(eventsOfType(result.events, "resolution.rejected")).toEqual([
      { type: "resolution.rejected", resourceId: 5, candidates: [1, 2], attempt: 1, tick: 7 },
    ]);
    expect(resolver.calls.map((call) => [call.context.attempt, call.context.rejected])).toEqual([
      [1, undefined],
      [2, 5],
    ]);
    expect(result.forcedReleases.map((record) => record.resourceId)).toEqual([1]);
  });

  it("fails once every resolution attempt is rejected", async () => {
    const engine = new SimulationEngine({
      programs: programs(CROSSED_REQUESTS),
      resourceIds: [1, 2],
      policy: new RoundRobinPolicy(1),
      resolver: new RecordingResolver([7, 8]),
      maxResolutionAttempts: 2,
    });

    await expect(engine.run()).rejects.toBeInstanceOf(InvalidResolutionError);
  });

  it("aborts a process that requests an undeclared resource and keeps going", async () => {
    const text = `
program P1
resource(1, allocate)
resource(12, allocate)
end
program P2
resource(1, allocate)
end
`;
    const result = await simulate(text, new FcfsPolicy(), new RecordingResolver(), [1, 2]);

    expect(eventsOfType(result.events, "process.aborted")).toEqual([
      {
        type: "process.aborted",
        pid: "P1",
        resourceId: 12,
        reason: "Process P1 requested undeclared resource R12 at tick 2.",
        tick: 2,
      },
    ]);
    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toBeInstanceOf(UnknownResourceError);
    expect(result.processes.map((p) => [p.id, p.outcome, p.completionTick])).toEqual([
      ["P1", "aborted", 2],
      ["P2", "completed", 4],
    ]);
  });

  it("jumps the clock to the next arrival when nothing is runnable", async () => {
    const text = `
program P1
wait(1)
end
program P2 at 5
wait(2)
end
`;
    const result = await simulate(text, new FcfsPolicy());

    expect(eventsOfType(result.events, "process.admitted").map((e) => [e.pid, e.tick])).toEqual([
      ["P1", 0],
      ["P2", 5],
    ]);
    expect(result.processes.map((p) => [p.id, p.startTick, p.completionTick, p.turnaroundTicks]))
      .toEqual([
        ["P1", 0, 2, 2],
        ["P2", 5, 8, 3],
      ]);
  });

  it("queues a preempted process ahead of a process arriving on the same tick", async () => {
    const text = `
program P1
wait(3)
program P2 at 1
wait(1)
`;
    const result = await simulate(text, new RoundRobinPolicy(1));

    expect(
      eventsOfType(result.events, "process.dispatched")
        .slice(0, 3)
        .map((e) => [e.pid, e.tick]),
    ).toEqual([
      ["P1", 0],
      ["P1", 1],
      ["P2", 2],
    ]);
  });

  it("streams events to sinks until they unsubscribe", async () => {
    const engine = new SimulationEngine({
      programs: programs(CROSSED_REQUESTS),
      resourceIds: [1, 2],
      policy: new FcfsPolicy(),
      resolver: new RecordingResolver(),
    });
    const kept = new RecordingSink();
    const dropped = new RecordingSink();
    engine.onEvent(kept);
    const unsubscribe = engine.onEvent(dropped);
    unsubscribe();

    const result = await engine.run();

    expect(kept.events).toEqual(result.events);
    expect(dropped.events).toEqual([]);
    expect(engine.currentTick).toBe(9);
    await expect(engine.run()).rejects.toThrow("can only be called once");
  });

  it("rejects duplicate process ids", () => {
    const [first] = programs("program P1\nend\n");
    expect(
      () =>
        new SimulationEngine({
          programs: [first, { ...first, arrivalOrder: 1 }],
          resourceIds: [1],
          policy: new FcfsPolicy(),
          resolver: new RecordingResolver(),
        }),
    ).toThrow(ProgramError);
  });
});
