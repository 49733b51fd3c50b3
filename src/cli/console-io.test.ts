import { describe, expect, it } from "vitest";

import type { DeadlockContext, SimulationSnapshot } from "../app/simulator/ports.js";
import { ResolutionUnavailableError } from "../core/errors.js";
import { FakeSimulatorIo } from "../__tests__/helpers/fake-io.js";

import {
  PromptingDeadlockResolver,
  formatAllocationStatus,
  parseResourceAnswer,
  promptQuantum,
  promptScheduler,
} from "./console-io.js";

const snapshot: SimulationSnapshot = {
  tick: 7,
  running: null,
  ready: [],
  processes: [
    { id: "P1", status: "blocked", pc: 2, held: [1], blockedOn: 2, waitRemaining: 0 },
    { id: "P2", status: "blocked", pc: 2, held: [2], blockedOn: 1, waitRemaining: 0 },
  ],
  resources: [
    { resourceId: 0, owner: null, waiters: [] },
    { resourceId: 1, owner: "P1", waiters: ["P2"] },
    { resourceId: 2, owner: "P2", waiters: ["P1"] },
  ],
};

function deadlockContext(overrides: Partial<DeadlockContext> = {}): DeadlockContext {
  return {
    tick: 7,
    cycle: {
      processIds: ["P1", "P2"],
      edges: [
        { from: "P1", to: "P2", resourceId: 2 },
        { from: "P2", to: "P1", resourceId: 1 },
      ],
    },
    attempt: 1,
    snapshot,
    ...overrides,
  };
}

describe("startup prompts", () => {
  it("maps menu choices onto schedulers", async () => {
    const io = new FakeSimulatorIo(["3"]);

    await expect(promptScheduler(io)).resolves.toBe("rr");
    expect(io.notes).toEqual([
      "Select a scheduling algorithm:",
      "1. First-Come-First-Serve (FCFS)",
      "2. Shortest Job First (SJF)",
      "3. Round Robin (RR)",
    ]);
  });

  it("falls back to FCFS on an unknown choice", async () => {
    const io = new FakeSimulatorIo(["9"]);

    await expect(promptScheduler(io)).resolves.toBe("fcfs");
    expect(io.notes.at(-1)).toBe("Invalid choice. Defaulting to FCFS.");
  });

  it("reads a quantum, using the default for blank or invalid answers", async () => {
    await expect(promptQuantum(new FakeSimulatorIo(["4"]))).resolves.toBe(4);
    await expect(promptQuantum(new FakeSimulatorIo([""]))).resolves.toBe(2);

    const io = new FakeSimulatorIo(["-3"]);
    await expect(promptQuantum(io)).resolves.toBe(2);
    expect(io.notes).toEqual(["Invalid quantum. Using default quantum of 2."]);
  });
});

describe("PromptingDeadlockResolver", () => {
  it("shows the allocation and waiting list, then reads a resource id", async () => {
    const io = new FakeSimulatorIo(["later", "R2"]);
    const resolver = new PromptingDeadlockResolver(io);

    await expect(resolver.chooseResourceToRelease([1, 2], deadlockContext())).resolves.toBe(2);
    expect(io.notes).toEqual([
      "Deadlock detected at tick 7 among P1, P2.",
      "Resource allocation:",
      "  R1: P1",
      "  R2: P2",
      "Waiting processes:",
      "  P1 -> R2",
      "  P2 -> R1",
      '"later" is not a resource id.',
    ]);
    expect(io.questions).toEqual([
      "Enter the resource to release (R1, R2):",
      "Enter the resource to release (R1, R2):",
    ]);
  });

  it("explains a rejected choice before asking again", async () => {
    const io = new FakeSimulatorIo(["1"]);
    const resolver = new PromptingDeadlockResolver(io);

    await resolver.chooseResourceToRelease([1, 2], deadlockContext({ attempt: 2, rejected: 5 }));
    expect(io.notes).toEqual(["R5 is not part of the deadlock."]);
  });

  it("gives up after repeated unreadable answers", async () => {
    const io = new FakeSimulatorIo(["a", "b"]);
    const resolver = new PromptingDeadlockResolver(io, 2);

    await expect(resolver.chooseResourceToRelease([1, 2], deadlockContext())).rejects.toBeInstanceOf(
      ResolutionUnavailableError,
    );
  });
});

describe("helpers", () => {
  it("parses bare and prefixed resource ids", () => {
    expect(parseResourceAnswer("3")).toBe(3);
    expect(parseResourceAnswer(" r12 ")).toBe(12);
    expect(parseResourceAnswer("R")).toBeNull();
    expect(parseResourceAnswer("1,2")).toBeNull();
  });

  it("marks empty sections", () => {
    expect(
      formatAllocationStatus({ ...snapshot, processes: [], resources: [] }),
    ).toEqual(["Resource allocation:", "  (none)", "Waiting processes:", "  (none)"]);
  });
});
