import { describe, expect, it } from "vitest";

import { ResolutionUnavailableError } from "../../../core/errors.js";
import { RoundRobinPolicy } from "../../../core/scheduler.js";
import { ScriptedResolver } from "../resolvers.js";
import { runSimulation } from "../simulation-engine.js";

import { CROSSED_REQUESTS, programs } from "./fakes.js";

describe("ScriptedResolver", () => {
  it("hands out its choices in order", async () => {
    const resolver = new ScriptedResolver([2, 7]);
    const result = await runSimulation({
      programs: programs(CROSSED_REQUESTS),
      resourceIds: [1, 2],
      policy: new RoundRobinPolicy(1),
      resolver,
    });

    expect(result.forcedReleases.map((record) => record.resourceId)).toEqual([2]);
    expect(resolver.pending).toEqual([7]);
  });

  it("fails the run once it has nothing left to say", async () => {
    const run = runSimulation({
      programs: programs(CROSSED_REQUESTS),
      resourceIds: [1, 2],
      policy: new RoundRobinPolicy(1),
      resolver: new ScriptedResolver(),
    });

    await expect(run).rejects.toBeInstanceOf(ResolutionUnavailableError);
    await expect(run).rejects.toThrow(
      "Deadlock at tick 7 needs a resource to release (candidates: R1, R2) but no choice is available.",
    );
  });
});
