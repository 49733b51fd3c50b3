import { ResolutionUnavailableError } from "../../core/errors.js";
import type { ResourceId } from "../../core/program.js";

import type { DeadlockContext, DeadlockResolver } from "./ports.js";

// =============================================================================
// NON-INTERACTIVE RESOLVERS
// =============================================================================

/**
 * Answers deadlock prompts from a fixed list, in order. Running out of
 * answers fails the run with ResolutionUnavailableError.
 */
export class ScriptedResolver implements DeadlockResolver {
  private readonly remaining: ResourceId[];

  constructor(choices: readonly ResourceId[] = []) {
    this.remaining = [...choices];
  }

  get pending(): readonly ResourceId[] {
    return this.remaining;
  }

  chooseResourceToRelease(
    candidates: readonly ResourceId[],
    context: DeadlockContext,
  ): ResourceId {
    const next = this.remaining.shift();
    if (next === undefined) {
      throw new ResolutionUnavailableError({ candidates, tick: context.tick });
    }
    return next;
  }
}
