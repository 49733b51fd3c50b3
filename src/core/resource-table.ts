/**
 * Ownership and FIFO wait queues for exclusively-owned resources.
 * A resource has at most one owner; a process waits in at most one queue.
 */

import { UnknownResourceError } from "./errors.js";
import type { ProcessId, ResourceId } from "./program.js";

// =============================================================================
// TYPES
// =============================================================================

export type AcquireResult = "granted" | "enqueued";

export type ReleaseHandoff = {
  resourceId: ResourceId;
  newOwner: ProcessId | null;
};

export type ForcedReleaseResult = {
  resourceId: ResourceId;
  formerOwner: ProcessId | null;
  newOwner: ProcessId | null;
};

export type ResourceSnapshot = {
  resourceId: ResourceId;
  owner: ProcessId | null;
  waiters: ProcessId[];
};

type ResourceEntry = {
  owner: ProcessId | null;
  queue: ProcessId[];
};

// =============================================================================
// RESOURCE TABLE
// =============================================================================

export class ResourceTable {
  private readonly entries = new Map<ResourceId, ResourceEntry>();

  constructor(resourceIds: Iterable<ResourceId>) {
    for (const resourceId of resourceIds) {
      this.entries.set(resourceId, { owner: null, queue: [] });
    }
  }

  has(resourceId: ResourceId): boolean {
    return this.entries.has(resourceId);
  }

  ids(): ResourceId[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }

  ownerOf(resourceId: ResourceId): ProcessId | null {
    return this.entry(resourceId).owner;
  }

  waitersOf(resourceId: ResourceId): readonly ProcessId[] {
    return this.entry(resourceId).queue;
  }

  ownedBy(pid: ProcessId): ResourceId[] {
    return this.ids().filter((resourceId) => this.entry(resourceId).owner === pid);
  }

  waitingOn(pid: ProcessId): ResourceId | null {
    for (const resourceId of this.ids()) {
      if (this.entry(resourceId).queue.includes(pid)) return resourceId;
    }
    return null;
  }

  /**
   * Grants a free resource, or queues the requester behind the current owner.
   * Re-requesting a resource the caller already owns is a no-op grant, and
   * re-requesting one it already waits for keeps its queue position.
   */
  tryAcquire(resourceId: ResourceId, pid: ProcessId): AcquireResult {
    const entry = this.entry(resourceId, pid);

    if (entry.owner === null || entry.owner === pid) {
      entry.owner = pid;
      return "granted";
    }

    if (!entry.queue.includes(pid)) {
      const elsewhere = this.waitingOn(pid);
      if (elsewhere !== null) {
        throw new Error(
          `Process ${pid} is already waiting for R${elsewhere} and cannot queue for R${resourceId}.`,
        );
      }
      entry.queue.push(pid);
    }

    return "enqueued";
  }

  /**
   * Releases everything `pid` owns, in ascending resource order, handing each
   * resource to the head of its queue.
   */
  releaseAll(pid: ProcessId): ReleaseHandoff[] {
    return this.ownedBy(pid).map((resourceId) => ({
      resourceId,
      newOwner: this.handOff(this.entry(resourceId)),
    }));
  }

  /** Clears ownership regardless of the owner's state and hands off FIFO. */
  forceRelease(resourceId: ResourceId): ForcedReleaseResult {
    const entry = this.entry(resourceId);
    const formerOwner = entry.owner;
    const newOwner = formerOwner === null ? null : this.handOff(entry);
    return { resourceId, formerOwner, newOwner };
  }

  snapshot(): ResourceSnapshot[] {
    return this.ids().map((resourceId) => {
      const entry = this.entry(resourceId);
      return { resourceId, owner: entry.owner, waiters: [...entry.queue] };
    });
  }

  private handOff(entry: ResourceEntry): ProcessId | null {
    const next = entry.queue.shift() ?? null;
    entry.owner = next;
    return next;
  }

  private entry(resourceId: ResourceId, pid?: ProcessId): ResourceEntry {
    const entry = this.entries.get(resourceId);
    if (!entry) {
      throw new UnknownResourceError({ pid, resourceId });
    }
    return entry;
  }
}
