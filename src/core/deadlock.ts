/*
Wait-for graph derived on demand from process state and resource ownership.
A blocked process A has an edge to B when A waits for a resource B owns.
Nothing here is cached; every call reads the current tables.
*/

import type { ProcessState } from "./process-state.js";
import type { ProcessId, ResourceId } from "./program.js";
import type { ResourceTable } from "./resource-table.js";

// =============================================================================
// TYPES
// =============================================================================

export type WaitForEdge = {
  from: ProcessId;
  to: ProcessId;
  resourceId: ResourceId;
};

export type DeadlockCycle = {
  /** Processes on the cycle, in the order the edges visit them. */
  processIds: ProcessId[];
  edges: WaitForEdge[];
};

type VisitColor = "white" | "gray" | "black";

// =============================================================================
// GRAPH
// =============================================================================

export function buildWaitForGraph(
  processes: Iterable<ProcessState>,
  table: ResourceTable,
): Map<ProcessId, WaitForEdge[]> {
  const graph = new Map<ProcessId, WaitForEdge[]>();

  for (const process of sortByArrival(processes)) {
    if (process.status !== "blocked" || process.blockedOn === null) continue;

    const owner = table.ownerOf(process.blockedOn);
    const edges: WaitForEdge[] = [];
    if (owner !== null && owner !== process.id) {
      edges.push({ from: process.id, to: owner, resourceId: process.blockedOn });
    }
    graph.set(process.id, edges);
  }

  return graph;
}

// =============================================================================
// DETECTION
// =============================================================================

/**
 * Three-color DFS over the blocked processes in arrival order. Returns the
 * first cycle found, or null when the graph is acyclic.
 */
export function detectDeadlock(
  processes: Iterable<ProcessState>,
  table: ResourceTable,
): DeadlockCycle | null {
  const graph = buildWaitForGraph(processes, table);
  const colors = new Map<ProcessId, VisitColor>();
  const path: WaitForEdge[] = [];

  const visit = (node: ProcessId): DeadlockCycle | null => {
    colors.set(node, "gray");

    for (const edge of graph.get(node) ?? []) {
      const color = colors.get(edge.to) ?? "white";
      if (color === "gray") {
        return extractCycle([...path, edge], edge.to);
      }
      if (color === "white") {
        path.push(edge);
        const found = visit(edge.to);
        if (found) return found;
        path.pop();
      }
    }

    colors.set(node, "black");
    return null;
  };

  for (const node of graph.keys()) {
    if ((colors.get(node) ?? "white") !== "white") continue;
    const found = visit(node);
    if (found) return found;
  }

  return null;
}

/**
 * Resources whose release could break the cycle: the ones on its edges, each
 * owned by a cycle member and awaited by another.
 */
export function cycleCandidates(cycle: DeadlockCycle): ResourceId[] {
  return [...new Set(cycle.edges.map((edge) => edge.resourceId))].sort((a, b) => a - b);
}

function extractCycle(trail: WaitForEdge[], entry: ProcessId): DeadlockCycle {
  const start = trail.findIndex((edge) => edge.from === entry);
  const edges = trail.slice(start);
  return { processIds: edges.map((edge) => edge.from), edges };
}

function sortByArrival(processes: Iterable<ProcessState>): ProcessState[] {
  return [...processes].sort((a, b) => a.arrivalOrder - b.arrivalOrder);
}
