/*
Consistency checks over a simulation snapshot.
Returns human-readable violations; an empty list means the state is consistent.
*/

import type { SimulationSnapshot } from "./ports.js";

export function checkSnapshotInvariants(snapshot: SimulationSnapshot): string[] {
  const violations: string[] = [];
  const processes = new Map(snapshot.processes.map((process) => [process.id, process]));

  for (const resource of snapshot.resources) {
    const label = `R${resource.resourceId}`;
    if (resource.owner === null) {
      if (resource.waiters.length > 0) {
        violations.push(`${label} has waiters but no owner`);
      }
      continue;
    }

    const owner = processes.get(resource.owner);
    if (!owner) {
      violations.push(`${label} is owned by unknown process ${resource.owner}`);
    } else if (owner.status === "terminated") {
      violations.push(`${label} is still owned by terminated process ${owner.id}`);
    } else if (!owner.held.includes(resource.resourceId)) {
      violations.push(`${label} is owned by ${owner.id} but missing from its held set`);
    }
  }

  for (const process of snapshot.processes) {
    for (const resourceId of process.held) {
      const resource = snapshot.resources.find((entry) => entry.resourceId === resourceId);
      if (resource?.owner !== process.id) {
        violations.push(`${process.id} lists R${resourceId} as held but does not own it`);
      }
    }

    const queues = snapshot.resources.filter((resource) => resource.waiters.includes(process.id));
    if (process.status === "blocked") {
      if (queues.length !== 1 || queues[0].resourceId !== process.blockedOn) {
        violations.push(
          `${process.id} is blocked on R${process.blockedOn} but queued in ${queues.length} wait queue(s)`,
        );
      }
    } else if (queues.length > 0) {
      violations.push(`${process.id} is ${process.status} but still queued for a resource`);
    }
  }

  const running = snapshot.processes.filter((process) => process.status === "running");
  if (running.length > 1) {
    violations.push(`${running.length} processes are running at once`);
  }
  if ((running[0]?.id ?? null) !== snapshot.running) {
    violations.push(`running slot (${snapshot.running ?? "none"}) disagrees with process states`);
  }

  const ready = snapshot.processes
    .filter((process) => process.status === "ready")
    .map((process) => process.id);
  const queued = [...snapshot.ready];
  if (ready.length !== queued.length || ready.some((id) => !queued.includes(id))) {
    violations.push(
      `ready queue [${queued.join(", ")}] disagrees with ready processes [${ready.join(", ")}]`,
    );
  }

  return violations;
}
