import { z } from "zod";

// =============================================================================
// TYPES
// =============================================================================

export type ProcessId = string;
export type ResourceId = number;

export type RequestResourceInstruction = { kind: "request"; resourceId: ResourceId };
export type WaitInstruction = { kind: "wait"; ticks: number };
export type EndInstruction = { kind: "end" };

export type Instruction = RequestResourceInstruction | WaitInstruction | EndInstruction;

export type ProgramDefinition = {
  id: ProcessId;
  arrivalOrder: number;
  arrivalTick: number;
  instructions: readonly Instruction[];
};

// =============================================================================
// DOCUMENT SCHEMA (.json / .yaml program files)
// =============================================================================

const InstructionSchema = z.discriminatedUnion("op", [
  z.object({ op: z.literal("request"), resource: z.number().int().nonnegative() }),
  z.object({ op: z.literal("wait"), ticks: z.number().int().positive() }),
  z.object({ op: z.literal("end") }),
]);

export const ProgramEntrySchema = z.object({
  id: z.string().min(1),
  arrival: z.number().int().nonnegative().default(0),
  instructions: z.array(InstructionSchema).min(1),
});

export const ProgramDocumentSchema = z.object({
  programs: z.array(ProgramEntrySchema).min(1),
});

export type ProgramEntry = z.infer<typeof ProgramEntrySchema>;
export type ProgramDocument = z.infer<typeof ProgramDocumentSchema>;

export function toInstruction(entry: z.infer<typeof InstructionSchema>): Instruction {
  switch (entry.op) {
    case "request":
      return { kind: "request", resourceId: entry.resource };
    case "wait":
      return { kind: "wait", ticks: entry.ticks };
    case "end":
      return { kind: "end" };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Burst estimate in ticks: every wait tick, plus one per resource request.
 * `end` is not counted.
 */
export function estimateBurst(instructions: readonly Instruction[], from = 0): number {
  let total = 0;
  for (const instruction of instructions.slice(from)) {
    if (instruction.kind === "wait") total += instruction.ticks;
    if (instruction.kind === "request") total += 1;
  }
  return total;
}

export function formatResourceId(resourceId: ResourceId): string {
  return `R${resourceId}`;
}

const PROCESS_ID_COLLATOR = new Intl.Collator("en", { numeric: true });

/** Total order: digit runs compare as numbers ("P9" < "P10"), then by code unit. */
export function compareProcessIds(a: ProcessId, b: ProcessId): number {
  const collated = PROCESS_ID_COLLATOR.compare(a, b);
  if (collated !== 0) return collated;
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
