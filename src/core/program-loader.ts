import path from "node:path";

import fse from "fs-extra";
import yaml from "js-yaml";

import { formatErrorMessage } from "./error-format.js";
import { ProgramError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import {
  ProgramDocumentSchema,
  toInstruction,
  type Instruction,
  type ProgramDefinition,
  type ResourceId,
} from "./program.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProgramIssue = {
  line?: number;
  programId?: string;
  message: string;
};

export type ProgramLoadResult = {
  source: string;
  programs: ProgramDefinition[];
};

export type UndeclaredReference = {
  programId: string;
  resourceId: ResourceId;
};

type DraftProgram = {
  id: string;
  line: number;
  arrivalTick: number;
  instructions: Instruction[];
};

const HEADER_PATTERN = /^program\s+(\S+)(?:\s+at\s+(\S+))?$/i;
const RESOURCE_PATTERN = /^resource\s*\(([^()]*)\)$/i;
const WAIT_PATTERN = /^wait\s*\(([^()]*)\)$/i;
const END_PATTERN = /^end$/i;
const LOOP_MARKER_PATTERN = /^(for|next)\b/i;
const INTEGER_PATTERN = /^\d+$/;

const STRUCTURED_EXTENSIONS = new Set([".json", ".yaml", ".yml"]);

// =============================================================================
// FILE LOADING
// =============================================================================

export async function loadProgramFile(filePath: string): Promise<ProgramLoadResult> {
  const absolutePath = path.resolve(filePath);
  if (!(await fse.pathExists(absolutePath))) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.program,
      title: "Program file not found.",
      message: `No program file at ${absolutePath}.`,
      hint: "Pass the path to a program definition file (.txt, .json or .yaml).",
    });
  }

  const raw = await fse.readFile(absolutePath, "utf8");
  const extension = path.extname(absolutePath).toLowerCase();
  const programs = STRUCTURED_EXTENSIONS.has(extension)
    ? parseProgramDocument(parseStructured(raw, absolutePath), absolutePath)
    : parseProgramText(raw, absolutePath);

  return { source: absolutePath, programs };
}

function parseStructured(raw: string, source: string): unknown {
  try {
    return yaml.load(raw);
  } catch (err) {
    throw createInvalidProgramError(source, [{ message: formatErrorMessage(err) }]);
  }
}

// =============================================================================
// TEXT FORMAT
// =============================================================================

/**
 * Parses the line-oriented program format:
 *
 *   program P1
 *   resource(1, allocate)
 *   wait(2)
 *   end
 *
 * `#` lines and blank lines are skipped; `for`/`next` loop markers are accepted
 * and ignored. All issues are collected before throwing.
 */
export function parseProgramText(text: string, source = "<inline>"): ProgramDefinition[] {
  const drafts: DraftProgram[] = [];
  const issues: ProgramIssue[] = [];
  let current: DraftProgram | null = null;

  for (const [index, rawLine] of text.split(/\r?\n/).entries()) {
    const line = rawLine.trim();
    const lineNumber = index + 1;
    if (!line || line.startsWith("#")) continue;

    const header = HEADER_PATTERN.exec(line);
    if (header) {
      current = startProgram(header, lineNumber, drafts, issues);
      continue;
    }

    if (!current) {
      issues.push({ line: lineNumber, message: `"${line}" appears before any program header` });
      continue;
    }

    if (LOOP_MARKER_PATTERN.test(line)) continue;

    const parsed = parseInstructionLine(line);
    if (typeof parsed === "string") {
      issues.push({ line: lineNumber, programId: current.id, message: parsed });
      continue;
    }
    current.instructions.push(parsed);
  }

  for (const draft of drafts) {
    if (draft.instructions.length === 0) {
      issues.push({ line: draft.line, programId: draft.id, message: "program has no instructions" });
    }
  }

  if (issues.length > 0) {
    throw createInvalidProgramError(source, issues);
  }

  return drafts.map((draft, arrivalOrder) => ({
    id: draft.id,
    arrivalOrder,
    arrivalTick: draft.arrivalTick,
    instructions: draft.instructions,
  }));
}

function startProgram(
  header: RegExpExecArray,
  lineNumber: number,
  drafts: DraftProgram[],
  issues: ProgramIssue[],
): DraftProgram {
  const id = header[1];
  const arrivalRaw = header[2];
  const draft: DraftProgram = { id, line: lineNumber, arrivalTick: 0, instructions: [] };

  if (arrivalRaw !== undefined) {
    if (INTEGER_PATTERN.test(arrivalRaw)) {
      draft.arrivalTick = Number(arrivalRaw);
    } else {
      issues.push({
        line: lineNumber,
        programId: id,
        message: `arrival tick "${arrivalRaw}" is not a non-negative integer`,
      });
    }
  }

  if (drafts.some((existing) => existing.id === id)) {
    issues.push({ line: lineNumber, programId: id, message: `duplicate program "${id}"` });
  } else {
    drafts.push(draft);
  }

  return draft;
}

function parseInstructionLine(line: string): Instruction | string {
  if (END_PATTERN.test(line)) {
    return { kind: "end" };
  }

  const wait = WAIT_PATTERN.exec(line);
  if (wait) {
    const ticks = wait[1].trim();
    if (!INTEGER_PATTERN.test(ticks) || Number(ticks) < 1) {
      return `wait duration "${ticks}" must be a positive integer`;
    }
    return { kind: "wait", ticks: Number(ticks) };
  }

  const resource = RESOURCE_PATTERN.exec(line);
  if (resource) {
    const [idRaw = "", operationRaw = ""] = resource[1].split(",").map((part) => part.trim());
    if (!INTEGER_PATTERN.test(idRaw)) {
      return `resource id "${idRaw}" must be a non-negative integer`;
    }
    if (operationRaw.toLowerCase() !== "allocate") {
      return `unsupported resource operation "${operationRaw}" (only "allocate" is supported)`;
    }
    return { kind: "request", resourceId: Number(idRaw) };
  }

  return `unknown instruction "${line}"`;
}

// =============================================================================
// STRUCTURED FORMAT
// =============================================================================

export function parseProgramDocument(doc: unknown, source = "<inline>"): ProgramDefinition[] {
  const parsed = ProgramDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw createInvalidProgramError(
      source,
      parsed.error.issues.map((issue) => ({
        message: `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`,
      })),
    );
  }

  const seen = new Set<string>();
  const issues: ProgramIssue[] = [];
  for (const entry of parsed.data.programs) {
    if (seen.has(entry.id)) {
      issues.push({ programId: entry.id, message: `duplicate program "${entry.id}"` });
    }
    seen.add(entry.id);
  }
  if (issues.length > 0) {
    throw createInvalidProgramError(source, issues);
  }

  return parsed.data.programs.map((entry, arrivalOrder) => ({
    id: entry.id,
    arrivalOrder,
    arrivalTick: entry.arrival,
    instructions: entry.instructions.map(toInstruction),
  }));
}

// =============================================================================
// CHECKS
// =============================================================================

export function findUndeclaredReferences(
  programs: readonly ProgramDefinition[],
  declared: readonly ResourceId[],
): UndeclaredReference[] {
  const known = new Set(declared);
  const references: UndeclaredReference[] = [];

  for (const program of programs) {
    const reported = new Set<ResourceId>();
    for (const instruction of program.instructions) {
      if (instruction.kind !== "request") continue;
      if (known.has(instruction.resourceId) || reported.has(instruction.resourceId)) continue;
      reported.add(instruction.resourceId);
      references.push({ programId: program.id, resourceId: instruction.resourceId });
    }
  }

  return references;
}

// =============================================================================
// ERRORS
// =============================================================================

export function formatProgramIssue(issue: ProgramIssue): string {
  const location = issue.line !== undefined ? `line ${issue.line}` : null;
  const owner = issue.programId !== undefined ? `program ${issue.programId}` : null;
  const prefix = [location, owner].filter(Boolean).join(", ");
  return prefix ? `${prefix}: ${issue.message}` : issue.message;
}

function createInvalidProgramError(source: string, issues: ProgramIssue[]): UserFacingError {
  const lines = issues.map((issue) => `- ${formatProgramIssue(issue)}`);
  const cause = new ProgramError(`Invalid programs in ${source}:\n${lines.join("\n")}`);

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.program,
    title: "Invalid program definitions.",
    message: `${source} has ${issues.length} issue(s):\n${lines.join("\n")}`,
    hint: "Each program starts with `program <name>` followed by resource(<id>, allocate), wait(<ticks>) or end.",
    cause,
  });
}
