import type { ProcessId, ResourceId } from "./program.js";

// =============================================================================
// BASE ERRORS
// =============================================================================

export class SimulatorError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SimulatorError";
  }
}

export class ConfigError extends SimulatorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class ProgramError extends SimulatorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ProgramError";
  }
}

// =============================================================================
// ENGINE ERRORS
// =============================================================================

export type SimulationErrorContext = {
  pid?: ProcessId;
  resourceId?: ResourceId;
  tick?: number;
};

export class SimulationError extends SimulatorError {
  readonly pid?: ProcessId;
  readonly resourceId?: ResourceId;
  readonly tick?: number;

  constructor(message: string, context: SimulationErrorContext = {}, cause?: unknown) {
    super(message, cause);
    this.name = "SimulationError";
    this.pid = context.pid;
    this.resourceId = context.resourceId;
    this.tick = context.tick;
  }
}

export class UnknownResourceError extends SimulationError {
  constructor(context: { pid?: ProcessId; resourceId: ResourceId; tick?: number }) {
    const requester = context.pid ? `Process ${context.pid} requested` : "Request for";
    const at = context.tick !== undefined ? ` at tick ${context.tick}` : "";
    super(`${requester} undeclared resource R${context.resourceId}${at}.`, context);
    this.name = "UnknownResourceError";
  }
}

export class InvalidResolutionError extends SimulationError {
  readonly candidates: ResourceId[];

  constructor(context: { resourceId: ResourceId; candidates: readonly ResourceId[]; tick: number }) {
    const allowed = context.candidates.map((id) => `R${id}`).join(", ");
    super(
      `R${context.resourceId} is not part of the deadlock cycle at tick ${context.tick} (expected one of: ${allowed}).`,
      context,
    );
    this.name = "InvalidResolutionError";
    this.candidates = [...context.candidates];
  }
}

export class ResolutionUnavailableError extends SimulationError {
  readonly candidates: ResourceId[];

  constructor(context: { candidates: readonly ResourceId[]; tick: number }) {
    const listed = context.candidates.map((id) => `R${id}`).join(", ");
    super(
      `Deadlock at tick ${context.tick} needs a resource to release (candidates: ${listed}) but no choice is available.`,
      { tick: context.tick },
    );
    this.name = "ResolutionUnavailableError";
    this.candidates = [...context.candidates];
  }
}

export class StallWithoutCycleError extends SimulationError {
  readonly blocked: ProcessId[];

  constructor(context: { tick: number; blocked: readonly ProcessId[] }) {
    super(
      `No process is ready at tick ${context.tick} but the wait-for graph has no cycle (blocked: ${context.blocked.join(", ") || "none"}).`,
      { tick: context.tick },
    );
    this.name = "StallWithoutCycleError";
    this.blocked = [...context.blocked];
  }
}

export class InvariantError extends SimulationError {
  readonly violations: string[];

  constructor(tick: number, violations: readonly string[]) {
    super(`State invariants violated at tick ${tick}: ${violations.join("; ")}`, { tick });
    this.name = "InvariantError";
    this.violations = [...violations];
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  program: "PROGRAM_ERROR",
  simulation: "SIMULATION_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorOptions = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;
  readonly next?: string;
  readonly cause?: unknown;

  constructor(options: UserFacingErrorOptions) {
    super(options.message);
    this.name = "UserFacingError";
    this.code = options.code;
    this.title = options.title;
    this.hint = options.hint;
    this.next = options.next;
    this.cause = options.cause;
  }
}
