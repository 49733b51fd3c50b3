import { CallbackEventSink, JsonlEventSink } from "../app/simulator/event-sinks.js";
import type { DeadlockResolver, EventSink } from "../app/simulator/ports.js";
import { ScriptedResolver } from "../app/simulator/resolvers.js";
import { runSimulation, type SimulationResult } from "../app/simulator/simulation-engine.js";
import {
  DEFAULT_QUANTUM,
  declaredResourceIds,
  type SchedulerName,
  type SimulatorConfig,
  type SjfMetric,
} from "../core/config.js";
import { applyConfigOverrides } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  ConfigError,
  InvalidResolutionError,
  ProgramError,
  ResolutionUnavailableError,
  SimulationError,
  type UserFacingErrorCode,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { resolveLogDir, runEventsLogPath } from "../core/paths.js";
import type { ResourceId } from "../core/program.js";
import { loadProgramFile } from "../core/program-loader.js";
import { createSchedulerPolicy, type SchedulerPolicyOptions } from "../core/scheduler.js";
import { defaultRunId } from "../core/utils.js";

import {
  ConsoleSimulatorIo,
  PromptingDeadlockResolver,
  promptQuantum,
  promptScheduler,
  type SimulatorIo,
} from "./console-io.js";
import { formatEventLine, formatSummaryLines } from "./report.js";

export type RunCommandOptions = {
  scheduler?: SchedulerName;
  quantum?: number;
  sjfMetric?: SjfMetric;
  resources?: number;
  release?: ResourceId[];
  runId?: string;
  eventLog?: boolean;
};

export type RunCommandDeps = {
  io?: SimulatorIo;
  cwd?: string;
};

export async function runCommand(
  programsPath: string,
  config: SimulatorConfig,
  opts: RunCommandOptions,
  deps: RunCommandDeps = {},
): Promise<SimulationResult> {
  const io = deps.io ?? new ConsoleSimulatorIo();
  try {
    const merged = applyConfigOverrides(config, {
      scheduler: opts.scheduler,
      quantum: opts.quantum,
      sjf_metric: opts.sjfMetric,
      resources: opts.resources,
      event_log: opts.eventLog,
    });
    const { programs, source } = await loadProgramFile(programsPath);
    const policy = createSchedulerPolicy(await resolvePolicyOptions(merged, io));
    const runId = opts.runId ?? defaultRunId();

    const sinks: EventSink[] = [new CallbackEventSink((event) => io.note(formatEventLine(event)))];
    const eventLog = merged.event_log
      ? new JsonlEventSink(
          runEventsLogPath(resolveLogDir(merged.log_dir, deps.cwd), runId),
          runId,
        )
      : null;
    if (eventLog) sinks.push(eventLog);

    io.note(`Run ${runId}: ${programs.length} program(s) from ${source} under ${policy.label}.`);

    let result: SimulationResult;
    try {
      result = await runSimulation({
        programs,
        resourceIds: declaredResourceIds(merged),
        policy,
        resolver: createResolver(opts.release, io),
        sinks,
        maxResolutionAttempts: merged.max_resolution_attempts,
        verifyInvariants: merged.verify_invariants,
      });
    } finally {
      eventLog?.close();
    }

    io.note("");
    for (const line of formatSummaryLines(result)) {
      io.note(line);
    }
    if (eventLog) {
      io.note("");
      io.note(`Event log: ${eventLog.filePath}`);
    }

    return result;
  } catch (error) {
    throw normalizeRunCommandError(error);
  } finally {
    if (!deps.io) io.close();
  }
}

async function resolvePolicyOptions(
  config: SimulatorConfig,
  io: SimulatorIo,
): Promise<SchedulerPolicyOptions> {
  const scheduler = config.scheduler ?? (io.interactive ? await promptScheduler(io) : "fcfs");

  let quantum = config.quantum;
  if (scheduler === "rr" && quantum === undefined) {
    quantum = io.interactive ? await promptQuantum(io) : DEFAULT_QUANTUM;
  }

  return { scheduler, quantum, sjfMetric: config.sjf_metric };
}

function createResolver(release: ResourceId[] | undefined, io: SimulatorIo): DeadlockResolver {
  if (release && release.length > 0) return new ScriptedResolver(release);
  if (io.interactive) return new PromptingDeadlockResolver(io);
  return new ScriptedResolver();
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const RUN_COMMAND_FAILURE_TITLE = "Run command failed.";
const RUN_COMMAND_RELEASE_HINT =
  "Pass --release <ids> with the resources to take away, in order, or run on a terminal to be prompted.";
const RUN_COMMAND_CANDIDATE_HINT = "Release one of the resources listed as candidates.";

function normalizeRunCommandError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title: RUN_COMMAND_FAILURE_TITLE,
      message: error.message,
      hint: error.hint ?? resolveRunCommandHint(error),
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveCommandErrorCode(error),
    title: RUN_COMMAND_FAILURE_TITLE,
    message: formatErrorMessage(error),
    hint: resolveRunCommandHint(error),
    cause: error,
  });
}

function resolveRunCommandHint(error: unknown): string | undefined {
  if (error instanceof ResolutionUnavailableError) return RUN_COMMAND_RELEASE_HINT;
  if (error instanceof InvalidResolutionError) return RUN_COMMAND_CANDIDATE_HINT;
  return undefined;
}

function resolveCommandErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) {
    return USER_FACING_ERROR_CODES.config;
  }
  if (error instanceof ProgramError) {
    return USER_FACING_ERROR_CODES.program;
  }
  if (error instanceof SimulationError) {
    return USER_FACING_ERROR_CODES.simulation;
  }

  return USER_FACING_ERROR_CODES.unknown;
}
