import { Command, InvalidArgumentError, Option } from "commander";

import type { SimulatorConfig } from "../core/config.js";
import type { ResourceId } from "../core/program.js";

import { checkCommand } from "./check.js";
import { loadConfigForCli } from "./config.js";
import { runCommand } from "./run.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type RunOptions = {
  scheduler?: "fcfs" | "sjf" | "rr";
  quantum?: number;
  sjfMetric?: "instructions" | "burst";
  resources?: number;
  release?: ResourceId[];
  runId?: string;
  eventLog: boolean;
};

type CheckOptions = {
  resources?: number;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveConfig = (): SimulatorConfig => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config }).config;
  };

  program
    .name("turnstile")
    .description("Process scheduling and deadlock simulator")
    .version("0.1.0")
    .option("--config <path>", "Simulator config path (default: ./turnstile.yaml)")
    .option("--debug", "Show error codes, causes and stacks", false);

  program
    .command("run")
    .description("Run programs under a scheduler and print the event trace")
    .argument("<programs>", "Program definition file (.txt, .json, .yaml)")
    .addOption(
      new Option("--scheduler <name>", "Scheduling policy (prompted on a terminal when unset)")
        .choices(["fcfs", "sjf", "rr"]),
    )
    .option("--quantum <n>", "Round Robin time quantum", parsePositiveInt)
    .addOption(
      new Option("--sjf-metric <metric>", "SJF ordering metric").choices(["instructions", "burst"]),
    )
    .option("--resources <n>", "Declare resources R0..R(n-1)", parsePositiveInt)
    .option("--release <ids>", "Comma-separated resources to release on deadlock, in order", parseIdList)
    .option("--run-id <id>", "Run ID (default: timestamp)")
    .option("--no-event-log", "Do not write the JSONL event log")
    .action(async (programsPath: string, opts: RunOptions) => {
      await runCommand(programsPath, resolveConfig(), {
        scheduler: opts.scheduler,
        quantum: opts.quantum,
        sjfMetric: opts.sjfMetric,
        resources: opts.resources,
        release: opts.release,
        runId: opts.runId,
        // Only the negated flag overrides the config file.
        eventLog: opts.eventLog ? undefined : false,
      });
    });

  program
    .command("check")
    .description("Validate a program file and list its programs")
    .argument("<programs>", "Program definition file (.txt, .json, .yaml)")
    .option("--resources <n>", "Declare resources R0..R(n-1)", parsePositiveInt)
    .action(async (programsPath: string, opts: CheckOptions) => {
      await checkCommand(programsPath, resolveConfig(), { resources: opts.resources });
    });

  return program;
}

// =============================================================================
// ARGUMENT PARSERS
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`Expected a positive integer, received "${value}".`);
  }
  return parsed;
}

export function parseIdList(value: string): ResourceId[] {
  const parts = value
    .split(",")
    .map((part) => part.trim().replace(/^r/i, ""))
    .filter(Boolean);
  if (parts.length === 0 || parts.some((part) => !/^\d+$/.test(part))) {
    throw new InvalidArgumentError(`Expected comma-separated resource ids, received "${value}".`);
  }
  return parts.map(Number);
}
