import { z } from "zod";

import { DEFAULT_LOG_DIR } from "./paths.js";

export const SchedulerNameSchema = z.enum(["fcfs", "sjf", "rr"]);
export type SchedulerName = z.infer<typeof SchedulerNameSchema>;

export const SjfMetricSchema = z.enum(["instructions", "burst"]);
export type SjfMetric = z.infer<typeof SjfMetricSchema>;

export const DEFAULT_QUANTUM = 2;
export const DEFAULT_RESOURCE_COUNT = 10;

export const SimulatorConfigSchema = z
  .object({
    // Left unset so the CLI can prompt on a TTY.
    scheduler: SchedulerNameSchema.optional(),
    quantum: z.number().int().positive().optional(),
    sjf_metric: SjfMetricSchema.default("instructions"),

    // Declares resource ids 0..resources-1.
    resources: z.number().int().positive().default(DEFAULT_RESOURCE_COUNT),

    max_resolution_attempts: z.number().int().positive().default(3),
    verify_invariants: z.boolean().default(false),

    log_dir: z.string().min(1).default(DEFAULT_LOG_DIR),
    event_log: z.boolean().default(true),
  })
  .strict();

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

export type SimulatorConfigOverrides = Partial<SimulatorConfig>;

export function declaredResourceIds(config: Pick<SimulatorConfig, "resources">): number[] {
  return Array.from({ length: config.resources }, (_, index) => index);
}
