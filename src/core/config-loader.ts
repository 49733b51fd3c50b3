import fs from "node:fs";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import {
  SimulatorConfigSchema,
  type SimulatorConfig,
  type SimulatorConfigOverrides,
} from "./config.js";
import { formatErrorMessage } from "./error-format.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const INVALID_CONFIG_TITLE = "Invalid simulator config.";
const INVALID_CONFIG_HINT = "Fix the config file and rerun, or pass --config <path>.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!(error instanceof yaml.YAMLException)) {
    return null;
  }

  const mark: unknown = error.mark;
  if (!mark || typeof mark !== "object") {
    return null;
  }

  const line = "line" in mark ? mark.line : undefined;
  const column = "column" in mark ? mark.column : undefined;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

export function formatConfigIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
    return `${location}: ${issue.message}`;
  });
}

function createInvalidConfigError(message: string, cause: unknown): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: INVALID_CONFIG_TITLE,
    message,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

// =============================================================================
// LOADING
// =============================================================================

export function parseSimulatorConfig(doc: unknown, source: string): SimulatorConfig {
  let expanded: unknown;
  try {
    expanded = expandEnv(doc ?? {}, { file: source, trail: [] });
  } catch (err) {
    throw createInvalidConfigError(formatErrorMessage(err), err);
  }

  const parsed = SimulatorConfigSchema.safeParse(expanded);
  if (!parsed.success) {
    const lines = formatConfigIssues(parsed.error.issues);
    const cause = new ConfigError(`Invalid config ${source}:\n${lines.join("\n")}`, parsed.error);
    throw createInvalidConfigError(`Config ${source} failed validation:\n${lines.join("\n")}`, cause);
  }

  return parsed.data;
}

export function loadSimulatorConfig(
  configPath: string,
  options: { required?: boolean } = {},
): SimulatorConfig {
  if (!fs.existsSync(configPath)) {
    if (options.required) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "Config not found.",
        message: `No config file at ${configPath}.`,
        hint: "Check the --config path, or omit it to use the defaults.",
      });
    }
    return parseSimulatorConfig({}, "<defaults>");
  }

  const raw = fs.readFileSync(configPath, "utf8");
  let doc: unknown;
  try {
    doc = yaml.load(raw);
  } catch (err) {
    const location = resolveYamlErrorLocation(err);
    const where = location ? ` (line ${location.line}, column ${location.column})` : "";
    throw createInvalidConfigError(
      `Failed to parse YAML config ${configPath}${where}.`,
      new ConfigError(`YAML parse error in ${configPath}`, err),
    );
  }

  return parseSimulatorConfig(doc, configPath);
}

/**
 * Layers CLI overrides on top of a loaded config. Undefined overrides leave
 * the file value in place; the merged result is validated again.
 */
export function applyConfigOverrides(
  config: SimulatorConfig,
  overrides: SimulatorConfigOverrides,
): SimulatorConfig {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined),
  );
  return parseSimulatorConfig({ ...config, ...defined }, "<command line>");
}
