import path from "node:path";

import type { SimulatorConfig } from "../core/config.js";
import { loadSimulatorConfig } from "../core/config-loader.js";
import { defaultConfigPath } from "../core/paths.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// An explicit --config path must exist; otherwise turnstile.yaml in the
// working directory is used when present, and the defaults when not.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export function loadConfigForCli(args: LoadConfigForCliArgs = {}): {
  config: SimulatorConfig;
  configPath: string;
} {
  const cwd = args.cwd ?? process.cwd();
  const configPath = args.explicitConfigPath
    ? path.resolve(cwd, args.explicitConfigPath)
    : defaultConfigPath(cwd);

  const config = loadSimulatorConfig(configPath, { required: Boolean(args.explicitConfigPath) });
  return { config, configPath };
}
