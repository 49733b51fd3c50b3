import { declaredResourceIds, type SimulatorConfig } from "../core/config.js";
import { applyConfigOverrides } from "../core/config-loader.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";
import { formatResourceId } from "../core/program.js";
import {
  findUndeclaredReferences,
  loadProgramFile,
  type UndeclaredReference,
} from "../core/program-loader.js";

import type { SimulatorIo } from "./console-io.js";
import { formatProgramListing } from "./report.js";

export type CheckCommandOptions = {
  resources?: number;
};

export type CheckCommandResult = {
  programCount: number;
  warnings: UndeclaredReference[];
};

type CheckOutput = Pick<SimulatorIo, "note">;

const consoleOutput: CheckOutput = { note: (message) => console.log(message) };

/** Validates a program file without running it. Undeclared resources are warnings. */
export async function checkCommand(
  programsPath: string,
  config: SimulatorConfig,
  opts: CheckCommandOptions,
  output: CheckOutput = consoleOutput,
): Promise<CheckCommandResult> {
  try {
    const merged = applyConfigOverrides(config, { resources: opts.resources });
    const { programs, source } = await loadProgramFile(programsPath);
    const declared = declaredResourceIds(merged);
    const warnings = findUndeclaredReferences(programs, declared);

    output.note(`${source}: ${programs.length} program(s), resources R0-R${merged.resources - 1}.`);
    for (const line of formatProgramListing(programs)) {
      output.note(line);
    }
    for (const warning of warnings) {
      output.note(
        `Warning: ${warning.programId} requests undeclared resource ${formatResourceId(warning.resourceId)}; it will abort when it gets there.`,
      );
    }

    return { programCount: programs.length, warnings };
  } catch (error) {
    if (error instanceof UserFacingError) {
      throw error;
    }
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.unknown,
      title: "Check command failed.",
      message: formatErrorMessage(error),
      cause: error,
    });
  }
}
