import { describe, expect, it } from "vitest";

import { defaultRunId, resolveDebugFlagFromArgv, toSnakeCase } from "./utils.js";

describe("utils", () => {
  it("derives run ids from UTC time", () => {
    expect(defaultRunId(new Date(Date.UTC(2024, 2, 5, 7, 8, 9)))).toBe("20240305-070809");
  });

  it("converts camelCase keys to snake_case", () => {
    expect(toSnakeCase("formerOwner")).toBe("former_owner");
    expect(toSnakeCase("tick")).toBe("tick");
  });

  it("takes the last debug flag before the argument terminator", () => {
    expect(resolveDebugFlagFromArgv(["node", "turnstile", "run", "p.txt"])).toBeUndefined();
    expect(resolveDebugFlagFromArgv(["node", "turnstile", "--debug", "run"])).toBe(true);
    expect(resolveDebugFlagFromArgv(["--debug", "run", "--no-debug"])).toBe(false);
    expect(resolveDebugFlagFromArgv(["--no-debug", "--", "--debug"])).toBe(false);
  });
});
