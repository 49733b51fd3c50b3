import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";

import { buildCli, parseIdList, parsePositiveInt } from "./index.js";

describe("cli argument parsers", () => {
  it("accepts positive integers only", () => {
    expect(parsePositiveInt("3")).toBe(3);
    expect(() => parsePositiveInt("0")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("2.5")).toThrow(InvalidArgumentError);
    expect(() => parsePositiveInt("x")).toThrow('Expected a positive integer, received "x".');
  });

  it("parses release lists with or without the R prefix", () => {
    expect(parseIdList("1, R2,r3")).toEqual([1, 2, 3]);
    expect(() => parseIdList("1,two")).toThrow(InvalidArgumentError);
    expect(() => parseIdList(" , ")).toThrow(InvalidArgumentError);
  });
});

describe("buildCli", () => {
  it("registers the run and check commands", () => {
    const program = buildCli();

    expect(program.name()).toBe("turnstile");
    expect(program.commands.map((command) => command.name())).toEqual(["run", "check"]);
  });
});
