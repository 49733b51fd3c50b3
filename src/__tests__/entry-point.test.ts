import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

import { describe, expect, it } from "vitest";

const repoRoot = fileURLToPath(new URL("../../", import.meta.url));

function readPackageBin(): Record<string, string> {
  const manifest: unknown = JSON.parse(fs.readFileSync(path.join(repoRoot, "package.json"), "utf8"));
  if (typeof manifest !== "object" || manifest === null || !("bin" in manifest)) {
    throw new Error("package.json has no bin entry");
  }

  const bin: unknown = manifest.bin;
  if (typeof bin !== "object" || bin === null) {
    throw new Error("package.json bin is not a map");
  }
  return Object.fromEntries(
    Object.entries(bin).filter((entry): entry is [string, string] => typeof entry[1] === "string"),
  );
}

describe("turnstile executable", () => {
  it("points the bin at the compiled entry point", () => {
    expect(readPackageBin()).toEqual({ turnstile: "dist/index.js" });
  });

  it("starts the entry point with a node shebang so the shell hands it to node", () => {
    const source = fs.readFileSync(path.join(repoRoot, "src", "index.ts"), "utf8");

    expect(source.split("\n")[0]).toBe("#!/usr/bin/env node");
  });
});
