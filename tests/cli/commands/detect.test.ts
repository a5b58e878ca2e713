import { describe, it, expect, beforeAll, afterAll } from "vitest";

import { runDetect } from "@/cli/commands/detect.js";
import { captureOutput, createTempDir, type TempDir } from "@tests/fixtures/output.js";

describe("detect command", () => {
  let dir: TempDir;

  beforeAll(async () => {
    dir = await createTempDir();
  });

  afterAll(async () => {
    await dir.remove();
  });

  it.each([
    ["fmt.txt", "Hello, {name}!", "fmt-string"],
    ["mustache.txt", "Hello, {{name}}!", "mustache"],
    ["literal.txt", "Hello, world.", "literal"],
    ["escaped.txt", "Use {{ and }} for braces", "fmt-string"],
  ])("prints the style of %s", async (name, content, style) => {
    const file = await dir.write(name, content);
    const output = captureOutput();

    expect(await runDetect(file, output)).toBe(0);
    expect(output.stdout).toEqual([style]);
    expect(output.stderr).toEqual([]);
  });

  it("reports mixed placeholder styles", async () => {
    const file = await dir.write("mixed.txt", "{a} {{b}}");
    const output = captureOutput();

    expect(await runDetect(file, output)).toBe(1);
    expect(output.stdout).toEqual([]);
    expect(output.stderr).toEqual([
      [
        `${file}:1:5 error[MIXED_FORMAT] Template mixes FmtString (offset 0) and Mustache (offset 4) placeholders at 1:5`,
        "  1 | {a} {{b}}",
        "    |     ^",
      ].join("\n"),
    ]);
  });

  it("reports a file it cannot read", async () => {
    const output = captureOutput();
    const missing = `${dir.path}/missing.txt`;

    expect(await runDetect(missing, output)).toBe(1);
    expect(output.stderr).toEqual([`Error: Failed to read file: ${missing}`]);
  });
});
