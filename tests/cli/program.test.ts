import { describe, it, expect, beforeAll, afterAll, afterEach } from "vitest";

import { createProgram } from "@/cli/program.js";
import { VERSION } from "@/version.js";
import { captureOutput, createTempDir, type TempDir } from "@tests/fixtures/output.js";

describe("createProgram", () => {
  let dir: TempDir;

  beforeAll(async () => {
    dir = await createTempDir();
  });

  afterAll(async () => {
    await dir.remove();
  });

  afterEach(() => {
    process.exitCode = undefined;
  });

  it("registers every command", () => {
    const program = createProgram(captureOutput());
    expect(program.name()).toBe("promptloom");
    expect(program.version()).toBe(VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(["detect", "check", "render", "variables"]);
  });

  it("runs a command through the parser", async () => {
    const file = await dir.write("prompt.txt", "Hi {{name}}");
    const output = captureOutput();

    await createProgram(output).parseAsync(["node", "promptloom", "detect", file]);
    expect(output.stdout).toEqual(["mustache"]);
    expect(process.exitCode).toBe(0);
  });

  it("rejects an unknown style", async () => {
    const file = await dir.write("vars.txt", "{a}");
    const output = captureOutput();

    await createProgram(output).parseAsync(["node", "promptloom", "variables", file, "--style", "jinja"]);
    expect(output.stdout).toEqual([]);
    expect(output.stderr).toEqual(["Error: Invalid style: jinja. Use: fmt-string, mustache, literal"]);
    expect(process.exitCode).toBe(1);
  });

  it("rejects an unknown output format", async () => {
    const file = await dir.write("render.txt", "plain");
    const output = captureOutput();

    await createProgram(output).parseAsync(["node", "promptloom", "render", file, "--output", "xml"]);
    expect(output.stderr).toEqual(["Error: Invalid output format: xml. Use: text, json"]);
    expect(process.exitCode).toBe(1);
  });
});
