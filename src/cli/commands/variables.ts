/**
 * Variables command - List the variables a template reads
 */

import { readTextFile } from "../../prompts/index.js";
import { formatDiagnostics, inputVariables, parse } from "../../templates/index.js";
import { formatError, isValidOutputFormat, type OutputFormat } from "../formatters.js";
import { consoleOutput, readStyleOption } from "../shared.js";

import type { Command } from "commander";
import type { Style } from "../../templates/index.js";
import type { CommandOutput } from "../shared.js";

export interface VariablesCommandOptions {
  format?: OutputFormat;
  style?: Style;
}

export async function runVariables(
  file: string,
  options: VariablesCommandOptions = {},
  output: CommandOutput = consoleOutput
): Promise<number> {
  const source = await readTextFile(file);
  if (!source.success) {
    output.error(formatError(source.error, output.color));
    return 1;
  }

  const parsed = parse(source.data, { style: options.style });
  if (!parsed.success) {
    output.error(formatDiagnostics(source.data, parsed.error, { color: output.color, label: file }));
    return 1;
  }

  const names = inputVariables(parsed.data);
  if ((options.format ?? "text") === "json") {
    output.out(JSON.stringify(names));
  } else if (names.length > 0) {
    output.out(names.join("\n"));
  }
  return 0;
}

export function registerVariablesCommand(program: Command, output: CommandOutput = consoleOutput): void {
  program
    .command("variables <file>")
    .description("List the variables a template reads, in order of first use")
    .option("-s, --style <style>", "Read the template in this style: fmt-string, mustache, literal")
    .option("-o, --output <format>", "Output format: text, json", "text")
    .action(async (file: string, options: Record<string, unknown>) => {
      const format = String(options["output"] ?? "text");
      if (!isValidOutputFormat(format)) {
        output.error(formatError(new Error(`Invalid output format: ${format}. Use: text, json`), output.color));
        process.exitCode = 1;
        return;
      }

      const style = readStyleOption(options);
      if (!style.success) {
        output.error(formatError(style.error, output.color));
        process.exitCode = 1;
        return;
      }

      process.exitCode = await runVariables(file, { format, style: style.data }, output);
    });
}
