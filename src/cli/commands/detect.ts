/**
 * Detect command - Print the placeholder style of a template file
 */

import { logger } from "../../lib/index.js";
import { readTextFile } from "../../prompts/index.js";
import { detectStyle, formatDiagnostics, scanSignals } from "../../templates/index.js";
import { formatError, formatStyle } from "../formatters.js";
import { consoleOutput } from "../shared.js";

import type { Command } from "commander";
import type { CommandOutput } from "../shared.js";

export async function runDetect(file: string, output: CommandOutput = consoleOutput): Promise<number> {
  const source = await readTextFile(file);
  if (!source.success) {
    output.error(formatError(source.error, output.color));
    return 1;
  }

  const signals = scanSignals(source.data);
  logger.debug(`First FmtString signal: ${signals.fmtString ?? "none"}, first Mustache signal: ${signals.mustache ?? "none"}`);

  const style = detectStyle(source.data);
  if (!style.success) {
    output.error(formatDiagnostics(source.data, [style.error], { color: output.color, label: file }));
    return 1;
  }

  output.out(formatStyle(style.data, output.color));
  return 0;
}

export function registerDetectCommand(program: Command, output: CommandOutput = consoleOutput): void {
  program
    .command("detect <file>")
    .description("Print the placeholder style of a template: fmt-string, mustache or literal")
    .action(async (file: string) => {
      process.exitCode = await runDetect(file, output);
    });
}
