/**
 * Check command - Parse template files and report every diagnostic
 */

import { logger } from "../../lib/index.js";
import { readTextFile } from "../../prompts/index.js";
import { formatDiagnostics, parse } from "../../templates/index.js";
import { formatError, formatStyle, formatSuccess } from "../formatters.js";
import { consoleOutput, readStyleOption } from "../shared.js";

import type { Command } from "commander";
import type { Style } from "../../templates/index.js";
import type { CommandOutput } from "../shared.js";

export interface CheckCommandOptions {
  style?: Style;
}

/**
 * Returns 0 when every file parses, 1 otherwise
 */
export async function runCheck(
  files: readonly string[],
  options: CheckCommandOptions = {},
  output: CommandOutput = consoleOutput
): Promise<number> {
  let errorCount = 0;
  let failedFiles = 0;

  for (const file of files) {
    const source = await readTextFile(file);
    if (!source.success) {
      output.error(formatError(source.error, output.color));
      errorCount++;
      failedFiles++;
      continue;
    }

    const parsed = parse(source.data, { style: options.style });
    if (!parsed.success) {
      output.error(formatDiagnostics(source.data, parsed.error, { color: output.color, label: file }));
      errorCount += parsed.error.length;
      failedFiles++;
      continue;
    }

    logger.debug(`${file}: ${parsed.data.root.length} top-level node(s)`);
    output.out(formatSuccess(`${file} (${formatStyle(parsed.data.style, output.color)})`, output.color));
  }

  if (failedFiles > 0) {
    output.error(
      formatError(new Error(`${errorCount} error(s) in ${failedFiles} of ${files.length} file(s)`), output.color)
    );
    return 1;
  }
  return 0;
}

export function registerCheckCommand(program: Command, output: CommandOutput = consoleOutput): void {
  program
    .command("check <files...>")
    .description("Parse template files and report syntax errors")
    .option("-s, --style <style>", "Read every file in this style: fmt-string, mustache, literal")
    .action(async (files: string[], options: Record<string, unknown>) => {
      const style = readStyleOption(options);
      if (!style.success) {
        output.error(formatError(style.error, output.color));
        process.exitCode = 1;
        return;
      }
      process.exitCode = await runCheck(files, { style: style.data }, output);
    });
}
