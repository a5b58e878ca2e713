/**
 * Render command - Render a template file against a context file
 */

import { logger } from "../../lib/index.js";
import { loadContext, readTextFile } from "../../prompts/index.js";
import { formatDiagnostics, parse, renderWithReport } from "../../templates/index.js";
import { loadConfig } from "../config.js";
import {
  formatError,
  formatMissingWarnings,
  formatRenderJson,
  isValidOutputFormat,
  type OutputFormat,
} from "../formatters.js";
import { consoleOutput, readStyleOption } from "../shared.js";

import type { Command } from "commander";
import type { Context, RenderOptions, Style } from "../../templates/index.js";
import type { Config } from "../config.js";
import type { CommandOutput } from "../shared.js";

export interface RenderCommandOptions {
  /** YAML or JSON file holding the render context */
  context?: string;
  /** Substitute "" for missing variables */
  lenient?: boolean;
  /** HTML-escape substituted values */
  escape?: boolean;
  format?: OutputFormat;
  style?: Style;
  /** Defaults from config files and environment */
  config?: Config;
}

/**
 * Flags win over configuration; configuration wins over built-in defaults
 */
export function resolveRenderOptions(options: RenderCommandOptions): RenderOptions {
  const config = options.config ?? {};
  return {
    missingVariablePolicy: options.lenient ? "lenient" : (config.missingVariablePolicy ?? "strict"),
    escapeOutput: options.escape === true || config.escapeOutput === true,
  };
}

export async function runRender(
  file: string,
  options: RenderCommandOptions = {},
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

  let context: Context = {};
  if (options.context !== undefined) {
    const loaded = await loadContext(options.context);
    if (!loaded.success) {
      output.error(formatError(loaded.error, output.color));
      return 1;
    }
    context = loaded.data;
  }

  const renderOptions = resolveRenderOptions(options);
  logger.debug(
    `Rendering ${file} as ${parsed.data.style} (missing variables: ${renderOptions.missingVariablePolicy ?? "strict"}, escape: ${String(renderOptions.escapeOutput)})`
  );

  const rendered = renderWithReport(parsed.data, context, renderOptions);
  if (!rendered.success) {
    output.error(formatDiagnostics(source.data, [rendered.error], { color: output.color, label: file }));
    return 1;
  }

  if ((options.format ?? "text") === "json") {
    output.out(formatRenderJson(file, rendered.data));
    return 0;
  }

  for (const warning of formatMissingWarnings(rendered.data.missing, file, output.color)) {
    output.error(warning);
  }
  output.out(rendered.data.output);
  return 0;
}

export function registerRenderCommand(program: Command, output: CommandOutput = consoleOutput): void {
  program
    .command("render <file>")
    .description("Render a template with variables from a YAML or JSON context file")
    .option("-c, --context <file>", "Context file (YAML or JSON)")
    .option("--lenient", "Render missing variables as empty text instead of failing")
    .option("--escape", "HTML-escape substituted values")
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

      const config = loadConfig();
      if (!config.success) {
        output.error(formatError(config.error, output.color));
        process.exitCode = 1;
        return;
      }

      process.exitCode = await runRender(
        file,
        {
          context: typeof options["context"] === "string" ? options["context"] : undefined,
          lenient: options["lenient"] === true,
          escape: options["escape"] === true,
          format,
          style: style.data,
          config: config.data,
        },
        output
      );
    });
}
