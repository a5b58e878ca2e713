import { Command } from "commander";

import { logger } from "../lib/index.js";
import { VERSION } from "../version.js";

import { registerCheckCommand } from "./commands/check.js";
import { registerDetectCommand } from "./commands/detect.js";
import { registerRenderCommand } from "./commands/render.js";
import { registerVariablesCommand } from "./commands/variables.js";
import { loadConfig } from "./config.js";
import { formatWarning } from "./formatters.js";
import { consoleOutput } from "./shared.js";

import type { CommandOutput } from "./shared.js";

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Build the promptloom command tree
 */
export function createProgram(output: CommandOutput = consoleOutput): Command {
  const program = new Command();

  program
    .name("promptloom")
    .description("Parse, check and render FmtString and Mustache prompt templates")
    .version(VERSION)
    .option("-v, --verbose", "Verbose output")
    .option("-q, --quiet", "Quiet mode (errors only)");

  program.hook("preAction", () => {
    const config = loadConfig();
    if (config.success && config.data.logLevel !== undefined) {
      logger.configure({ level: config.data.logLevel });
    } else if (!config.success) {
      output.error(formatWarning(config.error.message, output.color));
    }

    const options = program.opts<GlobalOptions>();
    if (options.quiet) {
      logger.configure({ level: "error" });
    } else if (options.verbose) {
      logger.configure({ level: "debug" });
    }
  });

  registerDetectCommand(program, output);
  registerCheckCommand(program, output);
  registerRenderCommand(program, output);
  registerVariablesCommand(program, output);

  return program;
}
