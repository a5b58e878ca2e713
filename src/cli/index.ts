#!/usr/bin/env node
/**
 * promptloom CLI entry point
 *
 * Commands:
 * - detect    - Print the placeholder style of a template
 * - check     - Report syntax errors in template files
 * - render    - Render a template against a context file
 * - variables - List the variables a template reads
 */

import { logger } from "../lib/index.js";

import { createProgram } from "./program.js";

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    logger.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
