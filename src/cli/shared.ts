/**
 * Shared CLI utilities
 */

import { ok, err } from "../lib/result.js";
import { STYLES } from "../templates/index.js";

import type { Result } from "../lib/result.js";
import type { Style } from "../templates/index.js";

/**
 * Where commands write. Commands never print directly so tests can capture
 * their output.
 */
export interface CommandOutput {
  /** Primary output (rendered prompts, styles, variable lists) */
  out(text: string): void;
  /** Diagnostics, warnings and errors */
  error(text: string): void;
  /** Whether to colour diagnostics */
  color: boolean;
}

export const consoleOutput: CommandOutput = {
  out: (text) => {
    console.log(text);
  },
  error: (text) => {
    console.error(text);
  },
  color: Boolean(process.stderr.isTTY),
};

/**
 * Narrow a `--style` option value
 */
export function parseStyleOption(value: string | undefined): Style | undefined {
  return STYLES.find((style) => style === value);
}

/**
 * Read the `--style` option of a command, if given
 */
export function readStyleOption(options: Record<string, unknown>): Result<Style | undefined, Error> {
  const value = options["style"];
  if (value === undefined) {
    return ok(undefined);
  }
  const style = typeof value === "string" ? parseStyleOption(value) : undefined;
  if (style === undefined) {
    return err(new Error(`Invalid style: ${String(value)}. Use: ${STYLES.join(", ")}`));
  }
  return ok(style);
}
