import chalk from "chalk";

import type { MissingVariable, RenderReport, Style } from "../templates/index.js";

/**
 * Output format types
 */
export type OutputFormat = "text" | "json";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "json"];

/**
 * Validate output format string
 */
export function isValidOutputFormat(format: string): format is OutputFormat {
  return OUTPUT_FORMATS.some((known) => known === format);
}

function paint(color: boolean, style: (text: string) => string, text: string): string {
  return color ? style(text) : text;
}

/**
 * Style colors for terminal output
 */
const STYLE_COLORS: Record<Style, (text: string) => string> = {
  "fmt-string": chalk.cyan,
  mustache: chalk.magenta,
  literal: chalk.gray,
};

export function formatStyle(style: Style, color = true): string {
  return paint(color, STYLE_COLORS[style], style);
}

/**
 * Format an error for terminal output
 */
export function formatError(error: Error, color = true): string {
  return paint(color, chalk.red, `Error: ${error.message}`);
}

/**
 * Format a warning for terminal output
 */
export function formatWarning(message: string, color = true): string {
  return paint(color, chalk.yellow, `Warning: ${message}`);
}

/**
 * Format a success message for terminal output
 */
export function formatSuccess(message: string, color = true): string {
  return paint(color, chalk.green, `✓ ${message}`);
}

/**
 * One warning line per variable that rendered as "" under the lenient policy
 */
export function formatMissingWarnings(missing: readonly MissingVariable[], label: string, color = true): string[] {
  return missing.map((entry) =>
    formatWarning(`${label}:${entry.line}:${entry.column} variable '${entry.name}' is missing and was left empty`, color)
  );
}

/**
 * Machine-readable render result
 */
export function formatRenderJson(file: string, report: RenderReport): string {
  return JSON.stringify(
    {
      file,
      output: report.output,
      missing: report.missing,
    },
    null,
    2
  );
}
