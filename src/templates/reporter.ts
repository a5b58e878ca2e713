/**
 * Error reporter.
 *
 * Parsers report into an ErrorReporter instead of throwing so a single pass
 * surfaces every problem it can detect. `formatDiagnostics` turns the
 * collected errors into an editor-style listing with a caret under the
 * offending character.
 */

import chalk from "chalk";

import { LineIndex } from "./errors.js";

import type { ParseError, SourcePosition, TemplateError } from "./errors.js";

export class ErrorReporter {
  private readonly errors: ParseError[] = [];
  private readonly lines: LineIndex;

  constructor(source: string) {
    this.lines = new LineIndex(source);
  }

  /**
   * Resolve an offset into the reporter's source
   */
  at(offset: number): SourcePosition {
    return this.lines.positionAt(offset);
  }

  report(error: ParseError): void {
    this.errors.push(error);
  }

  hasErrors(): boolean {
    return this.errors.length > 0;
  }

  get count(): number {
    return this.errors.length;
  }

  /**
   * Collected errors ordered by offset; errors at the same offset keep the
   * order they were reported in
   */
  collect(): ParseError[] {
    return this.errors
      .map((error, index) => ({ error, index }))
      .sort((a, b) => a.error.offset - b.error.offset || a.index - b.index)
      .map(({ error }) => error);
  }
}

export interface DiagnosticFormatOptions {
  /** Use terminal colors (default: true) */
  color?: boolean;
  /** Name shown in the header line, e.g. a file path */
  label?: string;
}

/**
 * Render errors against their source as a caret listing:
 *
 * ```text
 * prompt.txt:1:7 error[UNBALANCED_BRACE] Unmatched '{' at 1:7
 *   1 | Hello {name
 *     |       ^
 * ```
 */
export function formatDiagnostics(
  source: string,
  errors: readonly TemplateError[],
  options: DiagnosticFormatOptions = {}
): string {
  const useColor = options.color ?? true;
  const paint = (style: (text: string) => string, text: string): string => (useColor ? style(text) : text);
  const lines = source.split(/\r\n|\r|\n/);
  const blocks: string[] = [];

  for (const error of errors) {
    const location = `${options.label ?? "<template>"}:${error.line}:${error.column}`;
    const header = `${paint(chalk.bold, location)} ${paint(chalk.red, `error[${error.code}]`)} ${error.message}`;
    const lineText = lines[error.line - 1] ?? "";
    const gutter = String(error.line);
    const pad = " ".repeat(gutter.length);
    const caret = `${" ".repeat(Math.max(0, error.column - 1))}${paint(chalk.red, "^")}`;
    blocks.push([header, `  ${paint(chalk.gray, gutter)} | ${lineText}`, `  ${pad} | ${caret}`].join("\n"));
  }

  return blocks.join("\n");
}
