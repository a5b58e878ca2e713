/**
 * Template parsing entry point.
 *
 * raw source → style detection → FmtString parser | Mustache parser |
 * literal pass-through → frozen Template
 *
 * Parsing is total: every input yields either a Template or a non-empty,
 * offset-ordered list of errors.
 */

import { ok, err } from "../lib/result.js";

import { detectStyle } from "./detector.js";
import { UnbalancedBraceError } from "./errors.js";
import { parseFmtString } from "./fmt-parser.js";
import { parseMustache } from "./mustache-parser.js";
import { ErrorReporter } from "./reporter.js";

import type { Result } from "../lib/result.js";
import type { ParseError } from "./errors.js";
import type { TagScanner } from "./mustache-scanner.js";
import type { Style, Template, TemplateNode } from "./types.js";

export interface ParseOptions {
  /**
   * Skip detection and read the source in this style. Lets `{{literal}}`
   * be read as an escaped FmtString instead of a Mustache variable.
   */
  style?: Style;
  /** Tag scanner used for Mustache sources */
  scanner?: TagScanner;
}

function parseLiteral(source: string): TemplateNode[] {
  if (source.length === 0) {
    return [];
  }
  return [{ type: "literal", text: source, raw: source, start: 0, end: source.length }];
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

function parseStyle(source: string, style: Style, reporter: ErrorReporter, options: ParseOptions): TemplateNode[] {
  switch (style) {
    case "fmt-string":
      return parseFmtString(source, reporter);
    case "mustache":
      return parseMustache(source, reporter, options.scanner);
    case "literal":
      return parseLiteral(source);
  }
}

/**
 * Parse a template source
 *
 * @example
 * ```typescript
 * const parsed = parse("Hello, {name}!");
 * if (!parsed.success) {
 *   console.error(formatDiagnostics(source, parsed.error));
 * }
 * ```
 */
export function parse(source: string, options: ParseOptions = {}): Result<Template, ParseError[]> {
  const reporter = new ErrorReporter(source);
  let style = options.style;

  if (style === undefined) {
    const detected = detectStyle(source);
    if (!detected.success) {
      reporter.report(detected.error);
      // Brace problems are still worth reporting next to the conflict.
      const braceCheck = new ErrorReporter(source);
      parseFmtString(source, braceCheck);
      for (const error of braceCheck.collect()) {
        if (error instanceof UnbalancedBraceError) {
          reporter.report(error);
        }
      }
      return err(reporter.collect());
    }
    style = detected.data;
  }

  const root = parseStyle(source, style, reporter, options);
  if (reporter.hasErrors()) {
    return err(reporter.collect());
  }

  const template: Template = { rawSource: source, style, root };
  return ok(deepFreeze(template));
}
