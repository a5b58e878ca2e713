/**
 * Template error taxonomy.
 *
 * Every parse-time and render-time failure is one of the classes below. They
 * share a `kind` discriminant, a stable `code`, and the position of the
 * offending character in the template source.
 */

import { LoomError } from "../lib/errors.js";

export type TemplateErrorKind =
  | "UnbalancedBrace"
  | "EmptyPlaceholder"
  | "InvalidPlaceholder"
  | "MixedFormat"
  | "UnclosedSection"
  | "SectionMismatch"
  | "MissingVariable"
  | "TypeCoercion"
  | "FormatSpec";

/**
 * Location in a template source. `offset` counts UTF-16 code units from the
 * start of the source; `line` and `column` are 1-based.
 */
export interface SourcePosition {
  offset: number;
  line: number;
  column: number;
}

/**
 * Offsets at which each line of `source` begins. `\r\n` counts as a single
 * line break; a lone `\r` is a break of its own.
 */
function lineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    const ch = source.charCodeAt(i);
    if (ch === 10 || (ch === 13 && source.charCodeAt(i + 1) !== 10)) {
      starts.push(i + 1);
    }
  }
  return starts;
}

/**
 * Resolves offsets of one source to positions. The line table is built on
 * the first lookup; each lookup after that is a binary search.
 */
export class LineIndex {
  private starts: number[] | null = null;

  constructor(private readonly source: string) {}

  positionAt(offset: number): SourcePosition {
    const clamped = Math.max(0, Math.min(offset, this.source.length));
    this.starts ??= lineStarts(this.source);
    const starts = this.starts;

    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if ((starts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { offset: clamped, line: low + 1, column: clamped - (starts[low] ?? 0) + 1 };
  }
}

/**
 * Derive line and column for an offset into `source`. Offsets past the end
 * are clamped. Callers resolving many offsets of one source should keep a
 * LineIndex instead.
 */
export function positionAt(source: string, offset: number): SourcePosition {
  return new LineIndex(source).positionAt(offset);
}

/**
 * Base class for every template diagnostic
 */
export abstract class TemplateError extends LoomError {
  abstract readonly kind: TemplateErrorKind;
  readonly offset: number;
  readonly line: number;
  readonly column: number;

  protected constructor(
    description: string,
    code: string,
    position: SourcePosition,
    context?: Record<string, unknown>
  ) {
    super(`${description} at ${position.line}:${position.column}`, code, context);
    this.name = "TemplateError";
    this.offset = position.offset;
    this.line = position.line;
    this.column = position.column;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      offset: this.offset,
      line: this.line,
      column: this.column,
    };
  }
}

/**
 * A `{` without its `}`, or a stray `}`
 */
export class UnbalancedBraceError extends TemplateError {
  readonly kind = "UnbalancedBrace";

  constructor(
    position: SourcePosition,
    public readonly brace: "{" | "}"
  ) {
    super(`Unmatched '${brace}'`, "UNBALANCED_BRACE", position, { brace });
    this.name = "UnbalancedBraceError";
  }
}

/**
 * `{}` or `{{}}`
 */
export class EmptyPlaceholderError extends TemplateError {
  readonly kind = "EmptyPlaceholder";

  constructor(position: SourcePosition) {
    super("Placeholder has no name", "EMPTY_PLACEHOLDER", position);
    this.name = "EmptyPlaceholderError";
  }
}

/**
 * `{first name}`, `{1st}`: a placeholder whose name is not an identifier
 */
export class InvalidPlaceholderError extends TemplateError {
  readonly kind = "InvalidPlaceholder";

  constructor(
    position: SourcePosition,
    public readonly content: string
  ) {
    super(`Invalid placeholder name '${content}'`, "INVALID_PLACEHOLDER", position, { content });
    this.name = "InvalidPlaceholderError";
  }
}

/**
 * Both FmtString and Mustache delimiters appear in one source
 */
export class MixedFormatError extends TemplateError {
  readonly kind = "MixedFormat";

  constructor(
    position: SourcePosition,
    public readonly fmtStringOffset: number,
    public readonly mustacheOffset: number
  ) {
    super(
      `Template mixes FmtString (offset ${fmtStringOffset}) and Mustache (offset ${mustacheOffset}) placeholders`,
      "MIXED_FORMAT",
      position,
      { fmtStringOffset, mustacheOffset }
    );
    this.name = "MixedFormatError";
  }
}

export class UnclosedSectionError extends TemplateError {
  readonly kind = "UnclosedSection";

  constructor(
    position: SourcePosition,
    public readonly section: string
  ) {
    super(`Section '${section}' is never closed`, "UNCLOSED_SECTION", position, { section });
    this.name = "UnclosedSectionError";
  }
}

/**
 * A closing tag that does not name the innermost open section. `expected`
 * is null when no section is open.
 */
export class SectionMismatchError extends TemplateError {
  readonly kind = "SectionMismatch";

  constructor(
    position: SourcePosition,
    public readonly expected: string | null,
    public readonly found: string
  ) {
    super(
      expected === null
        ? `Closing tag '${found}' has no open section`
        : `Expected closing tag for '${expected}' but found '${found}'`,
      "SECTION_MISMATCH",
      position,
      { expected, found }
    );
    this.name = "SectionMismatchError";
  }
}

export class MissingVariableError extends TemplateError {
  readonly kind = "MissingVariable";

  constructor(
    position: SourcePosition,
    public readonly variable: string
  ) {
    super(`Missing variable '${variable}'`, "MISSING_VARIABLE", position, { variable });
    this.name = "MissingVariableError";
  }
}

/**
 * A list or map bound to a scalar substitution point
 */
export class TypeCoercionError extends TemplateError {
  readonly kind = "TypeCoercion";

  constructor(
    position: SourcePosition,
    public readonly variable: string,
    public readonly valueType: "list" | "map"
  ) {
    super(
      `Variable '${variable}' is a ${valueType} and cannot be substituted as text`,
      "TYPE_COERCION",
      position,
      { variable, valueType }
    );
    this.name = "TypeCoercionError";
  }
}

export class FormatSpecError extends TemplateError {
  readonly kind = "FormatSpec";

  constructor(
    position: SourcePosition,
    public readonly spec: string,
    public readonly reason: string
  ) {
    super(`Format spec '${spec}' ${reason}`, "FORMAT_SPEC", position, { spec, reason });
    this.name = "FormatSpecError";
  }
}

export type ParseError =
  | UnbalancedBraceError
  | EmptyPlaceholderError
  | InvalidPlaceholderError
  | MixedFormatError
  | UnclosedSectionError
  | SectionMismatchError;

export type RenderError = MissingVariableError | TypeCoercionError | FormatSpecError;

export type AnyTemplateError = ParseError | RenderError;
