/**
 * Template Module
 *
 * Parses, validates and renders prompt templates written in one of two
 * placeholder styles:
 * - FmtString: `Hello, {name}!`, `{price:.2f}`, `{tone|friendly}`, `{{` for a literal brace
 * - Mustache: `{{name}}`, `{{{raw}}}`, `{{#items}}{{.}}{{/items}}`, `{{^items}}none{{/items}}`
 *
 * @example
 * ```typescript
 * import { parse, render } from "promptloom";
 *
 * const parsed = parse("{{#items}}{{.}},{{/items}}");
 * if (parsed.success) {
 *   const result = render(parsed.data, { items: ["a", "b"] });
 *   // result.data === "a,b,"
 * }
 * ```
 */

export { detectStyle, scanSignals, type StyleSignals } from "./detector.js";
export { parse, type ParseOptions } from "./parser.js";
export {
  render,
  renderWithReport,
  TemplateRenderer,
  createRenderer,
  type MissingVariablePolicy,
  type MissingVariable,
  type RenderOptions,
  type RenderReport,
} from "./renderer.js";
export { toSource, inputVariables } from "./source.js";
export {
  ErrorReporter,
  formatDiagnostics,
  type DiagnosticFormatOptions,
} from "./reporter.js";
export {
  TemplateError,
  UnbalancedBraceError,
  EmptyPlaceholderError,
  InvalidPlaceholderError,
  MixedFormatError,
  UnclosedSectionError,
  SectionMismatchError,
  MissingVariableError,
  TypeCoercionError,
  FormatSpecError,
  positionAt,
  LineIndex,
  type TemplateErrorKind,
  type SourcePosition,
  type ParseError,
  type RenderError,
  type AnyTemplateError,
} from "./errors.js";
export {
  MustacheEngineScanner,
  defaultTagScanner,
  type TagScanner,
  type RawToken,
  type TagToken,
  type TextToken,
  type StrayOpenToken,
  type TagSigil,
} from "./mustache-scanner.js";
export { parseFormatSpec, applyFormatSpec, type FormatSpec } from "./format-spec.js";
export {
  ValueSchema,
  ContextSchema,
  validateContext,
  isTruthy,
  isValueMap,
  coerceScalar,
  kindOf,
  type ValueKind,
} from "./value.js";
export {
  STYLES,
  type Style,
  type Span,
  type Template,
  type TemplateNode,
  type LiteralNode,
  type PlaceholderNode,
  type VariableNode,
  type SectionNode,
  type Context,
  type Value,
  type ValueMap,
} from "./types.js";
