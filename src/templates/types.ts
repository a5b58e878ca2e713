/**
 * Core data model shared by the detector, both parsers and the renderer.
 */

/**
 * Placeholder syntax a template was written in. `literal` means no
 * placeholder delimiters were found; such a template renders to itself.
 */
export type Style = "fmt-string" | "mustache" | "literal";

export const STYLES: readonly Style[] = ["fmt-string", "mustache", "literal"];

/**
 * Half-open source range `[start, end)` in UTF-16 code units.
 */
export interface Span {
  start: number;
  end: number;
}

/**
 * Text emitted verbatim. `raw` is the source text the run was read from,
 * which differs from `text` for escaped braces (`{{` reads as `{`).
 */
export interface LiteralNode extends Span {
  type: "literal";
  text: string;
  raw: string;
}

/**
 * FmtString substitution point: `{name}`, `{name:spec}`, `{name|default}`.
 */
export interface PlaceholderNode extends Span {
  type: "placeholder";
  name: string;
  formatSpec?: string;
  defaultValue?: string;
  raw: string;
}

/**
 * Mustache scalar substitution point. `escaped` is false for `{{{name}}}`
 * and `{{&name}}`.
 */
export interface VariableNode extends Span {
  type: "variable";
  name: string;
  escaped: boolean;
  raw: string;
}

/**
 * Mustache block, `{{#name}}…{{/name}}` or `{{^name}}…{{/name}}`.
 */
export interface SectionNode extends Span {
  type: "section";
  name: string;
  inverted: boolean;
  body: readonly TemplateNode[];
  openTag: string;
  closeTag: string;
}

export type TemplateNode = LiteralNode | PlaceholderNode | VariableNode | SectionNode;

/**
 * Immutable, validated template. Only ever produced by a successful parse.
 */
export interface Template {
  readonly rawSource: string;
  readonly style: Style;
  readonly root: readonly TemplateNode[];
}

/**
 * JSON-compatible context value.
 */
export type Value = string | number | boolean | null | Value[] | ValueMap;

export interface ValueMap {
  [key: string]: Value;
}

/**
 * Variables supplied to a single render call.
 */
export type Context = ValueMap;
