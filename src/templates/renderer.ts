import Mustache from "mustache";

import { ok, err, map } from "../lib/result.js";

import {
  FormatSpecError,
  MissingVariableError,
  LineIndex,
  TypeCoercionError,
} from "./errors.js";
import { applyFormatSpec, parseFormatSpec } from "./format-spec.js";
import { coerceScalar, isTruthy, isValueMap } from "./value.js";

import type { Result } from "../lib/result.js";
import type { RenderError, SourcePosition } from "./errors.js";
import type {
  Context,
  PlaceholderNode,
  SectionNode,
  Template,
  TemplateNode,
  Value,
  VariableNode,
} from "./types.js";

/**
 * What to do when a placeholder names a variable the context lacks
 */
export type MissingVariablePolicy = "strict" | "lenient";

/**
 * Options for rendering a template
 */
export interface RenderOptions {
  /** strict (default) fails on a missing variable, lenient substitutes "" */
  missingVariablePolicy?: MissingVariablePolicy;
  /** Escape substituted text; raw `{{{name}}}` variables are never escaped */
  escapeOutput?: boolean;
  /** Escaping function used when escapeOutput is on (default: HTML escaping) */
  escapeFunction?: (text: string) => string;
}

/**
 * A variable that was missing under the lenient policy
 */
export interface MissingVariable extends SourcePosition {
  name: string;
}

/**
 * Result of rendering a template
 */
export interface RenderReport {
  /** Rendered output */
  output: string;
  /** Variables substituted as "" under the lenient policy, in source order */
  missing: MissingVariable[];
}

const htmlEscape = (text: string): string => Mustache.escape(text);

type Lookup = { found: true; value: Value } | { found: false };

/**
 * Resolve a name against the scope stack, innermost scope first. `.` is the
 * innermost scope itself; `a.b.c` resolves `a` through the scopes and then
 * walks into nested maps.
 */
function lookup(name: string, scopes: readonly Value[]): Lookup {
  if (name === ".") {
    const innermost = scopes[scopes.length - 1];
    return innermost === undefined ? { found: false } : { found: true, value: innermost };
  }

  const [head = "", ...path] = name.split(".");
  for (let i = scopes.length - 1; i >= 0; i--) {
    const scope = scopes[i];
    if (scope === undefined || !isValueMap(scope) || !Object.hasOwn(scope, head)) {
      continue;
    }
    let value = scope[head];
    for (const key of path) {
      if (value === undefined || !isValueMap(value) || !Object.hasOwn(value, key)) {
        return { found: false };
      }
      value = value[key];
    }
    return value === undefined ? { found: false } : { found: true, value };
  }
  return { found: false };
}

/**
 * State of a single render call. Nothing here outlives the call, so a
 * Template can be rendered concurrently with different contexts.
 */
class RenderPass {
  private readonly parts: string[] = [];
  readonly missing: MissingVariable[] = [];
  private readonly escape: (text: string) => string;
  private readonly policy: MissingVariablePolicy;
  private readonly lines: LineIndex;

  constructor(
    template: Template,
    options: RenderOptions
  ) {
    this.lines = new LineIndex(template.rawSource);
    this.policy = options.missingVariablePolicy ?? "strict";
    this.escape = options.escapeOutput ? (options.escapeFunction ?? htmlEscape) : (text) => text;
  }

  get output(): string {
    return this.parts.join("");
  }

  /**
   * Render nodes in order; stops at the first error
   */
  renderNodes(nodes: readonly TemplateNode[], scopes: readonly Value[]): RenderError | null {
    for (const node of nodes) {
      const error = this.renderNode(node, scopes);
      if (error) {
        return error;
      }
    }
    return null;
  }

  private renderNode(node: TemplateNode, scopes: readonly Value[]): RenderError | null {
    switch (node.type) {
      case "literal":
        this.parts.push(node.text);
        return null;
      case "placeholder":
        return this.renderPlaceholder(node, scopes);
      case "variable":
        return this.renderVariable(node, scopes);
      case "section":
        return this.renderSection(node, scopes);
    }
  }

  private position(node: TemplateNode): SourcePosition {
    return this.lines.positionAt(node.start);
  }

  /**
   * Applies the missing-variable policy. Returns an error under strict.
   */
  private miss(node: PlaceholderNode | VariableNode): RenderError | null {
    const position = this.position(node);
    if (this.policy === "strict") {
      return new MissingVariableError(position, node.name);
    }
    this.missing.push({ name: node.name, ...position });
    return null;
  }

  private renderPlaceholder(node: PlaceholderNode, scopes: readonly Value[]): RenderError | null {
    const resolved = lookup(node.name, scopes);
    let value: Value;
    if (resolved.found) {
      value = resolved.value;
    } else if (node.defaultValue !== undefined) {
      value = node.defaultValue;
    } else {
      return this.miss(node);
    }

    const scalar = coerceScalar(value);
    if (!scalar.success) {
      return new TypeCoercionError(this.position(node), node.name, scalar.kind);
    }

    let text = scalar.text;
    if (node.formatSpec !== undefined) {
      const spec = parseFormatSpec(node.formatSpec);
      if (!spec) {
        return new FormatSpecError(this.position(node), node.formatSpec, "is not recognised");
      }
      const formatted = applyFormatSpec(value, spec);
      if (!formatted.success) {
        return new FormatSpecError(this.position(node), node.formatSpec, formatted.reason);
      }
      text = formatted.text;
    }

    this.parts.push(this.escape(text));
    return null;
  }

  private renderVariable(node: VariableNode, scopes: readonly Value[]): RenderError | null {
    const resolved = lookup(node.name, scopes);
    if (!resolved.found) {
      return this.miss(node);
    }
    const scalar = coerceScalar(resolved.value);
    if (!scalar.success) {
      return new TypeCoercionError(this.position(node), node.name, scalar.kind);
    }
    this.parts.push(node.escaped ? this.escape(scalar.text) : scalar.text);
    return null;
  }

  private renderSection(node: SectionNode, scopes: readonly Value[]): RenderError | null {
    const resolved = lookup(node.name, scopes);
    const value = resolved.found ? resolved.value : null;

    if (node.inverted) {
      return isTruthy(value) ? null : this.renderNodes(node.body, scopes);
    }
    if (Array.isArray(value)) {
      for (const item of value) {
        const error = this.renderNodes(node.body, [...scopes, item]);
        if (error) {
          return error;
        }
      }
      return null;
    }
    return isTruthy(value) ? this.renderNodes(node.body, [...scopes, value]) : null;
  }
}

/**
 * Render a template, reporting variables that were missing under the
 * lenient policy
 */
export function renderWithReport(
  template: Template,
  context: Context,
  options: RenderOptions = {}
): Result<RenderReport, RenderError> {
  const pass = new RenderPass(template, options);
  const error = pass.renderNodes(template.root, [context]);
  if (error) {
    return err(error);
  }
  return ok({ output: pass.output, missing: pass.missing });
}

/**
 * Render a template against a context
 *
 * @example
 * ```typescript
 * const parsed = parse("Hello, {name}!");
 * if (parsed.success) {
 *   const result = render(parsed.data, { name: "World" });
 *   // result.data === "Hello, World!"
 * }
 * ```
 */
export function render(
  template: Template,
  context: Context,
  options: RenderOptions = {}
): Result<string, RenderError> {
  return map(renderWithReport(template, context, options), (report) => report.output);
}

/**
 * Renderer bound to a fixed set of options
 *
 * @example
 * ```typescript
 * const renderer = createRenderer({ missingVariablePolicy: "lenient" });
 * const result = renderer.render(template, { name: "Ada" });
 * ```
 */
export class TemplateRenderer {
  private readonly options: Required<Omit<RenderOptions, "escapeFunction">> & Pick<RenderOptions, "escapeFunction">;

  constructor(options: RenderOptions = {}) {
    this.options = {
      missingVariablePolicy: options.missingVariablePolicy ?? "strict",
      escapeOutput: options.escapeOutput ?? false,
      escapeFunction: options.escapeFunction,
    };
  }

  render(template: Template, context: Context, options?: RenderOptions): Result<string, RenderError> {
    return render(template, context, { ...this.options, ...options });
  }

  renderWithReport(
    template: Template,
    context: Context,
    options?: RenderOptions
  ): Result<RenderReport, RenderError> {
    return renderWithReport(template, context, { ...this.options, ...options });
  }
}

/**
 * Factory function to create a TemplateRenderer
 */
export function createRenderer(options?: RenderOptions): TemplateRenderer {
  return new TemplateRenderer(options);
}
