/**
 * FmtString parser.
 *
 * Grammar:
 *
 *   template    := (literal | escape | placeholder)*
 *   escape      := "{{" | "}}"
 *   placeholder := "{" identifier ("|" default)? (":" spec)? "}"
 *
 * Single pass, linear in the source length. Errors are reported and the
 * scan resumes after the offending brace, so one pass reports every brace
 * problem in the source.
 */

import {
  EmptyPlaceholderError,
  InvalidPlaceholderError,
  UnbalancedBraceError,
} from "./errors.js";
import { IDENTIFIER_RE } from "./syntax.js";

import type { ErrorReporter } from "./reporter.js";
import type { LiteralNode, PlaceholderNode, TemplateNode } from "./types.js";

/** Splits placeholder content into name, default and spec */
const CONTENT_RE = /^([^|:]*)(?:\|([^:]*))?(?::([\s\S]*))?$/;

/**
 * Accumulates adjacent literal pieces into a single node
 */
class LiteralBuffer {
  private text = "";
  private raw = "";
  private start = -1;

  append(text: string, raw: string, start: number): void {
    if (this.start < 0) {
      this.start = start;
    }
    this.text += text;
    this.raw += raw;
  }

  flushInto(nodes: TemplateNode[]): void {
    if (this.start < 0) {
      return;
    }
    const node: LiteralNode = {
      type: "literal",
      text: this.text,
      raw: this.raw,
      start: this.start,
      end: this.start + this.raw.length,
    };
    nodes.push(node);
    this.text = "";
    this.raw = "";
    this.start = -1;
  }
}

export function parseFmtString(source: string, reporter: ErrorReporter): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  const literal = new LiteralBuffer();
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "{") {
      if (source[i + 1] === "{") {
        literal.append("{", "{{", i);
        i += 2;
        continue;
      }

      let close = i + 1;
      while (close < source.length && source[close] !== "}" && source[close] !== "{") {
        close++;
      }
      if (close >= source.length || source[close] === "{") {
        reporter.report(new UnbalancedBraceError(reporter.at(i), "{"));
        literal.append("{", "{", i);
        i++;
        continue;
      }

      const raw = source.slice(i, close + 1);
      const placeholder = readPlaceholder(raw, i, reporter);
      if (placeholder) {
        literal.flushInto(nodes);
        nodes.push(placeholder);
      } else {
        literal.append(raw, raw, i);
      }
      i = close + 1;
      continue;
    }

    if (ch === "}") {
      if (source[i + 1] === "}") {
        literal.append("}", "}}", i);
        i += 2;
      } else {
        reporter.report(new UnbalancedBraceError(reporter.at(i), "}"));
        literal.append("}", "}", i);
        i++;
      }
      continue;
    }

    let next = i + 1;
    while (next < source.length && source[next] !== "{" && source[next] !== "}") {
      next++;
    }
    const run = source.slice(i, next);
    literal.append(run, run, i);
    i = next;
  }

  literal.flushInto(nodes);
  return nodes;
}

function readPlaceholder(raw: string, start: number, reporter: ErrorReporter): PlaceholderNode | null {
  const content = raw.slice(1, -1);
  const parts = CONTENT_RE.exec(content);
  const name = parts?.[1] ?? content;

  if (name === "") {
    reporter.report(new EmptyPlaceholderError(reporter.at(start)));
    return null;
  }
  if (!parts || !IDENTIFIER_RE.test(name)) {
    reporter.report(new InvalidPlaceholderError(reporter.at(start), content));
    return null;
  }

  const node: PlaceholderNode = {
    type: "placeholder",
    name,
    raw,
    start,
    end: start + raw.length,
  };
  if (parts[2] !== undefined) {
    node.defaultValue = parts[2];
  }
  if (parts[3] !== undefined) {
    node.formatSpec = parts[3];
  }
  return node;
}
