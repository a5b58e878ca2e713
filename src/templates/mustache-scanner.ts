/**
 * Mustache tag scanning.
 *
 * The Mustache parser only sees a flat stream of text runs and tags. The
 * stream comes from a TagScanner, so any engine able to split a source into
 * tags can be plugged in; the default drives the `mustache` package's own
 * Scanner.
 */

import Mustache from "mustache";

import { MUSTACHE_NAME } from "./syntax.js";

export type TagSigil = "" | "#" | "^" | "/" | "&" | "{";

export interface TextToken {
  type: "text";
  value: string;
  start: number;
  end: number;
}

export interface TagToken {
  type: "tag";
  sigil: TagSigil;
  /** Empty string for `{{}}` and friends */
  name: string;
  raw: string;
  start: number;
  end: number;
}

/**
 * A `{{` that does not open a well-formed tag
 */
export interface StrayOpenToken {
  type: "stray-open";
  raw: string;
  start: number;
  end: number;
}

export type RawToken = TextToken | TagToken | StrayOpenToken;

export interface TagScanner {
  scan(source: string): RawToken[];
}

const OPEN_RE = /\{\{/;
const TRIPLE_RE = new RegExp(`^\\{\\{\\{(${MUSTACHE_NAME})?\\}\\}\\}`);
const TAG_RE = new RegExp(`^\\{\\{([#^/&]?)(${MUSTACHE_NAME})?\\}\\}`);

function toSigil(value: string): TagSigil {
  switch (value) {
    case "#":
    case "^":
    case "/":
    case "&":
      return value;
    default:
      return "";
  }
}

/**
 * TagScanner backed by `Mustache.Scanner`
 */
export class MustacheEngineScanner implements TagScanner {
  scan(source: string): RawToken[] {
    const tokens: RawToken[] = [];
    const scanner = new Mustache.Scanner(source);

    while (!scanner.eos()) {
      const textStart = scanner.pos;
      const text = scanner.scanUntil(OPEN_RE);
      if (text.length > 0) {
        tokens.push({ type: "text", value: text, start: textStart, end: scanner.pos });
      }
      if (scanner.eos()) {
        break;
      }

      const tagStart = scanner.pos;
      const triple = scanner.scan(TRIPLE_RE);
      if (triple.length > 0) {
        const name = TRIPLE_RE.exec(triple)?.[1] ?? "";
        tokens.push({ type: "tag", sigil: "{", name, raw: triple, start: tagStart, end: scanner.pos });
        continue;
      }

      const tag = scanner.scan(TAG_RE);
      if (tag.length > 0) {
        const parts = TAG_RE.exec(tag);
        tokens.push({
          type: "tag",
          sigil: toSigil(parts?.[1] ?? ""),
          name: parts?.[2] ?? "",
          raw: tag,
          start: tagStart,
          end: scanner.pos,
        });
        continue;
      }

      const open = scanner.scan(OPEN_RE);
      tokens.push({ type: "stray-open", raw: open, start: tagStart, end: scanner.pos });
    }

    return tokens;
  }
}

export const defaultTagScanner: TagScanner = new MustacheEngineScanner();
