/**
 * Style detection.
 *
 * A single left-to-right scan looks for delimiters of each family:
 *
 *   Mustache:  {{name}}  {{#name}}  {{^name}}  {{/name}}  {{&name}}
 *              {{{name}}}  and the empty tags {{}} / {{{}}}
 *   FmtString: {name}  {name:spec}  {name|default}  {}  and any {{ or }}
 *              that is not part of a Mustache tag (an escaped brace)
 *
 * Single braces that fit neither grammar are plain text. A template with
 * delimiters from both families is rejected, never guessed.
 */

import { ok, err } from "../lib/result.js";

import { MixedFormatError, positionAt } from "./errors.js";
import { FMT_PLACEHOLDER_RE, MUSTACHE_TAG_RE, MUSTACHE_TRIPLE_RE, matchAt } from "./syntax.js";

import type { Result } from "../lib/result.js";
import type { Style } from "./types.js";

/**
 * Offset of the first delimiter seen from each family, or null
 */
export interface StyleSignals {
  fmtString: number | null;
  mustache: number | null;
}

export function scanSignals(source: string): StyleSignals {
  const signals: StyleSignals = { fmtString: null, mustache: null };
  let i = 0;

  while (i < source.length) {
    const ch = source[i];

    if (ch === "{") {
      const triple = matchAt(MUSTACHE_TRIPLE_RE, source, i);
      const tag = triple ?? matchAt(MUSTACHE_TAG_RE, source, i);
      if (tag) {
        signals.mustache ??= i;
        i += tag[0].length;
        continue;
      }
      if (source[i + 1] === "{") {
        signals.fmtString ??= i;
        i += 2;
        continue;
      }
      const placeholder = matchAt(FMT_PLACEHOLDER_RE, source, i);
      if (placeholder) {
        signals.fmtString ??= i;
        i += placeholder[0].length;
        continue;
      }
    } else if (ch === "}" && source[i + 1] === "}") {
      signals.fmtString ??= i;
      i += 2;
      continue;
    }

    i++;
  }

  return signals;
}

/**
 * Classify a template source. Deterministic and total: every input yields
 * either a style or a MixedFormatError.
 */
export function detectStyle(source: string): Result<Style, MixedFormatError> {
  const { fmtString, mustache } = scanSignals(source);

  if (fmtString !== null && mustache !== null) {
    const conflictAt = Math.max(fmtString, mustache);
    return err(new MixedFormatError(positionAt(source, conflictAt), fmtString, mustache));
  }
  if (mustache !== null) {
    return ok("mustache");
  }
  if (fmtString !== null) {
    return ok("fmt-string");
  }
  return ok("literal");
}
