/**
 * Delimiter grammar shared by the style detector and both parsers.
 *
 * The `_RE` delimiter patterns other than IDENTIFIER_RE are sticky: test
 * them through `matchAt`.
 */

/** Plain identifier, used for FmtString placeholder names */
export const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

/** Mustache name: dotted identifier path or the implicit iterator `.` */
export const MUSTACHE_NAME = "[A-Za-z_][A-Za-z0-9_]*(?:\\.[A-Za-z_][A-Za-z0-9_]*)*|\\.";

/** `{{{name}}}`; group 1 is the (possibly empty) name */
export const MUSTACHE_TRIPLE_RE = new RegExp(`\\{\\{\\{(${MUSTACHE_NAME})?\\}\\}\\}`, "y");

/** `{{name}}`, `{{#name}}`, `{{^name}}`, `{{/name}}`, `{{&name}}`; group 1 the sigil, group 2 the name */
export const MUSTACHE_TAG_RE = new RegExp(`\\{\\{([#^/&]?)(${MUSTACHE_NAME})?\\}\\}`, "y");

/**
 * `{name}`, `{name|default}`, `{name:spec}`, `{name|default:spec}` and the
 * empty forms `{}`, `{:spec}`. Group 1 name, group 2 default, group 3 spec.
 */
export const FMT_PLACEHOLDER_RE = /\{([A-Za-z_][A-Za-z0-9_]*)?(?:\|([^{}:]*))?(?::([^{}]*))?\}/y;

/**
 * Run a sticky pattern at `index`
 */
export function matchAt(re: RegExp, source: string, index: number): RegExpExecArray | null {
  re.lastIndex = index;
  return re.exec(source);
}
