/**
 * FmtString format specs.
 *
 * Recognised grammar (a subset of the Python mini-language):
 *
 *   spec  := [[fill]align][0][width][.precision][type]
 *   align := "<" | ">" | "^"
 *   type  := "s" | "d" | "f" | "%"
 *
 *   {name:>10}    right-align in 10 columns
 *   {name:*^9}    centre, padded with '*'
 *   {price:.2f}   fixed point, 2 decimals
 *   {count:05d}   integer, zero padded to 5
 *   {ratio:.1%}   percentage
 *   {title:.20}   truncate text to 20 characters
 *
 * Any other spec is rejected at render time, as are widths above
 * MAX_FORMAT_WIDTH and precisions above MAX_FORMAT_PRECISION.
 */

import type { Value } from "./types.js";

export type Alignment = "<" | ">" | "^";
export type FormatType = "s" | "d" | "f" | "%";

export interface FormatSpec {
  fill?: string;
  align?: Alignment;
  zeroPad: boolean;
  width?: number;
  precision?: number;
  type?: FormatType;
}

export const MAX_FORMAT_WIDTH = 10_000;
/** Largest digit count `Number.prototype.toFixed` accepts */
export const MAX_FORMAT_PRECISION = 100;

const SPEC_RE = /^(?:([^{}])?([<>^]))?(0)?([1-9]\d*)?(?:\.(\d+))?([sdf%])?$/u;

function toAlignment(value: string | undefined): Alignment | undefined {
  return value === "<" || value === ">" || value === "^" ? value : undefined;
}

function toFormatType(value: string | undefined): FormatType | undefined {
  return value === "s" || value === "d" || value === "f" || value === "%" ? value : undefined;
}

/**
 * Parse a spec string, or null when it is outside the recognised grammar
 */
export function parseFormatSpec(spec: string): FormatSpec | null {
  const match = SPEC_RE.exec(spec);
  if (!match) {
    return null;
  }
  const parsed: FormatSpec = { zeroPad: match[3] !== undefined };
  const align = toAlignment(match[2]);
  const type = toFormatType(match[6]);
  if (match[1] !== undefined) parsed.fill = match[1];
  if (align) parsed.align = align;
  if (match[4] !== undefined) parsed.width = Number(match[4]);
  if (match[5] !== undefined) parsed.precision = Number(match[5]);
  if (type) parsed.type = type;
  return parsed;
}

export type FormattedValue = { success: true; text: string } | { success: false; reason: string };

function fail(reason: string): FormattedValue {
  return { success: false, reason };
}

function lengthOf(text: string): number {
  return Array.from(text).length;
}

function pad(text: string, spec: FormatSpec, defaultAlign: Alignment): string {
  const width = spec.width ?? 0;
  const missing = width - lengthOf(text);
  if (missing <= 0) {
    return text;
  }

  if (spec.zeroPad && spec.align === undefined) {
    const sign = text.startsWith("-") ? "-" : "";
    return `${sign}${"0".repeat(missing)}${text.slice(sign.length)}`;
  }

  const fill = spec.fill ?? (spec.zeroPad ? "0" : " ");
  switch (spec.align ?? defaultAlign) {
    case "<":
      return text + fill.repeat(missing);
    case ">":
      return fill.repeat(missing) + text;
    case "^": {
      const left = Math.floor(missing / 2);
      return fill.repeat(left) + text + fill.repeat(missing - left);
    }
  }
}

function formatNumber(value: number, spec: FormatSpec): FormattedValue {
  switch (spec.type) {
    case "d":
      if (!Number.isInteger(value)) {
        return fail(`requires an integer, got ${value}`);
      }
      if (spec.precision !== undefined) {
        return fail("does not allow a precision with 'd'");
      }
      return { success: true, text: pad(String(value), spec, ">") };
    case "f":
      return { success: true, text: pad(value.toFixed(spec.precision ?? 6), spec, ">") };
    case "%":
      return { success: true, text: pad(`${(value * 100).toFixed(spec.precision ?? 6)}%`, spec, ">") };
    case "s":
      return formatText(String(value), spec);
    default: {
      const text = spec.precision !== undefined ? value.toFixed(spec.precision) : String(value);
      return { success: true, text: pad(text, spec, ">") };
    }
  }
}

function formatText(text: string, spec: FormatSpec): FormattedValue {
  if (spec.type !== undefined && spec.type !== "s") {
    return fail(`requires a number for type '${spec.type}'`);
  }
  if (spec.zeroPad) {
    return fail("only zero-pads numbers");
  }
  const truncated = spec.precision !== undefined ? Array.from(text).slice(0, spec.precision).join("") : text;
  return { success: true, text: pad(truncated, spec, "<") };
}

/**
 * Apply a spec to a scalar value. Lists and maps never reach this point.
 */
export function applyFormatSpec(value: Value, spec: FormatSpec): FormattedValue {
  if (spec.width !== undefined && spec.width > MAX_FORMAT_WIDTH) {
    return fail(`has a width above ${MAX_FORMAT_WIDTH}`);
  }
  if (spec.precision !== undefined && spec.precision > MAX_FORMAT_PRECISION) {
    return fail(`has a precision above ${MAX_FORMAT_PRECISION}`);
  }
  if (typeof value === "number") {
    return formatNumber(value, spec);
  }
  if (typeof value === "boolean") {
    return formatText(value ? "true" : "false", spec);
  }
  if (typeof value === "string") {
    return formatText(value, spec);
  }
  return formatText("", spec);
}
