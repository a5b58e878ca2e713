/**
 * Context value model: validation, classification, truthiness and text
 * coercion.
 */

import { z } from "zod";

import { ValidationError } from "../lib/errors.js";
import { ok, err } from "../lib/result.js";

import type { Result } from "../lib/result.js";
import type { Context, Value, ValueMap } from "./types.js";

/**
 * Any JSON-compatible value. Numbers must be finite.
 */
export const ValueSchema: z.ZodType<Value> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(ValueSchema),
    z.record(ValueSchema),
  ])
);

export const ContextSchema = z.record(ValueSchema);

/**
 * Check that an unknown payload (parsed JSON, YAML, an API response) can be
 * used as a render context
 */
export function validateContext(input: unknown): Result<Context, ValidationError> {
  const parsed = ContextSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new ValidationError("Invalid template context", {
        issues: parsed.error.issues,
      })
    );
  }
  return ok(parsed.data);
}

export type ValueKind = "string" | "number" | "boolean" | "null" | "list" | "map";

export function isValueMap(value: Value): value is ValueMap {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function kindOf(value: Value): ValueKind {
  if (value === null) {
    return "null";
  }
  if (Array.isArray(value)) {
    return "list";
  }
  switch (typeof value) {
    case "string":
      return "string";
    case "number":
      return "number";
    case "boolean":
      return "boolean";
    default:
      return "map";
  }
}

/**
 * Section gate. `false`, `null`, `""`, `0`, `NaN`, empty lists and empty
 * maps are falsy; everything else is truthy.
 */
export function isTruthy(value: Value): boolean {
  if (value === null) {
    return false;
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  switch (typeof value) {
    case "boolean":
      return value;
    case "number":
      return value !== 0 && !Number.isNaN(value);
    case "string":
      return value.length > 0;
    default:
      return Object.keys(value).length > 0;
  }
}

export type ScalarText = { success: true; text: string } | { success: false; kind: "list" | "map" };

/**
 * Text form of a scalar. Numbers use the shortest representation that reads
 * back to the same value (`3`, `0.1`, `1e+21`).
 */
export function coerceScalar(value: Value): ScalarText {
  if (value === null) {
    return { success: true, text: "" };
  }
  if (Array.isArray(value)) {
    return { success: false, kind: "list" };
  }
  switch (typeof value) {
    case "string":
      return { success: true, text: value };
    case "number":
      return { success: true, text: String(value) };
    case "boolean":
      return { success: true, text: value ? "true" : "false" };
    default:
      return { success: false, kind: "map" };
  }
}
