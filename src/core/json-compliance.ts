/**
 * JSON compliance checks for builder input.
 *
 * `JSON.stringify` silently turns NaN and Infinity into `null` and drops
 * functions and `undefined`; the service expects strict JSON, so values are
 * walked and rejected instead.
 */

import { isPlainObject } from "../types/json.js";

/**
 * Find the first reason `value` is not strict JSON.
 * Returns null when the value is compliant.
 */
export function findJsonViolation(value: unknown): string | null {
  return walk(value, "$", new Set<object>());
}

function walk(value: unknown, path: string, seen: Set<object>): string | null {
  switch (typeof value) {
    case "string":
    case "boolean":
      return null;
    case "number":
      return Number.isFinite(value)
        ? null
        : `Out of range float values are not JSON compliant: ${String(value)} at ${path}`;
    case "object":
      break;
    default:
      return `Object of type ${typeof value} is not JSON serializable at ${path}`;
  }

  if (value === null) return null;

  if (seen.has(value)) {
    return `Circular reference detected at ${path}`;
  }
  seen.add(value);

  let violation: string | null = null;
  if (Array.isArray(value)) {
    for (let i = 0; i < value.length && violation === null; i++) {
      violation = walk(value[i], `${path}[${i}]`, seen);
    }
  } else if (isPlainObject(value)) {
    for (const [key, child] of Object.entries(value)) {
      violation = walk(child, `${path}.${key}`, seen);
      if (violation !== null) break;
    }
  } else {
    violation = `Object of type ${typeNameOf(value)} is not JSON serializable at ${path}`;
  }

  seen.delete(value);
  return violation;
}

function typeNameOf(value: object): string {
  const proto: unknown = Object.getPrototypeOf(value);
  if (
    typeof proto === "object" &&
    proto !== null &&
    "constructor" in proto &&
    typeof proto.constructor === "function"
  ) {
    return proto.constructor.name || "object";
  }
  return "object";
}
