/**
 * Merge of extension fields over a structured record.
 *
 * Collision policy: when both sides hold a plain object the two are merged
 * recursively; in every other case the extension value replaces the base
 * value (arrays included). Neither input is mutated.
 */

import { isPlainObject } from "../types/json.js";

export function mergeExtensions(
  base: Record<string, unknown>,
  extensions: Record<string, unknown>
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(extensions)) {
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeExtensions(current, value)
        : value;
  }

  return merged;
}
