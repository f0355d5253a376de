/**
 * packages/core/src/theme/extend.ts — Merge theme overrides onto a base theme.
 *
 * Why: Front matter and theme files override only selected fields while
 * inheriting everything else from a base theme of the same shape.
 *
 * Merge rules:
 *   - a present override value replaces the base value
 *   - absent (or undefined) override fields fall through to the base
 *   - nested records merge recursively
 *   - tagged unions (records with a `kind`) are replaced wholesale when the
 *     override names another kind
 *   - arrays are replaced, never concatenated
 */

import type { PresentationTheme, ThemeOverrides } from "./types.js";
import { validateTheme } from "./validate.js";

function isMergeableObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function switchesVariant(base: Record<string, unknown>, overrides: Record<string, unknown>): boolean {
  return typeof overrides["kind"] === "string" && overrides["kind"] !== base["kind"];
}

function deepMerge(base: unknown, overrides: unknown): unknown {
  if (overrides === undefined) {
    if (Array.isArray(base)) {
      return [...base];
    }
    if (!isMergeableObject(base)) {
      return base;
    }

    const cloned: Record<string, unknown> = {};
    for (const key of Object.keys(base)) {
      cloned[key] = deepMerge(base[key], undefined);
    }
    return cloned;
  }

  if (Array.isArray(overrides)) {
    return [...overrides];
  }

  if (!isMergeableObject(overrides)) {
    return overrides;
  }

  if (!isMergeableObject(base)) {
    return deepMerge(overrides, undefined);
  }

  if (switchesVariant(base, overrides)) {
    return deepMerge(overrides, undefined);
  }

  const merged: Record<string, unknown> = {};
  const keys = new Set<string>([...Object.keys(base), ...Object.keys(overrides)]);

  for (const key of keys) {
    const overrideValue = Object.prototype.hasOwnProperty.call(overrides, key)
      ? overrides[key]
      : undefined;
    const value = deepMerge(base[key], overrideValue);
    if (value !== undefined) merged[key] = value;
  }

  return merged;
}

function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null) {
    return value;
  }

  if (Array.isArray(value)) {
    for (const item of value) {
      deepFreeze(item);
    }
    Object.freeze(value);
    return value;
  }

  for (const child of Object.values(value)) {
    deepFreeze(child);
  }
  Object.freeze(value);
  return value;
}

/**
 * Pure merge of two theme snapshots. Throws when the merged result is not a
 * valid theme (see validateTheme).
 */
export function mergeTheme(
  base: PresentationTheme,
  overrides: ThemeOverrides = {},
): PresentationTheme {
  const merged = deepMerge(base, overrides);
  const validated = validateTheme(merged);
  return deepFreeze(validated);
}
