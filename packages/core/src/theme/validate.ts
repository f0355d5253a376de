/**
 * packages/core/src/theme/validate.ts — Strict presentation theme validation.
 *
 * Why: Merged themes come from user-authored YAML; a bad field must fail the
 * build with a path-specific message instead of surfacing at draw time.
 */

import type { PresentationTheme } from "./types.js";

type UnknownRecord = Record<string, unknown>;

const COLOR_PATHS = [
  "defaultStyle.colors",
  "slideTitle.colors",
  "headings.h1.colors",
  "headings.h2.colors",
  "headings.h3.colors",
  "headings.h4.colors",
  "headings.h5.colors",
  "headings.h6.colors",
  "code.colors",
  "blockQuote.colors",
  "introSlide.title.colors",
  "introSlide.subtitle.colors",
  "introSlide.author.colors",
] as const;

const OPTIONAL_ALIGNMENT_PATHS = [
  "slideTitle.alignment",
  "headings.h1.alignment",
  "headings.h2.alignment",
  "headings.h3.alignment",
  "headings.h4.alignment",
  "headings.h5.alignment",
  "headings.h6.alignment",
  "code.alignment",
  "blockQuote.alignment",
  "introSlide.title.alignment",
  "introSlide.subtitle.alignment",
  "introSlide.author.alignment",
] as const;

const OPTIONAL_COUNT_PATHS = [
  "slideTitle.paddingTop",
  "slideTitle.paddingBottom",
  "code.padding.horizontal",
  "code.padding.vertical",
] as const;

const OPTIONAL_STRING_PATHS = [
  "headings.h1.prefix",
  "headings.h2.prefix",
  "headings.h3.prefix",
  "headings.h4.prefix",
  "headings.h5.prefix",
  "headings.h6.prefix",
  "blockQuote.prefix",
] as const;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function getPathValue(root: unknown, path: string): unknown {
  let cursor: unknown = root;
  for (const part of path.split(".")) {
    if (!isRecord(cursor) || !(part in cursor)) return undefined;
    cursor = cursor[part];
  }
  return cursor;
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (
    typeof value === "number" ||
    typeof value === "boolean" ||
    value === null ||
    value === undefined
  ) {
    return String(value);
  }
  if (Array.isArray(value)) return "[array]";
  return "[object]";
}

function fail(path: string, message: string): never {
  throw new Error(`Theme validation failed at ${path}: ${message}`);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

function validateCount(path: string, value: unknown): void {
  if (!isCount(value)) {
    fail(path, `expected a non-negative integer (received ${formatValue(value)})`);
  }
}

function validateRgb(path: string, value: unknown): void {
  if (!isRecord(value)) {
    fail(path, `expected RGB object { r, g, b } (received ${formatValue(value)})`);
  }
  for (const channel of ["r", "g", "b"] as const) {
    const channelValue = value[channel];
    if (!isCount(channelValue) || channelValue > 255) {
      fail(
        `${path}.${channel}`,
        `channel "${channel}" must be an integer 0..255 (received ${formatValue(channelValue)})`,
      );
    }
  }
}

function validateColors(path: string, value: unknown): void {
  if (!isRecord(value)) {
    fail(path, `expected colors object (received ${formatValue(value)})`);
  }
  for (const slot of ["foreground", "background"] as const) {
    const color = value[slot];
    if (color !== undefined) validateRgb(`${path}.${slot}`, color);
  }
}

function validateAlignment(path: string, value: unknown): void {
  if (!isRecord(value)) {
    fail(path, `expected alignment object (received ${formatValue(value)})`);
  }
  switch (value["kind"]) {
    case "left":
    case "right":
      validateCount(`${path}.margin`, value["margin"]);
      return;
    case "center":
      validateCount(`${path}.minimumSize`, value["minimumSize"]);
      validateCount(`${path}.minimumMargin`, value["minimumMargin"]);
      return;
    default:
      fail(`${path}.kind`, `expected "left", "right" or "center" (received ${formatValue(value["kind"])})`);
  }
}

function validateFooter(value: unknown): void {
  if (!isRecord(value)) {
    fail("footer", `expected footer object (received ${formatValue(value)})`);
  }
  switch (value["kind"]) {
    case "template":
      for (const side of ["left", "right"] as const) {
        const template = value[side];
        if (template !== undefined && typeof template !== "string") {
          fail(`footer.${side}`, `expected a string (received ${formatValue(template)})`);
        }
      }
      validateColors("footer.colors", value["colors"]);
      return;
    case "progressBar": {
      const character = value["character"];
      if (character !== undefined && (typeof character !== "string" || character.length === 0)) {
        fail("footer.character", `expected a non-empty string (received ${formatValue(character)})`);
      }
      validateColors("footer.colors", value["colors"]);
      return;
    }
    case "empty":
      return;
    default:
      fail(
        "footer.kind",
        `expected "template", "progressBar" or "empty" (received ${formatValue(value["kind"])})`,
      );
  }
}

/**
 * Validate a presentation theme.
 *
 * Throws on the first invalid value with a deterministic, path-specific error.
 */
export function validateTheme(theme: unknown): PresentationTheme {
  validateAlignment("defaultStyle.alignment", getPathValue(theme, "defaultStyle.alignment"));

  for (const path of COLOR_PATHS) {
    validateColors(path, getPathValue(theme, path));
  }

  for (const path of OPTIONAL_ALIGNMENT_PATHS) {
    const value = getPathValue(theme, path);
    if (value !== undefined) validateAlignment(path, value);
  }

  for (const path of OPTIONAL_COUNT_PATHS) {
    const value = getPathValue(theme, path);
    if (value !== undefined) validateCount(path, value);
  }

  for (const path of OPTIONAL_STRING_PATHS) {
    const value = getPathValue(theme, path);
    if (value !== undefined && typeof value !== "string") {
      fail(path, `expected a string (received ${formatValue(value)})`);
    }
  }

  if (typeof getPathValue(theme, "slideTitle.separator") !== "boolean") {
    fail("slideTitle.separator", "expected a boolean");
  }

  const positioning = getPathValue(theme, "introSlide.author.positioning");
  if (positioning !== "belowTitle" && positioning !== "pageBottom") {
    fail(
      "introSlide.author.positioning",
      `expected "belowTitle" or "pageBottom" (received ${formatValue(positioning)})`,
    );
  }

  validateFooter(getPathValue(theme, "footer"));

  return theme as PresentationTheme;
}
