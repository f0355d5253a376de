/**
 * packages/core/src/theme/schema.ts — YAML theme document schema.
 *
 * Theme files and front-matter overrides share one snake_case document shape.
 * Every field is optional: documents are overrides merged onto a base theme.
 *
 *   default:
 *     alignment: left        # left | right | center
 *     margin: 2              # left/right
 *     minimum_size: 40       # center
 *     minimum_margin: 5      # center
 *     colors: { foreground: "e6e6e6", background: "#1e1e1e" }
 *   footer:
 *     style: template        # template | progress_bar | empty
 *     left: "{author}"
 *     right: "{current_slide} / {total_slides}"
 */

import { isMap, isScalar, parseDocument, visit } from "yaml";
import { z } from "zod";
import type { Colors, Rgb } from "../text/styled.js";
import { rgb } from "../text/styled.js";
import type { Alignment, AuthorPositioning, FooterStyle, ThemeOverrides } from "./types.js";

const NAMED_COLORS: Readonly<Record<string, Rgb>> = Object.freeze({
  black: rgb(0, 0, 0),
  red: rgb(205, 49, 49),
  green: rgb(13, 188, 121),
  yellow: rgb(229, 229, 16),
  blue: rgb(36, 114, 200),
  magenta: rgb(188, 63, 188),
  cyan: rgb(17, 168, 205),
  white: rgb(229, 229, 229),
  dark_grey: rgb(102, 102, 102),
  grey: rgb(128, 128, 128),
  dark_red: rgb(139, 0, 0),
  dark_green: rgb(0, 100, 0),
  dark_yellow: rgb(128, 128, 0),
  dark_blue: rgb(0, 0, 139),
  dark_magenta: rgb(139, 0, 139),
  dark_cyan: rgb(0, 139, 139),
});

/** Parse "rrggbb", "#rrggbb" or a named ANSI color. */
export function parseColor(raw: string): Rgb | null {
  const value = raw.trim().toLowerCase();
  const named = NAMED_COLORS[value];
  if (named !== undefined) return named;
  const hex = value.startsWith("#") ? value.slice(1) : value;
  if (!/^[0-9a-f]{6}$/.test(hex)) return null;
  const packed = Number.parseInt(hex, 16);
  return rgb((packed >> 16) & 0xff, (packed >> 8) & 0xff, packed & 0xff);
}

const colorSchema = z.string().transform((raw, ctx): Rgb => {
  const parsed = parseColor(raw);
  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid color "${raw}"` });
    return z.NEVER;
  }
  return parsed;
});

const colorsSchema = z
  .object({
    foreground: colorSchema.optional(),
    background: colorSchema.optional(),
  })
  .strict();

const count = z.number().int().nonnegative();

const alignmentFields = {
  alignment: z.enum(["left", "right", "center"]).optional(),
  margin: count.optional(),
  minimum_size: count.optional(),
  minimum_margin: count.optional(),
};

const basicStyleSchema = z
  .object({
    ...alignmentFields,
    colors: colorsSchema.optional(),
  })
  .strict();

const headingStyleSchema = basicStyleSchema.extend({ prefix: z.string().optional() }).strict();

const footerSchema = z
  .object({
    style: z.enum(["template", "progress_bar", "empty"]),
    left: z.string().optional(),
    right: z.string().optional(),
    character: z.string().min(1).optional(),
    colors: colorsSchema.optional(),
  })
  .strict();

export const themeDocumentSchema = z
  .object({
    default: basicStyleSchema.optional(),
    slide_title: basicStyleSchema
      .extend({
        padding_top: count.optional(),
        padding_bottom: count.optional(),
        separator: z.boolean().optional(),
      })
      .strict()
      .optional(),
    headings: z
      .object({
        h1: headingStyleSchema.optional(),
        h2: headingStyleSchema.optional(),
        h3: headingStyleSchema.optional(),
        h4: headingStyleSchema.optional(),
        h5: headingStyleSchema.optional(),
        h6: headingStyleSchema.optional(),
      })
      .strict()
      .optional(),
    code: basicStyleSchema
      .extend({
        padding: z
          .object({ horizontal: count.optional(), vertical: count.optional() })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    block_quote: basicStyleSchema.extend({ prefix: z.string().optional() }).strict().optional(),
    intro_slide: z
      .object({
        title: basicStyleSchema.optional(),
        subtitle: basicStyleSchema.optional(),
        author: basicStyleSchema
          .extend({ positioning: z.enum(["below_title", "page_bottom"]).optional() })
          .strict()
          .optional(),
      })
      .strict()
      .optional(),
    footer: footerSchema.optional(),
  })
  .strict();

export type ThemeDocument = z.infer<typeof themeDocumentSchema>;

type AlignmentFields = Readonly<{
  alignment?: "left" | "right" | "center" | undefined;
  margin?: number | undefined;
  minimum_size?: number | undefined;
  minimum_margin?: number | undefined;
}>;

type StyleFields = AlignmentFields & Readonly<{ colors?: Colors | undefined }>;

function toAlignment(fields: AlignmentFields): Alignment | undefined {
  switch (fields.alignment) {
    case "left":
      return { kind: "left", margin: fields.margin ?? 0 };
    case "right":
      return { kind: "right", margin: fields.margin ?? 0 };
    case "center":
      return {
        kind: "center",
        minimumSize: fields.minimum_size ?? 0,
        minimumMargin: fields.minimum_margin ?? 0,
      };
    case undefined:
      // A bare margin means left alignment.
      return fields.margin === undefined ? undefined : { kind: "left", margin: fields.margin };
  }
}

function toBasicStyle(
  fields: StyleFields | undefined,
): { alignment?: Alignment; colors?: Colors } | undefined {
  if (fields === undefined) return undefined;
  const alignment = toAlignment(fields);
  return {
    ...(alignment !== undefined ? { alignment } : {}),
    ...(fields.colors !== undefined ? { colors: fields.colors } : {}),
  };
}

function toFooter(footer: NonNullable<ThemeDocument["footer"]>): FooterStyle {
  const colors = footer.colors ?? {};
  switch (footer.style) {
    case "template":
      return {
        kind: "template",
        colors,
        ...(footer.left !== undefined ? { left: footer.left } : {}),
        ...(footer.right !== undefined ? { right: footer.right } : {}),
      };
    case "progress_bar":
      return {
        kind: "progressBar",
        colors,
        ...(footer.character !== undefined ? { character: footer.character } : {}),
      };
    case "empty":
      return { kind: "empty" };
  }
}

function toPositioning(value: "below_title" | "page_bottom" | undefined): AuthorPositioning | undefined {
  if (value === undefined) return undefined;
  return value === "below_title" ? "belowTitle" : "pageBottom";
}

function withPrefix<T extends object>(
  style: T | undefined,
  prefix: string | undefined,
): (T & { prefix?: string }) | undefined {
  if (style === undefined) return undefined;
  return { ...style, ...(prefix !== undefined ? { prefix } : {}) };
}

/**
 * Convert a validated snake_case document into camelCase theme overrides.
 * Unset fields stay undefined and fall through when merged.
 */
export function themeDocumentToOverrides(document: ThemeDocument): ThemeOverrides {
  const slideTitle = document.slide_title;
  const code = document.code;
  const headings = document.headings;
  const intro = document.intro_slide;
  const author = intro?.author;

  return {
    defaultStyle: toBasicStyle(document.default),
    slideTitle: slideTitle && {
      ...toBasicStyle(slideTitle),
      paddingTop: slideTitle.padding_top,
      paddingBottom: slideTitle.padding_bottom,
      separator: slideTitle.separator,
    },
    headings: headings && {
      h1: withPrefix(toBasicStyle(headings.h1), headings.h1?.prefix),
      h2: withPrefix(toBasicStyle(headings.h2), headings.h2?.prefix),
      h3: withPrefix(toBasicStyle(headings.h3), headings.h3?.prefix),
      h4: withPrefix(toBasicStyle(headings.h4), headings.h4?.prefix),
      h5: withPrefix(toBasicStyle(headings.h5), headings.h5?.prefix),
      h6: withPrefix(toBasicStyle(headings.h6), headings.h6?.prefix),
    },
    code: code && { ...toBasicStyle(code), padding: code.padding },
    blockQuote: withPrefix(toBasicStyle(document.block_quote), document.block_quote?.prefix),
    introSlide: intro && {
      title: toBasicStyle(intro.title),
      subtitle: toBasicStyle(intro.subtitle),
      author: author && { ...toBasicStyle(author), positioning: toPositioning(author.positioning) },
    },
    footer: document.footer && toFooter(document.footer),
  };
}

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path.length > 0 ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
}

/** Validate an already-parsed value (e.g. a front-matter `override` block). */
export function parseThemeOverrides(value: unknown): ThemeOverrides {
  const result = themeDocumentSchema.safeParse(value ?? {});
  if (!result.success) {
    throw new Error(formatZodIssues(result.error));
  }
  return themeDocumentToOverrides(result.data);
}

/**
 * Parse YAML, keeping colors as written: an unquoted `000000` or `001020`
 * under a `colors` mapping would otherwise come back as a number.
 */
export function parseYamlWithColors(source: string): unknown {
  const document = parseDocument(source);
  const [firstError] = document.errors;
  if (firstError !== undefined) throw firstError;
  visit(document, {
    Pair(_, pair) {
      if (!isScalar(pair.key) || pair.key.value !== "colors" || !isMap(pair.value)) return;
      for (const item of pair.value.items) {
        const value = item.value;
        if (!isScalar(value) || typeof value.value !== "number" || !value.range) continue;
        value.value = source.slice(value.range[0], value.range[1]);
      }
    },
  });
  return document.toJS();
}

/** Parse a YAML theme document into overrides. Throws on YAML or schema errors. */
export function parseThemeDocument(source: string): ThemeOverrides {
  return parseThemeOverrides(parseYamlWithColors(source));
}

