/**
 * packages/core/src/builder/metadata.ts — Front matter parsing.
 *
 *   title: My talk
 *   sub_title: Subtitle      # `subtitle` is accepted too
 *   author: Someone
 *   theme:
 *     name: dark             # or `path: themes/mine.yaml`, not both
 *     override:              # same shape as a theme file
 *       default: { colors: { foreground: "ffffff" } }
 */

import { z } from "zod";
import { describeError } from "../errors.js";
import { formatZodIssues, parseThemeOverrides, parseYamlWithColors } from "../theme/schema.js";
import type { ThemeOverrides } from "../theme/types.js";

const scalarText = z.union([z.string(), z.number(), z.boolean()]).transform(String);

const metadataSchema = z.object({
  title: scalarText.optional(),
  sub_title: scalarText.optional(),
  subtitle: scalarText.optional(),
  author: scalarText.optional(),
  theme: z
    .object({
      name: z.string().optional(),
      path: z.string().optional(),
      override: z.unknown().optional(),
    })
    .strict()
    .optional(),
});

export type PresentationMetadata = Readonly<{
  title?: string;
  subtitle?: string;
  author?: string;
  theme: Readonly<{
    name?: string;
    path?: string;
    overrides?: ThemeOverrides;
  }>;
}>;

export type MetadataParseResult =
  | Readonly<{ ok: true; metadata: PresentationMetadata }>
  | Readonly<{ ok: false; detail: string }>;

export function parseMetadata(contents: string): MetadataParseResult {
  let raw: unknown;
  try {
    raw = parseYamlWithColors(contents);
  } catch (error: unknown) {
    return { ok: false, detail: describeError(error) };
  }

  const parsed = metadataSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    return { ok: false, detail: formatZodIssues(parsed.error) };
  }

  const data = parsed.data;
  const theme = data.theme ?? {};
  if (theme.name !== undefined && theme.path !== undefined) {
    return { ok: false, detail: "cannot have both theme path and theme name" };
  }

  let overrides: ThemeOverrides | undefined;
  if (theme.override !== undefined && theme.override !== null) {
    try {
      overrides = parseThemeOverrides(theme.override);
    } catch (error: unknown) {
      return { ok: false, detail: `theme.override: ${describeError(error)}` };
    }
  }

  const subtitle = data.sub_title ?? data.subtitle;
  return {
    ok: true,
    metadata: {
      ...(data.title !== undefined ? { title: data.title } : {}),
      ...(subtitle !== undefined ? { subtitle } : {}),
      ...(data.author !== undefined ? { author: data.author } : {}),
      theme: {
        ...(theme.name !== undefined ? { name: theme.name } : {}),
        ...(theme.path !== undefined ? { path: theme.path } : {}),
        ...(overrides !== undefined ? { overrides } : {}),
      },
    },
  };
}

/** Recognized directive comments; anything else is ignored. */
export type Directive = "pause" | "endSlide";

export function parseDirective(comment: string): Directive | null {
  switch (comment.trim()) {
    case "pause":
      return "pause";
    case "end_slide":
      return "endSlide";
    default:
      return null;
  }
}
