/**
 * packages/core/src/theme/presets.ts — Built-in theme presets.
 *
 * Available themes:
 *   - dark: light text on a near-black background
 *   - light: dark text on an off-white background
 */

import { rgb } from "../text/styled.js";
import { defaultTheme } from "./defaultTheme.js";
import { mergeTheme } from "./extend.js";
import type { PresentationTheme } from "./types.js";

const centered = { kind: "center", minimumSize: 40, minimumMargin: 5 } as const;

export const darkTheme: PresentationTheme = mergeTheme(defaultTheme, {
  defaultStyle: {
    alignment: { kind: "left", margin: 5 },
    colors: { foreground: rgb(230, 225, 207), background: rgb(10, 14, 20) },
  },
  slideTitle: {
    alignment: centered,
    colors: { foreground: rgb(255, 180, 84) },
    paddingBottom: 1,
    paddingTop: 1,
    separator: true,
  },
  headings: {
    h1: { alignment: centered, colors: { foreground: rgb(255, 180, 84) } },
    h2: { prefix: "▓▓", colors: { foreground: rgb(89, 194, 255) } },
    h3: { prefix: "▓▓▓", colors: { foreground: rgb(149, 230, 203) } },
    h4: { prefix: "▓▓▓▓", colors: { foreground: rgb(149, 230, 203) } },
    h5: { prefix: "▓▓▓▓▓", colors: { foreground: rgb(149, 230, 203) } },
    h6: { prefix: "▓▓▓▓▓▓", colors: { foreground: rgb(149, 230, 203) } },
  },
  code: {
    alignment: centered,
    colors: { background: rgb(26, 31, 38) },
    padding: { horizontal: 2, vertical: 1 },
  },
  blockQuote: {
    prefix: "▍ ",
    colors: { foreground: rgb(92, 103, 115), background: rgb(20, 25, 32) },
  },
  introSlide: {
    title: { alignment: centered, colors: { foreground: rgb(255, 180, 84) } },
    subtitle: { alignment: centered, colors: { foreground: rgb(89, 194, 255) } },
    author: {
      alignment: centered,
      colors: { foreground: rgb(230, 225, 207) },
      positioning: "pageBottom",
    },
  },
  footer: {
    kind: "template",
    left: "{author}",
    right: "{current_slide} / {total_slides}",
    colors: { foreground: rgb(92, 103, 115) },
  },
});

export const lightTheme: PresentationTheme = mergeTheme(darkTheme, {
  defaultStyle: {
    colors: { foreground: rgb(33, 37, 41), background: rgb(250, 250, 247) },
  },
  slideTitle: { colors: { foreground: rgb(191, 97, 0) } },
  headings: {
    h1: { colors: { foreground: rgb(191, 97, 0) } },
    h2: { colors: { foreground: rgb(0, 92, 197) } },
    h3: { colors: { foreground: rgb(2, 123, 96) } },
    h4: { colors: { foreground: rgb(2, 123, 96) } },
    h5: { colors: { foreground: rgb(2, 123, 96) } },
    h6: { colors: { foreground: rgb(2, 123, 96) } },
  },
  code: { colors: { background: rgb(236, 236, 230) } },
  blockQuote: { colors: { foreground: rgb(88, 96, 105), background: rgb(240, 240, 235) } },
  introSlide: {
    title: { colors: { foreground: rgb(191, 97, 0) } },
    subtitle: { colors: { foreground: rgb(0, 92, 197) } },
    author: { colors: { foreground: rgb(33, 37, 41) } },
  },
  footer: { kind: "progressBar", colors: { foreground: rgb(191, 97, 0) } },
});

export const builtinThemes: Readonly<Record<string, PresentationTheme>> = Object.freeze({
  dark: darkTheme,
  light: lightTheme,
});
