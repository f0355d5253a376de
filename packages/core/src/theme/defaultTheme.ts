/**
 * packages/core/src/theme/defaultTheme.ts — Baseline theme.
 *
 * Why: Used when nothing else is configured and as the base every theme file
 * and front-matter override is merged onto. It uses the terminal's own colors
 * and adds no decoration, so measurements in it equal the raw text widths.
 */

import type { PresentationTheme } from "./types.js";

export const defaultTheme: PresentationTheme = Object.freeze({
  defaultStyle: Object.freeze({
    alignment: Object.freeze({ kind: "left", margin: 0 }),
    colors: Object.freeze({}),
  }),
  slideTitle: Object.freeze({
    colors: Object.freeze({}),
    separator: false,
  }),
  headings: Object.freeze({
    h1: Object.freeze({ colors: Object.freeze({}) }),
    h2: Object.freeze({ colors: Object.freeze({}) }),
    h3: Object.freeze({ colors: Object.freeze({}) }),
    h4: Object.freeze({ colors: Object.freeze({}) }),
    h5: Object.freeze({ colors: Object.freeze({}) }),
    h6: Object.freeze({ colors: Object.freeze({}) }),
  }),
  code: Object.freeze({
    colors: Object.freeze({}),
    padding: Object.freeze({}),
  }),
  blockQuote: Object.freeze({
    colors: Object.freeze({}),
  }),
  introSlide: Object.freeze({
    title: Object.freeze({ colors: Object.freeze({}) }),
    subtitle: Object.freeze({ colors: Object.freeze({}) }),
    author: Object.freeze({ colors: Object.freeze({}), positioning: "belowTitle" }),
  }),
  footer: Object.freeze({ kind: "empty" }),
});
