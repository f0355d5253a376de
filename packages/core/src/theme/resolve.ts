/**
 * packages/core/src/theme/resolve.ts — Per-element alignment resolution.
 */

import type { Alignment, ElementType, HeadingStyle, PresentationTheme } from "./types.js";

export function resolveHeadingStyle(theme: PresentationTheme, level: number): HeadingStyle {
  switch (level) {
    case 1:
      return theme.headings.h1;
    case 2:
      return theme.headings.h2;
    case 3:
      return theme.headings.h3;
    case 4:
      return theme.headings.h4;
    case 5:
      return theme.headings.h5;
    default:
      return theme.headings.h6;
  }
}

/**
 * Alignment for an element: the element's own style wins, otherwise the
 * theme's default alignment applies.
 */
export function resolveAlignment(theme: PresentationTheme, element: ElementType): Alignment {
  let specific: Alignment | undefined;
  switch (element) {
    case "slideTitle":
      specific = theme.slideTitle.alignment;
      break;
    case "heading1":
      specific = theme.headings.h1.alignment;
      break;
    case "heading2":
      specific = theme.headings.h2.alignment;
      break;
    case "heading3":
      specific = theme.headings.h3.alignment;
      break;
    case "heading4":
      specific = theme.headings.h4.alignment;
      break;
    case "heading5":
      specific = theme.headings.h5.alignment;
      break;
    case "heading6":
      specific = theme.headings.h6.alignment;
      break;
    case "code":
      specific = theme.code.alignment;
      break;
    case "blockQuote":
      specific = theme.blockQuote.alignment;
      break;
    case "presentationTitle":
      specific = theme.introSlide.title.alignment;
      break;
    case "presentationSubtitle":
      specific = theme.introSlide.subtitle.alignment;
      break;
    case "presentationAuthor":
      specific = theme.introSlide.author.alignment;
      break;
    case "paragraph":
    case "list":
    case "table":
      specific = undefined;
      break;
  }
  return specific ?? theme.defaultStyle.alignment;
}
