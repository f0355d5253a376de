/**
 * packages/core/src/render/layout.ts — Horizontal placement of lines and blocks.
 */

import type { Alignment } from "../theme/types.js";

export type LinePosition = Readonly<{
  /** First column of the line. */
  start: number;
  /** Widest the line may be before it wraps. */
  maxWidth: number;
}>;

function clampWidth(width: number): number {
  return Math.max(1, width);
}

/**
 * Place a line (or block) of `width` cells in a window `columns` wide.
 *
 *   left{m}:   starts at m
 *   right{m}:  ends m cells before the right edge
 *   center:    centered; narrower windows than minimumSize + 2*minimumMargin
 *              fall back to left{minimumMargin}
 */
export function positionLine(alignment: Alignment, columns: number, width: number): LinePosition {
  switch (alignment.kind) {
    case "left":
      return { start: alignment.margin, maxWidth: clampWidth(columns - alignment.margin * 2) };
    case "right": {
      const maxWidth = clampWidth(columns - alignment.margin * 2);
      const start = columns - alignment.margin - Math.min(width, maxWidth);
      return { start: Math.max(0, start), maxWidth };
    }
    case "center": {
      if (columns < alignment.minimumSize + alignment.minimumMargin * 2) {
        return positionLine({ kind: "left", margin: alignment.minimumMargin }, columns, width);
      }
      const maxWidth = clampWidth(columns - alignment.minimumMargin * 2);
      const start = Math.floor((columns - Math.min(width, maxWidth)) / 2);
      return { start: Math.max(0, start), maxWidth };
    }
  }
}
