/**
 * packages/core/src/presentation/operations.ts — Render operation IR.
 *
 * A slide is a program of these operations. Everything the builder cannot
 * know at build time (final slide count, live window width) is expressed as a
 * `renderDynamic` operation resolved by the operator on every draw.
 */

import type { ImageHandle } from "../resources/resources.js";
import type { Colors } from "../text/styled.js";
import type { WeightedLine } from "../text/weighted.js";
import type { Alignment } from "../theme/types.js";

/** Live window dimensions; `width`/`height` are pixels, 0 when unknown. */
export type WindowSize = Readonly<{
  rows: number;
  columns: number;
  width: number;
  height: number;
}>;

/** A deferred operation: produces fresh operations for the given dimensions. */
export interface AsRenderOperations {
  asRenderOperations(dimensions: WindowSize): readonly RenderOperation[];
}

export type RenderOperation =
  | Readonly<{ kind: "setColors"; colors: Colors }>
  | Readonly<{ kind: "clearScreen" }>
  | Readonly<{ kind: "renderTextLine"; line: WeightedLine; alignment: Alignment }>
  | Readonly<{
      kind: "renderPreformattedLine";
      text: string;
      /** Display width of `text` without styling escapes. */
      unformattedLength: number;
      /** Shared display width of the block this line belongs to. */
      blockLength: number;
      alignment: Alignment;
    }>
  | Readonly<{ kind: "renderLineBreak" }>
  | Readonly<{ kind: "renderSeparator" }>
  | Readonly<{ kind: "renderImage"; image: ImageHandle }>
  | Readonly<{ kind: "jumpToVerticalCenter" }>
  | Readonly<{ kind: "jumpToSlideBottom" }>
  | Readonly<{ kind: "jumpToWindowBottom" }>
  | Readonly<{ kind: "renderDynamic"; operation: AsRenderOperations }>;

export type RenderOperationKind = RenderOperation["kind"];

export const LINE_BREAK: RenderOperation = Object.freeze({ kind: "renderLineBreak" });
