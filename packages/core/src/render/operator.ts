/**
 * packages/core/src/render/operator.ts — Executes render operations.
 *
 * The operator keeps a row cursor and turns each operation into backend calls
 * for the live window. Deferred operations are resolved on every draw and run
 * in place. Rows outside the window are skipped, not clipped mid-line.
 */

import { DeckError } from "../errors.js";
import type { AsRenderOperations, RenderOperation, WindowSize } from "../presentation/operations.js";
import type { ImageHandle } from "../resources/resources.js";
import type { WeightedLine } from "../text/weighted.js";
import { splitWeightedLine } from "../text/weighted.js";
import type { Alignment } from "../theme/types.js";
import type { ImageArea, TerminalBackend } from "./backend.js";
import { positionLine } from "./layout.js";

/** Rows kept free below the slide, where the footer is drawn. */
export const DEFAULT_RESERVED_ROWS = 3;

const MAX_DYNAMIC_DEPTH = 8;

export type RenderOperatorOptions = Readonly<{
  window: WindowSize;
  reservedRows?: number;
}>;

export interface RenderOperator {
  render(operation: RenderOperation): void;
  /** Current 0-based row of the cursor. */
  readonly row: number;
}

/** Fit an image into `columns` x `rows` cells, keeping its aspect ratio when known. */
export function fitImage(image: ImageHandle, window: WindowSize, columns: number, rows: number): ImageArea {
  const dimensions = image.dimensions;
  if (dimensions === undefined || window.width <= 0 || window.height <= 0 || window.columns <= 0 || window.rows <= 0) {
    return { columns, rows };
  }
  const cellWidth = window.width / window.columns;
  const cellHeight = window.height / window.rows;
  const naturalColumns = Math.max(1, Math.ceil(dimensions.width / cellWidth));
  const naturalRows = Math.max(1, Math.ceil(dimensions.height / cellHeight));
  const scale = Math.min(1, columns / naturalColumns, rows / naturalRows);
  return {
    columns: Math.max(1, Math.floor(naturalColumns * scale)),
    rows: Math.max(1, Math.floor(naturalRows * scale)),
  };
}

export function createRenderOperator(
  backend: TerminalBackend,
  options: RenderOperatorOptions,
): RenderOperator {
  const window = options.window;
  const reservedRows = options.reservedRows ?? DEFAULT_RESERVED_ROWS;
  const slideRows = Math.max(0, window.rows - reservedRows);
  const columns = window.columns;
  let row = 0;

  const rowVisible = (target: number): boolean => target >= 0 && target < window.rows;

  function renderTextLine(line: WeightedLine, alignment: Alignment): void {
    const { start, maxWidth } = positionLine(alignment, columns, line.width);
    const rows = splitWeightedLine(line, maxWidth);
    rows.forEach((wrapped, index) => {
      if (index > 0) row += 1;
      if (!rowVisible(row)) return;
      backend.moveTo(start, row);
      for (const chunk of wrapped.chunks) {
        backend.printStyled(chunk.text);
      }
    });
  }

  function renderPreformattedLine(
    text: string,
    unformattedLength: number,
    blockLength: number,
    alignment: Alignment,
  ): void {
    if (!rowVisible(row)) return;
    const { start } = positionLine(alignment, columns, blockLength);
    backend.moveTo(start, row);
    backend.printText(text);
    const padding = blockLength - unformattedLength;
    if (padding > 0) backend.printText(" ".repeat(padding));
  }

  function renderImage(image: ImageHandle): void {
    const remaining = slideRows - row;
    if (remaining <= 0 || columns <= 0) return;
    const area = fitImage(image, window, columns, remaining);
    backend.moveTo(Math.floor((columns - area.columns) / 2), row);
    backend.printImage(image, area);
    row += area.rows;
  }

  function renderDynamic(operation: AsRenderOperations, depth: number): void {
    if (depth >= MAX_DYNAMIC_DEPTH) {
      throw new DeckError(
        "DECK_UNSUPPORTED_STRUCTURE",
        `dynamic operations nested deeper than ${MAX_DYNAMIC_DEPTH} levels`,
      );
    }
    for (const resolved of operation.asRenderOperations(window)) {
      render(resolved, depth + 1);
    }
  }

  function render(operation: RenderOperation, depth: number): void {
    switch (operation.kind) {
      case "setColors":
        backend.setColors(operation.colors);
        return;
      case "clearScreen":
        backend.clearScreen();
        row = 0;
        return;
      case "renderLineBreak":
        row += 1;
        return;
      case "renderTextLine":
        renderTextLine(operation.line, operation.alignment);
        return;
      case "renderPreformattedLine":
        renderPreformattedLine(
          operation.text,
          operation.unformattedLength,
          operation.blockLength,
          operation.alignment,
        );
        return;
      case "renderSeparator":
        if (!rowVisible(row)) return;
        backend.moveTo(0, row);
        backend.printText("─".repeat(columns));
        return;
      case "renderImage":
        renderImage(operation.image);
        return;
      case "jumpToVerticalCenter":
        row = Math.floor(slideRows / 2);
        return;
      case "jumpToSlideBottom":
        row = Math.max(0, slideRows - 1);
        return;
      case "jumpToWindowBottom":
        row = Math.max(0, window.rows - 1);
        return;
      case "renderDynamic":
        renderDynamic(operation.operation, depth);
        return;
    }
  }

  return {
    render(operation) {
      render(operation, 0);
    },
    get row() {
      return row;
    },
  };
}
