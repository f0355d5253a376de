/**
 * packages/core/src/text/weighted.ts — Render-ready text with precomputed widths.
 */

import { measureTextCells, splitWordByWidth } from "./measure.js";
import { type StyledText, styled } from "./styled.js";

export type WeightedText = Readonly<{
  text: StyledText;
  width: number;
}>;

export type WeightedLine = Readonly<{
  chunks: readonly WeightedText[];
  /** Sum of the chunk widths. */
  width: number;
}>;

export function weightedText(text: StyledText): WeightedText {
  return { text, width: measureTextCells(text.text) };
}

export function weightedLine(chunks: readonly StyledText[]): WeightedLine {
  const weighted = chunks.map(weightedText);
  let width = 0;
  for (const chunk of weighted) width += chunk.width;
  return { chunks: weighted, width };
}

type RowBuilder = {
  chunks: WeightedText[];
  width: number;
};

function pushPiece(row: RowBuilder, piece: string, source: StyledText, width: number): void {
  const last = row.chunks[row.chunks.length - 1];
  if (last !== undefined && last.text.style === source.style) {
    row.chunks[row.chunks.length - 1] = {
      text: styled(last.text.text + piece, source.style),
      width: last.width + width,
    };
  } else {
    row.chunks.push({ text: styled(piece, source.style), width });
  }
  row.width += width;
}

/**
 * Greedily wrap a line into rows of at most `maxWidth` cells.
 *
 * - Breaks between whitespace and non-whitespace tokens
 * - Whitespace that would start a wrapped row is dropped
 * - Tokens wider than `maxWidth` are hard-broken at grapheme boundaries
 */
export function splitWeightedLine(line: WeightedLine, maxWidth: number): WeightedLine[] {
  if (maxWidth <= 0 || line.width <= maxWidth) return [line];

  const rows: WeightedLine[] = [];
  let row: RowBuilder = { chunks: [], width: 0 };
  const flush = (): void => {
    rows.push({ chunks: row.chunks, width: row.width });
    row = { chunks: [], width: 0 };
  };

  for (const chunk of line.chunks) {
    const tokens = chunk.text.text.match(/[^\s]+|\s+/g) ?? [];
    for (const token of tokens) {
      const isSpace = /^\s+$/.test(token);
      const tokenWidth = measureTextCells(token);
      if (row.width + tokenWidth <= maxWidth) {
        if (isSpace && row.width === 0 && rows.length > 0) continue;
        pushPiece(row, token, chunk.text, tokenWidth);
        continue;
      }
      if (isSpace) {
        if (row.width > 0) flush();
        continue;
      }
      if (tokenWidth <= maxWidth) {
        flush();
        pushPiece(row, token, chunk.text, tokenWidth);
        continue;
      }
      for (const piece of splitWordByWidth(token, maxWidth)) {
        const pieceWidth = measureTextCells(piece);
        if (row.width + pieceWidth > maxWidth && row.width > 0) flush();
        pushPiece(row, piece, chunk.text, pieceWidth);
      }
    }
  }
  if (row.chunks.length > 0) flush();
  return rows;
}
