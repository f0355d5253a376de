/**
 * packages/core/src/text/styled.ts — Styled text chunks and lines.
 */

import { measureTextCells } from "./measure.js";

export type Rgb = Readonly<{ r: number; g: number; b: number }>;

export type Colors = Readonly<{
  foreground?: Rgb;
  background?: Rgb;
}>;

export type TextStyle = Readonly<{
  bold?: boolean;
  italic?: boolean;
  /** Inline code span; takes the theme's code colors when emitted. */
  code?: boolean;
  colors?: Colors;
}>;

export type StyledText = Readonly<{
  text: string;
  style: TextStyle;
}>;

/** Ordered chunks, concatenated for display. */
export type Text = Readonly<{
  chunks: readonly StyledText[];
}>;

export function rgb(r: number, g: number, b: number): Rgb {
  return Object.freeze({ r, g, b });
}

export function styled(text: string, style: TextStyle = {}): StyledText {
  return { text, style };
}

export function textFrom(value: string | StyledText): Text {
  const chunk = typeof value === "string" ? styled(value) : value;
  return { chunks: [chunk] };
}

export function prependChunk(text: Text, chunk: StyledText): Text {
  return { chunks: [chunk, ...text.chunks] };
}

export function mergeColors(own: Colors | undefined, applied: Colors | undefined): Colors | undefined {
  if (own === undefined) return applied;
  if (applied === undefined) return own;
  const foreground = own.foreground ?? applied.foreground;
  const background = own.background ?? applied.background;
  return {
    ...(foreground !== undefined ? { foreground } : {}),
    ...(background !== undefined ? { background } : {}),
  };
}

/**
 * Merge `applied` into `own`: flags are OR-ed, colors already set on `own`
 * are kept and only unset slots are filled.
 */
export function mergeStyle(own: TextStyle, applied: TextStyle): TextStyle {
  const colors = mergeColors(own.colors, applied.colors);
  return {
    ...(own.bold === true || applied.bold === true ? { bold: true } : {}),
    ...(own.italic === true || applied.italic === true ? { italic: true } : {}),
    ...(own.code === true || applied.code === true ? { code: true } : {}),
    ...(colors !== undefined ? { colors } : {}),
  };
}

export function applyStyle(text: Text, style: TextStyle): Text {
  return { chunks: text.chunks.map((chunk) => styled(chunk.text, mergeStyle(chunk.style, style))) };
}

export function textWidth(text: Text): number {
  let width = 0;
  for (const chunk of text.chunks) {
    width += measureTextCells(chunk.text);
  }
  return width;
}

export function plainText(text: Text): string {
  return text.chunks.map((chunk) => chunk.text).join("");
}
