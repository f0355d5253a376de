/**
 * packages/core/src/testing/recordingBackend.ts — In-memory terminal backend.
 *
 * Why: Operator and drawer tests need to assert what reached the terminal
 * without a TTY. Every backend call is recorded in order, and printed text is
 * also laid into a cell grid so tests can read back whole rows.
 */

import type { WindowSize } from "../presentation/operations.js";
import type { ImageArea, TerminalBackend } from "../render/backend.js";
import type { ImageHandle } from "../resources/resources.js";
import { graphemes } from "../text/measure.js";
import type { Colors, StyledText } from "../text/styled.js";

export type RecordedCall =
  | Readonly<{ kind: "setColors"; colors: Colors }>
  | Readonly<{ kind: "clearScreen" }>
  | Readonly<{ kind: "moveTo"; column: number; row: number }>
  | Readonly<{ kind: "printStyled"; column: number; row: number; chunk: StyledText }>
  | Readonly<{ kind: "printText"; column: number; row: number; text: string }>
  | Readonly<{ kind: "printImage"; column: number; row: number; path: string; area: ImageArea }>
  | Readonly<{ kind: "setCursorVisible"; visible: boolean }>
  | Readonly<{ kind: "setRawMode"; enabled: boolean }>
  | Readonly<{ kind: "flush" }>;

export interface RecordingBackend extends TerminalBackend {
  readonly calls: readonly RecordedCall[];
  /** Rows of the cell grid, trailing spaces removed. */
  screenLines(): string[];
  /** Text printed on `row`, trailing spaces removed. */
  screenRow(row: number): string;
  resize(size: Partial<WindowSize>): void;
  reset(): void;
}

export function createRecordingBackend(
  size: Partial<WindowSize> = {},
): RecordingBackend {
  let window: WindowSize = { rows: 24, columns: 80, width: 0, height: 0, ...size };
  const calls: RecordedCall[] = [];
  let grid = new Map<number, string[]>();
  let column = 0;
  let row = 0;

  function put(text: string): void {
    let line = grid.get(row);
    if (line === undefined) {
      line = [];
      grid.set(row, line);
    }
    for (const { cluster, width } of graphemes(text)) {
      if (width === 0) continue;
      while (line.length < column) line.push(" ");
      line[column] = cluster;
      for (let i = 1; i < width; i++) line[column + i] = "";
      column += width;
    }
  }

  function readRow(target: number): string {
    const line = grid.get(target) ?? [];
    return line.join("").trimEnd();
  }

  return {
    get calls() {
      return calls;
    },
    windowSize() {
      return window;
    },
    setColors(colors) {
      calls.push({ kind: "setColors", colors });
    },
    clearScreen() {
      calls.push({ kind: "clearScreen" });
      grid = new Map();
    },
    moveTo(nextColumn, nextRow) {
      calls.push({ kind: "moveTo", column: nextColumn, row: nextRow });
      column = nextColumn;
      row = nextRow;
    },
    printStyled(chunk) {
      calls.push({ kind: "printStyled", column, row, chunk });
      put(chunk.text);
    },
    printText(text) {
      calls.push({ kind: "printText", column, row, text });
      put(text);
    },
    printImage(image: ImageHandle, area) {
      calls.push({ kind: "printImage", column, row, path: image.path, area });
    },
    setCursorVisible(visible) {
      calls.push({ kind: "setCursorVisible", visible });
    },
    setRawMode(enabled) {
      calls.push({ kind: "setRawMode", enabled });
    },
    flush() {
      calls.push({ kind: "flush" });
    },
    screenLines() {
      const last = Math.max(-1, ...grid.keys());
      const lines: string[] = [];
      for (let i = 0; i <= last; i++) lines.push(readRow(i));
      return lines;
    },
    screenRow(target) {
      return readRow(target);
    },
    resize(next) {
      window = { ...window, ...next };
    },
    reset() {
      calls.length = 0;
      grid = new Map();
      column = 0;
      row = 0;
    },
  };
}
