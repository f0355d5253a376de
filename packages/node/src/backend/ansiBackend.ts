/**
 * packages/node/src/backend/ansiBackend.ts — TerminalBackend over Node streams.
 *
 * Output is buffered and written in one piece by flush(). Styled chunks go
 * through chalk; chalk closes every color it opens, so the current slide
 * colors are re-emitted after each styled write. Switching colors first
 * resets both slots so a color the new set leaves unset falls back to the
 * terminal default.
 */

import { Chalk, type ChalkInstance } from "chalk";
import {
  type Colors,
  DeckError,
  type StyledText,
  type TerminalBackend,
  type WindowSize,
  describeError,
} from "@termdeck/core";
import type { CellSize, ColorLevel } from "../config.js";
import { encodeImage } from "./imageProtocols.js";
import type { ImageProtocol } from "./terminalProfile.js";

export interface TerminalInput {
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
}

export interface TerminalOutput {
  readonly columns?: number;
  readonly rows?: number;
  write(chunk: string): boolean;
}

export type AnsiBackendOptions = Readonly<{
  input?: TerminalInput;
  output: TerminalOutput;
  colorLevel?: ColorLevel;
  imageProtocol?: ImageProtocol;
  /** Pixel size of one cell; lets images keep their aspect ratio. */
  cellSize?: CellSize;
}>;

const ESC = "\x1b";
const CSI = `${ESC}[`;
const FALLBACK_COLUMNS = 80;
const FALLBACK_ROWS = 24;
const MARK = "\u0000";

function streamDimension(value: number | undefined, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

/** Escape codes chalk emits before the text for `paint`. */
function openCodes(paint: ChalkInstance): string {
  const marked = paint(MARK);
  const at = marked.indexOf(MARK);
  return at > 0 ? marked.slice(0, at) : "";
}

export function moveToSequence(column: number, row: number): string {
  return `${CSI}${String(row + 1)};${String(column + 1)}H`;
}

export function createAnsiBackend(options: AnsiBackendOptions): TerminalBackend {
  const { input, output } = options;
  const chalk = new Chalk({ level: options.colorLevel ?? 3 });
  const imageProtocol = options.imageProtocol ?? "none";
  const pending: string[] = [];
  const resetColors = chalk.level > 0 ? `${CSI}39;49m` : "";
  const resetAttributes = chalk.level > 0 ? `${CSI}0m` : "";
  let colorCodes = "";

  const paintFor = (style: StyledText["style"]): ChalkInstance => {
    let paint = chalk;
    if (style.bold === true) paint = paint.bold;
    if (style.italic === true) paint = paint.italic;
    const foreground = style.colors?.foreground;
    const background = style.colors?.background;
    if (foreground !== undefined) paint = paint.rgb(foreground.r, foreground.g, foreground.b);
    if (background !== undefined) paint = paint.bgRgb(background.r, background.g, background.b);
    return paint;
  };

  const colorsCodes = (colors: Colors): string => {
    let codes = "";
    if (colors.foreground !== undefined) {
      const { r, g, b } = colors.foreground;
      codes += openCodes(chalk.rgb(r, g, b));
    }
    if (colors.background !== undefined) {
      const { r, g, b } = colors.background;
      codes += openCodes(chalk.bgRgb(r, g, b));
    }
    return codes;
  };

  return {
    windowSize(): WindowSize {
      const columns = streamDimension(output.columns, FALLBACK_COLUMNS);
      const rows = streamDimension(output.rows, FALLBACK_ROWS);
      const cellSize = options.cellSize;
      return {
        columns,
        rows,
        width: cellSize === undefined ? 0 : columns * cellSize.width,
        height: cellSize === undefined ? 0 : rows * cellSize.height,
      };
    },
    setColors(colors) {
      colorCodes = colorsCodes(colors);
      pending.push(resetColors, colorCodes);
    },
    clearScreen() {
      pending.push(`${CSI}2J`);
    },
    moveTo(column, row) {
      pending.push(moveToSequence(column, row));
    },
    printStyled(chunk) {
      const painted = paintFor(chunk.style)(chunk.text);
      pending.push(painted);
      if (painted !== chunk.text) pending.push(colorCodes);
    },
    printText(text) {
      pending.push(text);
      if (text.includes(ESC)) pending.push(colorCodes);
    },
    printImage(image, area) {
      pending.push(encodeImage(imageProtocol, image, area));
    },
    setCursorVisible(visible) {
      if (!visible) {
        pending.push(`${CSI}?25l`);
        return;
      }
      // Showing the cursor ends the session: hand the terminal back uncolored.
      colorCodes = "";
      pending.push(resetAttributes, `${CSI}?25h`);
    },
    setRawMode(enabled) {
      if (input === undefined || input.isTTY !== true || input.setRawMode === undefined) return;
      try {
        input.setRawMode(enabled);
      } catch (error: unknown) {
        throw new DeckError("DECK_IO", `switching raw mode: ${describeError(error)}`, { cause: error });
      }
    },
    flush() {
      if (pending.length === 0) return;
      const data = pending.join("");
      pending.length = 0;
      try {
        output.write(data);
      } catch (error: unknown) {
        throw new DeckError("DECK_IO", `writing to terminal: ${describeError(error)}`, { cause: error });
      }
    },
  };
}
