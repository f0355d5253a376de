/**
 * packages/core/src/render/backend.ts — Terminal backend contract.
 *
 * The operator only talks to a terminal through this interface. Implementations
 * throw DeckError("DECK_IO") when the terminal cannot be written or queried and
 * DeckError("DECK_OTHER") for failures of their own dependencies (e.g. images).
 */

import type { WindowSize } from "../presentation/operations.js";
import type { ImageHandle } from "../resources/resources.js";
import type { Colors, StyledText } from "../text/styled.js";

/** Cell area an image is drawn into, starting at the cursor. */
export type ImageArea = Readonly<{ columns: number; rows: number }>;

export interface TerminalBackend {
  windowSize(): WindowSize;
  /** Colors used for everything printed until the next call; unset slots use the terminal default. */
  setColors(colors: Colors): void;
  clearScreen(): void;
  /** 0-based cell coordinates. */
  moveTo(column: number, row: number): void;
  printStyled(chunk: StyledText): void;
  /** Preformatted text; may already carry styling escapes. */
  printText(text: string): void;
  printImage(image: ImageHandle, area: ImageArea): void;
  /** Showing the cursor also drops any colors still set. */
  setCursorVisible(visible: boolean): void;
  setRawMode(enabled: boolean): void;
  flush(): void;
}
