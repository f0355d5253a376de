/**
 * packages/core/src/render/drawer.ts — Render session over a terminal backend.
 *
 * Creating a drawer puts the terminal in raw mode and hides the cursor;
 * dispose() reverses both. withDrawer() scopes a session so the terminal is
 * restored on every exit path.
 */

import { type DeckLogSink, makeLogSink } from "../log.js";
import type { RenderOperation } from "../presentation/operations.js";
import type { Presentation } from "../presentation/presentation.js";
import { rgb, styled } from "../text/styled.js";
import { weightedLine } from "../text/weighted.js";
import type { Alignment } from "../theme/types.js";
import type { TerminalBackend } from "./backend.js";
import { createRenderOperator, DEFAULT_RESERVED_ROWS } from "./operator.js";

export type DrawerOptions = Readonly<{
  /** Rows below the slide kept for the footer. Defaults to 3. */
  reservedRows?: number;
  log?: DeckLogSink;
}>;

export interface Drawer {
  renderSlide(presentation: Presentation): void;
  /** Draw a build failure with fixed colors, independent of any theme. */
  renderError(message: string): void;
  /** Restore the cursor and cooked mode. Safe to call more than once. */
  dispose(): void;
}

const ERROR_ALIGNMENT: Alignment = Object.freeze({ kind: "center", minimumSize: 0, minimumMargin: 5 });

/** Operations drawn by renderError(). */
export function errorOperations(message: string): readonly RenderOperation[] {
  return [
    { kind: "clearScreen" },
    { kind: "setColors", colors: { foreground: rgb(255, 0, 0), background: rgb(0, 0, 0) } },
    { kind: "jumpToVerticalCenter" },
    {
      kind: "renderTextLine",
      line: weightedLine([styled("Error loading presentation", { bold: true }), styled(": ")]),
      alignment: ERROR_ALIGNMENT,
    },
    { kind: "renderLineBreak" },
    { kind: "renderLineBreak" },
    { kind: "renderTextLine", line: weightedLine([styled(message)]), alignment: ERROR_ALIGNMENT },
  ];
}

export function createDrawer(backend: TerminalBackend, options: DrawerOptions = {}): Drawer {
  const reservedRows = options.reservedRows ?? DEFAULT_RESERVED_ROWS;
  const log = makeLogSink(options.log);
  let disposed = false;

  backend.setRawMode(true);
  backend.setCursorVisible(false);

  return {
    renderSlide(presentation) {
      const window = backend.windowSize();
      const operator = createRenderOperator(backend, { window, reservedRows });
      for (const operation of presentation.currentSlide().operations) {
        operator.render(operation);
      }
      backend.flush();
      log({
        level: "debug",
        message: "slide drawn",
        detail: { slide: presentation.currentSlideIndex(), rows: window.rows, columns: window.columns },
      });
    },
    renderError(message) {
      const operator = createRenderOperator(backend, { window: backend.windowSize(), reservedRows: 0 });
      for (const operation of errorOperations(message)) {
        operator.render(operation);
      }
      backend.flush();
    },
    dispose() {
      if (disposed) return;
      disposed = true;
      backend.setCursorVisible(true);
      backend.setRawMode(false);
      backend.flush();
    },
  };
}

export function withDrawer<T>(
  backend: TerminalBackend,
  options: DrawerOptions,
  run: (drawer: Drawer) => T,
): T {
  const drawer = createDrawer(backend, options);
  try {
    return run(drawer);
  } finally {
    drawer.dispose();
  }
}
