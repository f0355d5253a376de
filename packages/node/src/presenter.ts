/**
 * packages/node/src/presenter.ts — Interactive presentation loop.
 *
 * Builds the deck once, then redraws the current slide on every navigation
 * key and terminal resize until the user quits or input ends. A failed build
 * is shown on screen and the loop waits for quit. The terminal is restored on
 * every exit path, including process exit.
 */

import { emitKeypressEvents, type Key } from "node:readline";
import {
  type BuildError,
  type CodeHighlighter,
  type DeckLogSink,
  type DocumentElement,
  type PresentationTheme,
  type ResourceLoader,
  type TerminalBackend,
  type ThemeProvider,
  createDrawer,
  createPresentationBuilder,
  describeError,
  formatBuildError,
  makeLogSink,
} from "@termdeck/core";
import { type TerminalInput, type TerminalOutput, createAnsiBackend } from "./backend/ansiBackend.js";
import { type DeckConfig, readDeckConfig } from "./config.js";
import { createHighlightJsHighlighter } from "./highlight.js";
import { createFileResourceLoader } from "./image.js";
import { createFileLogSink } from "./logSink.js";
import { createThemeProvider } from "./theme/themeFiles.js";

export type PresenterInput = NodeJS.ReadableStream & TerminalInput;
export type PresenterOutput = NodeJS.EventEmitter & TerminalOutput;

export type NavigationCommand = "next" | "previous" | "first" | "last" | "quit";

export type PresentationOptions = Readonly<{
  elements: readonly DocumentElement[];
  input: PresenterInput;
  output: PresenterOutput;
  /** Defaults to readDeckConfig(process.env). */
  config?: DeckConfig;
  /** Relative image and theme paths resolve against this. Defaults to cwd. */
  baseDir?: string;
  /** Defaults to an ANSI backend over input/output. */
  backend?: TerminalBackend;
  themes?: ThemeProvider;
  highlighter?: CodeHighlighter;
  resources?: ResourceLoader;
  log?: DeckLogSink;
}>;

export type PresenterResult =
  | Readonly<{ ok: true; slideIndex: number; totalSlides: number }>
  | Readonly<{ ok: false; error: BuildError }>;

const NEXT_KEYS: ReadonlySet<string> = new Set(["right", "l", "j", "space", "pagedown"]);
const PREVIOUS_KEYS: ReadonlySet<string> = new Set(["left", "h", "k", "pageup"]);

/** Map a readline keypress to a navigation command. */
export function keyToCommand(sequence: string | undefined, key: Key | undefined): NavigationCommand | null {
  const name = key?.name;
  if (key?.ctrl === true) return name === "c" ? "quit" : null;
  if (sequence === "G" || (name === "g" && key?.shift === true) || name === "end") return "last";
  if (name === "g" || name === "home") return "first";
  if (name === "q") return "quit";
  if (name === undefined) return null;
  if (NEXT_KEYS.has(name)) return "next";
  if (PREVIOUS_KEYS.has(name)) return "previous";
  return null;
}

function resolveDefaultTheme(
  config: DeckConfig,
  themes: ThemeProvider,
  log: DeckLogSink,
): PresentationTheme | undefined {
  if (config.theme === undefined) return undefined;
  const theme = themes.lookupByName(config.theme);
  if (theme === null) {
    log({ level: "warn", message: "unknown default theme", detail: { name: config.theme } });
    return undefined;
  }
  return theme;
}

export function runPresentation(options: PresentationOptions): Promise<PresenterResult> {
  const config = options.config ?? readDeckConfig(process.env);
  const baseDir = options.baseDir ?? process.cwd();
  const log = makeLogSink(
    options.log ?? (config.logPath === undefined ? undefined : createFileLogSink(config.logPath)),
  );
  const { input, output } = options;

  return new Promise<PresenterResult>((resolvePromise, rejectPromise) => {
    const themes =
      options.themes ??
      createThemeProvider({ baseDir, ...(config.themesDir === undefined ? {} : { themesDir: config.themesDir }) });
    const defaultTheme = resolveDefaultTheme(config, themes, log);
    const builder = createPresentationBuilder({
      themes,
      highlighter: options.highlighter ?? createHighlightJsHighlighter({ colorLevel: config.colorLevel }),
      resources: options.resources ?? createFileResourceLoader(baseDir),
      log,
      ...(defaultTheme === undefined ? {} : { theme: defaultTheme }),
    });
    const built = builder.build(options.elements);

    const backend =
      options.backend ??
      createAnsiBackend({
        input,
        output,
        colorLevel: config.colorLevel,
        imageProtocol: config.imageProtocol,
        ...(config.cellSize === undefined ? {} : { cellSize: config.cellSize }),
      });
    const drawer = createDrawer(backend, { reservedRows: config.reservedRows, log });
    let finished = false;

    const draw = (): void => {
      if (built.ok) {
        drawer.renderSlide(built.presentation);
      } else {
        drawer.renderError(formatBuildError(built.error));
      }
    };

    const cleanup = (): void => {
      input.off("keypress", onKeypress);
      input.off("end", onEnd);
      output.off("resize", onResize);
      process.off("exit", onExit);
      drawer.dispose();
      input.pause();
    };

    const finish = (error?: unknown): void => {
      if (finished) return;
      finished = true;
      let failure = error;
      try {
        cleanup();
      } catch (cleanupError: unknown) {
        failure ??= cleanupError;
      }
      if (failure !== undefined) {
        log({ level: "error", message: "presentation aborted", detail: { error: describeError(failure) } });
        rejectPromise(failure);
        return;
      }
      if (!built.ok) {
        resolvePromise({ ok: false, error: built.error });
        return;
      }
      resolvePromise({
        ok: true,
        slideIndex: built.presentation.currentSlideIndex(),
        totalSlides: built.presentation.totalSlides(),
      });
    };

    const navigate = (command: NavigationCommand): void => {
      if (command === "quit") {
        log({ level: "info", message: "quit requested" });
        finish();
        return;
      }
      if (!built.ok) return;
      const presentation = built.presentation;
      let moved = false;
      switch (command) {
        case "next":
          moved = presentation.jumpNextSlide();
          break;
        case "previous":
          moved = presentation.jumpPreviousSlide();
          break;
        case "first":
          moved = presentation.jumpFirstSlide();
          break;
        case "last":
          moved = presentation.jumpLastSlide();
          break;
      }
      if (!moved) return;
      log({ level: "debug", message: "slide changed", detail: { command, slide: presentation.currentSlideIndex() } });
      draw();
    };

    function onKeypress(sequence: string | undefined, key: Key | undefined): void {
      const command = keyToCommand(sequence, key);
      if (command === null) return;
      try {
        navigate(command);
      } catch (error: unknown) {
        finish(error);
      }
    }

    function onResize(): void {
      const size = backend.windowSize();
      log({ level: "info", message: "terminal resized", detail: { rows: size.rows, columns: size.columns } });
      try {
        draw();
      } catch (error: unknown) {
        finish(error);
      }
    }

    function onEnd(): void {
      finish();
    }

    function onExit(): void {
      drawer.dispose();
    }

    emitKeypressEvents(input);
    input.on("keypress", onKeypress);
    input.on("end", onEnd);
    output.on("resize", onResize);
    process.once("exit", onExit);
    input.resume();

    try {
      draw();
    } catch (error: unknown) {
      finish(error);
    }
  });
}
