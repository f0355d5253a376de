/**
 * @termdeck/node
 *
 * Node.js integration for termdeck: ANSI terminal backend, theme files,
 * image loading, highlight.js highlighting and the interactive presenter.
 */

export {
  createAnsiBackend,
  moveToSequence,
  type AnsiBackendOptions,
  type TerminalInput,
  type TerminalOutput,
} from "./backend/ansiBackend.js";
export {
  encodeImage,
  encodeIterm2Image,
  encodeKittyImage,
  imagePlaceholder,
  KITTY_CHUNK_SIZE,
} from "./backend/imageProtocols.js";
export { detectImageProtocol, type EnvMap, type ImageProtocol } from "./backend/terminalProfile.js";
export { readDeckConfig, type CellSize, type ColorLevel, type DeckConfig } from "./config.js";
export {
  createHighlightJsHighlighter,
  defaultPalette,
  htmlToAnsiLines,
  type HighlighterOptions,
  type HighlightPalette,
  type SyntaxTokenKind,
  type TokenStyle,
} from "./highlight.js";
export {
  clearImageCache,
  createFileResourceLoader,
  loadImage,
  readPngDimensions,
  setImageCacheMaxEntries,
} from "./image.js";
export { createFileLogSink, formatLogRecord, type FileLogSinkOptions } from "./logSink.js";
export {
  keyToCommand,
  runPresentation,
  type NavigationCommand,
  type PresentationOptions,
  type PresenterInput,
  type PresenterOutput,
  type PresenterResult,
} from "./presenter.js";
export { createThemeProvider, loadThemeFile, type ThemeProviderOptions } from "./theme/themeFiles.js";
