/**
 * @termdeck/core
 *
 * Runtime-agnostic core for termdeck: document elements → slide programs →
 * terminal backend calls.
 * This package MUST NOT use Node-specific APIs (Buffer, node:* imports).
 */

// =============================================================================
// Errors and logging
// =============================================================================

export {
  DeckError,
  ResourceLoadError,
  ThemeLoadError,
  describeError,
  formatBuildError,
  type BuildError,
  type BuildErrorCode,
  type DeckErrorCode,
} from "./errors.js";
export { makeLogSink, type DeckLogEvent, type DeckLogLevel, type DeckLogSink } from "./log.js";

// =============================================================================
// Text
// =============================================================================

export {
  applyStyle,
  mergeColors,
  mergeStyle,
  plainText,
  prependChunk,
  rgb,
  styled,
  textFrom,
  textWidth,
  type Colors,
  type Rgb,
  type StyledText,
  type Text,
  type TextStyle,
} from "./text/styled.js";
export {
  clearTextMeasureCache,
  getTextMeasureCacheSize,
  graphemes,
  measureTextCells,
  splitWordByWidth,
} from "./text/measure.js";
export {
  splitWeightedLine,
  weightedLine,
  weightedText,
  type WeightedLine,
  type WeightedText,
} from "./text/weighted.js";

// =============================================================================
// Document, resources, highlighting
// =============================================================================

export type {
  Code,
  DocumentElement,
  DocumentElementKind,
  HeadingLevel,
  ListItem,
  ListItemType,
  ParagraphElement,
  Table,
  TableRow,
} from "./document/elements.js";
export type { ImageDimensions, ImageFormat, ImageHandle, ResourceLoader } from "./resources/resources.js";
export {
  createPlainHighlighter,
  splitCodeLines,
  type CodeHighlighter,
  type CodeLine,
} from "./highlighting/highlighter.js";

// =============================================================================
// Theme, presentation, builder, render
// =============================================================================

export * from "./theme/index.js";
export * from "./presentation/index.js";
export * from "./builder/index.js";
export * from "./render/index.js";
