/**
 * packages/core/src/document/elements.ts — Structural document elements.
 *
 * Produced by an external markdown parser and consumed once by the builder.
 */

import type { Text } from "../text/styled.js";

export type ListItemType =
  | Readonly<{ kind: "unordered" }>
  | Readonly<{ kind: "orderedParens"; number: number }>
  | Readonly<{ kind: "orderedPeriod"; number: number }>;

export type ListItem = Readonly<{
  /** Nesting depth, 0 for top-level items. */
  depth: number;
  itemType: ListItemType;
  contents: Text;
}>;

export type ParagraphElement =
  | Readonly<{ kind: "text"; text: Text }>
  | Readonly<{ kind: "lineBreak" }>;

export type Code = Readonly<{
  contents: string;
  /** Fence info string, "" when absent. */
  language: string;
}>;

/** One cell per column. */
export type TableRow = readonly Text[];

export type Table = Readonly<{
  header: TableRow;
  rows: readonly TableRow[];
}>;

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type DocumentElement =
  | Readonly<{ kind: "frontMatter"; contents: string }>
  | Readonly<{ kind: "slideTitle"; text: Text }>
  | Readonly<{ kind: "heading"; level: HeadingLevel; text: Text }>
  | Readonly<{ kind: "paragraph"; elements: readonly ParagraphElement[] }>
  | Readonly<{ kind: "list"; items: readonly ListItem[] }>
  | Readonly<{ kind: "code"; code: Code }>
  | Readonly<{ kind: "table"; table: Table }>
  | Readonly<{ kind: "thematicBreak" }>
  | Readonly<{ kind: "comment"; comment: string }>
  | Readonly<{ kind: "blockQuote"; lines: readonly string[] }>
  | Readonly<{ kind: "image"; path: string }>;

export type DocumentElementKind = DocumentElement["kind"];
