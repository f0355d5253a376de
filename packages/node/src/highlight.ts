/**
 * packages/node/src/highlight.ts — highlight.js code highlighter.
 *
 * highlight.js produces HTML (`<span class="hljs-keyword">`); each span scope
 * maps to a token kind, and kinds are painted with chalk line by line. A span
 * may cover several lines (block comments, template strings), so open scopes
 * carry over line breaks.
 */

import { Chalk, type ChalkInstance } from "chalk";
import hljs from "highlight.js";
import {
  type CodeHighlighter,
  type CodeLine,
  type Rgb,
  rgb,
  splitCodeLines,
} from "@termdeck/core";
import type { ColorLevel } from "./config.js";

export type SyntaxTokenKind =
  | "keyword"
  | "type"
  | "string"
  | "number"
  | "comment"
  | "operator"
  | "punctuation"
  | "function"
  | "variable";

export type TokenStyle = Readonly<{ foreground: Rgb; bold?: boolean; italic?: boolean }>;

export type HighlightPalette = Readonly<Record<SyntaxTokenKind, TokenStyle>>;

export type HighlighterOptions = Readonly<{
  palette?: HighlightPalette;
  colorLevel?: ColorLevel;
}>;

export const defaultPalette: HighlightPalette = Object.freeze({
  keyword: { foreground: rgb(255, 143, 64), bold: true },
  type: { foreground: rgb(89, 194, 255), bold: true },
  string: { foreground: rgb(170, 217, 76) },
  number: { foreground: rgb(210, 166, 255) },
  comment: { foreground: rgb(92, 103, 115), italic: true },
  operator: { foreground: rgb(242, 150, 104) },
  punctuation: { foreground: rgb(191, 189, 182) },
  function: { foreground: rgb(255, 180, 84), bold: true },
  variable: { foreground: rgb(240, 113, 120) },
});

/** highlight.js scope (without `hljs-`) → token kind. Unlisted scopes inherit. */
const SCOPE_KINDS: Readonly<Record<string, SyntaxTokenKind>> = Object.freeze({
  keyword: "keyword",
  literal: "keyword",
  meta: "keyword",
  tag: "keyword",
  name: "keyword",
  "selector-tag": "keyword",
  built_in: "type",
  type: "type",
  class: "type",
  string: "string",
  regexp: "string",
  symbol: "string",
  char: "string",
  addition: "string",
  number: "number",
  comment: "comment",
  doctag: "comment",
  quote: "comment",
  operator: "operator",
  punctuation: "punctuation",
  title: "function",
  section: "function",
  function: "function",
  variable: "variable",
  "template-variable": "variable",
  params: "variable",
  attr: "variable",
  attribute: "variable",
  property: "variable",
  deletion: "variable",
});

const ENTITIES: Readonly<Record<string, string>> = Object.freeze({
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&#x27;": "'",
  "&#39;": "'",
  "&amp;": "&",
});

function decodeEntities(text: string): string {
  return text.replace(/&(?:lt|gt|quot|amp|#x27|#39);/g, (entity) => ENTITIES[entity] ?? entity);
}

function kindOf(openTag: string): SyntaxTokenKind | null {
  const match = /class="([^"]*)"/.exec(openTag);
  const first = match?.[1]?.split(/\s+/)[0];
  if (first === undefined || !first.startsWith("hljs-")) return null;
  const scope = first.slice("hljs-".length);
  return Object.hasOwn(SCOPE_KINDS, scope) ? (SCOPE_KINDS[scope] ?? null) : null;
}

/**
 * Convert highlight.js HTML into one ANSI string per source line. The
 * innermost span with a known token kind decides a token's style.
 */
export function htmlToAnsiLines(html: string, palette: HighlightPalette, chalk: ChalkInstance): string[] {
  const lines: string[] = [""];
  const scopes: (SyntaxTokenKind | null)[] = [];

  const paint = (text: string): string => {
    for (let i = scopes.length - 1; i >= 0; i--) {
      const kind = scopes[i];
      if (kind === null || kind === undefined) continue;
      const style = palette[kind];
      let painter = chalk.rgb(style.foreground.r, style.foreground.g, style.foreground.b);
      if (style.bold === true) painter = painter.bold;
      if (style.italic === true) painter = painter.italic;
      return painter(text);
    }
    return text;
  };

  const emit = (raw: string): void => {
    const pieces = decodeEntities(raw).split("\n");
    pieces.forEach((piece, index) => {
      if (index > 0) lines.push("");
      if (piece.length === 0) return;
      const last = lines.length - 1;
      lines[last] = `${lines[last] ?? ""}${paint(piece)}`;
    });
  };

  const tag = /<span([^>]*)>|<\/span>/g;
  let cursor = 0;
  for (let match = tag.exec(html); match !== null; match = tag.exec(html)) {
    emit(html.slice(cursor, match.index));
    cursor = match.index + match[0].length;
    if (match[0] === "</span>") {
      scopes.pop();
    } else {
      scopes.push(kindOf(match[1] ?? ""));
    }
  }
  emit(html.slice(cursor));
  return lines;
}

export function createHighlightJsHighlighter(options: HighlighterOptions = {}): CodeHighlighter {
  const palette = options.palette ?? defaultPalette;
  const chalk = new Chalk({ level: options.colorLevel ?? 3 });

  return {
    highlight(code, language): readonly CodeLine[] {
      const originals = splitCodeLines(code);
      if (language.length === 0 || hljs.getLanguage(language) === undefined) {
        return originals.map((line) => ({ formatted: line, original: line }));
      }
      const html = hljs.highlight(code, { language, ignoreIllegals: true }).value;
      const formatted = htmlToAnsiLines(html, palette, chalk);
      return originals.map((original, index) => ({ formatted: formatted[index] ?? original, original }));
    },
  };
}
