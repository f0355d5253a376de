/**
 * packages/core/src/highlighting/highlighter.ts — Code highlighting contract.
 */

/**
 * One highlighted source line.
 *
 * `formatted` may contain zero-width styling escapes; `original` is the same
 * line without them and is what widths are measured on.
 */
export type CodeLine = Readonly<{
  formatted: string;
  original: string;
}>;

export interface CodeHighlighter {
  highlight(code: string, language: string): readonly CodeLine[];
}

/** Split code into lines without styling. */
export function splitCodeLines(code: string): string[] {
  const lines = code.split("\n");
  if (lines.length > 1 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function createPlainHighlighter(): CodeHighlighter {
  return {
    highlight(code) {
      return splitCodeLines(code).map((line) => ({ formatted: line, original: line }));
    },
  };
}
