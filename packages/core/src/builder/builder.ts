/**
 * packages/core/src/builder/builder.ts — Document elements → slide programs.
 *
 * The builder walks parsed document elements once and accumulates render
 * operations for the slide in progress. Every slide opens with the same
 * prelude (set colors, clear screen, one line break) and closes with a
 * deferred footer operation.
 *
 * Build failures are returned as values: `{ ok: false, error }`. No partial
 * presentation is ever returned.
 */

import type { Code, DocumentElement, ListItem, ParagraphElement, Table, TableRow } from "../document/elements.js";
import { type BuildError, type BuildErrorCode, describeError, ResourceLoadError } from "../errors.js";
import { type CodeHighlighter, createPlainHighlighter } from "../highlighting/highlighter.js";
import { type DeckLogSink, makeLogSink } from "../log.js";
import { createFooterGenerator, FooterContext } from "../presentation/footer.js";
import { LINE_BREAK, type RenderOperation } from "../presentation/operations.js";
import { Presentation, type Slide } from "../presentation/presentation.js";
import type { ImageHandle, ResourceLoader } from "../resources/resources.js";
import { measureTextCells } from "../text/measure.js";
import {
  applyStyle,
  prependChunk,
  styled,
  type StyledText,
  type Text,
  textFrom,
  textWidth,
} from "../text/styled.js";
import { weightedLine } from "../text/weighted.js";
import { defaultTheme } from "../theme/defaultTheme.js";
import { mergeTheme } from "../theme/extend.js";
import { createBuiltinThemeProvider, type ThemeProvider } from "../theme/provider.js";
import { resolveAlignment, resolveHeadingStyle } from "../theme/resolve.js";
import type { ElementType, PresentationTheme } from "../theme/types.js";
import { type PresentationMetadata, parseDirective, parseMetadata } from "./metadata.js";

/** Number of operations in a freshly opened slide. */
const PRELUDE_LENGTH = 3;

export type BuildResult =
  | Readonly<{ ok: true; presentation: Presentation }>
  | Readonly<{ ok: false; error: BuildError }>;

export type PresentationBuilderOptions = Readonly<{
  /** Theme used unless front matter picks another. Defaults to defaultTheme. */
  theme?: PresentationTheme;
  themes?: ThemeProvider;
  highlighter?: CodeHighlighter;
  resources?: ResourceLoader;
  log?: DeckLogSink;
}>;

export interface PresentationBuilder {
  build(elements: readonly DocumentElement[]): BuildResult;
}

class BuildFailure extends Error {
  override readonly name = "BuildFailure";
  readonly error: BuildError;

  constructor(code: BuildErrorCode, detail: string) {
    super(detail);
    this.error = { code, detail };
  }
}

const missingResources: ResourceLoader = {
  loadImage(path) {
    throw new ResourceLoadError(path, `no resource loader configured for ${path}`);
  },
};

function unorderedMarker(depth: number): string {
  if (depth === 0) return "•";
  if (depth === 1) return "◦";
  return "▪";
}

/** Mutable state for one build() call. */
class BuildSession {
  private operations: RenderOperation[] = [];
  private readonly slides: Slide[] = [];
  private readonly footerContext = new FooterContext();
  private theme: PresentationTheme;
  private ignoreElementLineBreak = false;
  private lastElementIsList = false;

  constructor(
    theme: PresentationTheme,
    private readonly themes: ThemeProvider,
    private readonly highlighter: CodeHighlighter,
    private readonly resources: ResourceLoader,
    private readonly log: DeckLogSink,
  ) {
    this.theme = theme;
  }

  run(elements: readonly DocumentElement[]): Presentation {
    const first = elements[0];
    if (first !== undefined && first.kind === "frontMatter") {
      this.processFrontMatter(first.contents);
    }
    if (this.operations.length === 0) {
      this.pushSlidePrelude();
    }

    for (const element of elements) {
      this.ignoreElementLineBreak = false;
      this.processElement(element);
      if (!this.ignoreElementLineBreak) {
        this.pushLineBreak();
      }
    }

    if (this.operations.length > PRELUDE_LENGTH || this.slides.length === 0) {
      this.terminateSlide();
    }
    this.footerContext.finalize(this.slides.length);
    this.log({ level: "info", message: "presentation built", detail: { slides: this.slides.length } });
    return new Presentation(this.slides);
  }

  private processElement(element: DocumentElement): void {
    switch (element.kind) {
      case "frontMatter":
        // Only the leading front matter is processed, before everything else.
        this.ignoreElementLineBreak = true;
        break;
      case "slideTitle":
        this.pushSlideTitle(element.text);
        break;
      case "heading":
        this.pushHeading(element.level, element.text);
        break;
      case "paragraph":
        this.pushParagraph(element.elements);
        break;
      case "list":
        for (const item of element.items) this.pushListItem(item);
        break;
      case "code":
        this.pushCode(element.code);
        break;
      case "table":
        this.pushTable(element.table);
        break;
      case "thematicBreak":
        this.terminateSlide();
        break;
      case "comment":
        this.processComment(element.comment);
        break;
      case "blockQuote":
        this.pushBlockQuote(element.lines);
        break;
      case "image":
        this.pushImage(element.path);
        break;
    }
    this.lastElementIsList = element.kind === "list";
  }

  private processFrontMatter(contents: string): void {
    const parsed = parseMetadata(contents);
    if (!parsed.ok) {
      throw new BuildFailure("INVALID_METADATA", parsed.detail);
    }
    const metadata = parsed.metadata;

    this.footerContext.setAuthor(metadata.author ?? "");
    this.setTheme(metadata.theme);
    if (metadata.title !== undefined || metadata.subtitle !== undefined || metadata.author !== undefined) {
      this.pushSlidePrelude();
      this.pushIntroSlide(metadata);
    }
  }

  private setTheme(metadata: PresentationMetadata["theme"]): void {
    if (metadata.name !== undefined) {
      let theme: PresentationTheme | null;
      try {
        theme = this.themes.lookupByName(metadata.name);
      } catch (error: unknown) {
        throw new BuildFailure("INVALID_THEME", describeError(error));
      }
      if (theme === null) {
        throw new BuildFailure("INVALID_METADATA", `theme '${metadata.name}' does not exist`);
      }
      this.theme = theme;
      this.log({ level: "info", message: "theme selected", detail: { name: metadata.name } });
    }
    if (metadata.path !== undefined) {
      try {
        this.theme = this.themes.loadFromPath(metadata.path);
      } catch (error: unknown) {
        throw new BuildFailure("INVALID_THEME", describeError(error));
      }
      this.log({ level: "info", message: "theme loaded", detail: { path: metadata.path } });
    }
    if (metadata.overrides !== undefined) {
      try {
        this.theme = mergeTheme(this.theme, metadata.overrides);
      } catch (error: unknown) {
        throw new BuildFailure("INVALID_METADATA", `invalid theme: ${describeError(error)}`);
      }
    }
  }

  private pushIntroSlide(metadata: PresentationMetadata): void {
    const styles = this.theme.introSlide;
    const title = styled(metadata.title ?? "", { bold: true, colors: styles.title.colors });

    this.operations.push({ kind: "jumpToVerticalCenter" });
    this.pushText(textFrom(title), "presentationTitle");
    this.pushLineBreak();
    if (metadata.subtitle !== undefined) {
      this.pushText(textFrom(styled(metadata.subtitle, { colors: styles.subtitle.colors })), "presentationSubtitle");
      this.pushLineBreak();
    }
    if (metadata.author !== undefined) {
      switch (styles.author.positioning) {
        case "belowTitle":
          this.pushLineBreak();
          this.pushLineBreak();
          this.pushLineBreak();
          break;
        case "pageBottom":
          this.operations.push({ kind: "jumpToSlideBottom" });
          break;
      }
      this.pushText(textFrom(styled(metadata.author, { colors: styles.author.colors })), "presentationAuthor");
    }
    this.terminateSlide();
  }

  private processComment(comment: string): void {
    const directive = parseDirective(comment);
    switch (directive) {
      case "pause":
        this.processPause();
        return;
      case "endSlide":
        this.terminateSlide();
        return;
      case null:
        this.log({ level: "debug", message: "ignoring comment", detail: { comment } });
        return;
    }
  }

  private processPause(): void {
    // List items after a pause should continue the list without a gap.
    const last = this.operations[this.operations.length - 1];
    if (this.lastElementIsList && last !== undefined && last.kind === "renderLineBreak") {
      this.operations.pop();
    }

    const nextOperations = [...this.operations];
    this.terminateSlide();
    this.operations = nextOperations;
  }

  private pushSlideTitle(text: Text): void {
    const style = this.theme.slideTitle;
    const title = applyStyle(text, { bold: true, colors: style.colors });

    for (let i = 0; i < (style.paddingTop ?? 0); i++) this.pushLineBreak();
    this.pushText(title, "slideTitle");
    this.pushLineBreak();
    for (let i = 0; i < (style.paddingBottom ?? 0); i++) this.pushLineBreak();
    if (style.separator) {
      this.operations.push({ kind: "renderSeparator" });
    }
    this.pushLineBreak();
    this.ignoreElementLineBreak = true;
  }

  private pushHeading(level: 1 | 2 | 3 | 4 | 5 | 6, text: Text): void {
    const elementType: ElementType = `heading${level}`;
    const style = resolveHeadingStyle(this.theme, level);
    const prefixed = style.prefix !== undefined ? prependChunk(text, styled(`${style.prefix} `)) : text;

    this.pushText(applyStyle(prefixed, { bold: true, colors: style.colors }), elementType);
    this.pushLineBreak();
  }

  private pushParagraph(elements: readonly ParagraphElement[]): void {
    for (const element of elements) {
      // Explicit breaks need nothing: every text run already ends in one.
      if (element.kind === "text") {
        this.pushText(element.text, "paragraph");
        this.pushLineBreak();
      }
    }
  }

  private pushListItem(item: ListItem): void {
    let prefix = " ".repeat((item.depth + 1) * 2);
    switch (item.itemType.kind) {
      case "unordered":
        prefix += unorderedMarker(item.depth);
        break;
      case "orderedParens":
        prefix += `${item.itemType.number}) `;
        break;
      case "orderedPeriod":
        prefix += `${item.itemType.number}. `;
        break;
    }
    prefix += " ";

    this.pushText(prependChunk(item.contents, styled(prefix)), "list");
    this.pushLineBreak();
  }

  private pushCode(code: Code): void {
    const horizontal = this.theme.code.padding.horizontal ?? 0;
    const vertical = this.theme.code.padding.vertical ?? 0;

    let source = code.contents;
    if (horizontal > 0 || vertical > 0) {
      const padding = " ".repeat(horizontal);
      const lines = code.contents.split("\n");
      if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
      const padded = lines.map((line) => `${padding}${line}`);
      if (vertical > 0) {
        padded.unshift("");
        padded.push("");
      }
      source = padded.map((line) => `${line}\n`).join("");
    }

    let widest = 0;
    for (const line of source.split("\n")) {
      widest = Math.max(widest, measureTextCells(line));
    }
    const blockLength = widest + horizontal;
    const alignment = resolveAlignment(this.theme, "code");

    for (const { formatted, original } of this.highlighter.highlight(source, code.language)) {
      const trimmed = formatted.trimEnd();
      const trimmedWidth = measureTextCells(formatted) - measureTextCells(trimmed);
      this.operations.push({
        kind: "renderPreformattedLine",
        text: trimmed,
        unformattedLength: Math.max(0, measureTextCells(original) - trimmedWidth),
        blockLength,
        alignment,
      });
      this.pushLineBreak();
    }
  }

  private pushTable(table: Table): void {
    const allRows: readonly TableRow[] = [table.header, ...table.rows];
    let columns = 0;
    for (const row of allRows) columns = Math.max(columns, row.length);

    const widths: number[] = [];
    for (let column = 0; column < columns; column++) {
      let width = 0;
      for (const row of allRows) {
        const cell = row[column];
        if (cell !== undefined) width = Math.max(width, textWidth(cell));
      }
      widths.push(width);
    }

    this.pushText(flattenTableRow(table.header, widths), "table");
    this.pushLineBreak();

    const separator: StyledText[] = widths.map((width, index) =>
      index === 0 ? styled("─".repeat(width + 1)) : styled(`┼${"─".repeat(width + 2)}`),
    );
    this.pushText({ chunks: separator }, "table");
    this.pushLineBreak();

    for (const row of table.rows) {
      this.pushText(flattenTableRow(row, widths), "table");
      this.pushLineBreak();
    }
  }

  private pushBlockQuote(lines: readonly string[]): void {
    const prefix = this.theme.blockQuote.prefix ?? "";
    const prefixWidth = measureTextCells(prefix);
    let blockLength = 0;
    for (const line of lines) {
      blockLength = Math.max(blockLength, measureTextCells(line) + prefixWidth);
    }
    const alignment = resolveAlignment(this.theme, "blockQuote");

    this.operations.push({ kind: "setColors", colors: this.theme.blockQuote.colors });
    for (const line of lines) {
      const text = `${prefix}${line}`;
      this.operations.push({
        kind: "renderPreformattedLine",
        text,
        unformattedLength: measureTextCells(text),
        blockLength,
        alignment,
      });
      this.pushLineBreak();
    }
    this.operations.push({ kind: "setColors", colors: this.theme.defaultStyle.colors });
  }

  private pushImage(path: string): void {
    let image: ImageHandle;
    try {
      image = this.resources.loadImage(path);
    } catch (error: unknown) {
      throw new BuildFailure("LOAD_IMAGE", describeError(error));
    }
    this.operations.push({ kind: "renderImage", image });
  }

  private pushText(text: Text, elementType: ElementType): void {
    if (text.chunks.length === 0) return;
    const codeColors = this.theme.code.colors;
    const chunks = text.chunks.map((chunk) =>
      chunk.style.code === true ? styled(chunk.text, { ...chunk.style, colors: codeColors }) : chunk,
    );
    this.operations.push({
      kind: "renderTextLine",
      line: weightedLine(chunks),
      alignment: resolveAlignment(this.theme, elementType),
    });
  }

  private pushLineBreak(): void {
    this.operations.push(LINE_BREAK);
  }

  private pushSlidePrelude(): void {
    this.operations.push({ kind: "setColors", colors: this.theme.defaultStyle.colors });
    this.operations.push({ kind: "clearScreen" });
    this.pushLineBreak();
  }

  private terminateSlide(): void {
    this.operations.push({
      kind: "renderDynamic",
      operation: createFooterGenerator({
        style: this.theme.footer,
        currentSlide: this.slides.length,
        context: this.footerContext,
      }),
    });
    this.slides.push({ operations: Object.freeze(this.operations) });
    this.operations = [];
    this.pushSlidePrelude();
    this.ignoreElementLineBreak = true;
  }
}

function flattenTableRow(row: TableRow, widths: readonly number[]): Text {
  const chunks: StyledText[] = [];
  row.forEach((cell, column) => {
    if (column > 0) chunks.push(styled(" │ "));
    chunks.push(...cell.chunks);
    const missing = (widths[column] ?? 0) - textWidth(cell);
    if (missing > 0) chunks.push(styled(" ".repeat(missing)));
  });
  return { chunks };
}

export function createPresentationBuilder(options: PresentationBuilderOptions = {}): PresentationBuilder {
  const theme = options.theme ?? defaultTheme;
  const themes = options.themes ?? createBuiltinThemeProvider();
  const highlighter = options.highlighter ?? createPlainHighlighter();
  const resources = options.resources ?? missingResources;
  const log = makeLogSink(options.log);

  return {
    build(elements) {
      const session = new BuildSession(theme, themes, highlighter, resources, log);
      try {
        return { ok: true, presentation: session.run(elements) };
      } catch (error: unknown) {
        if (error instanceof BuildFailure) {
          log({ level: "error", message: "build failed", detail: { ...error.error } });
          return { ok: false, error: error.error };
        }
        throw error;
      }
    },
  };
}
