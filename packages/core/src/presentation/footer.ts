/**
 * packages/core/src/presentation/footer.ts — Footer context and generator.
 *
 * One FooterContext is shared by every footer operation of a build. It is
 * written while building (author) and finalized once every slide exists
 * (total slide count); footer operations only read it at render time.
 */

import { DeckError } from "../errors.js";
import { measureTextCells } from "../text/measure.js";
import { styled } from "../text/styled.js";
import { weightedLine } from "../text/weighted.js";
import type { Colors } from "../text/styled.js";
import type { Alignment, FooterStyle } from "../theme/types.js";
import type { AsRenderOperations, RenderOperation, WindowSize } from "./operations.js";

const DEFAULT_PROGRESS_CHARACTER = "█";

export class FooterContext {
  private authorValue: string | null = null;
  private total: number | null = null;

  get author(): string {
    return this.authorValue ?? "";
  }

  get finalized(): boolean {
    return this.total !== null;
  }

  /** Total slide count. Throws DECK_INVALID_STATE before finalize(). */
  get totalSlides(): number {
    if (this.total === null) {
      throw new DeckError("DECK_INVALID_STATE", "footer context read before the build finished");
    }
    return this.total;
  }

  setAuthor(author: string): void {
    if (this.authorValue !== null) {
      throw new DeckError("DECK_INVALID_STATE", "footer author already set");
    }
    this.authorValue = author;
  }

  finalize(totalSlides: number): void {
    if (this.total !== null) {
      throw new DeckError("DECK_INVALID_STATE", "footer context already finalized");
    }
    this.total = totalSlides;
  }
}

export type FooterGeneratorOptions = Readonly<{
  style: FooterStyle;
  /** 0-based index of the slide the footer belongs to. */
  currentSlide: number;
  context: FooterContext;
}>;

function renderTemplate(
  template: string,
  currentSlide: string,
  context: FooterContext,
  colors: Colors,
  alignment: Alignment,
): RenderOperation {
  const contents = template
    .replaceAll("{current_slide}", currentSlide)
    .replaceAll("{total_slides}", String(context.totalSlides))
    .replaceAll("{author}", context.author);
  return {
    kind: "renderTextLine",
    line: weightedLine([styled(contents, { colors })]),
    alignment,
  };
}

export function createFooterGenerator(options: FooterGeneratorOptions): AsRenderOperations {
  const { style, currentSlide, context } = options;

  return {
    asRenderOperations(dimensions: WindowSize): readonly RenderOperation[] {
      switch (style.kind) {
        case "template": {
          const current = String(currentSlide + 1);
          const operations: RenderOperation[] = [];
          if (style.left !== undefined) {
            operations.push(
              { kind: "jumpToWindowBottom" },
              renderTemplate(style.left, current, context, style.colors, { kind: "left", margin: 1 }),
            );
          }
          if (style.right !== undefined) {
            operations.push(
              { kind: "jumpToWindowBottom" },
              renderTemplate(style.right, current, context, style.colors, { kind: "right", margin: 1 }),
            );
          }
          return operations;
        }
        case "progressBar": {
          const character = style.character ?? DEFAULT_PROGRESS_CHARACTER;
          const totalColumns = Math.floor(
            dimensions.columns / Math.max(1, measureTextCells(character)),
          );
          const ratio = (currentSlide + 1) / context.totalSlides;
          const bar = character.repeat(Math.ceil(totalColumns * ratio));
          return [
            { kind: "jumpToWindowBottom" },
            {
              kind: "renderTextLine",
              line: weightedLine([styled(bar, { colors: style.colors })]),
              alignment: { kind: "left", margin: 0 },
            },
          ];
        }
        case "empty":
          return [];
      }
    },
  };
}
