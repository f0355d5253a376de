/**
 * packages/core/src/theme/types.ts — Presentation theme shape.
 *
 * All styles are plain immutable records so that themes can be merged
 * field-wise (see extend.ts) and compared structurally in tests.
 */

import type { Colors } from "../text/styled.js";

/**
 * Horizontal placement of a line or block.
 *
 *   - left: indent by `margin` columns
 *   - right: right-edge align leaving `margin` columns free
 *   - center: center; below `minimumSize + 2 * minimumMargin` columns fall back to
 *     left alignment with `minimumMargin`
 */
export type Alignment =
  | Readonly<{ kind: "left"; margin: number }>
  | Readonly<{ kind: "right"; margin: number }>
  | Readonly<{ kind: "center"; minimumSize: number; minimumMargin: number }>;

export type DefaultStyle = Readonly<{
  alignment: Alignment;
  colors: Colors;
}>;

export type SlideTitleStyle = Readonly<{
  alignment?: Alignment;
  colors: Colors;
  paddingTop?: number;
  paddingBottom?: number;
  separator: boolean;
}>;

export type HeadingStyle = Readonly<{
  alignment?: Alignment;
  colors: Colors;
  prefix?: string;
}>;

export type HeadingStyles = Readonly<{
  h1: HeadingStyle;
  h2: HeadingStyle;
  h3: HeadingStyle;
  h4: HeadingStyle;
  h5: HeadingStyle;
  h6: HeadingStyle;
}>;

export type CodeStyle = Readonly<{
  alignment?: Alignment;
  colors: Colors;
  padding: Readonly<{ horizontal?: number; vertical?: number }>;
}>;

export type BlockQuoteStyle = Readonly<{
  alignment?: Alignment;
  colors: Colors;
  prefix?: string;
}>;

export type BasicStyle = Readonly<{
  alignment?: Alignment;
  colors: Colors;
}>;

export type AuthorPositioning = "belowTitle" | "pageBottom";

export type IntroSlideStyle = Readonly<{
  title: BasicStyle;
  subtitle: BasicStyle;
  author: BasicStyle & Readonly<{ positioning: AuthorPositioning }>;
}>;

export type FooterStyle =
  | Readonly<{ kind: "template"; left?: string; right?: string; colors: Colors }>
  | Readonly<{ kind: "progressBar"; character?: string; colors: Colors }>
  | Readonly<{ kind: "empty" }>;

export type PresentationTheme = Readonly<{
  defaultStyle: DefaultStyle;
  slideTitle: SlideTitleStyle;
  headings: HeadingStyles;
  code: CodeStyle;
  blockQuote: BlockQuoteStyle;
  introSlide: IntroSlideStyle;
  footer: FooterStyle;
}>;

/** Element kinds whose alignment the theme decides. */
export type ElementType =
  | "slideTitle"
  | "heading1"
  | "heading2"
  | "heading3"
  | "heading4"
  | "heading5"
  | "heading6"
  | "paragraph"
  | "list"
  | "code"
  | "blockQuote"
  | "table"
  | "presentationTitle"
  | "presentationSubtitle"
  | "presentationAuthor";

type Primitive = string | number | boolean | bigint | symbol | null | undefined;

export type DeepPartial<T> = T extends Primitive
  ? T
  : T extends ReadonlyArray<infer U>
    ? ReadonlyArray<DeepPartial<U>>
    : { [K in keyof T]?: DeepPartial<T[K]> };

export type ThemeOverrides = DeepPartial<PresentationTheme>;
