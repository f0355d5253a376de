/**
 * packages/core/src/theme/index.ts — Theme public exports.
 */

export { defaultTheme } from "./defaultTheme.js";
export { mergeTheme } from "./extend.js";
export { builtinThemes, darkTheme, lightTheme } from "./presets.js";
export { createBuiltinThemeProvider, type ThemeProvider } from "./provider.js";
export { resolveAlignment, resolveHeadingStyle } from "./resolve.js";
export {
  formatZodIssues,
  parseColor,
  parseThemeDocument,
  parseThemeOverrides,
  themeDocumentSchema,
  themeDocumentToOverrides,
  type ThemeDocument,
} from "./schema.js";
export type {
  Alignment,
  AuthorPositioning,
  BasicStyle,
  BlockQuoteStyle,
  CodeStyle,
  DeepPartial,
  DefaultStyle,
  ElementType,
  FooterStyle,
  HeadingStyle,
  HeadingStyles,
  IntroSlideStyle,
  PresentationTheme,
  SlideTitleStyle,
  ThemeOverrides,
} from "./types.js";
export { validateTheme } from "./validate.js";
