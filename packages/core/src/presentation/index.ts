export {
  LINE_BREAK,
  type AsRenderOperations,
  type RenderOperation,
  type RenderOperationKind,
  type WindowSize,
} from "./operations.js";
export { Presentation, type Slide } from "./presentation.js";
export { createFooterGenerator, FooterContext, type FooterGeneratorOptions } from "./footer.js";
