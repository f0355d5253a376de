export type { ImageArea, TerminalBackend } from "./backend.js";
export { createDrawer, errorOperations, withDrawer, type Drawer, type DrawerOptions } from "./drawer.js";
export { positionLine, type LinePosition } from "./layout.js";
export {
  createRenderOperator,
  DEFAULT_RESERVED_ROWS,
  fitImage,
  type RenderOperator,
  type RenderOperatorOptions,
} from "./operator.js";
