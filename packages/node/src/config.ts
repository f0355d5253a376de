/**
 * packages/node/src/config.ts — Environment configuration.
 *
 * Every variable is optional; unparseable values fall back to the default
 * instead of failing.
 */

import { DEFAULT_RESERVED_ROWS } from "@termdeck/core";
import {
  type EnvMap,
  type ImageProtocol,
  detectImageProtocol,
  envBool,
  envCount,
  envInt,
  envLower,
  envText,
} from "./backend/terminalProfile.js";

/** chalk color support level: none, 16 colors, 256 colors, truecolor. */
export type ColorLevel = 0 | 1 | 2 | 3;

export type CellSize = Readonly<{ width: number; height: number }>;

export type DeckConfig = Readonly<{
  colorLevel: ColorLevel;
  /** Theme used when the document names none. */
  theme?: string;
  themesDir?: string;
  imageProtocol: ImageProtocol;
  cellSize?: CellSize;
  reservedRows: number;
  /** NDJSON log file; logging is off without it. */
  logPath?: string;
}>;

function readColorLevel(env: EnvMap): ColorLevel {
  if (envText(env, "NO_COLOR") !== undefined) return 0;

  const force = envLower(env, "FORCE_COLOR");
  if (force !== undefined) {
    if (force === "2") return 2;
    if (force === "3") return 3;
    const enabled = envBool(env, "FORCE_COLOR");
    if (enabled === false) return 0;
    if (enabled === true) return 1;
  }

  const colorTerm = envLower(env, "COLORTERM");
  if (colorTerm === "truecolor" || colorTerm === "24bit") return 3;
  const term = envLower(env, "TERM") ?? "";
  if (term === "dumb") return 0;
  if (term.includes("256")) return 2;
  return 1;
}

function readImageProtocol(env: EnvMap): ImageProtocol {
  const raw = envLower(env, "TERMDECK_IMAGE_PROTOCOL");
  if (raw === "kitty" || raw === "iterm2" || raw === "none") return raw;
  return detectImageProtocol(env);
}

export function readDeckConfig(env: EnvMap): DeckConfig {
  const theme = envText(env, "TERMDECK_THEME");
  const themesDir = envText(env, "TERMDECK_THEMES_DIR");
  const logPath = envText(env, "TERMDECK_LOG");
  const cellWidth = envInt(env, "TERMDECK_CELL_WIDTH_PX");
  const cellHeight = envInt(env, "TERMDECK_CELL_HEIGHT_PX");
  const cellSize =
    cellWidth !== undefined && cellHeight !== undefined ? { width: cellWidth, height: cellHeight } : undefined;

  return Object.freeze({
    colorLevel: readColorLevel(env),
    imageProtocol: readImageProtocol(env),
    reservedRows: envCount(env, "TERMDECK_RESERVED_ROWS") ?? DEFAULT_RESERVED_ROWS,
    ...(theme === undefined ? {} : { theme }),
    ...(themesDir === undefined ? {} : { themesDir }),
    ...(cellSize === undefined ? {} : { cellSize }),
    ...(logPath === undefined ? {} : { logPath }),
  });
}
