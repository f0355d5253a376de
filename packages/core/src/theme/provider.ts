/**
 * packages/core/src/theme/provider.ts — Theme lookup contract.
 *
 * The core never reads theme files itself; a provider resolves names and
 * paths. The built-in provider only knows the presets and rejects paths.
 */

import { ThemeLoadError } from "../errors.js";
import { builtinThemes } from "./presets.js";
import type { PresentationTheme } from "./types.js";

export interface ThemeProvider {
  /** Resolve a named theme, or null when the name is unknown. */
  lookupByName(name: string): PresentationTheme | null;
  /** Load a theme file. Throws ThemeLoadError on failure. */
  loadFromPath(path: string): PresentationTheme;
}

export function createBuiltinThemeProvider(
  themes: Readonly<Record<string, PresentationTheme>> = builtinThemes,
): ThemeProvider {
  return {
    lookupByName(name) {
      return Object.prototype.hasOwnProperty.call(themes, name) ? (themes[name] ?? null) : null;
    },
    loadFromPath(path) {
      throw new ThemeLoadError(path, `theme files are not supported here: ${path}`);
    },
  };
}
