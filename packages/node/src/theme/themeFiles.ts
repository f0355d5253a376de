/**
 * packages/node/src/theme/themeFiles.ts — YAML theme files.
 *
 * Theme files are override documents merged onto the default theme. Named
 * lookups try the built-in presets first, then `<name>.yaml` in themesDir.
 */

import { existsSync, readFileSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  type PresentationTheme,
  type ThemeProvider,
  ThemeLoadError,
  builtinThemes,
  defaultTheme,
  describeError,
  mergeTheme,
  parseThemeDocument,
} from "@termdeck/core";

export type ThemeProviderOptions = Readonly<{
  /** Directory searched for `<name>.yaml` themes. */
  themesDir?: string;
  /** Base for relative theme paths. Defaults to the working directory. */
  baseDir?: string;
  themes?: Readonly<Record<string, PresentationTheme>>;
}>;

const THEME_NAME = /^[A-Za-z0-9_-]+$/;

/** Read and validate one theme file. Throws ThemeLoadError. */
export function loadThemeFile(path: string): PresentationTheme {
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch (error: unknown) {
    throw new ThemeLoadError(path, `reading theme ${path}: ${describeError(error)}`, { cause: error });
  }
  try {
    return mergeTheme(defaultTheme, parseThemeDocument(source));
  } catch (error: unknown) {
    throw new ThemeLoadError(path, `theme ${path}: ${describeError(error)}`, { cause: error });
  }
}

export function createThemeProvider(options: ThemeProviderOptions = {}): ThemeProvider {
  const themes = options.themes ?? builtinThemes;
  const baseDir = options.baseDir ?? process.cwd();
  const themesDir = options.themesDir === undefined ? undefined : resolve(baseDir, options.themesDir);

  return {
    lookupByName(name) {
      if (Object.prototype.hasOwnProperty.call(themes, name)) {
        return themes[name] ?? null;
      }
      if (themesDir === undefined || !THEME_NAME.test(name)) return null;
      const path = join(themesDir, `${name}.yaml`);
      return existsSync(path) ? loadThemeFile(path) : null;
    },
    loadFromPath(path) {
      return loadThemeFile(resolve(baseDir, path));
    },
  };
}
