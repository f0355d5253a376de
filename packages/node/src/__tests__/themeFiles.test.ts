import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { ThemeLoadError, createPresentationBuilder, darkTheme, defaultTheme, rgb } from "@termdeck/core";
import { assert, describe, test, withTempDir } from "@termdeck/testkit";
import { createThemeProvider, loadThemeFile } from "../theme/themeFiles.js";

const OCEAN = [
  "default:",
  "  colors:",
  '    foreground: "#e0f0ff"',
  "    background: 001020",
  "footer:",
  "  style: progress_bar",
  '  character: "="',
  "",
].join("\n");

describe("loadThemeFile", () => {
  test("merges the file onto the default theme", async () => {
    await withTempDir((dir) => {
      const path = join(dir, "ocean.yaml");
      writeFileSync(path, OCEAN, "utf8");
      const theme = loadThemeFile(path);
      assert.deepEqual(theme.defaultStyle.colors, {
        foreground: rgb(224, 240, 255),
        background: rgb(0, 16, 32),
      });
      assert.equal(theme.footer.kind, "progressBar");
      assert.deepEqual(theme.headings, defaultTheme.headings);
    });
  });

  test("a missing file is a ThemeLoadError carrying the cause", async () => {
    await withTempDir((dir) => {
      const path = join(dir, "nope.yaml");
      assert.throws(
        () => loadThemeFile(path),
        (error: unknown) =>
          error instanceof ThemeLoadError &&
          error.path === path &&
          error.message.startsWith(`reading theme ${path}: `) &&
          error.cause instanceof Error,
      );
    });
  });

  test("schema errors name the offending field", async () => {
    await withTempDir((dir) => {
      const path = join(dir, "bad.yaml");
      writeFileSync(path, "footer:\n  style: marquee\n", "utf8");
      assert.throws(
        () => loadThemeFile(path),
        (error: unknown) => error instanceof ThemeLoadError && error.message.includes("footer.style"),
      );
    });
  });
});

describe("createThemeProvider", () => {
  test("built-in presets come first", () => {
    const provider = createThemeProvider();
    assert.equal(provider.lookupByName("dark"), darkTheme);
    assert.equal(provider.lookupByName("missing"), null);
  });

  test("named themes are looked up in the themes directory", async () => {
    await withTempDir((dir) => {
      mkdirSync(join(dir, "themes"));
      writeFileSync(join(dir, "themes", "ocean.yaml"), OCEAN, "utf8");
      const provider = createThemeProvider({ baseDir: dir, themesDir: "themes" });

      const theme = provider.lookupByName("ocean");
      assert.notEqual(theme, null);
      assert.deepEqual(theme?.defaultStyle.colors.background, rgb(0, 16, 32));
      assert.equal(provider.lookupByName("other"), null);
      assert.equal(provider.lookupByName("../ocean"), null);
    });
  });

  test("theme paths resolve against the base directory", async () => {
    await withTempDir((dir) => {
      writeFileSync(join(dir, "ocean.yaml"), OCEAN, "utf8");
      const provider = createThemeProvider({ baseDir: dir });
      assert.equal(provider.loadFromPath("ocean.yaml").footer.kind, "progressBar");
    });
  });

  test("a broken theme file fails the build as INVALID_THEME", async () => {
    await withTempDir((dir) => {
      writeFileSync(join(dir, "broken.yaml"), "default: [", "utf8");
      const builder = createPresentationBuilder({ themes: createThemeProvider({ baseDir: dir }) });
      const result = builder.build([{ kind: "frontMatter", contents: "theme:\n  path: broken.yaml" }]);
      assert.equal(result.ok, false);
      if (result.ok) return;
      assert.equal(result.error.code, "INVALID_THEME");
      assert.ok(result.error.detail.startsWith(`theme ${join(dir, "broken.yaml")}: `));
    });
  });
});
