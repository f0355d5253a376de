import { assert, describe, test } from "@termdeck/testkit";
import { rgb } from "../../text/styled.js";
import { defaultTheme } from "../defaultTheme.js";
import { mergeTheme } from "../extend.js";
import { darkTheme } from "../presets.js";

describe("mergeTheme", () => {
  test("no overrides returns an equal, frozen copy", () => {
    const merged = mergeTheme(defaultTheme);
    assert.deepEqual(merged, defaultTheme);
    assert.notEqual(merged, defaultTheme);
    assert.ok(Object.isFrozen(merged));
    assert.ok(Object.isFrozen(merged.defaultStyle.alignment));
  });

  test("present fields replace, absent fields fall through", () => {
    const merged = mergeTheme(darkTheme, {
      defaultStyle: { colors: { foreground: rgb(1, 2, 3) } },
    });
    assert.deepEqual(merged.defaultStyle.colors, {
      foreground: { r: 1, g: 2, b: 3 },
      background: darkTheme.defaultStyle.colors.background,
    });
    assert.deepEqual(merged.defaultStyle.alignment, { kind: "left", margin: 5 });
    assert.deepEqual(merged.code, darkTheme.code);
  });

  test("does not modify the base theme", () => {
    mergeTheme(darkTheme, { slideTitle: { paddingTop: 4 } });
    assert.equal(darkTheme.slideTitle.paddingTop, 1);
  });

  test("replaces a tagged union wholesale when the kind changes", () => {
    const merged = mergeTheme(darkTheme, { footer: { kind: "progressBar", colors: {} } });
    assert.deepEqual(merged.footer, { kind: "progressBar", colors: {} });
  });

  test("merges a tagged union field-wise when the kind stays", () => {
    const merged = mergeTheme(darkTheme, { footer: { kind: "template", left: "{current_slide}" } });
    assert.deepEqual(merged.footer, {
      kind: "template",
      left: "{current_slide}",
      right: "{current_slide} / {total_slides}",
      colors: { foreground: { r: 92, g: 103, b: 115 } },
    });
  });

  test("alignment switches kind without leaking old fields", () => {
    const merged = mergeTheme(darkTheme, {
      defaultStyle: { alignment: { kind: "center", minimumSize: 10, minimumMargin: 2 } },
    });
    assert.deepEqual(merged.defaultStyle.alignment, { kind: "center", minimumSize: 10, minimumMargin: 2 });
  });

  test("throws when the merged theme is invalid", () => {
    assert.throws(
      () => mergeTheme(defaultTheme, { slideTitle: { paddingTop: -1 } }),
      /Theme validation failed at slideTitle\.paddingTop: expected a non-negative integer \(received -1\)/,
    );
  });
});
