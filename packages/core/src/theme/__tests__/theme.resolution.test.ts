import { assert, describe, test } from "@termdeck/testkit";
import { defaultTheme } from "../defaultTheme.js";
import { darkTheme } from "../presets.js";
import { resolveAlignment, resolveHeadingStyle } from "../resolve.js";

describe("resolveAlignment", () => {
  test("uses the element's own alignment when set", () => {
    assert.deepEqual(resolveAlignment(darkTheme, "code"), {
      kind: "center",
      minimumSize: 40,
      minimumMargin: 5,
    });
    assert.deepEqual(resolveAlignment(darkTheme, "heading1"), resolveAlignment(darkTheme, "slideTitle"));
  });

  test("falls back to the default alignment", () => {
    assert.deepEqual(resolveAlignment(darkTheme, "paragraph"), { kind: "left", margin: 5 });
    assert.deepEqual(resolveAlignment(darkTheme, "heading2"), { kind: "left", margin: 5 });
    assert.deepEqual(resolveAlignment(defaultTheme, "presentationAuthor"), { kind: "left", margin: 0 });
  });
});

describe("resolveHeadingStyle", () => {
  test("selects the style for each level", () => {
    assert.equal(resolveHeadingStyle(darkTheme, 2).prefix, "▓▓");
    assert.equal(resolveHeadingStyle(darkTheme, 6).prefix, "▓▓▓▓▓▓");
    assert.equal(resolveHeadingStyle(darkTheme, 1).prefix, undefined);
  });
});
