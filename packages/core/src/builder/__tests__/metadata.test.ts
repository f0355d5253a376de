import { assert, describe, test } from "@termdeck/testkit";
import { rgb } from "../../text/styled.js";
import { parseDirective, parseMetadata } from "../metadata.js";

describe("parseMetadata", () => {
  test("reads title, subtitle and author", () => {
    assert.deepEqual(parseMetadata("title: Talk\nsub_title: Sub\nauthor: Ann"), {
      ok: true,
      metadata: { title: "Talk", subtitle: "Sub", author: "Ann", theme: {} },
    });
  });

  test("accepts `subtitle` as an alias and stringifies scalars", () => {
    assert.deepEqual(parseMetadata("title: 2024\nsubtitle: true"), {
      ok: true,
      metadata: { title: "2024", subtitle: "true", theme: {} },
    });
  });

  test("empty front matter is valid", () => {
    assert.deepEqual(parseMetadata(""), { ok: true, metadata: { theme: {} } });
  });

  test("ignores unknown top-level keys", () => {
    assert.deepEqual(parseMetadata("date: today\nauthor: Ann"), {
      ok: true,
      metadata: { author: "Ann", theme: {} },
    });
  });

  test("parses theme overrides", () => {
    const result = parseMetadata('theme:\n  override:\n    code:\n      colors:\n        background: "#000000"');
    assert.ok(result.ok);
    assert.deepEqual(result.metadata.theme.overrides?.code?.colors, { background: rgb(0, 0, 0) });
  });

  test("unquoted all-digit override colors are read as written", () => {
    const result = parseMetadata("theme:\n  override:\n    default:\n      colors:\n        background: 000000");
    assert.ok(result.ok);
    assert.deepEqual(result.metadata.theme.overrides?.defaultStyle?.colors, { background: rgb(0, 0, 0) });
  });

  test("malformed YAML is reported", () => {
    const result = parseMetadata("title: [unclosed");
    assert.equal(result.ok, false);
  });

  test("rejects a theme with both name and path", () => {
    assert.deepEqual(parseMetadata("theme:\n  name: dark\n  path: x.yaml"), {
      ok: false,
      detail: "cannot have both theme path and theme name",
    });
  });

  test("rejects non-mapping front matter", () => {
    const result = parseMetadata("- a\n- b");
    assert.equal(result.ok, false);
  });

  test("rejects unknown theme keys", () => {
    const result = parseMetadata("theme:\n  colour: red");
    assert.ok(!result.ok);
    assert.match(result.detail, /Unrecognized key/);
  });
});

describe("parseDirective", () => {
  test("recognizes pause and end_slide", () => {
    assert.equal(parseDirective("pause"), "pause");
    assert.equal(parseDirective(" end_slide\n"), "endSlide");
  });

  test("returns null for anything else", () => {
    assert.equal(parseDirective("note: pause here"), null);
    assert.equal(parseDirective(""), null);
  });
});
