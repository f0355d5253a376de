import { assert, describe, test } from "@termdeck/testkit";
import { styled } from "../styled.js";
import { splitWeightedLine, weightedLine } from "../weighted.js";

function rowTexts(rows: ReturnType<typeof splitWeightedLine>): string[] {
  return rows.map((row) => row.chunks.map((chunk) => chunk.text.text).join(""));
}

describe("weightedLine", () => {
  test("precomputes chunk and line widths", () => {
    const line = weightedLine([styled("ab"), styled("苹")]);
    assert.deepEqual(
      line.chunks.map((chunk) => chunk.width),
      [2, 2],
    );
    assert.equal(line.width, 4);
  });
});

describe("splitWeightedLine", () => {
  test("returns the line unchanged when it fits", () => {
    const line = weightedLine([styled("short")]);
    const rows = splitWeightedLine(line, 10);
    assert.equal(rows.length, 1);
    assert.equal(rows[0], line);
  });

  test("wraps at whitespace and drops the break space", () => {
    const rows = splitWeightedLine(weightedLine([styled("hello world foo")]), 11);
    assert.deepEqual(rowTexts(rows), ["hello world", "foo"]);
    assert.deepEqual(
      rows.map((row) => row.width),
      [11, 3],
    );
    assert.equal(rows[0]?.chunks.length, 1);
  });

  test("hard-breaks words wider than the row", () => {
    const rows = splitWeightedLine(weightedLine([styled("abcdefghij")]), 4);
    assert.deepEqual(rowTexts(rows), ["abcd", "efgh", "ij"]);
  });

  test("keeps chunk styles across wrapped rows", () => {
    const bold = { bold: true };
    const rows = splitWeightedLine(weightedLine([styled("ab ", bold), styled("cd")]), 3);
    assert.deepEqual(rowTexts(rows), ["ab ", "cd"]);
    assert.equal(rows[0]?.chunks[0]?.text.style, bold);
    assert.deepEqual(rows[1]?.chunks[0]?.text.style, {});
  });
});
