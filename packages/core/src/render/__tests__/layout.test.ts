import { assert, describe, test } from "@termdeck/testkit";
import { positionLine } from "../layout.js";

describe("positionLine", () => {
  test("left indents by the margin", () => {
    assert.deepEqual(positionLine({ kind: "left", margin: 2 }, 20, 5), { start: 2, maxWidth: 16 });
  });

  test("right leaves the margin free on the right", () => {
    assert.deepEqual(positionLine({ kind: "right", margin: 1 }, 20, 5), { start: 14, maxWidth: 18 });
  });

  test("right clamps overlong lines to the usable width", () => {
    assert.deepEqual(positionLine({ kind: "right", margin: 1 }, 20, 30), { start: 1, maxWidth: 18 });
  });

  test("center centers within the window", () => {
    const center = { kind: "center", minimumSize: 10, minimumMargin: 2 } as const;
    assert.deepEqual(positionLine(center, 20, 6), { start: 7, maxWidth: 16 });
    assert.deepEqual(positionLine(center, 20, 30), { start: 2, maxWidth: 16 });
  });

  test("center falls back to left alignment in narrow windows", () => {
    const center = { kind: "center", minimumSize: 10, minimumMargin: 2 } as const;
    assert.deepEqual(positionLine(center, 12, 6), { start: 2, maxWidth: 8 });
  });

  test("never reports a width below one cell", () => {
    assert.deepEqual(positionLine({ kind: "left", margin: 10 }, 10, 3), { start: 10, maxWidth: 1 });
  });
});
