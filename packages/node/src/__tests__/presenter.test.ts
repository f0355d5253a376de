import { PassThrough } from "node:stream";
import { type DocumentElement, textFrom } from "@termdeck/core";
import { createRecordingBackend } from "@termdeck/core/testing";
import { assert, captureLogs, describe, test } from "@termdeck/testkit";
import type { DeckConfig } from "../config.js";
import { keyToCommand, runPresentation } from "../presenter.js";

const CONFIG: DeckConfig = { colorLevel: 0, imageProtocol: "none", reservedRows: 3 };

function paragraph(text: string): DocumentElement {
  return { kind: "paragraph", elements: [{ kind: "text", text: textFrom(text) }] };
}

const THREE_SLIDES: readonly DocumentElement[] = [
  paragraph("one"),
  { kind: "thematicBreak" },
  paragraph("two"),
  { kind: "thematicBreak" },
  paragraph("three"),
];

describe("keyToCommand", () => {
  test("navigation keys", () => {
    for (const name of ["right", "l", "j", "space", "pagedown"]) {
      assert.equal(keyToCommand(undefined, { name }), "next", name);
    }
    for (const name of ["left", "h", "k", "pageup"]) {
      assert.equal(keyToCommand(undefined, { name }), "previous", name);
    }
    assert.equal(keyToCommand("g", { name: "g" }), "first");
    assert.equal(keyToCommand(undefined, { name: "home" }), "first");
    assert.equal(keyToCommand("G", { name: "g", shift: true }), "last");
    assert.equal(keyToCommand(undefined, { name: "end" }), "last");
  });

  test("quit keys", () => {
    assert.equal(keyToCommand("q", { name: "q" }), "quit");
    assert.equal(keyToCommand("\x03", { name: "c", ctrl: true }), "quit");
  });

  test("everything else is ignored", () => {
    assert.equal(keyToCommand("x", { name: "x" }), null);
    assert.equal(keyToCommand("\x0c", { name: "l", ctrl: true }), null);
    assert.equal(keyToCommand("é", undefined), null);
  });
});

describe("runPresentation", () => {
  test("navigates with keys and restores the terminal on quit", async () => {
    const backend = createRecordingBackend({ rows: 24, columns: 80 });
    const input = new PassThrough();
    const output = new PassThrough();
    const exitListeners = process.listenerCount("exit");

    const running = runPresentation({ elements: THREE_SLIDES, input, output, backend, config: CONFIG });
    assert.equal(backend.screenRow(1).trim(), "one");
    input.write("llGglq");

    assert.deepEqual(await running, { ok: true, slideIndex: 1, totalSlides: 3 });
    assert.equal(backend.screenRow(1).trim(), "two");
    assert.deepEqual(backend.calls.slice(-3), [
      { kind: "setCursorVisible", visible: true },
      { kind: "setRawMode", enabled: false },
      { kind: "flush" },
    ]);
    assert.equal(process.listenerCount("exit"), exitListeners);
  });

  test("shows build errors until the user quits", async () => {
    const backend = createRecordingBackend({ rows: 24, columns: 80 });
    const input = new PassThrough();
    const running = runPresentation({
      elements: [{ kind: "frontMatter", contents: "theme:\n  name: nope" }],
      input,
      output: new PassThrough(),
      backend,
      config: CONFIG,
    });
    assert.equal(backend.screenRow(14).trim(), "invalid presentation metadata: theme 'nope' does not exist");
    input.write("j\x03");

    assert.deepEqual(await running, {
      ok: false,
      error: { code: "INVALID_METADATA", detail: "theme 'nope' does not exist" },
    });
  });

  test("redraws on resize and finishes when input ends", async () => {
    const backend = createRecordingBackend({ rows: 24, columns: 80 });
    const input = new PassThrough();
    const output = new PassThrough();
    const logs = captureLogs();

    const running = runPresentation({ elements: [paragraph("solo")], input, output, backend, config: CONFIG, log: logs.sink });
    backend.resize({ columns: 40 });
    output.emit("resize");
    input.end();

    assert.deepEqual(await running, { ok: true, slideIndex: 0, totalSlides: 1 });
    const resized = logs.events.find((event) => event.message === "terminal resized");
    assert.deepEqual(resized?.detail, { rows: 24, columns: 40 });
    assert.equal(logs.messages("debug").filter((message) => message === "slide drawn").length, 2);
  });

  test("an unknown default theme is reported and ignored", async () => {
    const backend = createRecordingBackend({ rows: 24, columns: 80 });
    const input = new PassThrough();
    const logs = captureLogs();
    const running = runPresentation({
      elements: [paragraph("hi")],
      input,
      output: new PassThrough(),
      backend,
      config: { ...CONFIG, theme: "missing" },
      log: logs.sink,
    });
    input.write("q");
    await running;
    assert.deepEqual(logs.messages("warn"), ["unknown default theme"]);
  });
});
