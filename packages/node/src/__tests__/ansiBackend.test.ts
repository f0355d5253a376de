import { DeckError, type ImageHandle, rgb, styled } from "@termdeck/core";
import { assert, describe, test } from "@termdeck/testkit";
import { createAnsiBackend, moveToSequence, type TerminalInput, type TerminalOutput } from "../backend/ansiBackend.js";

type FakeOutput = TerminalOutput & { writes: string[] };

function fakeOutput(size: { columns?: number; rows?: number } = {}): FakeOutput {
  const writes: string[] = [];
  return {
    ...size,
    writes,
    write(chunk) {
      writes.push(chunk);
      return true;
    },
  };
}

const PNG: ImageHandle = { path: "/img/logo.png", bytes: Uint8Array.from([1, 2, 3]), format: "png" };

describe("createAnsiBackend", () => {
  test("buffers output until flush", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 0 });
    backend.clearScreen();
    backend.moveTo(4, 2);
    backend.printText("hi");
    assert.deepEqual(output.writes, []);
    backend.flush();
    assert.deepEqual(output.writes, ["\x1b[2J\x1b[3;5Hhi"]);
    backend.flush();
    assert.equal(output.writes.length, 1);
  });

  test("moveTo uses 1-based rows and columns", () => {
    assert.equal(moveToSequence(0, 0), "\x1b[1;1H");
    assert.equal(moveToSequence(9, 19), "\x1b[20;10H");
  });

  test("window size comes from the output stream", () => {
    const backend = createAnsiBackend({ output: fakeOutput({ columns: 100, rows: 30 }) });
    assert.deepEqual(backend.windowSize(), { columns: 100, rows: 30, width: 0, height: 0 });
  });

  test("window size falls back to 80x24 and scales by the cell size", () => {
    const backend = createAnsiBackend({ output: fakeOutput(), cellSize: { width: 8, height: 16 } });
    assert.deepEqual(backend.windowSize(), { columns: 80, rows: 24, width: 640, height: 384 });
  });

  test("styled chunks restore the slide colors afterwards", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 3 });
    backend.setColors({ foreground: rgb(1, 2, 3), background: rgb(4, 5, 6) });
    backend.printStyled(styled("hi", { bold: true }));
    backend.printStyled(styled("plain"));
    backend.flush();
    const slide = "\x1b[38;2;1;2;3m\x1b[48;2;4;5;6m";
    assert.deepEqual(output.writes, [`\x1b[39;49m${slide}\x1b[1mhi\x1b[22m${slide}plain`]);
  });

  test("chunk colors are painted with chalk", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 3 });
    backend.printStyled(styled("x", { colors: { foreground: rgb(255, 0, 0) } }));
    backend.flush();
    assert.deepEqual(output.writes, ["\x1b[38;2;255;0;0mx\x1b[39m"]);
  });

  test("color level 0 writes no color codes", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 0 });
    backend.setColors({ foreground: rgb(1, 2, 3) });
    backend.printStyled(styled("hi", { bold: true, colors: { background: rgb(9, 9, 9) } }));
    backend.flush();
    assert.deepEqual(output.writes, ["hi"]);
  });

  test("preformatted text with escapes is followed by the slide colors", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 3 });
    backend.setColors({ background: rgb(0, 0, 0) });
    backend.printText("\x1b[31mred\x1b[39m");
    backend.printText("  ");
    backend.flush();
    assert.deepEqual(output.writes, ["\x1b[39;49m\x1b[48;2;0;0;0m\x1b[31mred\x1b[39m\x1b[48;2;0;0;0m  "]);
  });

  test("switching colors resets slots the new colors leave unset", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 3 });
    backend.setColors({ foreground: rgb(1, 2, 3), background: rgb(4, 5, 6) });
    backend.setColors({});
    backend.printText("after");
    backend.setColors({ foreground: rgb(7, 8, 9) });
    backend.printText("fg only");
    backend.flush();
    assert.deepEqual(output.writes, [
      "\x1b[39;49m\x1b[38;2;1;2;3m\x1b[48;2;4;5;6m" + "\x1b[39;49mafter" + "\x1b[39;49m\x1b[38;2;7;8;9mfg only",
    ]);
  });

  test("showing the cursor hands the terminal back without colors", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, colorLevel: 3 });
    backend.setColors({ foreground: rgb(1, 2, 3), background: rgb(4, 5, 6) });
    backend.setCursorVisible(true);
    backend.printStyled(styled("x", { bold: true }));
    backend.flush();
    assert.deepEqual(output.writes, [
      "\x1b[39;49m\x1b[38;2;1;2;3m\x1b[48;2;4;5;6m\x1b[0m\x1b[?25h\x1b[1mx\x1b[22m",
    ]);
  });

  test("cursor visibility sequences", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output });
    backend.setCursorVisible(false);
    backend.setCursorVisible(true);
    backend.flush();
    assert.deepEqual(output.writes, ["\x1b[?25l\x1b[0m\x1b[?25h"]);
  });

  test("raw mode is only switched on TTY input", () => {
    const modes: boolean[] = [];
    const tty: TerminalInput = {
      isTTY: true,
      setRawMode(mode) {
        modes.push(mode);
      },
    };
    createAnsiBackend({ input: tty, output: fakeOutput() }).setRawMode(true);
    createAnsiBackend({ input: { isTTY: false, setRawMode: () => modes.push(false) }, output: fakeOutput() }).setRawMode(
      true,
    );
    createAnsiBackend({ output: fakeOutput() }).setRawMode(false);
    assert.deepEqual(modes, [true]);
  });

  test("write failures surface as DECK_IO", () => {
    const output: TerminalOutput = {
      write() {
        throw new Error("stream closed");
      },
    };
    const backend = createAnsiBackend({ output });
    backend.clearScreen();
    assert.throws(
      () => backend.flush(),
      (error: unknown) =>
        error instanceof DeckError && error.code === "DECK_IO" && error.message === "writing to terminal: stream closed",
    );
  });

  test("images go out through the configured protocol", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output, imageProtocol: "iterm2" });
    backend.printImage(PNG, { columns: 4, rows: 2 });
    backend.flush();
    assert.deepEqual(output.writes, [
      "\x1b]1337;File=inline=1;size=3;width=4;height=2;preserveAspectRatio=1:AQID\x07",
    ]);
  });

  test("images without a protocol are drawn as a label", () => {
    const output = fakeOutput();
    const backend = createAnsiBackend({ output });
    backend.printImage(PNG, { columns: 40, rows: 3 });
    backend.printImage(PNG, { columns: 8, rows: 3 });
    backend.flush();
    assert.deepEqual(output.writes, ["[image: /img/logo.png][image: "]);
  });
});
