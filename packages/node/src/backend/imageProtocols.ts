/**
 * packages/node/src/backend/imageProtocols.ts — Inline image escape sequences.
 *
 *   kitty:  APC `_G` graphics commands, PNG payload (f=100), base64 in chunks
 *   iterm2: OSC 1337 `File=` with the whole base64 payload
 *   none:   a plain `[image: path]` label clipped to the area width
 */

import { DeckError, type ImageArea, type ImageHandle } from "@termdeck/core";
import type { ImageProtocol } from "./terminalProfile.js";

export const KITTY_CHUNK_SIZE = 4096;

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

export function encodeKittyImage(image: ImageHandle, area: ImageArea): string {
  if (image.format !== "png") {
    throw new DeckError("DECK_OTHER", `kitty graphics needs PNG data: ${image.path}`);
  }
  const payload = toBase64(image.bytes);
  const parts: string[] = [];
  for (let offset = 0; offset < payload.length || offset === 0; offset += KITTY_CHUNK_SIZE) {
    const chunk = payload.slice(offset, offset + KITTY_CHUNK_SIZE);
    const more = offset + KITTY_CHUNK_SIZE < payload.length ? 1 : 0;
    // q=2 keeps the terminal from answering on stdin.
    const control =
      offset === 0
        ? `f=100,a=T,q=2,c=${String(area.columns)},r=${String(area.rows)},m=${String(more)}`
        : `m=${String(more)}`;
    parts.push(`\x1b_G${control};${chunk}\x1b\\`);
  }
  return parts.join("");
}

export function encodeIterm2Image(image: ImageHandle, area: ImageArea): string {
  const args = [
    "inline=1",
    `size=${String(image.bytes.byteLength)}`,
    `width=${String(area.columns)}`,
    `height=${String(area.rows)}`,
    "preserveAspectRatio=1",
  ].join(";");
  return `\x1b]1337;File=${args}:${toBase64(image.bytes)}\x07`;
}

export function imagePlaceholder(image: ImageHandle, area: ImageArea): string {
  return `[image: ${image.path}]`.slice(0, Math.max(0, area.columns));
}

export function encodeImage(protocol: ImageProtocol, image: ImageHandle, area: ImageArea): string {
  switch (protocol) {
    case "kitty":
      return encodeKittyImage(image, area);
    case "iterm2":
      return encodeIterm2Image(image, area);
    case "none":
      return imagePlaceholder(image, area);
  }
}
