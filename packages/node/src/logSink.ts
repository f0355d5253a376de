/**
 * packages/node/src/logSink.ts — NDJSON file log sink.
 *
 * Why: the terminal belongs to the presentation while it runs, so logs go to
 * a file, one JSON object per line.
 */

import { appendFileSync } from "node:fs";
import type { DeckLogEvent, DeckLogSink } from "@termdeck/core";

export type FileLogSinkOptions = Readonly<{
  /** Defaults to the wall clock. */
  now?: () => Date;
}>;

export function formatLogRecord(event: DeckLogEvent, time: Date): string {
  return `${JSON.stringify({ time: time.toISOString(), ...event })}\n`;
}

export function createFileLogSink(path: string, options: FileLogSinkOptions = {}): DeckLogSink {
  const now = options.now ?? (() => new Date());
  return (event) => {
    appendFileSync(path, formatLogRecord(event, now()), "utf8");
  };
}
