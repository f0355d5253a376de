/**
 * packages/core/src/log.ts — Structured log events.
 *
 * Log sinks are plain callbacks. The terminal belongs to the presentation, so
 * nothing here writes to stdout/stderr; hosts decide where events go.
 */

export type DeckLogLevel = "debug" | "info" | "warn" | "error";

export type DeckLogEvent = Readonly<{
  level: DeckLogLevel;
  message: string;
  detail?: Readonly<Record<string, unknown>>;
}>;

export type DeckLogSink = (event: DeckLogEvent) => void;

export function makeLogSink(log: DeckLogSink | undefined): DeckLogSink {
  if (typeof log === "function") return log;
  return () => {};
}
