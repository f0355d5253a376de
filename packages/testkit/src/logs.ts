/** Log event shape shared by every termdeck component. */
export type CapturedLogEvent = Readonly<{
  level: string;
  message: string;
  detail?: Readonly<Record<string, unknown>>;
}>;

export type LogCapture = Readonly<{
  events: CapturedLogEvent[];
  sink: (event: CapturedLogEvent) => void;
  messages: (level?: string) => string[];
}>;

/** Collect log events in memory for assertions. */
export function captureLogs(): LogCapture {
  const events: CapturedLogEvent[] = [];
  return {
    events,
    sink: (event) => {
      events.push(event);
    },
    messages: (level) =>
      events.filter((event) => level === undefined || event.level === level).map((event) => event.message),
  };
}
