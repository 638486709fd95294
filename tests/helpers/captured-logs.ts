import {
  resetLogSink,
  setLogSink,
  type StructuredLogEvent,
} from "../../packages/core/src/observability/logger";

/** Routes structured log lines into the returned array until `releaseLogs` runs. */
export function captureLogs(): StructuredLogEvent[] {
  const events: StructuredLogEvent[] = [];
  setLogSink((line) => {
    events.push(JSON.parse(line));
  });
  return events;
}

export function releaseLogs(): void {
  resetLogSink();
}
