import { normalizeEnvironment, type RuntimeEnvironment } from "../config/runtime-config";
import {
  EVENT_CATALOG_BY_NAME,
  type CanonicalEventName,
  type EventCatalogEntry,
} from "./event-catalog";
import { emitSystemErrorMetric } from "./metrics";
import { redactPII } from "./redaction";
import { captureSentryFromStructuredLog } from "./sentry";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type StructuredLogEventInput = {
  event: CanonicalEventName;
  user_id?: string | number | null;
  payload: Record<string, unknown>;
  level?: LogLevel;
};

export type StructuredLogEvent = {
  ts: string;
  level: LogLevel;
  event: CanonicalEventName;
  category: EventCatalogEntry["category"];
  env: RuntimeEnvironment;
  user_id: string | null;
  payload: Record<string, unknown>;
};

/** Receives one serialized event per call, without a trailing newline. */
export type LogSink = (line: string) => void;

// stdout belongs to command output; log lines go to stderr.
const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

let activeSink: LogSink = stderrSink;

export function setLogSink(sink: LogSink): void {
  activeSink = sink;
}

export function resetLogSink(): void {
  activeSink = stderrSink;
}

export function logEvent(input: StructuredLogEventInput, explicitEnv?: string): StructuredLogEvent {
  const definition = EVENT_CATALOG_BY_NAME[input.event];
  if (!definition) {
    throw new Error(`Unknown structured log event: '${input.event}'.`);
  }
  const missing = definition.required_fields.find((field) => !isPresent(input.payload[field]));
  if (missing) {
    throw new Error(`Missing required field '${missing}' for log event '${input.event}'.`);
  }

  const event: StructuredLogEvent = {
    ts: new Date().toISOString(),
    level: input.level ?? "info",
    event: input.event,
    category: definition.category,
    env: normalizeEnvironment(explicitEnv ?? process.env.APP_ENV ?? process.env.NODE_ENV),
    user_id: input.user_id === null || input.user_id === undefined ? null : String(input.user_id),
    payload: redactPII(input.payload),
  };

  if (event.event === "system.unhandled_error") {
    emitSystemErrorMetric({
      component: "structured_logger",
      phase: stringOrNull(event.payload.phase),
      error_name: stringOrNull(event.payload.error_name),
    });
  }
  activeSink(JSON.stringify(event));
  captureSentryFromStructuredLog(event);
  return event;
}

function isPresent(value: unknown): boolean {
  if (typeof value === "string") {
    return value.trim().length > 0;
  }
  return value !== null && value !== undefined;
}

function stringOrNull(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}
