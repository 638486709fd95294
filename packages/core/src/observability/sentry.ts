import type { LogLevel, StructuredLogEvent } from "./logger";

export type SentryCaptureInput = {
  level: LogLevel;
  event: string;
  category: string;
  user_id: string | null;
  payload: Record<string, unknown>;
};

export type SentrySpanOptions = {
  name: string;
  op?: string;
  attributes?: Record<string, string | number | boolean>;
};

/**
 * The capture surface core code talks to. Hosts install one backed by their
 * Sentry SDK; without one every helper here is a pass-through.
 */
export type SentryBridge = {
  captureException: (error: Error, input: SentryCaptureInput) => void;
  captureMessage: (message: string, input: SentryCaptureInput) => void;
  startSpan: <T>(options: SentrySpanOptions, callback: () => T) => T;
};

const SENTRY_BRIDGE_KEY = Symbol.for("travel_match.observability.sentry_bridge");

type BridgeHolder = typeof globalThis & {
  [SENTRY_BRIDGE_KEY]?: SentryBridge | null;
};

const holder: BridgeHolder = globalThis;

export function registerSentryBridge(bridge: SentryBridge | null): void {
  holder[SENTRY_BRIDGE_KEY] = bridge;
}

export function getSentryBridge(): SentryBridge | null {
  return holder[SENTRY_BRIDGE_KEY] ?? null;
}

/**
 * Runs `callback` inside a span. The callback runs exactly once: errors it
 * throws propagate, and a bridge that fails before entering it is bypassed.
 */
export function startSentrySpan<T>(options: SentrySpanOptions, callback: () => T): T {
  const bridge = getSentryBridge();
  if (!bridge) {
    return callback();
  }

  let entered = false;
  try {
    return bridge.startSpan(options, () => {
      entered = true;
      return callback();
    });
  } catch (error) {
    if (entered) {
      throw error;
    }
    return callback();
  }
}

/** Forwards `error` and `fatal` log events; lower levels stay local. */
export function captureSentryFromStructuredLog(event: StructuredLogEvent): void {
  if (event.level !== "error" && event.level !== "fatal") {
    return;
  }
  const bridge = getSentryBridge();
  if (!bridge) {
    return;
  }

  const input: SentryCaptureInput = {
    level: event.level,
    event: event.event,
    category: event.category,
    user_id: event.user_id,
    payload: event.payload,
  };
  try {
    const error = errorFromPayload(event.payload);
    if (error) {
      bridge.captureException(error, input);
    } else {
      bridge.captureMessage(`structured_log.${event.event}`, input);
    }
  } catch {
    // A failing bridge must not turn a logged error into a crash.
  }
}

function errorFromPayload(payload: Record<string, unknown>): Error | null {
  if (payload.error instanceof Error) {
    return payload.error;
  }
  if (typeof payload.error_message !== "string" || !payload.error_message.trim()) {
    return null;
  }
  const error = new Error(payload.error_message.trim());
  error.name = typeof payload.error_name === "string" && payload.error_name.trim()
    ? payload.error_name.trim()
    : "StructuredLogError";
  return error;
}
