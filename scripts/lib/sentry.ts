import * as Sentry from "@sentry/node";
import type { SentryRuntimeConfig } from "../../packages/core/src/config/runtime-config";
import { redactPII } from "../../packages/core/src/observability/redaction";
import {
  registerSentryBridge,
  type SentryBridge,
  type SentryCaptureInput,
} from "../../packages/core/src/observability/sentry";

const FLUSH_TIMEOUT_MS = 2_000;

let installed = false;

export function buildSentryInitOptions(config: SentryRuntimeConfig): Sentry.NodeOptions {
  return {
    dsn: config.dsn ?? undefined,
    environment: config.environment,
    release: config.release ?? undefined,
    tracesSampleRate: config.tracesSampleRate,
    sendDefaultPii: false,
    // Payloads carry user names and free text from the datasets.
    beforeSend: (event) => redactPII(event),
  };
}

/** Starts @sentry/node and points the core bridge at it. Returns false when disabled. */
export function installNodeSentryBridge(config: SentryRuntimeConfig): boolean {
  if (installed) {
    return true;
  }
  if (!config.enabled) {
    return false;
  }
  Sentry.init(buildSentryInitOptions(config));
  registerSentryBridge(nodeSentryBridge);
  installed = true;
  return true;
}

export async function flushSentry(): Promise<void> {
  if (installed) {
    await Sentry.flush(FLUSH_TIMEOUT_MS);
  }
}

export const nodeSentryBridge: SentryBridge = {
  captureException(error, input) {
    Sentry.withScope((scope) => {
      applyCaptureInput(scope, input);
      Sentry.captureException(error);
    });
  },
  captureMessage(message, input) {
    Sentry.withScope((scope) => {
      applyCaptureInput(scope, input);
      Sentry.captureMessage(message);
    });
  },
  startSpan(options, callback) {
    return Sentry.startSpan(
      { name: options.name, op: options.op ?? options.name, attributes: options.attributes },
      callback,
    );
  },
};

function applyCaptureInput(scope: Sentry.Scope, input: SentryCaptureInput): void {
  scope.setLevel(input.level === "warn" ? "warning" : input.level);
  scope.setTag("event", input.event);
  scope.setTag("category", input.category);
  if (input.user_id) {
    scope.setUser({ id: input.user_id });
  }
  scope.setContext("payload", input.payload);
}
