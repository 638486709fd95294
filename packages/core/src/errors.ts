export type MatchingErrorCode =
  | "MATCH_USER_NOT_FOUND"
  | "MATCH_UNKNOWN_ROLE"
  | "DATASET_READ_FAILED"
  | "DATASET_PARSE_FAILED"
  | "DATASET_INVALID_ROW"
  | "CONFIG_INVALID"
  | "SWIPE_SESSION_STATE";

export const MATCHING_ERROR_CODES = {
  USER_NOT_FOUND: "MATCH_USER_NOT_FOUND",
  UNKNOWN_ROLE: "MATCH_UNKNOWN_ROLE",
  DATASET_READ_FAILED: "DATASET_READ_FAILED",
  DATASET_PARSE_FAILED: "DATASET_PARSE_FAILED",
  DATASET_INVALID_ROW: "DATASET_INVALID_ROW",
  CONFIG_INVALID: "CONFIG_INVALID",
  SWIPE_SESSION_STATE: "SWIPE_SESSION_STATE",
} as const satisfies Record<string, MatchingErrorCode>;

const SENSITIVE_KEY_PATTERN = /(secret|token|password|authorization|api[_-]?key|dsn)/i;
const REDACTED = "[REDACTED]";

export function sanitizeForError(value: unknown): unknown {
  return sanitizeValue(value, new WeakSet<object>());
}

function sanitizeValue(value: unknown, seen: WeakSet<object>): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeValue(entry, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    output[key] = SENSITIVE_KEY_PATTERN.test(key) ? REDACTED : sanitizeValue(child, seen);
  }
  return output;
}

export class MatchingError extends Error {
  readonly code: MatchingErrorCode;
  readonly context: unknown;

  constructor(
    code: MatchingErrorCode,
    message: string,
    options: { context?: unknown; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "MatchingError";
    this.code = code;
    this.context = sanitizeForError(options.context ?? null);
  }

  toJSON(): {
    name: string;
    code: MatchingErrorCode;
    message: string;
    context: unknown;
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }

  static fromUnknown(params: {
    code: MatchingErrorCode;
    message: string;
    error: unknown;
    context?: unknown;
  }): MatchingError {
    if (params.error instanceof MatchingError) {
      return params.error;
    }
    const detail = params.error instanceof Error ? params.error.message : String(params.error);
    return new MatchingError(params.code, `${params.message}: ${detail}`, {
      context: params.context,
      cause: params.error,
    });
  }
}

export function isMatchingError(error: unknown): error is MatchingError {
  return error instanceof MatchingError;
}
