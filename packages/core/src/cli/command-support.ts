import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { logEvent } from "../observability/logger";

export const EXIT_OK = 0;
export const EXIT_MATCHING_ERROR = 1;
export const EXIT_USAGE = 2;

export type WriteLine = (line: string) => void;

export const writeStdoutLine: WriteLine = (line) => {
  process.stdout.write(`${line}\n`);
};

/** Returns the user id, or the usage problem as a message. */
export function readUserIdPositional(positionals: readonly string[]): number | string {
  if (positionals.length !== 1) {
    return "Expected exactly one <userId> argument.";
  }
  const raw = positionals[0];
  if (!/^-?\d+$/.test(raw)) {
    return `userId must be an integer, got '${raw}'.`;
  }
  return Number.parseInt(raw, 10);
}

/**
 * Turns an argument-parsing failure into a usage message. `parseArgs` reports
 * unknown or malformed flags with a TypeError.
 */
export function usageProblem(error: unknown): string {
  if (error instanceof MatchingError || error instanceof TypeError) {
    return error.message;
  }
  throw error;
}

export function reportMatchingError(
  error: MatchingError,
  params: { user_id: number; phase: string; write: WriteLine },
): number {
  switch (error.code) {
    case MATCHING_ERROR_CODES.USER_NOT_FOUND:
      logEvent({
        event: "matching.user_not_found",
        level: "warn",
        payload: { requested_user_id: params.user_id },
      });
      break;

    case MATCHING_ERROR_CODES.DATASET_READ_FAILED:
    case MATCHING_ERROR_CODES.DATASET_PARSE_FAILED:
    case MATCHING_ERROR_CODES.DATASET_INVALID_ROW:
      logEvent({
        event: "dataset.parse_failed",
        level: "error",
        payload: {
          source: contextSource(error.context) ?? "unknown",
          error_code: error.code,
          error_name: error.name,
          error_message: error.message,
        },
      });
      break;

    default:
      logEvent({
        event: "system.unhandled_error",
        level: "error",
        user_id: params.user_id,
        payload: {
          phase: params.phase,
          error_name: error.name,
          error_code: error.code,
          error_message: error.message,
        },
      });
  }

  params.write(`Error: ${error.message}`);
  return EXIT_MATCHING_ERROR;
}

function contextSource(context: unknown): string | null {
  if (!context || typeof context !== "object" || !("source" in context)) {
    return null;
  }
  return typeof context.source === "string" ? context.source : null;
}
