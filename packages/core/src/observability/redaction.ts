const EMAIL_PATTERN = /\b[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}\b/gi;
const PHONE_PATTERN = /(?:\+?\d[\d().\-\s]{8,}\d)/g;

const USER_NAME_KEY_PATTERN = /(^|[_-])(user[_-]?name|username|full[_-]?name|display[_-]?name)$/i;

export const REDACTED_USER_NAME = "[REDACTED_USER_NAME]";

export function redactPII<T>(input: T): T;
export function redactPII(input: unknown): unknown {
  const seen = new WeakSet<object>();
  return redactValue(input, "", seen);
}

function redactValue(input: unknown, keyName: string, seen: WeakSet<object>): unknown {
  if (input === null || input === undefined) {
    return input;
  }

  if (USER_NAME_KEY_PATTERN.test(keyName) && typeof input === "string") {
    return REDACTED_USER_NAME;
  }

  if (typeof input === "string") {
    return redactString(input);
  }

  if (typeof input !== "object") {
    return input;
  }

  if (seen.has(input)) {
    return "[Circular]";
  }
  seen.add(input);

  if (Array.isArray(input)) {
    return input.map((value) => redactValue(value, keyName, seen));
  }

  const output: Record<string, unknown> = {};
  for (const [childKey, childValue] of Object.entries(input)) {
    output[childKey] = redactValue(childValue, childKey, seen);
  }
  return output;
}

function redactString(input: string): string {
  let redacted = input.replace(EMAIL_PATTERN, "[REDACTED_EMAIL]");
  redacted = redacted.replace(PHONE_PATTERN, (candidate) => {
    const digits = candidate.replace(/\D/g, "");
    if (digits.length < 10 || digits.length > 15) {
      return candidate;
    }
    return "[REDACTED_PHONE]";
  });
  return redacted;
}
