export type ListLiteralValue = string | number;

type ParseListLiteralOk = {
  ok: true;
  values: ListLiteralValue[];
};

type ParseListLiteralFailed = {
  ok: false;
  error: string;
  position: number;
};

export type ParseListLiteralResult = ParseListLiteralOk | ParseListLiteralFailed;

const CLOSING_BRACKETS: Record<string, string> = {
  "[": "]",
  "(": ")",
  "{": "}",
};

const ESCAPES: Record<string, string> = {
  "\\": "\\",
  "'": "'",
  '"': '"',
  n: "\n",
  t: "\t",
  r: "\r",
};

class ListLiteralSyntaxError extends Error {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = "ListLiteralSyntaxError";
    this.position = position;
  }
}

/**
 * Parses the textual list representation stored in set-valued dataset columns,
 * e.g. `['Hiking', "Food"]`, `(1, 2,)` or `{'es'}`. A blank cell is an empty list.
 * Only flat lists of quoted strings and integers are accepted.
 */
export function parseListLiteral(raw: string): ParseListLiteralResult {
  const text = raw.trim();
  if (text.length === 0) {
    return { ok: true, values: [] };
  }

  try {
    const scanner = new Scanner(text);
    const values = scanner.readList();
    scanner.skipWhitespace();
    if (!scanner.done()) {
      throw new ListLiteralSyntaxError("Unexpected trailing characters", scanner.position);
    }
    return { ok: true, values };
  } catch (error) {
    if (error instanceof ListLiteralSyntaxError) {
      return { ok: false, error: error.message, position: error.position };
    }
    throw error;
  }
}

class Scanner {
  position = 0;

  constructor(private readonly text: string) {}

  done(): boolean {
    return this.position >= this.text.length;
  }

  skipWhitespace(): void {
    while (!this.done() && /\s/.test(this.text[this.position])) {
      this.position += 1;
    }
  }

  readList(): ListLiteralValue[] {
    this.skipWhitespace();
    const opening = this.text[this.position];
    const closing = CLOSING_BRACKETS[opening];
    if (!closing) {
      throw new ListLiteralSyntaxError("Expected '[', '(' or '{'", this.position);
    }
    this.position += 1;

    const values: ListLiteralValue[] = [];
    for (;;) {
      this.skipWhitespace();
      if (this.done()) {
        throw new ListLiteralSyntaxError(`Missing closing '${closing}'`, this.position);
      }
      if (this.text[this.position] === closing) {
        this.position += 1;
        return values;
      }

      values.push(this.readScalar());

      this.skipWhitespace();
      if (this.done()) {
        throw new ListLiteralSyntaxError(`Missing closing '${closing}'`, this.position);
      }
      const next = this.text[this.position];
      if (next === ",") {
        this.position += 1;
        continue;
      }
      if (next !== closing) {
        throw new ListLiteralSyntaxError(`Expected ',' or '${closing}'`, this.position);
      }
    }
  }

  private readScalar(): ListLiteralValue {
    const current = this.text[this.position];
    if (current === "'" || current === '"') {
      return this.readString(current);
    }
    return this.readInteger();
  }

  private readString(quote: string): string {
    const start = this.position;
    this.position += 1;
    let value = "";

    while (!this.done()) {
      const char = this.text[this.position];
      if (char === quote) {
        this.position += 1;
        return value;
      }
      if (char === "\\") {
        const escaped = this.text[this.position + 1];
        const replacement = escaped === undefined ? undefined : ESCAPES[escaped];
        if (replacement === undefined) {
          throw new ListLiteralSyntaxError("Unsupported escape sequence", this.position);
        }
        value += replacement;
        this.position += 2;
        continue;
      }
      value += char;
      this.position += 1;
    }

    throw new ListLiteralSyntaxError("Unterminated string", start);
  }

  private readInteger(): number {
    const match = /^-?\d+/.exec(this.text.slice(this.position));
    if (!match) {
      throw new ListLiteralSyntaxError("Expected a quoted string or an integer", this.position);
    }
    this.position += match[0].length;
    return Number.parseInt(match[0], 10);
  }
}
