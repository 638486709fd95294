import { readFileSync } from "node:fs";
import { parse } from "csv-parse/sync";
import { MATCHING_ERROR_CODES, MatchingError } from "../errors";
import { parseListLiteral, type ListLiteralValue } from "./list-literal";

export type CsvRecord = Record<string, string>;

export type CsvRow = {
  record: CsvRecord;
  /** File line the record ends on; the header is line 1. */
  row_number: number;
};

export type CsvCellLocation = {
  source: string;
  row_number: number;
  column: string;
};

export function readDatasetFile(path: string): string {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw MatchingError.fromUnknown({
      code: MATCHING_ERROR_CODES.DATASET_READ_FAILED,
      message: `Unable to read dataset '${path}'`,
      error,
      context: { source: path },
    });
  }
}

/**
 * Parses CSV text with a header row into string records and checks that every
 * required column is present. Each row keeps the file line it came from, so
 * skipped blank lines and quoted line breaks do not shift reported rows.
 */
export function parseCsvRecords(params: {
  text: string;
  source: string;
  requiredColumns: readonly string[];
}): CsvRow[] {
  let parsed: unknown;
  try {
    parsed = parse(params.text, {
      columns: true,
      bom: true,
      trim: true,
      skip_empty_lines: true,
      info: true,
    });
  } catch (error) {
    throw MatchingError.fromUnknown({
      code: MATCHING_ERROR_CODES.DATASET_PARSE_FAILED,
      message: `Malformed CSV in '${params.source}'`,
      error,
      context: { source: params.source },
    });
  }

  if (!Array.isArray(parsed)) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.DATASET_PARSE_FAILED,
      `CSV parser returned no rows for '${params.source}'`,
      { context: { source: params.source } },
    );
  }

  const header = firstHeader(params.text);
  const missing = params.requiredColumns.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.DATASET_PARSE_FAILED,
      `Dataset '${params.source}' is missing columns: ${missing.join(", ")}`,
      { context: { source: params.source, missing_columns: missing } },
    );
  }
  return parsed.map((entry, index) => toCsvRow(entry, params.source, index));
}

function firstHeader(text: string): string[] {
  const parsedHeader: unknown = parse(text, { bom: true, trim: true, to_line: 1 });
  if (!Array.isArray(parsedHeader) || !Array.isArray(parsedHeader[0])) {
    return [];
  }
  const header: unknown[] = parsedHeader[0];
  return header.filter((cell): cell is string => typeof cell === "string");
}

function toCsvRow(entry: unknown, source: string, index: number): CsvRow {
  const info = isObjectLike(entry) ? entry.info : undefined;
  const rowNumber = isObjectLike(info) && typeof info.lines === "number" ? info.lines : index + 2;
  const fields = isObjectLike(entry) ? entry.record : undefined;
  if (!isObjectLike(fields) || Array.isArray(fields)) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.DATASET_PARSE_FAILED,
      `Row ${rowNumber} of '${source}' is not a record`,
      { context: { source, row_number: rowNumber } },
    );
  }

  const record: CsvRecord = {};
  for (const [key, value] of Object.entries(fields)) {
    record[key] = typeof value === "string" ? value : "";
  }
  return { record, row_number: rowNumber };
}

function isObjectLike(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

export function readListCell(record: CsvRecord, location: CsvCellLocation): ListLiteralValue[] {
  const result = parseListLiteral(record[location.column] ?? "");
  if (!result.ok) {
    throw new MatchingError(
      MATCHING_ERROR_CODES.DATASET_PARSE_FAILED,
      `Malformed list in column '${location.column}' at row ${location.row_number} of '${location.source}': ${result.error}`,
      { context: { ...location, position: result.position } },
    );
  }
  return result.values;
}

export function readStringListCell(record: CsvRecord, location: CsvCellLocation): string[] {
  const values = readListCell(record, location);
  const strings: string[] = [];
  for (const value of values) {
    if (typeof value !== "string") {
      throw invalidCell(location, "must contain only quoted strings");
    }
    strings.push(value);
  }
  return uniqueValues(strings);
}

export function readIntegerListCell(record: CsvRecord, location: CsvCellLocation): number[] {
  const values = readListCell(record, location);
  const integers: number[] = [];
  for (const value of values) {
    if (typeof value !== "number" || !Number.isSafeInteger(value)) {
      throw invalidCell(location, "must contain only integers");
    }
    integers.push(value);
  }
  return uniqueValues(integers);
}

export function readIntegerCell(record: CsvRecord, location: CsvCellLocation): number {
  const raw = (record[location.column] ?? "").trim();
  if (!/^-?\d+$/.test(raw)) {
    throw invalidCell(location, "must be an integer");
  }
  const value = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(value)) {
    throw invalidCell(location, "is out of range");
  }
  return value;
}

export function readRequiredStringCell(record: CsvRecord, location: CsvCellLocation): string {
  const value = (record[location.column] ?? "").trim();
  if (!value) {
    throw invalidCell(location, "must not be empty");
  }
  return value;
}

export function readOptionalStringCell(record: CsvRecord, location: CsvCellLocation): string | null {
  const value = (record[location.column] ?? "").trim();
  return value.length > 0 ? value : null;
}

export function invalidCell(location: CsvCellLocation, problem: string): MatchingError {
  return new MatchingError(
    MATCHING_ERROR_CODES.DATASET_INVALID_ROW,
    `Column '${location.column}' at row ${location.row_number} of '${location.source}' ${problem}`,
    { context: location },
  );
}

function uniqueValues<T>(values: readonly T[]): T[] {
  return [...new Set(values)];
}
