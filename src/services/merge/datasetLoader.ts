/**
 * Dataset Loader
 *
 * Turns uploaded file bytes into TabularDatasets.
 * - Decodes with the declared encoding (invalid byte sequences fail the load)
 * - Parses with the declared separator via csv-parse
 * - Rows whose field count differs from the header are reported as
 *   malformed and left out; the rest of the file still loads
 */

import { parse as parseCsv } from "csv-parse/sync";
import {
  dateCell,
  numberCell,
  textCell,
  type CellValue,
  type Column,
  type ColumnType,
  type Row,
  type TabularDataset,
} from "../../domain/dataset";
import { LoadError, fail, succeed, type StageResult } from "../../domain/errors";
import { SEPARATOR_CHARS, type Separator, type TextEncodingName } from "../../domain/formats";

export interface LoadInput {
  sourceId: string;
  content: Uint8Array;
  separator: Separator;
  encoding: TextEncodingName;
  /** Declared column types by header name; undeclared columns are "unknown". */
  columnTypes?: Readonly<Record<string, ColumnType>>;
}

export interface MalformedRow {
  sourceId: string;
  /** Zero-based index among the file's data records. */
  rowIndex: number;
  expectedColumns: number;
  actualColumns: number;
}

export interface LoadReport {
  sourceId: string;
  rowCount: number;
  malformedRows: MalformedRow[];
  renamedHeaders: Array<{ original: string; renamed: string }>;
}

export interface LoadedSource {
  dataset: TabularDataset;
  report: LoadReport;
}

const NUMBER_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;
const ISO_DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export function loadDatasets(inputs: readonly LoadInput[]): StageResult<LoadedSource[]> {
  if (inputs.length === 0) {
    return fail(new LoadError("No files supplied"));
  }

  const seen = new Set<string>();
  const loaded: LoadedSource[] = [];
  for (const input of inputs) {
    if (seen.has(input.sourceId)) {
      return fail(new LoadError(`Duplicate source id "${input.sourceId}"`, input.sourceId));
    }
    seen.add(input.sourceId);

    const result = loadDataset(input);
    if (!result.ok) return result;
    loaded.push(result.value);
  }
  return succeed(loaded);
}

export function loadDataset(input: LoadInput): StageResult<LoadedSource> {
  const { sourceId } = input;
  if (sourceId.trim() === "") {
    return fail(new LoadError("Source id must not be empty"));
  }
  if (input.content.byteLength === 0) {
    return fail(new LoadError(`File "${sourceId}" is empty`, sourceId));
  }

  const decoded = decodeContent(input.content, input.encoding);
  if (decoded === null) {
    return fail(
      new LoadError(`File "${sourceId}" is not valid ${input.encoding} text`, sourceId),
    );
  }

  let records: unknown;
  try {
    records = parseCsv(decoded, {
      delimiter: SEPARATOR_CHARS[input.separator],
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(new LoadError(`File "${sourceId}" could not be parsed: ${message}`, sourceId));
  }

  if (!isStringMatrix(records) || records.length === 0) {
    return fail(new LoadError(`File "${sourceId}" has no header row`, sourceId));
  }

  const [headerRecord, ...dataRecords] = records;
  const { names, renamed } = uniqueHeaderNames(headerRecord);
  const columnTypes = input.columnTypes ?? {};
  const columns: Column[] = names.map((name) => ({
    name,
    declaredType: columnTypes[name] ?? "unknown",
  }));

  const rows: Row[] = [];
  const malformedRows: MalformedRow[] = [];
  dataRecords.forEach((record, rowIndex) => {
    if (record.length !== columns.length) {
      malformedRows.push({
        sourceId,
        rowIndex,
        expectedColumns: columns.length,
        actualColumns: record.length,
      });
      return;
    }
    rows.push(
      Object.fromEntries(
        columns.map((column, i): [string, CellValue] => [column.name, parseCell(record[i], column.declaredType)]),
      ),
    );
  });

  return succeed({
    dataset: { sourceId, columns, rows },
    report: { sourceId, rowCount: rows.length, malformedRows, renamedHeaders: renamed },
  });
}

/**
 * Decode bytes strictly. Returns null when the bytes are not valid in the
 * declared encoding.
 */
export function decodeContent(content: Uint8Array, encoding: TextEncodingName): string | null {
  switch (encoding) {
    case "utf-8":
    case "utf-16le":
      try {
        return new TextDecoder(encoding, { fatal: true }).decode(content);
      } catch {
        return null;
      }
    case "ascii":
      if (content.some((byte) => byte > 0x7f)) return null;
      return Buffer.from(content).toString("latin1");
    case "latin1":
      return Buffer.from(content).toString("latin1");
  }
}

/**
 * Cell value for a declared column type. Values that do not fit the
 * declared type stay text.
 */
export function parseCell(raw: string, declaredType: ColumnType): CellValue {
  const trimmed = raw.trim();
  if (declaredType === "number" && NUMBER_PATTERN.test(trimmed)) {
    return numberCell(Number(trimmed), raw);
  }
  if (declaredType === "date") {
    const iso = toIsoDate(trimmed);
    if (iso !== null) return dateCell(iso, raw);
  }
  return textCell(raw);
}

function toIsoDate(value: string): string | null {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const calendarDate = new Date(Date.UTC(year, month - 1, day));
  if (
    calendarDate.getUTCFullYear() !== year ||
    calendarDate.getUTCMonth() !== month - 1 ||
    calendarDate.getUTCDate() !== day
  ) {
    return null;
  }
  if (match[4] !== undefined && (Number(match[4]) > 23 || Number(match[5]) > 59)) {
    return null;
  }
  return value.replace(" ", "T");
}

/**
 * Blank headers become "Unnamed: <index>"; repeated headers get ".1", ".2", ...
 */
function uniqueHeaderNames(header: readonly string[]): {
  names: string[];
  renamed: Array<{ original: string; renamed: string }>;
} {
  const taken = new Set<string>();
  const names: string[] = [];
  const renamed: Array<{ original: string; renamed: string }> = [];

  header.forEach((original, index) => {
    let name = original.trim() === "" ? `Unnamed: ${index}` : original;
    if (taken.has(name)) {
      let counter = 1;
      while (taken.has(`${name}.${counter}`)) counter++;
      name = `${name}.${counter}`;
    }
    if (name !== original) renamed.push({ original, renamed: name });
    taken.add(name);
    names.push(name);
  });

  return { names, renamed };
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((record) => Array.isArray(record) && record.every((field) => typeof field === "string"))
  );
}
