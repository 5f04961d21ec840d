/**
 * Exporter
 *
 * Serializes a dataset to bytes. Header row first with the schema's names in
 * schema order, then one line per row in dataset order. Cells are written
 * from their source text; the only transformation is null rendering.
 */

import { stringify } from "csv-stringify/sync";
import * as XLSX from "xlsx";
import { getCell, type CellValue, type TabularDataset } from "../../domain/dataset";
import { ExportError, fail, succeed, type StageResult } from "../../domain/errors";
import {
  SEPARATOR_CHARS,
  type ExportFormat,
  type ExportOptions,
  type TextEncodingName,
} from "../../domain/formats";

const BOM = "\uFEFF";
const DEFAULT_SHEET_NAME = "Merged";

/** Highest code point each single-byte encoding can carry. */
const MAX_CODE_POINT: Partial<Record<TextEncodingName, number>> = {
  latin1: 0xff,
  ascii: 0x7f,
};

export function exportDataset(
  dataset: TabularDataset,
  format: ExportFormat,
  options: ExportOptions,
): StageResult<Buffer> {
  const rendered = renderCells(dataset, options);
  if (!rendered.ok) return rendered;

  return format.kind === "csv"
    ? writeCsv(rendered.value, dataset, format)
    : writeXlsx(rendered.value, dataset, format.sheetName);
}

/** Source text of a cell, plus its numeric value for spreadsheet output. */
interface RenderedCell {
  text: string;
  numeric?: number;
}

function renderCells(
  dataset: TabularDataset,
  options: ExportOptions,
): StageResult<RenderedCell[][]> {
  const names = dataset.columns.map((c) => c.name);
  const rows: RenderedCell[][] = [];

  for (let rowIndex = 0; rowIndex < dataset.rows.length; rowIndex++) {
    const row = dataset.rows[rowIndex];
    const out: RenderedCell[] = [];
    for (const name of names) {
      const rendered = renderCell(getCell(row, name), options);
      if (rendered === null) {
        return fail(
          new ExportError(
            `Row ${rowIndex + 1}, column "${name}" holds a null marker; enable null materialization or set a null token`,
          ),
        );
      }
      out.push(rendered);
    }
    rows.push(out);
  }
  return succeed(rows);
}

function renderCell(cell: CellValue, options: ExportOptions): RenderedCell | null {
  switch (cell.kind) {
    case "null":
      if (options.materializeNulls) return { text: "" };
      return options.nullToken === undefined ? null : { text: options.nullToken };
    case "number":
      return { text: cell.raw, numeric: cell.value };
    case "text":
      return { text: cell.text };
    case "date":
      return { text: cell.raw };
  }
}

function writeCsv(
  rows: RenderedCell[][],
  dataset: TabularDataset,
  format: Extract<ExportFormat, { kind: "csv" }>,
): StageResult<Buffer> {
  const header = dataset.columns.map((c) => c.name);
  const body = rows.map((row) => row.map((cell) => cell.text));

  const limit = MAX_CODE_POINT[format.encoding];
  if (limit !== undefined) {
    const problem = findUnrepresentable([header, ...body], limit);
    if (problem) {
      const where =
        problem.row === 0
          ? `header "${header[problem.column]}"`
          : `row ${problem.row}, column "${header[problem.column]}"`;
      return fail(
        new ExportError(`Character U+${problem.codePoint.toString(16).toUpperCase().padStart(4, "0")} in ${where} cannot be encoded as ${format.encoding}`),
      );
    }
  }

  let text: string;
  try {
    text = stringify([header, ...body], {
      delimiter: SEPARATOR_CHARS[format.separator],
      record_delimiter: "unix",
      // A lone empty field would otherwise be written as a blank line
      quoted_empty: header.length === 1,
    });
  } catch (err) {
    return fail(new ExportError(`CSV serialization failed: ${err instanceof Error ? err.message : String(err)}`));
  }

  const withBom = format.bom && (format.encoding === "utf-8" || format.encoding === "utf-16le");
  const content = withBom ? BOM + text : text;
  switch (format.encoding) {
    case "utf-8":
      return succeed(Buffer.from(content, "utf8"));
    case "utf-16le":
      return succeed(Buffer.from(content, "utf16le"));
    case "latin1":
    case "ascii":
      return succeed(Buffer.from(content, "latin1"));
  }
}

function findUnrepresentable(
  records: readonly (readonly string[])[],
  limit: number,
): { row: number; column: number; codePoint: number } | null {
  for (let row = 0; row < records.length; row++) {
    const record = records[row];
    for (let column = 0; column < record.length; column++) {
      for (const char of record[column]) {
        const codePoint = char.codePointAt(0) ?? 0;
        if (codePoint > limit) return { row, column, codePoint };
      }
    }
  }
  return null;
}

function writeXlsx(
  rows: RenderedCell[][],
  dataset: TabularDataset,
  sheetName: string | undefined,
): StageResult<Buffer> {
  const header = dataset.columns.map((c) => c.name);
  try {
    const sheet = XLSX.utils.aoa_to_sheet([
      header,
      ...rows.map((row) => row.map((cell) => cell.numeric ?? cell.text)),
    ]);
    const workbook = XLSX.utils.book_new();
    XLSX.utils.book_append_sheet(workbook, sheet, sanitizeSheetName(sheetName ?? DEFAULT_SHEET_NAME));
    const output: unknown = XLSX.write(workbook, { bookType: "xlsx", type: "buffer" });
    if (!Buffer.isBuffer(output)) {
      return fail(new ExportError("Spreadsheet writer did not return a buffer"));
    }
    return succeed(output);
  } catch (err) {
    return fail(new ExportError(`Spreadsheet export failed: ${err instanceof Error ? err.message : String(err)}`));
  }
}

/**
 * Sheet names: at most 31 characters, none of : \ / ? * [ ]
 */
export function sanitizeSheetName(name: string): string {
  const cleaned = name.replace(/[:\\/?*[\]]/g, "_").trim().slice(0, 31);
  return cleaned === "" ? DEFAULT_SHEET_NAME : cleaned;
}
