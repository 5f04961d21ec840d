/**
 * Duplicate Resolver
 *
 * Groups rows by an equality key over the comparison columns and applies a
 * duplicate policy. Cells compare by kind and value: numbers by exact decimal value,
 * dates by ISO text, text exactly, and the null marker only equals another
 * null marker. Surviving rows keep their relative order.
 */

import {
  getCell,
  type CellValue,
  type DuplicatePolicy,
  type Row,
  type RowOrigin,
  type TabularDataset,
} from "../../domain/dataset";
import { UnknownColumnError, fail, succeed, type StageResult } from "../../domain/errors";

export interface DuplicateGroup {
  key: string;
  /** Indices into the input dataset's rows. */
  rowIndices: number[];
  origins: RowOrigin[];
}

export interface DuplicateReport {
  policy: DuplicatePolicy;
  comparisonColumns: string[];
  /** Groups with more than one member, in first-seen order. */
  groups: DuplicateGroup[];
  inputRows: number;
  outputRows: number;
  removedCount: number;
}

export interface DedupeOutcome {
  dataset: TabularDataset;
  report: DuplicateReport;
}

export const DUPLICATE_POLICIES: readonly DuplicatePolicy[] = [
  "keepFirst",
  "keepLast",
  "keepAll",
  "dropAllDuplicates",
];

export function dedupeRows(
  dataset: TabularDataset,
  policy: DuplicatePolicy,
  columns?: readonly string[],
): StageResult<DedupeOutcome> {
  const schemaNames = dataset.columns.map((c) => c.name);
  const comparisonColumns = columns && columns.length > 0 ? [...columns] : schemaNames;

  const known = new Set(schemaNames);
  const unknown = comparisonColumns.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    return fail(new UnknownColumnError(unknown));
  }

  const groups = new Map<string, number[]>();
  dataset.rows.forEach((row, index) => {
    const key = rowKey(row, comparisonColumns);
    const members = groups.get(key);
    if (members) {
      members.push(index);
    } else {
      groups.set(key, [index]);
    }
  });

  const keep = new Set<number>();
  for (const members of groups.values()) {
    switch (policy) {
      case "keepFirst":
        keep.add(members[0]);
        break;
      case "keepLast":
        keep.add(members[members.length - 1]);
        break;
      case "keepAll":
        members.forEach((index) => keep.add(index));
        break;
      case "dropAllDuplicates":
        if (members.length === 1) keep.add(members[0]);
        break;
    }
  }

  const rows: Row[] = [];
  const origins: RowOrigin[] = [];
  dataset.rows.forEach((row, index) => {
    if (!keep.has(index)) return;
    rows.push(row);
    origins.push(originOf(dataset, index));
  });

  const duplicateGroups: DuplicateGroup[] = [];
  for (const [key, members] of groups) {
    if (members.length < 2) continue;
    duplicateGroups.push({
      key,
      rowIndices: members,
      origins: members.map((index) => originOf(dataset, index)),
    });
  }

  return succeed({
    dataset: { ...dataset, rows, origins: dataset.origins ? origins : undefined },
    report: {
      policy,
      comparisonColumns,
      groups: duplicateGroups,
      inputRows: dataset.rows.length,
      outputRows: rows.length,
      removedCount: dataset.rows.length - rows.length,
    },
  });
}

/**
 * Stable equality key for a row over the given columns.
 */
export function rowKey(row: Row, columns: readonly string[]): string {
  return JSON.stringify(columns.map((name) => cellToken(getCell(row, name))));
}

function cellToken(cell: CellValue): [string] | [string, string] {
  switch (cell.kind) {
    case "text":
      return ["t", cell.text];
    case "number":
      return ["n", canonicalDecimal(cell.raw) ?? String(cell.value)];
    case "date":
      return ["d", cell.iso];
    case "null":
      return ["null"];
  }
}

function originOf(dataset: TabularDataset, index: number): RowOrigin {
  return dataset.origins?.[index] ?? { sourceId: dataset.sourceId, rowIndex: index };
}

const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Exact canonical form of decimal source text as `<digits>e<exponent>`, so
 * "2", "2.0" and "0.2e1" share a key while integers past 2^53 stay distinct.
 */
export function canonicalDecimal(raw: string): string | null {
  const match = DECIMAL_PATTERN.exec(raw.trim());
  if (!match) return null;
  const [, sign, whole = "", fraction = "", exponent = "0"] = match;
  if (whole === "" && fraction === "") return null;

  let digits = (whole + fraction).replace(/^0+/, "");
  if (digits === "") return "0";
  let scale = Number(exponent) - fraction.length;
  const trailing = /0+$/.exec(digits);
  if (trailing) {
    digits = digits.slice(0, trailing.index);
    scale += trailing[0].length;
  }
  return `${sign === "-" ? "-" : ""}${digits}e${scale}`;
}
