/**
 * Tabular dataset model shared by every merge stage.
 *
 * All values here are treated as immutable snapshots: stages build new
 * datasets and never edit one they were handed.
 */

export type ColumnType = "text" | "number" | "date" | "unknown";

export interface Column {
  readonly name: string;
  readonly declaredType: ColumnType;
}

/**
 * Closed cell variant. `number` and `date` keep the source text so that
 * export reproduces the input exactly. `null` is the projection marker for
 * "the source file did not have this column", never an empty cell.
 */
export type CellValue =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "number"; readonly value: number; readonly raw: string }
  | { readonly kind: "date"; readonly iso: string; readonly raw: string }
  | { readonly kind: "null" };

/** Keys absent from a row mean the column was not present in its source. */
export type Row = Readonly<Record<string, CellValue>>;

export interface RowOrigin {
  readonly sourceId: string;
  /** Index of the row within its loaded dataset. */
  readonly rowIndex: number;
}

export interface TabularDataset {
  readonly sourceId: string;
  readonly columns: readonly Column[];
  readonly rows: readonly Row[];
  /** Present on merged datasets, parallel to `rows`. */
  readonly origins?: readonly RowOrigin[];
}

export type MergeStrategy =
  | { readonly kind: "union" }
  | { readonly kind: "intersection" }
  | { readonly kind: "customMapping"; readonly templateSourceId?: string };

export type DuplicatePolicy = "keepFirst" | "keepLast" | "keepAll" | "dropAllDuplicates";

export type ConflictResolution =
  | { readonly kind: "rename" }
  | { readonly kind: "coerce" }
  | { readonly kind: "drop"; readonly keepSourceId: string };

/** Column name → resolution for that collision. */
export type ConflictPolicyMap = Readonly<Record<string, ConflictResolution>>;

export interface Schema {
  readonly columns: readonly Column[];
  /** Source columns left out of the target schema, per sourceId. */
  readonly dropped: Readonly<Record<string, readonly string[]>>;
}

export const NULL_CELL: CellValue = Object.freeze({ kind: "null" });

export function textCell(text: string): CellValue {
  return { kind: "text", text };
}

export function numberCell(value: number, raw: string = String(value)): CellValue {
  return { kind: "number", value, raw };
}

export function dateCell(iso: string, raw: string = iso): CellValue {
  return { kind: "date", iso, raw };
}

export function columnNames(dataset: Pick<TabularDataset, "columns">): string[] {
  return dataset.columns.map((column) => column.name);
}

/**
 * Source text of a cell, or null for the projection marker.
 */
export function cellText(cell: CellValue): string | null {
  switch (cell.kind) {
    case "text":
      return cell.text;
    case "number":
    case "date":
      return cell.raw;
    case "null":
      return null;
  }
}

/**
 * Cell lookup that treats a missing key as the null marker.
 */
export function getCell(row: Row, column: string): CellValue {
  return Object.prototype.hasOwnProperty.call(row, column) ? row[column] : NULL_CELL;
}
