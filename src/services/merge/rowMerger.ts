/**
 * Row Merger
 *
 * Projects each dataset onto the target schema and concatenates the results
 * in (file order, row order). Target columns a file lacks are filled with the
 * null marker; source columns outside the target are dropped. The output row
 * order is what keepFirst / keepLast rely on.
 */

import {
  NULL_CELL,
  type CellValue,
  type Row,
  type RowOrigin,
  type Schema,
  type TabularDataset,
} from "../../domain/dataset";

export const MERGED_SOURCE_ID = "merged";

export function mergeRows(
  datasets: readonly TabularDataset[],
  schema: Pick<Schema, "columns">,
): TabularDataset {
  const rows: Row[] = [];
  const origins: RowOrigin[] = [];

  for (const dataset of datasets) {
    const present = new Set(dataset.columns.map((c) => c.name));
    dataset.rows.forEach((row, rowIndex) => {
      rows.push(projectRow(row, schema, present));
      origins.push(dataset.origins?.[rowIndex] ?? { sourceId: dataset.sourceId, rowIndex });
    });
  }

  return {
    sourceId: MERGED_SOURCE_ID,
    columns: schema.columns.map((c) => ({ ...c })),
    rows,
    origins,
  };
}

export function projectRow(
  row: Row,
  schema: Pick<Schema, "columns">,
  sourceColumns: ReadonlySet<string>,
): Row {
  return Object.fromEntries(
    schema.columns.map(({ name }): [string, CellValue] => [
      name,
      sourceColumns.has(name) && Object.prototype.hasOwnProperty.call(row, name) ? row[name] : NULL_CELL,
    ]),
  );
}
