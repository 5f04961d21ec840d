import { getCell, type CellValue, type Column, type TabularDataset } from "../../domain/dataset";

export type PreviewValue = string | number | null;

export interface DatasetPreview {
  sourceId: string;
  columns: Column[];
  rows: Array<Record<string, PreviewValue>>;
  totalRows: number;
}

export function previewValue(cell: CellValue): PreviewValue {
  switch (cell.kind) {
    case "text":
      return cell.text;
    case "number":
      return cell.value;
    case "date":
      return cell.raw;
    case "null":
      return null;
  }
}

/**
 * First `limit` rows with JSON-friendly cells. Null markers stay null so a
 * client can tell them apart from empty text.
 */
export function previewDataset(dataset: TabularDataset, limit: number): DatasetPreview {
  const rows = dataset.rows.slice(0, Math.max(0, limit)).map(
    (row): Record<string, PreviewValue> =>
      Object.fromEntries(
        dataset.columns.map(({ name }): [string, PreviewValue] => [name, previewValue(getCell(row, name))]),
      ),
  );
  return {
    sourceId: dataset.sourceId,
    columns: dataset.columns.map((c) => ({ ...c })),
    rows,
    totalRows: dataset.rows.length,
  };
}
