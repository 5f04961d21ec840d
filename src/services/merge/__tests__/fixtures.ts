import type { ColumnType, TabularDataset } from "../../../domain/dataset";
import type { Separator, TextEncodingName } from "../../../domain/formats";
import { loadDataset, type LoadInput } from "../datasetLoader";

export const csvInput = (
  sourceId: string,
  text: string,
  overrides: Partial<Omit<LoadInput, "sourceId" | "content">> & { encoding?: TextEncodingName; separator?: Separator } = {},
): LoadInput => ({
  sourceId,
  content: Buffer.from(text, overrides.encoding === "utf-16le" ? "utf16le" : "utf8"),
  separator: "comma",
  encoding: "utf-8",
  ...overrides,
});

/**
 * Load a CSV fixture, failing the test when it does not load.
 */
export function dataset(
  sourceId: string,
  text: string,
  columnTypes?: Record<string, ColumnType>,
): TabularDataset {
  const result = loadDataset(csvInput(sourceId, text, columnTypes ? { columnTypes } : {}));
  if (!result.ok) throw new Error(`fixture ${sourceId} failed to load: ${result.error.message}`);
  return result.value.dataset;
}

/** Rows as plain source text, null markers as null. */
export function rowValues(data: TabularDataset): Array<Array<string | null>> {
  return data.rows.map((row) =>
    data.columns.map(({ name }) => {
      const cell = row[name];
      if (cell === undefined) return null;
      switch (cell.kind) {
        case "text":
          return cell.text;
        case "number":
        case "date":
          return cell.raw;
        case "null":
          return null;
      }
    }),
  );
}
