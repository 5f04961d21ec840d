import { describe, it, expect } from "vitest";
import * as XLSX from "xlsx";
import { numberCell, textCell, type ColumnType, type TabularDataset } from "../../../domain/dataset";
import {
  SEPARATORS,
  contentTypeFor,
  fileExtensionFor,
  type ExportFormat,
  type Separator,
  type TextEncodingName,
} from "../../../domain/formats";
import { loadDataset } from "../datasetLoader";
import { exportDataset, sanitizeSheetName } from "../exporter";
import { mergeRows } from "../rowMerger";
import { reconcileSchema } from "../schemaReconciler";
import { dataset } from "./fixtures";

const CSV = { kind: "csv", separator: "comma", encoding: "utf-8" } as const;

function unionOfScenarioFiles(): TabularDataset {
  const files = [
    dataset("File1.csv", "Name,Price\nBolt,5\n", { Price: "number" }),
    dataset("File2.csv", "Name,Qty\nBolt,2\n", { Qty: "number" }),
  ];
  const schema = reconcileSchema(files, { kind: "union" });
  if (!schema.ok) throw schema.error;
  return mergeRows(files, schema.value);
}

describe("exportDataset", () => {
  it("writes header then rows, with null markers as empty cells", () => {
    const result = exportDataset(unionOfScenarioFiles(), CSV, { materializeNulls: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.toString("utf8")).toBe("Name,Price,Qty\nBolt,5,\nBolt,,2\n");
  });

  it("writes the null token when materialization is off", () => {
    const result = exportDataset(unionOfScenarioFiles(), CSV, { materializeNulls: false, nullToken: "NA" });

    expect(result.ok && result.value.toString("utf8")).toBe("Name,Price,Qty\nBolt,5,NA\nBolt,NA,2\n");
  });

  it("fails on a null marker with neither option", () => {
    const result = exportDataset(unionOfScenarioFiles(), CSV, { materializeNulls: false });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("EXPORT_ERROR");
    expect(result.error.message).toBe(
      'Row 1, column "Qty" holds a null marker; enable null materialization or set a null token',
    );
  });

  it("reproduces source text and quotes cells that need it", () => {
    const source = dataset(
      "a.csv",
      'Name,Price,Text\n"Bolt, Lightning", 1.50 ,"say ""hi"""\n',
      { Price: "number" },
    );

    const result = exportDataset(source, CSV, { materializeNulls: false });

    expect(result.ok && result.value.toString("utf8")).toBe(
      'Name,Price,Text\n"Bolt, Lightning", 1.50 ,"say ""hi"""\n',
    );
  });

  it("uses the chosen separator", () => {
    const result = exportDataset(
      dataset("a.csv", "Name,Qty\nBolt,2\n"),
      { kind: "csv", separator: "semicolon", encoding: "utf-8" },
      { materializeNulls: false },
    );

    expect(result.ok && result.value.toString("utf8")).toBe("Name;Qty\nBolt;2\n");
  });

  it("quotes an empty cell in a single-column file", () => {
    const source: TabularDataset = {
      sourceId: "a.csv",
      columns: [{ name: "Name", declaredType: "text" }],
      rows: [{ Name: { kind: "text", text: "" } }, { Name: { kind: "text", text: "Bolt" } }],
    };

    const result = exportDataset(source, CSV, { materializeNulls: false });

    expect(result.ok && result.value.toString("utf8")).toBe('Name\n""\nBolt\n');
  });

  it("adds a byte order mark on request", () => {
    const source = dataset("a.csv", "Name\nBolt\n");

    const utf8 = exportDataset(source, { ...CSV, bom: true }, { materializeNulls: false });
    const utf16 = exportDataset(source, { ...CSV, encoding: "utf-16le", bom: true }, { materializeNulls: false });

    expect(utf8.ok && [...utf8.value.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(utf16.ok && [...utf16.value.subarray(0, 2)]).toEqual([0xff, 0xfe]);
    expect(utf16.ok && utf16.value.toString("utf16le")).toBe("\uFEFFName\nBolt\n");
  });

  it("encodes latin1 and refuses characters it cannot carry", () => {
    const fits = exportDataset(
      dataset("a.csv", "Name\nJötun\n"),
      { ...CSV, encoding: "latin1" },
      { materializeNulls: false },
    );
    const euro = exportDataset(
      dataset("a.csv", "Name\n5 €\n"),
      { ...CSV, encoding: "latin1" },
      { materializeNulls: false },
    );
    const accentedHeader = exportDataset(
      dataset("a.csv", "Café\nx\n"),
      { ...CSV, encoding: "ascii" },
      { materializeNulls: false },
    );

    expect(fits.ok && [...fits.value]).toEqual([...Buffer.from("Name\nJötun\n", "latin1")]);
    expect(!euro.ok && euro.error.message).toBe(
      'Character U+20AC in row 1, column "Name" cannot be encoded as latin1',
    );
    expect(!accentedHeader.ok && accentedHeader.error.message).toBe(
      'Character U+00E9 in header "Café" cannot be encoded as ascii',
    );
  });

  describe("reading the export back", () => {
    const columnTypes: Record<string, ColumnType> = { Name: "text", Note: "text", Qty: "number" };
    const awkward = (): TabularDataset => ({
      sourceId: "awkward.csv",
      columns: [
        { name: "Name", declaredType: "text" },
        { name: "Note", declaredType: "text" },
        { name: "Qty", declaredType: "number" },
      ],
      rows: [
        { Name: textCell("Bolt, Lightning"), Note: textCell('say "hi"'), Qty: numberCell(2, "2") },
        { Name: textCell("semi;colon|pipe\ttab"), Note: textCell("line\nbreak"), Qty: numberCell(1.5, "1.50") },
        { Name: textCell("J\u00f6tun"), Note: textCell(" padded "), Qty: numberCell(4, "4") },
        { Name: textCell(""), Note: textCell(""), Qty: textCell("n/a") },
      ],
    });

    function roundTrip(source: TabularDataset, format: Extract<ExportFormat, { kind: "csv" }>): TabularDataset {
      const exported = exportDataset(source, format, { materializeNulls: false });
      if (!exported.ok) throw exported.error;
      const loaded = loadDataset({
        sourceId: source.sourceId,
        content: exported.value,
        separator: format.separator,
        encoding: format.encoding,
        columnTypes,
      });
      if (!loaded.ok) throw loaded.error;
      expect(loaded.value.report.malformedRows).toEqual([]);
      return loaded.value.dataset;
    }

    it.each(SEPARATORS)("reproduces every cell with the %s separator", (separator: Separator) => {
      const source = awkward();

      const reloaded = roundTrip(source, { kind: "csv", separator, encoding: "utf-8" });

      expect(reloaded.columns).toEqual(source.columns);
      expect(reloaded.rows).toEqual(source.rows);
    });

    it.each<[TextEncodingName, boolean]>([
      ["utf-8", true],
      ["utf-16le", true],
      ["utf-16le", false],
      ["latin1", false],
    ])("reproduces every cell encoded as %s (byte order mark: %s)", (encoding, bom) => {
      const source = awkward();

      const reloaded = roundTrip(source, { kind: "csv", separator: "semicolon", encoding, bom });

      expect(reloaded.columns).toEqual(source.columns);
      expect(reloaded.rows).toEqual(source.rows);
    });
  });

  it("writes a workbook with numeric cells for number columns", () => {
    const result = exportDataset(unionOfScenarioFiles(), { kind: "xlsx" }, { materializeNulls: true });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const workbook = XLSX.read(result.value, { type: "buffer" });
    expect(workbook.SheetNames).toEqual(["Merged"]);
    const sheet = workbook.Sheets.Merged;
    expect(sheet.A1.v).toBe("Name");
    expect(sheet.C1.v).toBe("Qty");
    expect(sheet.A2.v).toBe("Bolt");
    expect(sheet.B2.t).toBe("n");
    expect(sheet.B2.v).toBe(5);
    expect(sheet.C3.v).toBe(2);
  });

  it("cleans sheet names", () => {
    expect(sanitizeSheetName("Q1/Q2: [draft]")).toBe("Q1_Q2_ _draft_");
    expect(sanitizeSheetName("x".repeat(40))).toBe("x".repeat(31));
    expect(sanitizeSheetName("   ")).toBe("Merged");
  });

  it("names content types and extensions per format", () => {
    expect(contentTypeFor(CSV)).toBe("text/csv; charset=utf-8");
    expect(fileExtensionFor({ ...CSV, separator: "tab" })).toBe("tsv");
    expect(fileExtensionFor({ kind: "xlsx" })).toBe("xlsx");
  });
});
