import { describe, it, expect } from "vitest";
import { canonicalDecimal, dedupeRows, rowKey } from "../duplicateResolver";
import { mergeRows } from "../rowMerger";
import { dataset, rowValues } from "./fixtures";

describe("dedupeRows", () => {
  const cards = () =>
    dataset("cards.csv", "Name,Qty\nBolt,2\nShock,1\nBolt,2.0\nBolt,3\n", { Qty: "number" });

  it("keeps the first of each group in original order", () => {
    const result = dedupeRows(cards(), "keepFirst");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(rowValues(result.value.dataset)).toEqual([
      ["Bolt", "2"],
      ["Shock", "1"],
      ["Bolt", "3"],
    ]);
    expect(result.value.report).toMatchObject({
      policy: "keepFirst",
      comparisonColumns: ["Name", "Qty"],
      inputRows: 4,
      outputRows: 3,
      removedCount: 1,
    });
    expect(result.value.report.groups.map((g) => g.rowIndices)).toEqual([[0, 2]]);
  });

  it("keeps the last of each group", () => {
    const result = dedupeRows(cards(), "keepLast");

    expect(result.ok && rowValues(result.value.dataset)).toEqual([
      ["Shock", "1"],
      ["Bolt", "2.0"],
      ["Bolt", "3"],
    ]);
  });

  it("drops every member of a duplicate group", () => {
    const twins = dataset("twins.csv", "Name,Qty\nBolt,2\nBolt,2\n");

    const result = dedupeRows(twins, "dropAllDuplicates");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.dataset.rows).toEqual([]);
    expect(result.value.report.removedCount).toBe(2);
    expect(result.value.report.groups).toHaveLength(1);
  });

  it("keeps every row but still reports groups under keepAll", () => {
    const result = dedupeRows(cards(), "keepAll");

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.dataset.rows).toHaveLength(4);
    expect(result.value.report.groups).toHaveLength(1);
    expect(result.value.report.removedCount).toBe(0);
  });

  it("compares only the chosen columns", () => {
    const result = dedupeRows(cards(), "keepLast", ["Name"]);

    expect(result.ok && rowValues(result.value.dataset)).toEqual([
      ["Shock", "1"],
      ["Bolt", "3"],
    ]);
  });

  it.each(["keepFirst", "keepLast", "keepAll", "dropAllDuplicates"] as const)(
    "gives the same rows when %s runs twice",
    (policy) => {
      const once = dedupeRows(cards(), policy);
      if (!once.ok) throw once.error;
      const twice = dedupeRows(once.value.dataset, policy);
      if (!twice.ok) throw twice.error;

      expect(twice.value.dataset.rows).toEqual(once.value.dataset.rows);
      expect(twice.value.report.removedCount).toBe(0);
    },
  );

  it("keeps every row on repeated keepAll runs", () => {
    const once = dedupeRows(cards(), "keepAll");
    if (!once.ok) throw once.error;
    const twice = dedupeRows(once.value.dataset, "keepAll");

    expect(twice.ok && twice.value.dataset.rows).toHaveLength(4);
    expect(twice.ok && twice.value.report.groups.map((g) => g.rowIndices)).toEqual([[0, 2]]);
  });

  it("drops nothing more when dropAllDuplicates runs on its own output", () => {
    const once = dedupeRows(cards(), "dropAllDuplicates");
    if (!once.ok) throw once.error;
    const twice = dedupeRows(once.value.dataset, "dropAllDuplicates");

    expect(rowValues(once.value.dataset)).toEqual([
      ["Shock", "1"],
      ["Bolt", "3"],
    ]);
    expect(twice.ok && rowValues(twice.value.dataset)).toEqual(rowValues(once.value.dataset));
    expect(twice.ok && twice.value.report.groups).toEqual([]);
  });

  it("tells apart integers beyond double precision", () => {
    const ids = dataset("ids.csv", "Id\n9007199254740993\n9007199254740992\n", { Id: "number" });

    const result = dedupeRows(ids, "keepFirst");

    expect(result.ok && rowValues(result.value.dataset)).toEqual([["9007199254740993"], ["9007199254740992"]]);
    expect(result.ok && result.value.report.removedCount).toBe(0);
  });

  it("compares numbers by exact decimal value", () => {
    expect(canonicalDecimal("2")).toBe("2e0");
    expect(canonicalDecimal("2.00")).toBe("2e0");
    expect(canonicalDecimal(" 0.2e1 ")).toBe("2e0");
    expect(canonicalDecimal("+020")).toBe("2e1");
    expect(canonicalDecimal("-0.050")).toBe("-5e-2");
    expect(canonicalDecimal("-0.0")).toBe("0");
    expect(canonicalDecimal("0.1000000000000000001")).toBe("1000000000000000001e-19");
    expect(canonicalDecimal("abc")).toBeNull();
    expect(canonicalDecimal(".")).toBeNull();
  });

  it("keeps origins of merged rows", () => {
    const merged = mergeRows(
      [dataset("a.csv", "Name\nBolt\n"), dataset("b.csv", "Name\nBolt\n")],
      { columns: [{ name: "Name", declaredType: "unknown" }] },
    );

    const result = dedupeRows(merged, "keepLast");

    expect(result.ok && result.value.dataset.origins).toEqual([{ sourceId: "b.csv", rowIndex: 0 }]);
    expect(result.ok && result.value.report.groups[0].origins).toEqual([
      { sourceId: "a.csv", rowIndex: 0 },
      { sourceId: "b.csv", rowIndex: 0 },
    ]);
  });

  it("rejects unknown comparison columns", () => {
    const result = dedupeRows(cards(), "keepFirst", ["Name", "Colour"]);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe("UNKNOWN_COLUMN");
    expect(result.error.message).toBe("Unknown column(s): Colour");
  });

  it("never equates the null marker with empty text", () => {
    const withNull = rowKey({ Name: { kind: "text", text: "Bolt" } }, ["Name", "Qty"]);
    const withEmpty = rowKey(
      { Name: { kind: "text", text: "Bolt" }, Qty: { kind: "text", text: "" } },
      ["Name", "Qty"],
    );

    expect(withNull).not.toBe(withEmpty);
    expect(withNull).toBe(rowKey({ Name: { kind: "text", text: "Bolt" }, Qty: { kind: "null" } }, ["Name", "Qty"]));
  });
});
