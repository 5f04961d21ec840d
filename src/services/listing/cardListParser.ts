import {
  numberCell,
  type CellValue,
  textCell,
  type Column,
  type Row,
  type TabularDataset,
} from "../../domain/dataset";

export interface CardListEntry {
  name: string;
  quantity: number;
  setCode?: string;
  collectorNumber?: string;
}

// First match wins.
const ARENA_LINE = /^(\d+)\s+(.+?)(?:\s+\(([A-Z0-9]+)\)\s+(\d+))?$/;
const QUANTITY_FIRST = /^(\d+)\s*[xX]?\s+(.+)$/;
const QUANTITY_LAST = /^(.+),\s*(\d+)$/;

export function parseCardLine(line: string): CardListEntry | null {
  const trimmed = line.trim();
  if (!trimmed) return null;

  let match = ARENA_LINE.exec(trimmed);
  if (match) {
    const [, qty, name, setCode, collectorNumber] = match;
    return {
      name: name.trim(),
      quantity: Number.parseInt(qty, 10),
      ...(setCode ? { setCode, collectorNumber } : {}),
    };
  }

  match = QUANTITY_FIRST.exec(trimmed);
  if (match) {
    return { name: match[2].trim(), quantity: Number.parseInt(match[1], 10) };
  }

  match = QUANTITY_LAST.exec(trimmed);
  if (match) {
    return { name: match[1].trim(), quantity: Number.parseInt(match[2], 10) };
  }

  return { name: trimmed, quantity: 1 };
}

export function parseCardEntries(text: string): CardListEntry[] {
  const entries: CardListEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const entry = parseCardLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

/**
 * Plain-text card list as a dataset with Name and Quantity, plus Edition
 * Code and Card Number when any line names a printing.
 */
export function parseCardList(text: string, sourceId = "card-list.txt"): TabularDataset {
  const entries = parseCardEntries(text);
  const withPrinting = entries.some((entry) => entry.setCode !== undefined);

  const columns: Column[] = [
    { name: "Name", declaredType: "text" },
    { name: "Quantity", declaredType: "number" },
  ];
  if (withPrinting) {
    columns.push({ name: "Edition Code", declaredType: "text" }, { name: "Card Number", declaredType: "text" });
  }

  const rows: Row[] = entries.map((entry) => {
    const row: Record<string, CellValue> = {
      Name: textCell(entry.name),
      Quantity: numberCell(entry.quantity),
    };
    if (withPrinting) {
      row["Edition Code"] = textCell(entry.setCode ?? "");
      row["Card Number"] = textCell(entry.collectorNumber ?? "");
    }
    return row;
  });

  return { sourceId, columns, rows };
}
