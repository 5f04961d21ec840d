/**
 * Card list input detection from the header row.
 * - deckbox: collection export with Name, Count and Edition Code
 * - named_list: any list with a Name or Title column
 */

export type ListInputFormat = "deckbox" | "named_list" | "unknown";

function normalizeHeader(h: string): string {
  return h.replace(/^\uFEFF/, "").trim().toLowerCase();
}

// Each inner array is a set of required headers; a format matches if ANY set is fully present.
const FORMAT_SIGNATURES: Record<Exclude<ListInputFormat, "unknown">, string[][]> = {
  deckbox: [["name", "count", "edition code"]],
  named_list: [["name"], ["title"]],
};

export function detectListInputFormat(rawHeaders: readonly string[]): ListInputFormat {
  const normalizedHeaders = new Set(rawHeaders.map(normalizeHeader));

  for (const format of ["deckbox", "named_list"] as const) {
    const matched = FORMAT_SIGNATURES[format].some((required) =>
      required.every((h) => normalizedHeaders.has(h)),
    );
    if (matched) return format;
  }
  return "unknown";
}

/**
 * Actual header of the first matching candidate, compared case-insensitively.
 */
export function findHeader(rawHeaders: readonly string[], candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    const found = rawHeaders.find((h) => normalizeHeader(h) === candidate);
    if (found !== undefined) return found;
  }
  return null;
}

export function getListFormatDisplayName(format: ListInputFormat): string {
  switch (format) {
    case "deckbox":
      return "Deckbox Collection Export";
    case "named_list":
      return "Card Name List";
    case "unknown":
      return "Unknown Format";
  }
}
