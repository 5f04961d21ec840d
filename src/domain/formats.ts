export type Separator = "comma" | "semicolon" | "tab" | "pipe";

export type TextEncodingName = "utf-8" | "utf-16le" | "latin1" | "ascii";

export const SEPARATORS: readonly Separator[] = ["comma", "semicolon", "tab", "pipe"];

export const TEXT_ENCODINGS: readonly TextEncodingName[] = ["utf-8", "utf-16le", "latin1", "ascii"];

export const SEPARATOR_CHARS: Record<Separator, string> = {
  comma: ",",
  semicolon: ";",
  tab: "\t",
  pipe: "|",
};

export type ExportFormat =
  | {
      readonly kind: "csv";
      readonly separator: Separator;
      readonly encoding: TextEncodingName;
      /** Byte order mark; only meaningful for utf-8 and utf-16le. */
      readonly bom?: boolean;
    }
  | { readonly kind: "xlsx"; readonly sheetName?: string };

export interface ExportOptions {
  /** Render null markers as empty cells. */
  readonly materializeNulls: boolean;
  /** Used for null markers when materializeNulls is off. */
  readonly nullToken?: string;
}

export function fileExtensionFor(format: ExportFormat): string {
  if (format.kind === "xlsx") return "xlsx";
  return format.separator === "tab" ? "tsv" : "csv";
}

export function contentTypeFor(format: ExportFormat): string {
  if (format.kind === "xlsx") {
    return "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet";
  }
  const mime = format.separator === "tab" ? "text/tab-separated-values" : "text/csv";
  return `${mime}; charset=${format.encoding}`;
}
