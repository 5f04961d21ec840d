import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import type { DuplicatePolicy, MergeStrategy } from "../domain/dataset";
import type { ExportFormat, ExportOptions, Separator, TextEncodingName } from "../domain/formats";
import { SEPARATORS, TEXT_ENCODINGS } from "../domain/formats";
import type { LoadInput } from "../services/merge/datasetLoader";
import { runMergeAndExport, type MergePipelineOptions } from "../services/merge/pipeline";

export interface MergeCommandOptions {
  strategy: string;
  template?: string;
  dedupe: string;
  key?: string;
  separator: string;
  encoding: string;
  format: string;
  out?: string;
  nullToken?: string;
  materializeNulls?: boolean;
  bom?: boolean;
}

export type ResolvedMergeOptions = MergePipelineOptions & {
  separator: Separator;
  encoding: TextEncodingName;
  format: ExportFormat;
  exportOptions: ExportOptions;
};

const DEDUPE_FLAGS = new Map<string, DuplicatePolicy>([
  ["keep-first", "keepFirst"],
  ["keep-last", "keepLast"],
  ["keep-all", "keepAll"],
  ["drop-all", "dropAllDuplicates"],
]);

function isSeparator(value: string): value is Separator {
  return SEPARATORS.some((s) => s === value);
}

function isEncoding(value: string): value is TextEncodingName {
  return TEXT_ENCODINGS.some((e) => e === value);
}

/**
 * Translate command-line flags into pipeline options.
 */
export function resolveMergeOptions(
  opts: MergeCommandOptions,
): { ok: true; value: ResolvedMergeOptions } | { ok: false; message: string } {
  let strategy: MergeStrategy;
  switch (opts.strategy) {
    case "union":
      strategy = { kind: "union" };
      break;
    case "intersection":
      strategy = { kind: "intersection" };
      break;
    case "custom":
      strategy = opts.template ? { kind: "customMapping", templateSourceId: opts.template } : { kind: "customMapping" };
      break;
    default:
      return { ok: false, message: `Unknown strategy "${opts.strategy}" (union, intersection, custom)` };
  }

  const duplicatePolicy = DEDUPE_FLAGS.get(opts.dedupe);
  if (!duplicatePolicy) {
    return { ok: false, message: `Unknown dedupe policy "${opts.dedupe}" (${[...DEDUPE_FLAGS.keys()].join(", ")})` };
  }
  if (!isSeparator(opts.separator)) {
    return { ok: false, message: `Unknown separator "${opts.separator}" (${SEPARATORS.join(", ")})` };
  }
  if (!isEncoding(opts.encoding)) {
    return { ok: false, message: `Unknown encoding "${opts.encoding}" (${TEXT_ENCODINGS.join(", ")})` };
  }

  let format: ExportFormat;
  if (opts.format === "csv") {
    format = { kind: "csv", separator: opts.separator, encoding: opts.encoding, bom: opts.bom ?? false };
  } else if (opts.format === "xlsx") {
    format = { kind: "xlsx" };
  } else {
    return { ok: false, message: `Unknown format "${opts.format}" (csv, xlsx)` };
  }

  const comparisonColumns = opts.key
    ? opts.key
        .split(",")
        .map((k) => k.trim())
        .filter((k) => k.length > 0)
    : undefined;

  return {
    ok: true,
    value: {
      strategy,
      duplicatePolicy,
      comparisonColumns,
      separator: opts.separator,
      encoding: opts.encoding,
      format,
      exportOptions: {
        materializeNulls: opts.materializeNulls ?? false,
        ...(opts.nullToken !== undefined ? { nullToken: opts.nullToken } : {}),
      },
    },
  };
}

/**
 * Merge files from disk and write the result. Returns the process exit code.
 */
export async function runMergeCommand(
  files: readonly string[],
  opts: MergeCommandOptions,
  logger: Logger,
  write: (bytes: Buffer) => void = (bytes) => process.stdout.write(bytes),
): Promise<number> {
  const resolved = resolveMergeOptions(opts);
  if (!resolved.ok) {
    logger.error({ message: resolved.message }, "merge.cli.invalid_options");
    return 2;
  }
  const options = resolved.value;

  const inputs: LoadInput[] = [];
  for (const file of files) {
    try {
      inputs.push({
        sourceId: path.basename(file),
        content: await readFile(file),
        separator: options.separator,
        encoding: options.encoding,
      });
    } catch (err) {
      logger.error({ file, err: err instanceof Error ? err.message : String(err) }, "merge.cli.read_failed");
      return 1;
    }
  }

  const result = runMergeAndExport(inputs, options);
  if (!result.ok) {
    logger.error({ code: result.error.code, message: result.error.message }, "merge.cli.failed");
    return 1;
  }

  const { output, bytes } = result.value;
  for (const report of output.loadReports) {
    logger.info(
      { sourceId: report.sourceId, rows: report.rowCount, malformed: report.malformedRows.length },
      "merge.cli.loaded",
    );
  }
  logger.info(
    {
      columns: output.schema.columns.map((c) => c.name),
      dropped: output.schema.dropped,
      mergedRows: output.merged.rows.length,
      duplicateGroups: output.duplicateReport.groups.length,
      removed: output.duplicateReport.removedCount,
    },
    "merge.cli.merged",
  );

  if (opts.out) {
    await writeFile(opts.out, bytes);
    logger.info({ out: opts.out, bytes: bytes.byteLength }, "merge.cli.written");
  } else {
    write(bytes);
  }
  return 0;
}
