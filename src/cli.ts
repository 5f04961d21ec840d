#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { program } from "commander";
import { createContext, createLogger, runtimeConfig } from "./app/context";
import { runMergeCommand, type MergeCommandOptions } from "./commands/mergeCommand";
import { exportDataset } from "./services/merge/exporter";
import type { ListingOutcome } from "./services/listing/enrichmentService";

const logger = createLogger(runtimeConfig.logLevel, 2);

async function writeListing(outcome: ListingOutcome, out: string | undefined): Promise<number> {
  if (!outcome.ok) {
    logger.error({ code: outcome.error, message: outcome.message }, "listing.cli.failed");
    return 1;
  }
  for (const warning of outcome.warnings) logger.warn({ warning }, "listing.cli.warning");
  if (outcome.missing.length > 0) logger.warn({ missing: outcome.missing }, "listing.cli.cards_not_found");

  const csv = exportDataset(
    outcome.dataset,
    { kind: "csv", separator: "comma", encoding: "utf-8" },
    { materializeNulls: true },
  );
  if (!csv.ok) {
    logger.error({ code: csv.error.code, message: csv.error.message }, "listing.cli.failed");
    return 1;
  }
  if (out) {
    await writeFile(out, csv.value);
    logger.info({ out, rows: outcome.dataset.rows.length }, "listing.cli.written");
  } else {
    process.stdout.write(csv.value);
  }
  return 0;
}

program.name("cardsheet").description("Card list enrichment and CSV merging").version("0.1.0");

program
  .command("merge <files...>")
  .description("Merge CSV files into one table")
  .option("-s, --strategy <strategy>", "union, intersection or custom", "union")
  .option("-t, --template <sourceId>", "template file name for the custom strategy")
  .option("-d, --dedupe <policy>", "keep-first, keep-last, keep-all or drop-all", "keep-all")
  .option("-k, --key <columns>", "comma-separated columns compared for duplicates")
  .option("--separator <separator>", "comma, semicolon, tab or pipe", "comma")
  .option("--encoding <encoding>", "utf-8, utf-16le, latin1 or ascii", "utf-8")
  .option("-f, --format <format>", "csv or xlsx", "csv")
  .option("--bom", "write a byte order mark (csv, utf-8/utf-16le)")
  .option("--materialize-nulls", "write missing values as empty cells")
  .option("--null-token <token>", "text written for missing values")
  .option("-o, --out <path>", "output file (defaults to stdout)")
  .action(async (files: string[], options: MergeCommandOptions) => {
    process.exitCode = await runMergeCommand(files, options, logger);
  });

program
  .command("enrich <file>")
  .description("Turn a .txt card list or .csv export into marketplace listing rows")
  .option("-o, --out <path>", "output file (defaults to stdout)")
  .action(async (file: string, options: { out?: string }) => {
    const ctx = createContext({ logger });
    const content = await readFile(file);
    process.exitCode = await writeListing(
      await ctx.enrichment.enrichUpload({ fileName: path.basename(file), content }),
      options.out,
    );
  });

program
  .command("set-listing <code>")
  .description("Listing rows for every regular card in a set")
  .option("-o, --out <path>", "output file (defaults to stdout)")
  .action(async (code: string, options: { out?: string }) => {
    const ctx = createContext({ logger });
    process.exitCode = await writeListing(await ctx.enrichment.buildSetListing(code), options.out);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal({ err: error instanceof Error ? error.message : String(error) }, "cli.failed");
  process.exitCode = 1;
});
