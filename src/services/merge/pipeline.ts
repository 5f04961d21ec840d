/**
 * Merge pipeline: load → resolve conflicts → reconcile → merge → dedupe → export.
 *
 * Each stage is a pure function over the previous stage's output. This module
 * runs them in order for callers that do not need to stop between stages
 * (CLI, session "run all").
 */

import type {
  ConflictPolicyMap,
  DuplicatePolicy,
  MergeStrategy,
  Schema,
  TabularDataset,
} from "../../domain/dataset";
import { succeed, type StageResult } from "../../domain/errors";
import type { ExportFormat, ExportOptions } from "../../domain/formats";
import { resolveConflicts, type ConflictReport } from "./conflictResolver";
import { loadDatasets, type LoadInput, type LoadReport } from "./datasetLoader";
import { dedupeRows, type DuplicateReport } from "./duplicateResolver";
import { exportDataset } from "./exporter";
import { mergeRows } from "./rowMerger";
import { reconcileSchema } from "./schemaReconciler";

export interface MergePipelineOptions {
  conflicts?: ConflictPolicyMap;
  strategy: MergeStrategy;
  duplicatePolicy: DuplicatePolicy;
  comparisonColumns?: readonly string[];
}

export interface MergePipelineOutput {
  loadReports: LoadReport[];
  conflictReport: ConflictReport;
  schema: Schema;
  merged: TabularDataset;
  deduped: TabularDataset;
  duplicateReport: DuplicateReport;
}

export function runMergePipeline(
  inputs: readonly LoadInput[],
  options: MergePipelineOptions,
): StageResult<MergePipelineOutput> {
  const loaded = loadDatasets(inputs);
  if (!loaded.ok) return loaded;

  const output = mergeLoadedDatasets(
    loaded.value.map((source) => source.dataset),
    options,
  );
  if (!output.ok) return output;

  return succeed({ ...output.value, loadReports: loaded.value.map((source) => source.report) });
}

export function mergeLoadedDatasets(
  datasets: readonly TabularDataset[],
  options: MergePipelineOptions,
): StageResult<Omit<MergePipelineOutput, "loadReports">> {
  const resolved = resolveConflicts(datasets, options.conflicts);
  if (!resolved.ok) return resolved;

  const schema = reconcileSchema(resolved.value.datasets, options.strategy);
  if (!schema.ok) return schema;

  const merged = mergeRows(resolved.value.datasets, schema.value);

  const deduped = dedupeRows(merged, options.duplicatePolicy, options.comparisonColumns);
  if (!deduped.ok) return deduped;

  return succeed({
    conflictReport: resolved.value.report,
    schema: schema.value,
    merged,
    deduped: deduped.value.dataset,
    duplicateReport: deduped.value.report,
  });
}

export function runMergeAndExport(
  inputs: readonly LoadInput[],
  options: MergePipelineOptions & { format: ExportFormat; exportOptions: ExportOptions },
): StageResult<{ output: MergePipelineOutput; bytes: Buffer }> {
  const output = runMergePipeline(inputs, options);
  if (!output.ok) return output;

  const bytes = exportDataset(output.value.deduped, options.format, options.exportOptions);
  if (!bytes.ok) return bytes;

  return succeed({ output: output.value, bytes: bytes.value });
}
