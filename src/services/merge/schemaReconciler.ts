/**
 * Schema Reconciler
 *
 * Computes the target column sequence for a merge strategy:
 * - union: every column, first-seen order across files in upload order
 * - intersection: columns common to all files, in the first file's order
 * - customMapping: the template file's columns exactly (default: first file)
 *
 * Column names compare case-sensitively; "Price" and "price" are different
 * columns.
 */

import type { Column, ColumnType, MergeStrategy, Schema, TabularDataset } from "../../domain/dataset";
import {
  EmptyIntersectionError,
  EmptyTemplateError,
  fail,
  succeed,
  type StageResult,
} from "../../domain/errors";

export function reconcileSchema(
  datasets: readonly TabularDataset[],
  strategy: MergeStrategy,
): StageResult<Schema> {
  switch (strategy.kind) {
    case "union":
      return succeed(buildSchema(datasets, unionNames(datasets)));

    case "intersection": {
      const names = intersectionNames(datasets);
      if (names.length === 0) return fail(new EmptyIntersectionError());
      return succeed(buildSchema(datasets, names));
    }

    case "customMapping": {
      const template =
        strategy.templateSourceId === undefined
          ? datasets[0]
          : datasets.find((d) => d.sourceId === strategy.templateSourceId);
      if (!template) {
        return fail(
          new EmptyTemplateError(
            strategy.templateSourceId === undefined
              ? "No template file available"
              : `Template file "${strategy.templateSourceId}" is not loaded`,
          ),
        );
      }
      if (template.columns.length === 0) {
        return fail(new EmptyTemplateError(`Template file "${template.sourceId}" has no columns`));
      }
      return succeed(buildSchema(datasets, template.columns.map((c) => c.name)));
    }
  }
}

function unionNames(datasets: readonly TabularDataset[]): string[] {
  const seen = new Set<string>();
  const names: string[] = [];
  for (const dataset of datasets) {
    for (const column of dataset.columns) {
      if (seen.has(column.name)) continue;
      seen.add(column.name);
      names.push(column.name);
    }
  }
  return names;
}

function intersectionNames(datasets: readonly TabularDataset[]): string[] {
  const [first, ...rest] = datasets;
  if (!first) return [];
  const others = rest.map((d) => new Set(d.columns.map((c) => c.name)));
  return first.columns
    .map((c) => c.name)
    .filter((name) => others.every((names) => names.has(name)));
}

function buildSchema(datasets: readonly TabularDataset[], names: readonly string[]): Schema {
  const target = new Set(names);
  const columns: Column[] = names.map((name) => ({
    name,
    declaredType: resolveDeclaredType(datasets, name),
  }));

  const dropped: Record<string, string[]> = {};
  for (const dataset of datasets) {
    dropped[dataset.sourceId] = dataset.columns
      .map((c) => c.name)
      .filter((name) => !target.has(name));
  }

  return { columns, dropped };
}

/**
 * First known declaration in upload order, else "unknown".
 */
function resolveDeclaredType(datasets: readonly TabularDataset[], name: string): ColumnType {
  for (const dataset of datasets) {
    const column = dataset.columns.find((c) => c.name === name);
    if (column && column.declaredType !== "unknown") return column.declaredType;
  }
  return "unknown";
}
