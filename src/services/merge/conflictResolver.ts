/**
 * Conflict Resolver
 *
 * Resolves column-name collisions across input files before reconciliation.
 * A collision is a column name declared by two or more files that the caller
 * marks as distinct data (policy map), or that the files declare with
 * different known types. Type-detected collisions without a policy are
 * renamed. Coerce joins columns whose known types agree; files that left the
 * column "unknown" have its cells read as that type.
 */

import {
  cellText,
  type CellValue,
  type Column,
  type ColumnType,
  type ConflictPolicyMap,
  type ConflictResolution,
  type Row,
  type TabularDataset,
} from "../../domain/dataset";
import {
  AmbiguousConflictError,
  UnknownColumnError,
  fail,
  succeed,
  type StageResult,
} from "../../domain/errors";
import { parseCell } from "./datasetLoader";

export interface Collision {
  column: string;
  sourceIds: string[];
  declaredTypes: ColumnType[];
  /** True when two known (non-"unknown") declared types differ. */
  typeMismatch: boolean;
}

export interface ConflictAction {
  column: string;
  sourceId: string;
  action: "renamed" | "dropped" | "coerced";
  newName?: string;
  reason: string;
}

export interface ConflictReport {
  collisions: Array<{
    column: string;
    sourceIds: string[];
    resolution: ConflictResolution["kind"];
    detectedBy: "policy" | "declaredType";
  }>;
  actions: ConflictAction[];
}

export interface ResolvedDatasets {
  datasets: TabularDataset[];
  report: ConflictReport;
}

/**
 * Every column name shared by two or more datasets, in first-seen order.
 */
export function findSharedColumns(datasets: readonly TabularDataset[]): Collision[] {
  const byName = new Map<string, Collision>();
  for (const dataset of datasets) {
    for (const column of dataset.columns) {
      const entry = byName.get(column.name) ?? {
        column: column.name,
        sourceIds: [],
        declaredTypes: [],
        typeMismatch: false,
      };
      entry.sourceIds.push(dataset.sourceId);
      entry.declaredTypes.push(column.declaredType);
      byName.set(column.name, entry);
    }
  }

  const shared: Collision[] = [];
  for (const entry of byName.values()) {
    if (entry.sourceIds.length < 2) continue;
    const known = new Set(entry.declaredTypes.filter((t) => t !== "unknown"));
    shared.push({ ...entry, typeMismatch: known.size > 1 });
  }
  return shared;
}

export function resolveConflicts(
  datasets: readonly TabularDataset[],
  policyMap: ConflictPolicyMap = {},
): StageResult<ResolvedDatasets> {
  const allNames = new Set(datasets.flatMap((d) => d.columns.map((c) => c.name)));
  const unknown = Object.keys(policyMap).filter((name) => !allNames.has(name));
  if (unknown.length > 0) {
    return fail(new UnknownColumnError(unknown));
  }

  const changes = new Map<string, ColumnChanges>();
  for (const dataset of datasets) {
    changes.set(dataset.sourceId, { renames: new Map(), drops: new Set(), retypes: new Map() });
  }

  // Names in use by any file plus every rename handed out so far
  const takenNames = new Set(allNames);
  const report: ConflictReport = { collisions: [], actions: [] };

  for (const collision of findSharedColumns(datasets)) {
    const explicit = Object.prototype.hasOwnProperty.call(policyMap, collision.column)
      ? policyMap[collision.column]
      : undefined;
    if (!explicit && !collision.typeMismatch) continue;

    const resolution: ConflictResolution = explicit ?? { kind: "rename" };
    report.collisions.push({
      column: collision.column,
      sourceIds: collision.sourceIds,
      resolution: resolution.kind,
      detectedBy: explicit ? "policy" : "declaredType",
    });

    switch (resolution.kind) {
      case "coerce": {
        const known = [...new Set(collision.declaredTypes.filter((t) => t !== "unknown"))];
        if (known.length > 1) {
          return fail(
            new AmbiguousConflictError(
              collision.column,
              `Cannot coerce "${collision.column}": declared types differ (${known.join(", ")}). Choose rename or drop.`,
            ),
          );
        }
        const [target] = known;
        collision.sourceIds.forEach((sourceId, i) => {
          const retype = target !== undefined && collision.declaredTypes[i] === "unknown";
          if (retype) changes.get(sourceId)?.retypes.set(collision.column, target);
          report.actions.push({
            column: collision.column,
            sourceId,
            action: "coerced",
            reason: retype ? `read as ${target}` : "treated as the same column across files",
          });
        });
        break;
      }

      case "drop": {
        if (!collision.sourceIds.includes(resolution.keepSourceId)) {
          return fail(
            new AmbiguousConflictError(
              collision.column,
              `Cannot keep "${collision.column}" from "${resolution.keepSourceId}": that file does not declare it`,
            ),
          );
        }
        for (const sourceId of collision.sourceIds) {
          if (sourceId === resolution.keepSourceId) continue;
          changes.get(sourceId)?.drops.add(collision.column);
          report.actions.push({
            column: collision.column,
            sourceId,
            action: "dropped",
            reason: `kept only from "${resolution.keepSourceId}"`,
          });
        }
        break;
      }

      case "rename": {
        const reason = explicit
          ? "marked as distinct data"
          : `declared types differ (${collision.declaredTypes.join(", ")})`;
        for (const dataset of datasets) {
          if (!collision.sourceIds.includes(dataset.sourceId)) continue;
          const datasetRenames = changes.get(dataset.sourceId)?.renames;
          if (!datasetRenames) continue;
          const newName = availableName(`${collision.column}_${sourceLabel(dataset.sourceId)}`, takenNames);
          takenNames.add(newName);
          datasetRenames.set(collision.column, newName);
          report.actions.push({
            column: collision.column,
            sourceId: dataset.sourceId,
            action: "renamed",
            newName,
            reason,
          });
        }
        break;
      }
    }
  }

  const resolved = datasets.map((dataset) => {
    const datasetChanges = changes.get(dataset.sourceId);
    return datasetChanges ? applyColumnChanges(dataset, datasetChanges) : dataset;
  });

  return succeed({ datasets: resolved, report });
}

/**
 * Suffix label for a source: file extension removed, anything outside
 * [A-Za-z0-9_-] replaced by "_".
 */
export function sourceLabel(sourceId: string): string {
  const withoutExtension = sourceId.replace(/\.[A-Za-z0-9]{1,5}$/, "");
  const label = withoutExtension.replace(/[^A-Za-z0-9_-]/g, "_");
  return label === "" ? "source" : label;
}

/**
 * `candidate`, or the first `candidate_2`, `candidate_3`... not yet taken.
 * Taken names span every file so a rename never lands on another file's column.
 */
function availableName(candidate: string, taken: ReadonlySet<string>): string {
  if (!taken.has(candidate)) return candidate;

  let counter = 2;
  while (taken.has(`${candidate}_${counter}`)) counter++;
  return `${candidate}_${counter}`;
}

interface ColumnChanges {
  renames: Map<string, string>;
  drops: Set<string>;
  /** Columns declared "unknown" that take the type of the files they are coerced with. */
  retypes: Map<string, ColumnType>;
}

function applyColumnChanges(dataset: TabularDataset, { renames, drops, retypes }: ColumnChanges): TabularDataset {
  if (renames.size === 0 && drops.size === 0 && retypes.size === 0) return dataset;

  const columns: Column[] = dataset.columns
    .filter((column) => !drops.has(column.name))
    .map((column) => ({
      name: renames.get(column.name) ?? column.name,
      declaredType: retypes.get(column.name) ?? column.declaredType,
    }));

  const retyped = (name: string, value: CellValue): CellValue => {
    const type = retypes.get(name);
    const text = cellText(value);
    return type === undefined || text === null ? value : parseCell(text, type);
  };

  const rows: Row[] = dataset.rows.map((row) =>
    Object.fromEntries(
      Object.entries(row)
        .filter(([name]) => !drops.has(name))
        .map(([name, value]): [string, CellValue] => [renames.get(name) ?? name, retyped(name, value)]),
    ),
  );

  return { ...dataset, columns, rows };
}
