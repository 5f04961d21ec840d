import type {
  ConflictPolicyMap,
  DuplicatePolicy,
  MergeStrategy,
  Schema,
  TabularDataset,
} from "./dataset";
import type { ConflictReport } from "../services/merge/conflictResolver";
import type { LoadReport, LoadedSource } from "../services/merge/datasetLoader";
import type { DuplicateReport } from "../services/merge/duplicateResolver";

export type MergeStageName = "sources" | "resolved" | "merged" | "deduped";

export const MERGE_STAGE_NAMES: readonly MergeStageName[] = ["sources", "resolved", "merged", "deduped"];

/**
 * One user's merge context. Original sources stay for the session's lifetime
 * so strategies can be re-selected without another upload; stage outputs are
 * replaced whole whenever an earlier stage is re-run.
 */
export interface MergeSession {
  id: string;
  createdAt: number;
  lastAccessedAt: number;
  sources: LoadedSource[];
  conflictPolicies: ConflictPolicyMap;
  resolved?: { datasets: TabularDataset[]; report: ConflictReport };
  strategy?: MergeStrategy;
  schema?: Schema;
  merged?: TabularDataset;
  dedupe?: {
    policy: DuplicatePolicy;
    columns?: string[];
    dataset: TabularDataset;
    report: DuplicateReport;
  };
}

export interface MergeSessionSummary {
  id: string;
  createdAt: number;
  lastAccessedAt: number;
  sources: Array<{
    sourceId: string;
    columns: string[];
    rowCount: number;
    malformedRows: LoadReport["malformedRows"];
    renamedHeaders: LoadReport["renamedHeaders"];
  }>;
  conflictPolicies: ConflictPolicyMap;
  conflictReport: ConflictReport | null;
  strategy: MergeStrategy | null;
  schema: Schema | null;
  mergedRows: number | null;
  dedupe: { policy: DuplicatePolicy; columns: string[] | null; report: DuplicateReport } | null;
}

export type SessionErrorCode = "SESSION_NOT_FOUND" | "STAGE_NOT_READY";

export class SessionError extends Error {
  constructor(
    readonly code: SessionErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "SessionError";
  }

  toJSON(): { error: SessionErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}
