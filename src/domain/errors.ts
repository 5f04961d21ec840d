/**
 * Merge pipeline failures. Each stage reports one of these through a
 * StageResult instead of throwing, so the caller keeps the prior output
 * and can retry with different options.
 */

export type MergeErrorCode =
  | "LOAD_ERROR"
  | "AMBIGUOUS_CONFLICT"
  | "EMPTY_INTERSECTION"
  | "EMPTY_TEMPLATE"
  | "UNKNOWN_COLUMN"
  | "EXPORT_ERROR";

export abstract class MergeStageError extends Error {
  abstract readonly code: MergeErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { error: MergeErrorCode; message: string } {
    return { error: this.code, message: this.message };
  }
}

export class LoadError extends MergeStageError {
  readonly code = "LOAD_ERROR";

  constructor(
    message: string,
    readonly sourceId: string | null = null,
  ) {
    super(message);
  }
}

export class AmbiguousConflictError extends MergeStageError {
  readonly code = "AMBIGUOUS_CONFLICT";

  constructor(
    readonly column: string,
    message: string,
  ) {
    super(message);
  }
}

export class EmptyIntersectionError extends MergeStageError {
  readonly code = "EMPTY_INTERSECTION";

  constructor(message = "Input files share no common column") {
    super(message);
  }
}

export class EmptyTemplateError extends MergeStageError {
  readonly code = "EMPTY_TEMPLATE";
}

export class UnknownColumnError extends MergeStageError {
  readonly code = "UNKNOWN_COLUMN";

  constructor(readonly columns: readonly string[]) {
    super(`Unknown column(s): ${columns.join(", ")}`);
  }
}

export class ExportError extends MergeStageError {
  readonly code = "EXPORT_ERROR";
}

export type StageResult<T, E extends MergeStageError = MergeStageError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends MergeStageError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
