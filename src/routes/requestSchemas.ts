/**
 * Request body schemas shared by the merge and listing routes.
 */

import type { Response } from "express";
import { z } from "zod";
import type { LoadInput } from "../services/merge/datasetLoader";

export const separatorSchema = z.enum(["comma", "semicolon", "tab", "pipe"]);
export const encodingSchema = z.enum(["utf-8", "utf-16le", "latin1", "ascii"]);

const base64Schema = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, "content must be base64");

export const uploadedFileSchema = z.object({
  sourceId: z.string().trim().min(1),
  /** File bytes, base64 encoded. */
  content: base64Schema,
  separator: separatorSchema.default("comma"),
  encoding: encodingSchema.default("utf-8"),
  columnTypes: z.record(z.enum(["text", "number", "date", "unknown"])).optional(),
});

export type UploadedFile = z.infer<typeof uploadedFileSchema>;

export const uploadBodySchema = z.object({
  files: z.array(uploadedFileSchema).min(1),
});

export const conflictResolutionSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("rename") }),
  z.object({ kind: z.literal("coerce") }),
  z.object({ kind: z.literal("drop"), keepSourceId: z.string().min(1) }),
]);

export const conflictsBodySchema = z.object({
  policies: z.record(conflictResolutionSchema).default({}),
});

export const strategySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("union") }),
  z.object({ kind: z.literal("intersection") }),
  z.object({ kind: z.literal("customMapping"), templateSourceId: z.string().min(1).optional() }),
]);

export const duplicatePolicySchema = z.enum([
  "keepFirst",
  "keepLast",
  "keepAll",
  "dropAllDuplicates",
]);

export const dedupeBodySchema = z.object({
  policy: duplicatePolicySchema,
  columns: z.array(z.string()).optional(),
});

export const exportFormatSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("csv"),
    separator: separatorSchema.default("comma"),
    encoding: encodingSchema.default("utf-8"),
    bom: z.boolean().optional(),
  }),
  z.object({ kind: z.literal("xlsx"), sheetName: z.string().optional() }),
]);

export const exportBodySchema = z.object({
  format: exportFormatSchema.default({ kind: "csv", separator: "comma", encoding: "utf-8" }),
  materializeNulls: z.boolean().default(false),
  nullToken: z.string().optional(),
  fileName: z.string().trim().min(1).optional(),
});

export const runBodySchema = z.object({
  conflicts: z.record(conflictResolutionSchema).optional(),
  strategy: strategySchema,
  duplicatePolicy: duplicatePolicySchema.default("keepAll"),
  comparisonColumns: z.array(z.string()).optional(),
});

export function toLoadInput(file: UploadedFile): LoadInput {
  return {
    sourceId: file.sourceId,
    content: Buffer.from(file.content, "base64"),
    separator: file.separator,
    encoding: file.encoding,
    ...(file.columnTypes ? { columnTypes: file.columnTypes } : {}),
  };
}

export function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    ok: false,
    error: "BAD_REQUEST",
    message: "Invalid request body",
    issues: error.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
  });
}
