/**
 * Zod schemas for prediction payloads and API responses.
 */

import { z } from 'zod';
import { CrunchError, ValidationError } from './errors';

// ==========================================
// Cells
// ==========================================
export const CellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const PredictionValueSchema = z.union([
  z.number().finite(),
  z.string().min(1, 'must not be empty'),
]);

// ==========================================
// Prediction payload
// ==========================================
export const PredictionTableSchema = z
  .object({
    columns: z
      .array(z.string().min(1, 'column names must not be empty'))
      .min(2, 'expected an id column and at least one prediction column'),
    rows: z.array(z.record(PredictionValueSchema)).min(1, 'must contain at least one row'),
  })
  .superRefine((table, ctx) => {
    const expected = new Set(table.columns);
    if (expected.size !== table.columns.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['columns'],
        message: 'column names must be unique',
      });
      return;
    }

    table.rows.forEach((row, index) => {
      const keys = Object.keys(row);
      const missing = table.columns.filter((name) => !Object.hasOwn(row, name));
      const extra = keys.filter((key) => !expected.has(key));
      if (missing.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index],
          message: `missing column(s) ${missing.join(', ')}`,
        });
      }
      if (extra.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['rows', index],
          message: `unexpected column(s) ${extra.join(', ')}`,
        });
      }
    });
  });

// ==========================================
// Responses
// ==========================================
export const ApiErrorSchema = z
  .object({
    error: z.string().optional(),
    message: z.string().optional(),
    code: z.string().optional(),
    retry_after: z.number().optional(),
  })
  .passthrough();

export const UploadResponseSchema = z
  .object({
    id: z.number().int().positive(),
  })
  .passthrough();

export const SubmissionRecordSchema = z
  .object({
    id: z.number().int(),
  })
  .passthrough();

export const SubmissionsResponseSchema = z.array(SubmissionRecordSchema);

export const SubmissionRowSchema = z
  .object({
    id: z.number().int(),
  })
  .catchall(CellSchema);

export const DatasetConfigResponseSchema = z
  .object({
    dataset: z
      .object({
        id: z.number().int(),
        name: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

export const DatasetConfigSchema = z
  .object({
    round_id: z.number().int(),
    dataset_id: z.number().int(),
    dataset_name: z.string(),
  })
  .catchall(z.unknown());

export const ScoresResponseSchema = z.array(z.record(z.unknown()));

export const ScoreRowSchema = z
  .object({
    dataset_id: z.number().int(),
    submission_id: z.number().int(),
    resolved: z.boolean().optional(),
  })
  .catchall(CellSchema);

export type SubmissionRow = z.infer<typeof SubmissionRowSchema>;
export type DatasetConfig = z.infer<typeof DatasetConfigSchema>;
export type ScoreRow = z.infer<typeof ScoreRowSchema>;

// ==========================================
// Helpers
// ==========================================
export function toIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate local input, throwing a ValidationError that lists every issue.
 */
export function validateInput<S extends z.ZodTypeAny>(operation: string, schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = toIssues(result.error);
    const summary = issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
    throw new ValidationError(`${operation}: invalid input (${summary})`, 'INVALID_PAYLOAD', issues);
  }
  return result.data;
}

/**
 * Validate a server response against the shape the client relies on.
 */
export function parseResponse<S extends z.ZodTypeAny>(operation: string, schema: S, value: unknown): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const summary = toIssues(result.error)
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');
    throw new CrunchError(`${operation}: unexpected response from server (${summary})`, undefined, 'INVALID_RESPONSE', {
      issues: result.error.issues,
    });
  }
  return result.data;
}
