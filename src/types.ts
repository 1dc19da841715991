/**
 * CrunchDAO Client Type Definitions
 *
 * Configuration, tabular and response types shared across the client.
 */

import type { LogLevel } from './logger';

// =============================================================================
// Configuration Types
// =============================================================================

export interface CrunchConfig {
  /** API key. Falls back to `CRUNCHDAO_API_KEY` when omitted. */
  apiKey?: string;
  /** Base URL of the tournament API (default: https://api.tournament.crunchdao.com) */
  baseUrl?: string;
  /** Base URL dataset files are served from (default: https://tournament.crunchdao.com/data) */
  dataUrl?: string;
  /** Additional headers to include in all requests */
  headers?: Record<string, string>;
  /** Request timeout in milliseconds. Unset means no client-side timeout. */
  timeout?: number;
  /** Minimum level the client logs at (default: warn) */
  logLevel?: LogLevel;
  /** Environment to read fallbacks from (default: process.env) */
  env?: Record<string, string | undefined>;
  /** Optional .env file consulted after the environment */
  envFile?: string;
}

export interface ResolvedConfig {
  apiKey: string | undefined;
  baseUrl: string;
  dataUrl: string;
  headers: Record<string, string>;
  timeout: number | undefined;
  logLevel: LogLevel;
}

// =============================================================================
// Error Types
// =============================================================================

export type ErrorCode =
  | 'AUTH_REQUIRED'
  | 'INVALID_API_KEY'
  | 'EMAIL_NOT_VERIFIED'
  | 'INVALID_PAYLOAD'
  | 'INVALID_FORMAT'
  | 'EMPTY_FILE'
  | 'DUPLICATE_SUBMISSION'
  | 'SUBMISSIONS_CLOSED'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'INVALID_RESPONSE'
  | 'DOWNLOAD_FAILED'
  | 'UPLOAD_FAILED'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * Error body as returned by the tournament API. Older endpoints answer with
 * `message`, newer ones with `error`.
 */
export interface ApiError {
  error?: string;
  message?: string;
  code?: string;
  retry_after?: number;
  [key: string]: unknown;
}

// =============================================================================
// Tabular Types
// =============================================================================

export type Cell = string | number | boolean | null;

/**
 * Row-oriented table with named columns. Every row is keyed by the names in
 * `columns`.
 */
export interface Table<Row extends Record<string, unknown> = Record<string, Cell>> {
  columns: string[];
  rows: Row[];
}

/** A row of a prediction file: an id column plus one or more predictions. */
export type PredictionRow = Record<string, string | number>;

export type PredictionTable = Table<PredictionRow>;

// =============================================================================
// Submission Types
// =============================================================================

/**
 * One submission, flattened: `id, user_id, username, deleted, role,
 * crunch_number, crunch_ts, final_crunch, round_id, upload_ts, eval_ts,
 * selected, selected_by, comment, file_hash, file_name, chosen`, plus
 * `private_*` and `public_*` scoring columns.
 */
export type { SubmissionRow } from './schemas';

export interface SubmissionsParams {
  /** User whose submissions to list (default: the caller) */
  userId?: number;
  /** Restrict to one round */
  roundNumber?: number;
}

export interface UploadOptions {
  comment?: string;
}

// =============================================================================
// Dataset Types
// =============================================================================

export type DataFormat = 'csv' | 'parquet';

export const DATA_FORMATS: readonly DataFormat[] = ['csv', 'parquet'];

/** Files published for every round, without extension. */
export const DATASET_FILES = ['X_train', 'y_train', 'X_test', 'example_submission'] as const;

export type DatasetFile = (typeof DATASET_FILES)[number];

export interface DownloadOptions {
  /** Dataset name; defaults to the current round's dataset */
  dataset?: string;
  /** File variant to fetch (default: csv) */
  format?: string;
  /** Re-fetch files that already exist */
  force?: boolean;
  /** Called after every chunk written to disk */
  onProgress?: (path: string, bytesWritten: number, totalBytes: number | undefined) => void;
}

/**
 * Round configuration: `round_id, dataset_id, dataset_name, live, updated,
 * periods, inception, first_of_inception, forced_start, moons_duration,
 * negative_prevented`.
 */
export type { DatasetConfig } from './schemas';

// =============================================================================
// Score Types
// =============================================================================

/** Metric values of one submission on one dataset. */
export type { ScoreRow } from './schemas';

export interface ScoresParams {
  /** Only return metrics computed against finalized targets */
  resolvedOnly?: boolean;
}
