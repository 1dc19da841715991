/**
 * CrunchDAO Tournament Client for TypeScript
 *
 * Download datasets, upload predictions and follow your submissions on the
 * CrunchDAO machine learning tournament.
 *
 * @example
 * ```typescript
 * import { createClient } from 'crunchdao-client';
 *
 * // Reads CRUNCHDAO_API_KEY when apiKey is omitted
 * const client = createClient();
 *
 * const config = await client.datasetConfig();
 * console.log(`Round ${config.round_id} on ${config.dataset_name}`);
 *
 * await client.downloadData('./data', { format: 'parquet' });
 *
 * const id = await client.upload({
 *   columns: ['id', 'target'],
 *   rows: [
 *     { id: 'a1', target: 0.25 },
 *     { id: 'a2', target: 0.75 },
 *   ],
 * }, { comment: 'first try' });
 *
 * const { rows } = await client.submissions({ roundNumber: config.round_id });
 * ```
 *
 * @packageDocumentation
 */

export type {
  // Configuration
  CrunchConfig,
  ResolvedConfig,

  // Errors
  ErrorCode,
  ApiError,

  // Tables
  Cell,
  Table,
  PredictionRow,
  PredictionTable,

  // Submissions
  SubmissionRow,
  SubmissionsParams,
  UploadOptions,

  // Datasets
  DataFormat,
  DatasetFile,
  DownloadOptions,
  DatasetConfig,

  // Scores
  ScoreRow,
  ScoresParams,
} from './types';

export { DATA_FORMATS, DATASET_FILES } from './types';

export {
  CrunchError,
  AuthenticationError,
  ValidationError,
  NotFoundError,
  RateLimitError,
  ServerError,
  UploadError,
  DownloadError,
  TimeoutError,
  ConnectionError,
  isCrunchError,
  isAuthenticationError,
  isValidationError,
} from './errors';

export { CrunchClient, createClient } from './client';
export type { RequestOptions } from './client';

export {
  resolveConfig,
  resolveApiKey,
  DEFAULT_BASE_URL,
  DEFAULT_DATA_URL,
  ENV_API_KEY,
  ENV_API_URL,
  ENV_DATA_URL,
  ENV_LOG_LEVEL,
} from './config';

export type { LogLevel, Logger } from './logger';

export { toCsv } from './csv';
export { column, maxOf, toSnakeCase } from './table';

// Default export for convenience
export { createClient as default } from './client';
