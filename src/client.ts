/**
 * CrunchDAO Tournament Client
 *
 * Main client for downloading data, uploading predictions and reading
 * submission results.
 */

import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { resolveConfig } from './config';
import { toCsv } from './csv';
import { downloadFile } from './download';
import {
  AuthenticationError,
  ConnectionError,
  CrunchError,
  DownloadError,
  TimeoutError,
  UploadError,
  ValidationError,
  reasonOf,
} from './errors';
import { createLogger, type Logger } from './logger';
import {
  ApiErrorSchema,
  DatasetConfigResponseSchema,
  DatasetConfigSchema,
  PredictionTableSchema,
  ScoreRowSchema,
  ScoresResponseSchema,
  SubmissionRecordSchema,
  SubmissionRowSchema,
  SubmissionsResponseSchema,
  UploadResponseSchema,
  parseResponse,
  validateInput,
  type DatasetConfig,
  type ScoreRow,
  type SubmissionRow,
} from './schemas';
import { flattenRecord, maxOf, toSnakeCase, toTable, type FlattenOptions } from './table';
import {
  DATASET_FILES,
  DATA_FORMATS,
  type ApiError,
  type CrunchConfig,
  type DataFormat,
  type DownloadOptions,
  type PredictionTable,
  type ResolvedConfig,
  type ScoresParams,
  type SubmissionsParams,
  type Table,
  type UploadOptions,
} from './types';

type HttpMethod = 'GET' | 'POST' | 'PATCH';

export interface RequestOptions {
  /** JSON body */
  body?: Record<string, unknown>;
  /** Multipart body; takes precedence over `body` */
  form?: FormData;
  params?: Record<string, string | number | boolean | undefined>;
  headers?: Record<string, string>;
  /** Fail before sending when no API key is configured */
  authenticated?: boolean;
  /** Operation name used in error messages */
  operation?: string;
  /** Map a non-success response to an error, replacing the default mapping */
  mapError?: (status: number, body: ApiError) => CrunchError;
}

const SUBMISSION_LAYOUT: FlattenOptions = {
  merged: ['user', 'crunch'],
  prefixed: ['private', 'public'],
  renames: {
    '': { uploadedAt: 'uploadTs', evaluatedAt: 'evalTs' },
    user: { id: 'userId' },
    crunch: { number: 'crunchNumber', final: 'finalCrunch', at: 'crunchTs' },
  },
  drop: {
    '': ['userId'],
    crunch: ['id'],
  },
};

const SCORE_LAYOUT: FlattenOptions = {
  merged: ['metrics'],
};

/**
 * Explanations for the statuses the submission endpoint answers with.
 */
const UPLOAD_FAILURES: Record<number, { code: string; explanation: string }> = {
  400: { code: 'EMPTY_FILE', explanation: 'the file must not be empty' },
  401: {
    code: 'EMAIL_NOT_VERIFIED',
    explanation: 'your email has not been verified; verify it or contact the tournament team',
  },
  404: {
    code: 'INVALID_API_KEY',
    explanation: 'unknown API key; check it is the one you received by email',
  },
  409: {
    code: 'DUPLICATE_SUBMISSION',
    explanation: 'these exact predictions have already been submitted',
  },
  422: { code: 'AUTH_REQUIRED', explanation: 'the API key is missing or empty' },
  423: {
    code: 'SUBMISSIONS_CLOSED',
    explanation: 'submissions are closed, or the server is crunching submitted files; retry during an open round',
  },
  429: { code: 'RATE_LIMITED', explanation: 'too many submissions' },
};

const CREDENTIAL_STATUSES = new Set([401, 404, 422]);

function uploadFailure(status: number, body: ApiError): CrunchError {
  const known = UPLOAD_FAILURES[status];
  const reason = reasonOf(body);
  const explanation = known?.explanation ?? `server returned ${status}`;
  const message = `upload failed: ${explanation}${reason ? ` (${reason})` : ''}`;

  if (CREDENTIAL_STATUSES.has(status)) {
    return new AuthenticationError(message, known?.code, body, status);
  }
  return new UploadError(message, status, known?.code, body);
}

function isDataFormat(value: string): value is DataFormat {
  return DATA_FORMATS.some((format) => format === value);
}

function requirePositiveInteger(operation: string, field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${operation}: ${field} must be a positive integer, got ${value}`, 'INVALID_VALUE', [
      { path: field, message: 'expected a positive integer' },
    ]);
  }
}

async function readErrorBody(response: Response): Promise<ApiError> {
  const text = await response.text().catch(() => '');
  if (text) {
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      return { error: text };
    }
    const parsed = ApiErrorSchema.safeParse(json);
    return parsed.success ? parsed.data : { error: text };
  }
  return response.statusText ? { error: response.statusText } : {};
}

/**
 * Client for the CrunchDAO tournament API.
 *
 * @example
 * ```typescript
 * const client = new CrunchClient({ apiKey: 'your-api-key' });
 *
 * await client.downloadData('./data', { format: 'parquet' });
 * const id = await client.upload(predictions, { comment: 'ridge baseline' });
 * const subs = await client.submissions();
 * ```
 */
export class CrunchClient {
  private readonly config: ResolvedConfig;
  private readonly logger: Logger;

  constructor(config: CrunchConfig = {}) {
    this.config = resolveConfig(config);
    this.logger = createLogger(this.config.logLevel);
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get dataUrl(): string {
    return this.config.dataUrl;
  }

  /**
   * Whether an API key was resolved at construction.
   */
  hasCredential(): boolean {
    return this.config.apiKey !== undefined;
  }

  // ===========================================================================
  // Core Request Method
  // ===========================================================================

  /**
   * Send one request to the tournament API and return the parsed JSON body.
   *
   * Nothing is retried. An empty body resolves to `{}`.
   */
  async rawRequest(method: HttpMethod, path: string, options: RequestOptions = {}): Promise<unknown> {
    const operation = options.operation ?? `${method} ${path}`;
    if (options.authenticated) {
      this.requireCredential(operation);
    }

    const url = new URL(`${this.config.baseUrl}${path}`);
    if (options.params) {
      Object.entries(options.params).forEach(([key, value]) => {
        if (value !== undefined) {
          url.searchParams.append(key, String(value));
        }
      });
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...this.config.headers,
      ...options.headers,
    };
    if (this.config.apiKey) {
      headers['Authorization'] = `API-Key ${this.config.apiKey}`;
    }

    let body: FormData | string | undefined;
    if (options.form) {
      body = options.form;
    } else if (options.body) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.body);
    }

    let response: Response;
    try {
      response = await fetch(url.toString(), {
        method,
        headers,
        body,
        signal: this.config.timeout ? AbortSignal.timeout(this.config.timeout) : undefined,
      });
    } catch (error) {
      if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
        throw new TimeoutError(`${operation}: request timed out after ${this.config.timeout}ms`);
      }
      const detail = error instanceof Error ? error.message : String(error);
      throw new ConnectionError(`${operation}: could not reach ${url.origin} (${detail})`);
    }

    if (!response.ok) {
      const errorBody = await readErrorBody(response);
      throw options.mapError
        ? options.mapError(response.status, errorBody)
        : CrunchError.fromResponse(operation, response.status, errorBody);
    }

    const text = await response.text();
    if (!text) {
      return {};
    }
    try {
      return JSON.parse(text);
    } catch {
      throw new CrunchError(`${operation}: server returned invalid JSON`, response.status, 'INVALID_RESPONSE');
    }
  }

  private requireCredential(operation: string): string {
    if (this.config.apiKey === undefined) {
      throw new AuthenticationError(
        `${operation}: an API key is required; pass apiKey or set CRUNCHDAO_API_KEY`,
        'AUTH_REQUIRED',
        undefined,
        undefined
      );
    }
    return this.config.apiKey;
  }

  // ===========================================================================
  // Datasets
  // ===========================================================================

  /**
   * Download the training data, targets, test data and an example submission
   * into `directory`.
   *
   * @returns Paths of the written files, in the order X_train, y_train,
   *   X_test, example_submission
   *
   * @example
   * ```typescript
   * await client.downloadData('./data');
   * // ['data/X_train.csv', 'data/y_train.csv', 'data/X_test.csv', 'data/example_submission.csv']
   * ```
   */
  async downloadData(directory: string = '.', options: DownloadOptions = {}): Promise<string[]> {
    const format = options.format ?? 'csv';
    if (!isDataFormat(format)) {
      throw new ValidationError(
        `download: unsupported format "${format}", expected one of ${DATA_FORMATS.join(', ')}`,
        'INVALID_FORMAT',
        [{ path: 'format', message: `expected one of ${DATA_FORMATS.join(', ')}` }]
      );
    }
    if (options.dataset !== undefined && !/^[\w.-]+$/.test(options.dataset)) {
      throw new ValidationError(`download: invalid dataset name "${options.dataset}"`, 'INVALID_VALUE', [
        { path: 'dataset', message: 'expected letters, digits, dots, dashes or underscores' },
      ]);
    }

    try {
      await mkdir(directory, { recursive: true });
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new DownloadError(`download: cannot create ${directory} (${detail})`, undefined, directory);
    }

    const base = options.dataset ? `${this.config.dataUrl}/${options.dataset}` : this.config.dataUrl;
    const paths: string[] = [];
    for (const name of DATASET_FILES) {
      const filename = `${name}.${format}`;
      const path = await downloadFile(`${base}/${filename}`, join(directory, filename), {
        headers: this.config.headers,
        timeout: this.config.timeout,
        force: options.force,
        logger: this.logger,
        onProgress: options.onProgress,
      });
      paths.push(path);
    }
    return paths;
  }

  /**
   * Get the dataset configuration of a round.
   *
   * @param roundNumber - Round to describe (default: the latest round)
   *
   * @example
   * ```typescript
   * await client.datasetConfig(76);
   * // { round_id: 76, dataset_id: 4, dataset_name: 'e-kinetic', live: false,
   * //   periods: { red: 'P30D', green: 'P60D', blue: 'P90D' }, moons_duration: 'P7D', ... }
   * ```
   */
  async datasetConfig(roundNumber?: number): Promise<DatasetConfig> {
    const operation = 'datasetConfig';
    if (roundNumber !== undefined) {
      requirePositiveInteger(operation, 'roundNumber', roundNumber);
    }

    const round = roundNumber === undefined ? '@latest' : String(roundNumber);
    const data = await this.rawRequest('GET', `/v2/rounds/${round}/dataset-config`, { operation });
    const raw = parseResponse(operation, DatasetConfigResponseSchema, data);

    const flattened: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (key === 'id' || key === 'dataset') continue;
      flattened[toSnakeCase(key)] = value;
    }
    flattened['dataset_id'] = raw.dataset.id;
    flattened['dataset_name'] = raw.dataset.name;

    return parseResponse(operation, DatasetConfigSchema, flattened);
  }

  // ===========================================================================
  // Submissions
  // ===========================================================================

  /**
   * Upload predictions for the current round.
   *
   * The table is checked before anything is sent: at least one row, an id
   * column plus one or more prediction columns, and every row carrying
   * exactly those columns.
   *
   * @returns Id of the created submission
   */
  async upload(predictions: PredictionTable, options: UploadOptions = {}): Promise<number> {
    const operation = 'upload';
    this.requireCredential(operation);
    const table = validateInput(operation, PredictionTableSchema, predictions);

    const form = new FormData();
    form.append('file', new Blob([toCsv(table)], { type: 'text/csv' }), 'predictions.csv');
    if (options.comment !== undefined) {
      form.append('comment', options.comment);
    }

    const data = await this.rawRequest('POST', '/v2/submissions', {
      form,
      authenticated: true,
      operation,
      mapError: uploadFailure,
    });

    const parsed = UploadResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UploadError('upload failed: the server accepted the file but returned no submission id', undefined, 'INVALID_RESPONSE');
    }
    this.logger.info(`Submission ${parsed.data.id} uploaded`);
    return parsed.data.id;
  }

  /**
   * List submissions as a table, one row per submission.
   *
   * Listing your own submissions requires an API key; another user's public
   * submissions can be listed without one.
   *
   * @example
   * ```typescript
   * const { columns, rows } = await client.submissions({ roundNumber: 89 });
   * ```
   */
  async submissions(params: SubmissionsParams = {}): Promise<Table<SubmissionRow>> {
    const operation = 'submissions';
    if (params.userId !== undefined) {
      requirePositiveInteger(operation, 'userId', params.userId);
    }
    if (params.roundNumber !== undefined) {
      requirePositiveInteger(operation, 'roundNumber', params.roundNumber);
    }

    const own = params.userId === undefined;
    const user = own ? '@me' : String(params.userId);
    const data = await this.rawRequest('GET', `/v2/users/${user}/submissions`, {
      params: { round: params.roundNumber },
      authenticated: own,
      operation,
    });

    const rows = parseResponse(operation, SubmissionsResponseSchema, data).map((record) =>
      parseResponse(operation, SubmissionRowSchema, flattenRecord(record, SUBMISSION_LAYOUT))
    );
    return toTable(rows, ['id']);
  }

  /**
   * Set the comment of one of your submissions. Setting the same comment
   * twice leaves the submission unchanged.
   *
   * @returns The updated submission
   */
  async setComment(submissionId: number, comment: string): Promise<SubmissionRow> {
    const operation = 'setComment';
    requirePositiveInteger(operation, 'submissionId', submissionId);

    const data = await this.rawRequest('PATCH', `/v2/submissions/${submissionId}`, {
      body: { comment },
      authenticated: true,
      operation,
    });

    const record = parseResponse(operation, SubmissionRecordSchema, data);
    return parseResponse(operation, SubmissionRowSchema, flattenRecord(record, SUBMISSION_LAYOUT));
  }

  /**
   * Crunch number of the last crunch you uploaded to the latest round, or
   * undefined when you have not submitted to it.
   */
  async lastCrunch(): Promise<number | undefined> {
    const config = await this.datasetConfig();
    const subs = await this.submissions({ roundNumber: config.round_id });
    return maxOf(subs, 'crunch_number');
  }

  // ===========================================================================
  // Scores
  // ===========================================================================

  /**
   * Get the metric rows of your submissions on a dataset.
   *
   * @param dataset - Dataset id or name
   * @param params.resolvedOnly - Only metrics computed against final targets
   */
  async getScores(dataset: string | number, params: ScoresParams = {}): Promise<Table<ScoreRow>> {
    const operation = 'getScores';
    if (typeof dataset === 'number') {
      requirePositiveInteger(operation, 'dataset', dataset);
    } else if (!dataset) {
      throw new ValidationError(`${operation}: dataset must not be empty`, 'INVALID_VALUE', [
        { path: 'dataset', message: 'expected a dataset id or name' },
      ]);
    }

    const data = await this.rawRequest('GET', `/v2/datasets/${encodeURIComponent(String(dataset))}/scores`, {
      params: { resolved: params.resolvedOnly ? true : undefined },
      authenticated: true,
      operation,
    });

    const rows = parseResponse(operation, ScoresResponseSchema, data).map((record) =>
      parseResponse(operation, ScoreRowSchema, flattenRecord(record, SCORE_LAYOUT))
    );
    return toTable(rows, ['dataset_id', 'submission_id']);
  }
}

/**
 * Create a new client instance.
 */
export function createClient(config?: CrunchConfig): CrunchClient {
  return new CrunchClient(config);
}
