/**
 * Client configuration.
 *
 * Each setting is taken from the explicit option, then the environment, then
 * an optional `.env` file, then the default.
 */

import { readFileSync } from 'node:fs';
import { parse } from 'dotenv';
import { ValidationError } from './errors';
import { isLogLevel } from './logger';
import type { CrunchConfig, ResolvedConfig } from './types';

export const DEFAULT_BASE_URL = 'https://api.tournament.crunchdao.com';
export const DEFAULT_DATA_URL = 'https://tournament.crunchdao.com/data';

export const ENV_API_KEY = 'CRUNCHDAO_API_KEY';
export const ENV_API_URL = 'CRUNCHDAO_API_URL';
export const ENV_DATA_URL = 'CRUNCHDAO_DATA_URL';
export const ENV_LOG_LEVEL = 'CRUNCHDAO_LOG_LEVEL';

/**
 * Read a .env file without touching `process.env`.
 *
 * A missing file yields no values; any other read failure propagates.
 */
export function readEnvFile(path: string): Record<string, string> {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {};
    }
    throw error;
  }
  return parse(contents);
}

/**
 * Resolve the API key: explicit argument, then environment, then file.
 * Empty strings count as absent.
 */
export function resolveApiKey(
  apiKey: string | undefined,
  env: Record<string, string | undefined>,
  fileEnv: Record<string, string> = {}
): string | undefined {
  return firstNonEmpty(apiKey, env[ENV_API_KEY], fileEnv[ENV_API_KEY]);
}

export function resolveConfig(config: CrunchConfig = {}): ResolvedConfig {
  const env = config.env ?? process.env;
  const fileEnv = config.envFile ? readEnvFile(config.envFile) : {};

  const logLevel = firstNonEmpty(config.logLevel, env[ENV_LOG_LEVEL], fileEnv[ENV_LOG_LEVEL]) ?? 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ValidationError(`Unknown log level "${logLevel}"`, 'INVALID_VALUE', [
      { path: 'logLevel', message: `expected one of debug, info, warn, error, silent` },
    ]);
  }

  if (config.timeout !== undefined && !(config.timeout > 0)) {
    throw new ValidationError(`Timeout must be a positive number of milliseconds`, 'INVALID_VALUE', [
      { path: 'timeout', message: `got ${config.timeout}` },
    ]);
  }

  return {
    apiKey: resolveApiKey(config.apiKey, env, fileEnv),
    baseUrl: normalizeUrl(
      'baseUrl',
      firstNonEmpty(config.baseUrl, env[ENV_API_URL], fileEnv[ENV_API_URL]) ?? DEFAULT_BASE_URL
    ),
    dataUrl: normalizeUrl(
      'dataUrl',
      firstNonEmpty(config.dataUrl, env[ENV_DATA_URL], fileEnv[ENV_DATA_URL]) ?? DEFAULT_DATA_URL
    ),
    headers: config.headers ?? {},
    timeout: config.timeout,
    logLevel,
  };
}

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value !== '');
}

function normalizeUrl(field: string, value: string): string {
  try {
    new URL(value);
  } catch {
    throw new ValidationError(`Invalid ${field} "${value}"`, 'INVALID_VALUE', [
      { path: field, message: 'expected an absolute URL' },
    ]);
  }
  return value.replace(/\/+$/, ''); // Remove trailing slashes
}
