/**
 * Dataset file download.
 *
 * A file that is already complete on disk is skipped, a partial one is resumed
 * with a range request, and one larger than the server's copy is fetched
 * again from scratch.
 */

import { open, rm, stat, type FileHandle } from 'node:fs/promises';
import { DownloadError } from './errors';
import type { Logger } from './logger';

export interface DownloadFileOptions {
  headers?: Record<string, string>;
  /** Milliseconds before the request is aborted */
  timeout?: number;
  /** Discard any existing file and fetch it again */
  force?: boolean;
  logger: Logger;
  onProgress?: (path: string, bytesWritten: number, totalBytes: number | undefined) => void;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function fileSize(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).size;
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw new DownloadError(`download: cannot inspect ${path} (${describe(error)})`, undefined, path);
  }
}

function contentLength(response: Response): number | undefined {
  const header = response.headers.get('content-length');
  if (header === null) return undefined;
  const value = Number.parseInt(header, 10);
  return Number.isNaN(value) ? undefined : value;
}

async function fetchFile(url: string, path: string, options: DownloadFileOptions, range?: number): Promise<Response> {
  const headers: Record<string, string> = { ...options.headers };
  if (range !== undefined) {
    headers['Range'] = `bytes=${range}-`;
  }

  let response: Response;
  try {
    response = await fetch(url, {
      method: 'GET',
      headers,
      signal: options.timeout ? AbortSignal.timeout(options.timeout) : undefined,
    });
  } catch (error) {
    throw new DownloadError(`download: could not fetch ${url} (${describe(error)})`, undefined, path);
  }

  if (!response.ok) {
    await response.body?.cancel();
    throw new DownloadError(
      `download: ${url} returned ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
      response.status,
      path
    );
  }
  return response;
}

async function writeBody(
  response: Response,
  path: string,
  mode: 'w' | 'a',
  startAt: number,
  total: number | undefined,
  options: DownloadFileOptions
): Promise<number> {
  let written = startAt;
  let handle: FileHandle;
  try {
    handle = await open(path, mode);
  } catch (error) {
    await response.body?.cancel();
    throw new DownloadError(`download: cannot open ${path} (${describe(error)})`, undefined, path);
  }
  try {
    if (response.body) {
      const reader = response.body.getReader();
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        await handle.write(value);
        written += value.byteLength;
        options.onProgress?.(path, written, total);
      }
    }
  } catch (error) {
    throw new DownloadError(`download: failed writing ${path} (${describe(error)})`, undefined, path);
  } finally {
    await handle.close();
  }
  return written;
}

/**
 * Download `url` to `path` and return the path.
 */
export async function downloadFile(url: string, path: string, options: DownloadFileOptions): Promise<string> {
  const { logger } = options;

  if (options.force) {
    await rm(path, { force: true }).catch((error: unknown) => {
      throw new DownloadError(`download: cannot remove ${path} (${describe(error)})`, undefined, path);
    });
  }

  const existing = await fileSize(path);
  const response = await fetchFile(url, path, options);
  const total = contentLength(response);

  if (existing === undefined || total === undefined) {
    logger.info(`Downloading ${url} to ${path}`);
    await writeBody(response, path, 'w', 0, total, options);
    return path;
  }

  if (existing === total) {
    await response.body?.cancel();
    logger.info(`${path} is already complete`);
    return path;
  }

  if (existing < total) {
    await response.body?.cancel();
    logger.info(`Resuming ${path} at byte ${existing}`);
    const resumed = await fetchFile(url, path, options, existing);
    if (resumed.status === 206) {
      await writeBody(resumed, path, 'a', existing, total, options);
    } else {
      // Range ignored: the body is the whole file
      await writeBody(resumed, path, 'w', 0, total, options);
    }
    return path;
  }

  logger.warn(`${path} is larger than the server copy, downloading it again`);
  await writeBody(response, path, 'w', 0, total, options);
  return path;
}
