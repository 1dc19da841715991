/**
 * Error Classes Tests
 */

import { describe, it, expect } from 'vitest';
import {
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
  reasonOf,
} from '../errors';

describe('CrunchError', () => {
  describe('constructor', () => {
    it('should create error with message only', () => {
      const error = new CrunchError('Something went wrong');
      expect(error.message).toBe('Something went wrong');
      expect(error.statusCode).toBeUndefined();
      expect(error.errorCode).toBeUndefined();
      expect(error.responseBody).toBeUndefined();
      expect(error.name).toBe('CrunchError');
    });

    it('should expose status and code aliases', () => {
      const error = new CrunchError('Something went wrong', 500, 'INTERNAL_ERROR', { error: 'boom' });
      expect(error.status).toBe(500);
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.responseBody).toEqual({ error: 'boom' });
    });

    it('should extend Error', () => {
      expect(new CrunchError('Test')).toBeInstanceOf(Error);
    });
  });

  describe('toString', () => {
    it('should format error with all fields', () => {
      const error = new CrunchError('Something went wrong', 500, 'INTERNAL_ERROR');
      expect(error.toString()).toBe('CrunchError (500) [INTERNAL_ERROR]: Something went wrong');
    });

    it('should format error without optional fields', () => {
      expect(new CrunchError('Something went wrong').toString()).toBe('CrunchError: Something went wrong');
    });

    it('should use the subclass name', () => {
      const error = new NotFoundError('gone');
      expect(error.toString()).toBe('NotFoundError (404): gone');
    });
  });

  describe('fromResponse', () => {
    it('should create AuthenticationError for 401', () => {
      const error = CrunchError.fromResponse('submissions', 401, { error: 'Invalid API key' });
      expect(error).toBeInstanceOf(AuthenticationError);
      expect(error.statusCode).toBe(401);
      expect(error.errorCode).toBe('INVALID_API_KEY');
      expect(error.message).toBe('submissions failed: Invalid API key');
    });

    it('should create ValidationError for 400 and read the message field', () => {
      const error = CrunchError.fromResponse('setComment', 400, { message: 'comment too long' });
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('setComment failed: comment too long');
    });

    it('should create NotFoundError for 404', () => {
      const error = CrunchError.fromResponse('setComment', 404, { error: 'Submission not found' });
      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.errorCode).toBe('NOT_FOUND');
    });

    it('should create RateLimitError for 429 with retry_after', () => {
      const error = CrunchError.fromResponse('getScores', 429, { error: 'slow down', retry_after: 30 });
      expect(error).toBeInstanceOf(RateLimitError);
      if (error instanceof RateLimitError) {
        expect(error.retryAfter).toBe(30);
      }
      expect(error.toString()).toBe('RateLimitError (429) [RATE_LIMITED]: getScores failed: slow down (retry after 30s)');
    });

    it('should create ServerError for 5xx', () => {
      const error = CrunchError.fromResponse('datasetConfig', 503, {});
      expect(error).toBeInstanceOf(ServerError);
      expect(error.statusCode).toBe(503);
      expect(error.message).toBe('datasetConfig failed with status 503');
    });

    it('should create a base error for other statuses', () => {
      const error = CrunchError.fromResponse('datasetConfig', 418, { error: 'teapot' });
      expect(error.constructor).toBe(CrunchError);
      expect(error.statusCode).toBe(418);
    });
  });
});

describe('error subclasses', () => {
  it('AuthenticationError has no status unless one is given', () => {
    expect(new AuthenticationError('no key').statusCode).toBeUndefined();
    expect(new AuthenticationError('rejected', 'INVALID_API_KEY', {}, 404).statusCode).toBe(404);
  });

  it('AuthenticationError without a response has no body', () => {
    const error = new AuthenticationError('no key', 'AUTH_REQUIRED', undefined, undefined);
    expect(error.statusCode).toBeUndefined();
    expect(error.errorCode).toBe('AUTH_REQUIRED');
    expect(error.name).toBe('AuthenticationError');
  });

  it('ValidationError keeps its issues and has no status for local input', () => {
    const error = new ValidationError('bad', 'INVALID_PAYLOAD', [{ path: 'rows', message: 'empty' }]);
    expect(error.issues).toEqual([{ path: 'rows', message: 'empty' }]);
    expect(error.statusCode).toBeUndefined();
  });

  it('UploadError defaults its code', () => {
    const error = new UploadError('rejected', 423);
    expect(error.errorCode).toBe('UPLOAD_FAILED');
    expect(error.statusCode).toBe(423);
  });

  it('DownloadError records the path', () => {
    const error = new DownloadError('missing', 404, '/tmp/X_train.csv');
    expect(error.path).toBe('/tmp/X_train.csv');
    expect(error.errorCode).toBe('DOWNLOAD_FAILED');
  });

  it('transport errors share a code', () => {
    expect(new TimeoutError().errorCode).toBe('SERVICE_UNAVAILABLE');
    expect(new ConnectionError().errorCode).toBe('SERVICE_UNAVAILABLE');
  });
});

describe('type guards', () => {
  it('isCrunchError matches every subclass', () => {
    expect(isCrunchError(new UploadError())).toBe(true);
    expect(isCrunchError(new Error('plain'))).toBe(false);
  });

  it('isAuthenticationError and isValidationError', () => {
    expect(isAuthenticationError(new AuthenticationError())).toBe(true);
    expect(isAuthenticationError(new NotFoundError())).toBe(false);
    expect(isValidationError(new ValidationError())).toBe(true);
    expect(isValidationError('nope')).toBe(false);
  });
});

describe('reasonOf', () => {
  it('prefers error over message', () => {
    expect(reasonOf({ error: 'a', message: 'b' })).toBe('a');
    expect(reasonOf({ message: 'b' })).toBe('b');
    expect(reasonOf({ error: '' })).toBeUndefined();
  });
});
