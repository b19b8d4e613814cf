import { afterEach, describe, expect, test, vi } from 'vitest';

import {
  ConfigError,
  DownloadFailedError,
  FetchError,
  NotFoundError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import {
  buildErrorResponse,
  errorHandler,
  normalizeError,
} from '../../../src/middleware/error-handler.js';
import { createMockRequest, MockResponse } from '../../helpers/express.js';

function bodyParserError(type: string): Error {
  return Object.assign(new Error('body-parser failure'), { type, status: 400 });
}

describe('error-handler', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe('normalizeError', () => {
    test('turns JSON parse failures into validation errors', () => {
      const error = normalizeError(bodyParserError('entity.parse.failed'));
      expect(error).toBeInstanceOf(ValidationError);
      expect(error.message).toBe('Malformed JSON body');
    });

    test('turns oversized bodies into validation errors', () => {
      const error = normalizeError(bodyParserError('entity.too.large'));
      expect(error.message).toBe('Request body too large');
    });

    test('leaves other errors alone', () => {
      const original = new Error('plain');
      expect(normalizeError(original)).toBe(original);
      const unknownType = bodyParserError('encoding.unsupported');
      expect(normalizeError(unknownType)).toBe(unknownType);
    });
  });

  describe('buildErrorResponse', () => {
    test('exposes operational errors with details', () => {
      expect(buildErrorResponse(new ValidationError('bad', { field: 'chat_id' }))).toEqual({
        ok: false,
        error: {
          message: 'bad',
          code: 'VALIDATION_ERROR',
          statusCode: 400,
          details: { field: 'chat_id' },
        },
      });
    });

    test('omits empty details', () => {
      const response = buildErrorResponse(new FetchError('HTTP 500: x', 'https://a.test/', 500));
      expect(response.error).not.toHaveProperty('details');
      expect(response.error.statusCode).toBe(500);
    });

    test('reports download failures with their last error', () => {
      const response = buildErrorResponse(
        new DownloadFailedError('https://a.test/', 5, new Error('socket hang up'))
      );
      expect(response.error).toEqual({
        message: 'Download failed after 5 attempts: socket hang up',
        code: 'DOWNLOAD_FAILED',
        statusCode: 500,
        details: { url: 'https://a.test/', attempts: 5, lastError: 'socket hang up' },
      });
    });

    test.each([new Error('db password leaked'), new ConfigError('Missing env var: X')])(
      'hides internals of %s',
      (error) => {
        expect(buildErrorResponse(error)).toEqual({
          ok: false,
          error: {
            message: 'Internal Server Error',
            code: 'INTERNAL_ERROR',
            statusCode: 500,
          },
        });
      }
    );

    test('adds the stack in development', () => {
      vi.stubEnv('NODE_ENV', 'development');
      const error = new NotFoundError('Route GET /x');
      expect(buildErrorResponse(error).error.stack).toBe(error.stack);
    });
  });

  describe('errorHandler', () => {
    test('writes the status and body', () => {
      const res = new MockResponse();
      errorHandler(
        new NotFoundError('Route GET /nope'),
        createMockRequest({ method: 'GET', path: '/nope' }) as never,
        res as never,
        vi.fn()
      );

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({
        ok: false,
        error: {
          message: 'Route GET /nope not found',
          code: 'NOT_FOUND',
          statusCode: 404,
        },
      });
    });

    test('does nothing once headers are sent', () => {
      const res = new MockResponse();
      res.headersSent = true;
      errorHandler(new Error('late'), createMockRequest() as never, res as never, vi.fn());

      expect(res.statusCode).toBe(200);
      expect(res.body).toBeUndefined();
    });
  });
});
