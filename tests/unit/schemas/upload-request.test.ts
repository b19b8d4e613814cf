import { describe, expect, test } from 'vitest';

import { ValidationError } from '../../../src/errors/app-error.js';
import {
  normalizeFormatMode,
  normalizeUploadRequest,
} from '../../../src/schemas/inputs.js';

function captureValidationError(body: unknown): ValidationError {
  try {
    normalizeUploadRequest(body);
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('Expected ValidationError');
}

function issuePaths(error: ValidationError): unknown[] {
  const issues = error.details?.issues;
  if (!Array.isArray(issues)) return [];
  return issues.map((issue: unknown) =>
    issue && typeof issue === 'object' ? Reflect.get(issue, 'path') : undefined
  );
}

describe('upload request', () => {
  describe('normalizeFormatMode', () => {
    test.each([
      ['HTML', 'html'],
      [' html ', 'html'],
      ['"HTML"', 'html'],
      ['Markdown', 'markdown'],
      ["'MarkdownV2'", 'markdown'],
      ['MARKDOWNV2', 'markdown'],
      ['', 'none'],
      ['bbcode', 'none'],
    ])('maps %j to %s', (input, expected) => {
      expect(normalizeFormatMode(input)).toBe(expected);
    });

    test('treats non-strings as plain text', () => {
      expect(normalizeFormatMode(undefined)).toBe('none');
      expect(normalizeFormatMode(null)).toBe('none');
      expect(normalizeFormatMode(1)).toBe('none');
    });
  });

  describe('normalizeUploadRequest', () => {
    test('normalizes a complete body', () => {
      const request = normalizeUploadRequest({
        chat_id: '@channel',
        file_url: ' https://cdn.example.com/a.mp4 ',
        caption: 'hello',
        parse_mode: 'HTML',
      });

      expect(request).toEqual({
        destination: '@channel',
        sourceUrl: 'https://cdn.example.com/a.mp4',
        caption: 'hello',
        formatMode: 'html',
        kind: 'video',
      });
    });

    test('accepts numeric chat ids, the url alias and an explicit kind', () => {
      const request = normalizeUploadRequest({
        chat_id: -1001234567890,
        url: 'https://cdn.example.com/p.jpg',
        kind: ' PHOTO ',
      });

      expect(request.destination).toBe('-1001234567890');
      expect(request.sourceUrl).toBe('https://cdn.example.com/p.jpg');
      expect(request.kind).toBe('photo');
      expect(request.formatMode).toBe('none');
      expect(request).not.toHaveProperty('caption');
    });

    test('prefers file_url over url', () => {
      const request = normalizeUploadRequest({
        chat_id: '1',
        file_url: 'https://a.test/first.mp4',
        url: 'https://a.test/second.mp4',
      });

      expect(request.sourceUrl).toBe('https://a.test/first.mp4');
    });

    test('drops empty and null captions', () => {
      expect(
        normalizeUploadRequest({ chat_id: '1', url: 'https://a.test/', caption: null })
      ).not.toHaveProperty('caption');
      expect(
        normalizeUploadRequest({ chat_id: '1', url: 'https://a.test/', caption: '' })
      ).not.toHaveProperty('caption');
    });

    test('requires a source URL', () => {
      const error = captureValidationError({ chat_id: '1' });

      expect(error.message).toBe('Invalid upload request');
      expect(error.details).toEqual({
        issues: [{ path: 'file_url', message: 'file_url is required' }],
      });
    });

    test('requires a chat id', () => {
      const error = captureValidationError({ file_url: 'https://a.test/' });
      expect(issuePaths(error)).toContain('chat_id');
    });

    test('rejects a blank chat id', () => {
      const error = captureValidationError({
        chat_id: '   ',
        file_url: 'https://a.test/',
      });
      expect(error.details).toEqual({
        issues: [{ path: 'chat_id', message: 'chat_id must not be empty' }],
      });
    });

    test('rejects fractional chat ids', () => {
      const error = captureValidationError({ chat_id: 1.5, url: 'https://a.test/' });
      expect(issuePaths(error)).toContain('chat_id');
    });

    test('rejects unknown kinds', () => {
      const error = captureValidationError({
        chat_id: '1',
        url: 'https://a.test/',
        kind: 'audio',
      });
      expect(issuePaths(error)).toEqual(['kind']);
    });

    test.each([null, 'chat_id=1', 42])('rejects non-object body %j', (body) => {
      expect(() => normalizeUploadRequest(body)).toThrow(ValidationError);
    });
  });
});
