import { describe, expect, test } from 'vitest';

import {
  UrlValidationError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import {
  hasHttpScheme,
  validateMediaUrl,
} from '../../../src/utils/url-validator.js';

function captureError(fn: () => unknown): UrlValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof UrlValidationError) return error;
    throw error;
  }
  throw new Error('Expected UrlValidationError');
}

describe('url-validator', () => {
  describe('hasHttpScheme', () => {
    test('matches http and https in any case', () => {
      expect(hasHttpScheme('http://a.test')).toBe(true);
      expect(hasHttpScheme('HTTPS://a.test')).toBe(true);
      expect(hasHttpScheme('ftp://a.test')).toBe(false);
      expect(hasHttpScheme('//a.test/clip.mp4')).toBe(false);
    });
  });

  describe('validateMediaUrl', () => {
    test('returns the normalized URL', () => {
      expect(validateMediaUrl('HTTPS://CDN.Example.com/v/clip.mp4')).toBe(
        'https://cdn.example.com/v/clip.mp4'
      );
      expect(validateMediaUrl('http://example.com')).toBe('http://example.com/');
    });

    test('percent-encodes unsafe path characters', () => {
      expect(validateMediaUrl('https://cdn.example.com/v/clip one.mp4')).toBe(
        'https://cdn.example.com/v/clip%20one.mp4'
      );
    });

    test('rejects an empty URL', () => {
      const error = captureError(() => validateMediaUrl(''));
      expect(error.message).toBe('URL is required');
      expect(error).toBeInstanceOf(ValidationError);
    });

    test.each([
      'ftp://files.example.com/clip.mp4',
      'file:///etc/passwd',
      'javascript:alert(1)',
      '//cdn.example.com/clip.mp4',
      '  https://cdn.example.com/clip.mp4',
      'cdn.example.com/clip.mp4',
    ])('rejects %s', (url) => {
      const error = captureError(() => validateMediaUrl(url));
      expect(error.message).toBe(
        'Invalid URL scheme: only http:// and https:// are allowed'
      );
      expect(error.url).toBe(url);
    });

    test('rejects URLs that do not parse', () => {
      const error = captureError(() => validateMediaUrl('https://'));
      expect(error.message).toBe('Invalid URL format');
    });

    test('rejects URLs over the length limit', () => {
      const error = captureError(() =>
        validateMediaUrl('https://cdn.example.com/clip.mp4', 20)
      );
      expect(error.message).toBe('URL exceeds maximum length of 20 characters');
    });
  });
});
