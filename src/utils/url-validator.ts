import { config } from '../config/index.js';

import { UrlValidationError } from '../errors/app-error.js';

const HTTP_SCHEME_PATTERN = /^https?:\/\//i;

export function hasHttpScheme(url: string): boolean {
  return HTTP_SCHEME_PATTERN.test(url);
}

/**
 * Accepts absolute http(s) URLs only and returns them in WHATWG-normalized
 * form. Throws {@link UrlValidationError} for everything else.
 */
export function validateMediaUrl(
  url: string,
  maxLength = config.fetcher.maxUrlLength
): string {
  if (!url) {
    throw new UrlValidationError('URL is required', url);
  }

  if (url.length > maxLength) {
    throw new UrlValidationError(
      `URL exceeds maximum length of ${maxLength} characters`,
      url
    );
  }

  if (!hasHttpScheme(url)) {
    throw new UrlValidationError(
      'Invalid URL scheme: only http:// and https:// are allowed',
      url
    );
  }

  if (!URL.canParse(url)) {
    throw new UrlValidationError('Invalid URL format', url);
  }

  const parsed = new URL(url);
  if (!parsed.hostname) {
    throw new UrlValidationError('URL must have a valid hostname', url);
  }

  return parsed.href;
}
