import type {
  AxiosResponseHeaders,
  RawAxiosResponseHeaders,
} from 'axios';

export type HeaderMap = Record<string, string>;

export function buildRequestHeaders(userAgent: string): HeaderMap {
  return {
    'User-Agent': userAgent,
    Accept: '*/*',
    'Accept-Language': 'en-US,en;q=0.5',
  };
}

/**
 * Flattens axios response headers into a lowercase string map. Multi-valued
 * headers are joined with ", ".
 */
export function toHeaderMap(
  headers: AxiosResponseHeaders | RawAxiosResponseHeaders | undefined
): HeaderMap {
  const result: HeaderMap = {};
  if (!headers) return result;

  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) continue;
    const name = key.toLowerCase();
    if (Array.isArray(value)) {
      result[name] = value.map(String).join(', ');
    } else if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      result[name] = String(value);
    }
  }

  return result;
}

export function getContentType(headers: HeaderMap): string | undefined {
  const value = headers['content-type']?.trim();
  return value ? value : undefined;
}

export function getContentLength(headers: HeaderMap): number | undefined {
  const value = headers['content-length'];
  if (!value) return undefined;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}
