import { z } from 'zod';

import { ValidationError } from '../errors/app-error.js';

import type { MediaKind } from '../services/fetcher.js';
import type { FormatMode } from '../services/messenger.js';

export interface UploadRequest {
  destination: string;
  sourceUrl: string;
  caption?: string;
  formatMode: FormatMode;
  kind: MediaKind;
}

const QUOTE_PAIRS = [
  ['"', '"'],
  ["'", "'"],
] as const;

function stripMatchingQuotes(value: string): string {
  for (const [open, close] of QUOTE_PAIRS) {
    if (value.length >= 2 && value.startsWith(open) && value.endsWith(close)) {
      return value.slice(1, -1).trim();
    }
  }
  return value;
}

/**
 * Maps loosely typed parse-mode strings ("HTML", "'markdownv2'", "") onto a
 * format mode. Unknown values fall back to plain text.
 */
export function normalizeFormatMode(value: unknown): FormatMode {
  if (typeof value !== 'string') return 'none';
  const mode = stripMatchingQuotes(value.trim()).toUpperCase();
  if (mode === 'HTML') return 'html';
  if (mode.startsWith('MARKDOWN')) return 'markdown';
  return 'none';
}

const chatIdSchema = z
  .union([z.string(), z.number().int()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, 'chat_id must not be empty'));

const urlSchema = z.string().trim().min(1, 'file_url must not be empty');

const kindSchema = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(['video', 'photo']));

export const uploadRequestSchema = z
  .object({
    chat_id: chatIdSchema,
    file_url: urlSchema.optional(),
    url: urlSchema.optional(),
    caption: z.string().nullish(),
    parse_mode: z.unknown().optional(),
    kind: kindSchema.nullish(),
  })
  .refine((body) => body.file_url !== undefined || body.url !== undefined, {
    message: 'file_url is required',
    path: ['file_url'],
  });

function formatIssues(error: z.ZodError): { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
}

/**
 * Validates an inbound JSON body once at the boundary and returns the
 * strongly typed request the relay works with.
 */
export function normalizeUploadRequest(body: unknown): UploadRequest {
  const result = uploadRequestSchema.safeParse(body);
  if (!result.success) {
    throw new ValidationError('Invalid upload request', {
      issues: formatIssues(result.error),
    });
  }

  const data = result.data;
  const sourceUrl = data.file_url ?? data.url ?? '';

  return {
    destination: data.chat_id,
    sourceUrl,
    ...(data.caption ? { caption: data.caption } : {}),
    formatMode: normalizeFormatMode(data.parse_mode),
    kind: data.kind ?? 'video',
  };
}
