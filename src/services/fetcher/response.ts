import { Transform, type Readable, type TransformCallback } from 'node:stream';

import { FetchError } from '../../errors/app-error.js';

const ACCEPTED_CONTENT_MARKERS = [
  'video',
  'image',
  'application/octet-stream',
  'binary',
] as const;

type StreamChunk = string | Buffer | Uint8Array;

export function isMediaContentType(contentType: string): boolean {
  const normalized = contentType.toLowerCase();
  return ACCEPTED_CONTENT_MARKERS.some((marker) => normalized.includes(marker));
}

function toBuffer(chunk: StreamChunk): Buffer {
  if (typeof chunk === 'string') return Buffer.from(chunk);
  return Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
}

/**
 * Reads at most `limit` bytes from the stream, then destroys it. Used to
 * capture the head of a non-media body for diagnostics.
 */
export async function readSample(
  stream: Readable,
  limit: number
): Promise<string> {
  const chunks: Buffer[] = [];
  let total = 0;

  try {
    for await (const chunk of stream) {
      if (!(typeof chunk === 'string' || chunk instanceof Uint8Array)) continue;
      const buffer = toBuffer(chunk);
      chunks.push(buffer);
      total += buffer.length;
      if (total >= limit) break;
    }
  } finally {
    stream.destroy();
  }

  return new TextDecoder('utf-8', { fatal: false }).decode(
    Buffer.concat(chunks).subarray(0, limit)
  );
}

export function createSizeLimitError(url: string, maxBytes: number): FetchError {
  return new FetchError(
    `Response exceeds maximum size of ${maxBytes} bytes`,
    url,
    413,
    { maxBytes, reason: 'too-large' }
  );
}

export function assertContentLengthWithinLimit(
  contentLength: number | undefined,
  url: string,
  maxBytes: number
): void {
  if (maxBytes <= 0 || contentLength === undefined) return;
  if (contentLength <= maxBytes) return;
  throw createSizeLimitError(url, maxBytes);
}

/**
 * Pass-through stream that counts bytes and fails once `maxBytes` is
 * exceeded. `maxBytes <= 0` disables the cap.
 */
export class ByteCounter extends Transform {
  private total = 0;

  constructor(
    private readonly url: string,
    private readonly maxBytes: number
  ) {
    super();
  }

  get bytes(): number {
    return this.total;
  }

  override _transform(
    chunk: StreamChunk,
    _encoding: BufferEncoding,
    callback: TransformCallback
  ): void {
    const buffer = toBuffer(chunk);
    this.total += buffer.length;

    if (this.maxBytes > 0 && this.total > this.maxBytes) {
      callback(createSizeLimitError(this.url, this.maxBytes));
      return;
    }

    callback(null, buffer);
  }
}
