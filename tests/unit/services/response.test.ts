import { Readable, Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';

import { AxiosHeaders } from 'axios';
import { describe, expect, test } from 'vitest';

import { FetchError } from '../../../src/errors/app-error.js';
import {
  getContentLength,
  getContentType,
  toHeaderMap,
} from '../../../src/services/fetcher/headers.js';
import {
  assertContentLengthWithinLimit,
  ByteCounter,
  isMediaContentType,
  readSample,
} from '../../../src/services/fetcher/response.js';

const MEDIA_URL = 'https://cdn.example.com/clip.mp4';

function sink(): Writable {
  return new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
}

describe('fetch response helpers', () => {
  test.each([
    ['video/mp4', true],
    ['image/jpeg', true],
    ['Application/Octet-Stream', true],
    ['binary/octet-stream', true],
    ['text/html; charset=utf-8', false],
    ['application/json', false],
  ])('isMediaContentType(%s) is %s', (contentType, expected) => {
    expect(isMediaContentType(contentType)).toBe(expected);
  });

  test('readSample stops at the limit and destroys the stream', async () => {
    const stream = Readable.from([Buffer.from('abcdef'), Buffer.from('ghijkl')]);

    await expect(readSample(stream, 8)).resolves.toBe('abcdefgh');
    expect(stream.destroyed).toBe(true);
  });

  test('readSample replaces invalid UTF-8', async () => {
    const stream = Readable.from([Buffer.from([0x3c, 0xff, 0x3e])]);
    await expect(readSample(stream, 512)).resolves.toBe('<\uFFFD>');
  });

  test('ByteCounter counts bytes that pass through', async () => {
    const counter = new ByteCounter(MEDIA_URL, 0);
    await pipeline(Readable.from([Buffer.alloc(300), Buffer.alloc(200)]), counter, sink());
    expect(counter.bytes).toBe(500);
  });

  test('ByteCounter fails past the cap', async () => {
    const counter = new ByteCounter(MEDIA_URL, 400);
    const result = pipeline(
      Readable.from([Buffer.alloc(300), Buffer.alloc(200)]),
      counter,
      sink()
    );

    await expect(result).rejects.toThrow('Response exceeds maximum size of 400 bytes');
  });

  test('assertContentLengthWithinLimit', () => {
    expect(() => assertContentLengthWithinLimit(500, MEDIA_URL, 0)).not.toThrow();
    expect(() => assertContentLengthWithinLimit(undefined, MEDIA_URL, 10)).not.toThrow();
    expect(() => assertContentLengthWithinLimit(10, MEDIA_URL, 10)).not.toThrow();
    expect(() => assertContentLengthWithinLimit(11, MEDIA_URL, 10)).toThrow(FetchError);
  });

  test('toHeaderMap lowercases names and joins repeated values', () => {
    const headers = toHeaderMap(
      new AxiosHeaders({
        'Content-Type': 'video/mp4',
        'Content-Length': '2048',
        'Set-Cookie': ['a=1', 'b=2'],
      })
    );

    expect(headers).toEqual({
      'content-type': 'video/mp4',
      'content-length': '2048',
      'set-cookie': 'a=1, b=2',
    });
    expect(getContentType(headers)).toBe('video/mp4');
    expect(getContentLength(headers)).toBe(2048);
    expect(getContentLength({ 'content-length': 'n/a' })).toBeUndefined();
    expect(getContentType({ 'content-type': ' image/png ' })).toBe('image/png');
    expect(getContentType({ 'content-type': '  ' })).toBeUndefined();
  });
});
