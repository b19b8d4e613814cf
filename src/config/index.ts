import os from 'node:os';

import {
  parseBoolean,
  parseInteger,
  parseLogLevel,
  parseOptionalString,
} from './env-parsers.js';

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120 Safari/537.36';

const ONE_MIB = 1024 * 1024;

export const config = {
  server: {
    name: 'media-relay',
    host: process.env.HOST ?? '0.0.0.0',
    port: parseInteger(process.env.PORT, 3000, 1024, 65535),
    bodyLimit: '1mb',
    shutdownTimeoutMs: 10000,
  },
  fetcher: {
    userAgent: parseOptionalString(process.env.USER_AGENT) ?? DEFAULT_USER_AGENT,
    scratchDir: parseOptionalString(process.env.SCRATCH_DIR) ?? os.tmpdir(),
    maxRedirects: 5,
    maxUrlLength: 2048,
    chunkSize: ONE_MIB,
    sampleBytes: 512,
    maxAttempts: parseInteger(process.env.DOWNLOAD_MAX_ATTEMPTS, 5, 1, 10),
    backoffBaseMs: parseInteger(process.env.DOWNLOAD_BACKOFF_BASE_MS, 1000, 0),
    backoffMaxMs: parseInteger(process.env.DOWNLOAD_BACKOFF_MAX_MS, 30000, 0),
    timeoutMs: parseInteger(process.env.DOWNLOAD_TIMEOUT_MS, 0, 0),
    maxBytes: parseInteger(process.env.DOWNLOAD_MAX_BYTES, 0, 0),
    probeEnabled: parseBoolean(process.env.PROBE_ENABLED, true),
    probeTimeoutMs: parseInteger(process.env.PROBE_TIMEOUT_MS, 10000, 100),
  },
  pool: {
    maxSockets: parseInteger(process.env.HTTP_MAX_SOCKETS, 10, 1, 256),
    maxFreeSockets: parseInteger(process.env.HTTP_MAX_FREE_SOCKETS, 5, 0, 256),
    keepAliveMsecs: 1000,
  },
  logging: {
    level: parseLogLevel(process.env.LOG_LEVEL),
    enabled: parseBoolean(process.env.LOG_ENABLED, true),
    dir: parseOptionalString(process.env.LOG_DIR),
  },
  security: {
    apiKey: parseOptionalString(process.env.UPLOAD_API_KEY),
  },
};
