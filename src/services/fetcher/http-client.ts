import axios, { type AxiosInstance } from 'axios';

import { config } from '../../config/index.js';

import { httpAgent, httpsAgent } from './agents.js';
import { buildRequestHeaders } from './headers.js';
import {
  handleRequest,
  handleResponse,
  handleResponseError,
} from './interceptors.js';

/**
 * Creates the axios instance used for probes and downloads. All instances
 * share the process-wide keep-alive agents.
 */
export function createHttpClient(): AxiosInstance {
  const client = axios.create({
    maxRedirects: config.fetcher.maxRedirects,
    httpAgent,
    httpsAgent,
    headers: buildRequestHeaders(config.fetcher.userAgent),
    validateStatus: (status) => status >= 200 && status < 300,
  });

  client.interceptors.request.use(handleRequest);
  client.interceptors.response.use(handleResponse, handleResponseError);

  return client;
}
