/**
 * HTTP Client Configuration
 *
 * Factory for axios instances with the job's default timeout and headers.
 */

import axios, { type AxiosInstance, type CreateAxiosDefaults } from 'axios';
import { logger } from '../utils/logger.js';
import { TIMEOUTS } from './constants.js';

/**
 * Create a configured axios instance
 *
 * @param config - Optional axios configuration to merge with defaults
 */
export function createHttpClient(config: CreateAxiosDefaults = {}): AxiosInstance {
  const client = axios.create({
    timeout: TIMEOUTS.HTTP_REQUEST_MS,
    headers: {
      Accept: 'application/json',
      'User-Agent': 'pncp-digest/1.0',
    },
    ...config,
  });

  client.interceptors.request.use((requestConfig) => {
    if (!requestConfig.timeout) {
      requestConfig.timeout = TIMEOUTS.HTTP_REQUEST_MS;
    }
    logger.debug(
      { method: requestConfig.method, url: requestConfig.url, params: requestConfig.params },
      'HTTP request'
    );
    return requestConfig;
  });

  return client;
}
