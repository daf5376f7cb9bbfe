/**
 * HTTP Context
 * Shared HTTP session and logger handed to the auth service and the request executor
 */

import { ofetch, type $Fetch } from 'ofetch';
import { loggers, type StructuredLogger } from '../lib/logger.js';

export interface HttpContext {
  /** One fetch instance (and connection pool) shared by every request of a client */
  http: $Fetch;
  logger: StructuredLogger;
  userAgent?: string;
}

export interface HttpContextOptions {
  userAgent?: string;
  /** Per-request network timeout in milliseconds */
  timeoutMs?: number;
  logger?: StructuredLogger;
}

export function createHttpContext(options: HttpContextOptions = {}): HttpContext {
  // Retries and status handling live in the executor, so ofetch must not do either
  const http = ofetch.create({
    retry: 0,
    ignoreResponseError: true,
    timeout: options.timeoutMs,
  });

  return {
    http,
    logger: options.logger ?? loggers.api,
    userAgent: options.userAgent,
  };
}
