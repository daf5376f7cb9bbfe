/**
 * Request Executor
 * Sends one Graph request with the current bearer token and classifies the response
 */

import type { FetchResponse } from 'ofetch';
import { GraphRequestError } from '../lib/errors.js';
import { appendQuery, type QueryValue } from '../lib/odata.js';
import type { HttpMethod } from '../types/graph.js';
import type { HttpContext } from './context.js';
import { retry, type RetryConfig } from './retry.js';
import type { StructuredLogger } from '../lib/logger.js';

const SUCCESS_STATUSES = [200, 201, 202];

/**
 * What the executor needs from the session: the token to send,
 * and a way to replace it after a 401
 */
export interface TokenSession {
  accessToken(): string | null;
  login(): Promise<unknown>;
}

export interface ExecuteOptions {
  /** Merged into the URL's query string, for every method */
  query?: Record<string, QueryValue>;
  /** Sent form-encoded on POST */
  body?: Record<string, string>;
  /** Attach the bearer token and re-login on 401 (default: true) */
  authenticate?: boolean;
  requestId?: string;
}

export function isSupportedMethod(method: string): method is HttpMethod {
  return method === 'GET' || method === 'POST';
}

export class RequestExecutor {
  private context: HttpContext;
  private session: TokenSession;
  private retryConfig: Partial<RetryConfig>;
  private retryLogger: StructuredLogger;

  constructor(context: HttpContext, session: TokenSession, retryConfig: Partial<RetryConfig> = {}) {
    this.context = context;
    this.session = session;
    this.retryConfig = retryConfig;
    this.retryLogger = context.logger.child('Retry');
  }

  /**
   * Execute a request, retrying transient failures with exponential backoff.
   * Resolves to the decoded JSON body, or null when the body is empty.
   */
  async execute(method: string, url: string, options: ExecuteOptions = {}): Promise<unknown> {
    if (!isSupportedMethod(method)) {
      throw GraphRequestError.fatal('unsupported-method', `Unsupported HTTP method: ${method}`);
    }

    const target = options.query ? appendQuery(url, options.query) : url;

    return retry(({ attempt }) => this.send(method, target, options, attempt), {
      ...this.retryConfig,
      onRetry: (error, attempt, delayMs) => {
        this.retryLogger.warn('Retrying request', {
          requestId: options.requestId,
          method,
          url: target,
          attempt,
          delayMs: Math.round(delayMs),
          reason: error instanceof Error ? error.message : String(error),
        });
        this.retryConfig.onRetry?.(error, attempt, delayMs);
      },
    });
  }

  private async send(
    method: HttpMethod,
    url: string,
    options: ExecuteOptions,
    attempt: number
  ): Promise<unknown> {
    const { logger } = this.context;
    const authenticate = options.authenticate !== false;
    const headers: Record<string, string> = {};

    if (authenticate) {
      const token = this.session.accessToken();
      if (token) {
        headers['Authorization'] = `Bearer ${token}`;
      }
    }

    if (this.context.userAgent) {
      headers['User-Agent'] = this.context.userAgent;
    }

    let body: string | undefined;
    if (method === 'POST') {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      body = new URLSearchParams(options.body ?? {}).toString();
    }

    // Never log the POST body: the token request carries the client secret
    logger.debug('Sending request', { requestId: options.requestId, method, url, attempt });

    let response: FetchResponse<string>;
    try {
      response = await this.context.http.raw(url, {
        method,
        headers,
        body,
        responseType: 'text',
        ignoreResponseError: true,
        retry: 0,
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw GraphRequestError.transient('connection', `Connection failed: ${reason}`, undefined, error);
    }

    const status = response.status;
    const text = response._data ?? '';

    logger.debug('Received response', { requestId: options.requestId, method, url, statusCode: status });

    if (status === 401) {
      if (!authenticate) {
        throw GraphRequestError.fatal('auth', text || 'Unauthorized', status);
      }
      logger.info('Received 401, refreshing access token', { requestId: options.requestId, url });
      await this.session.login();
      throw GraphRequestError.transient('unauthorized', 'Access token rejected, retrying with a new token', status);
    }

    if (status === 429) {
      logger.warn('Rate limited', {
        requestId: options.requestId,
        url,
        retryAfter: response.headers.get('retry-after') ?? undefined,
      });
      throw GraphRequestError.transient('rate-limit', 'Rate limit exceeded (429)', status);
    }

    if (status >= 500) {
      throw GraphRequestError.transient('server-error', `Server error (${status})`, status);
    }

    if (!SUCCESS_STATUSES.includes(status)) {
      throw GraphRequestError.fatal('unexpected-status', text, status);
    }

    return parseBody(text, status);
  }
}

function parseBody(text: string, status: number): unknown {
  if (text.trim() === '') {
    return null;
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw GraphRequestError.fatal('invalid-response', `Response is not valid JSON: ${text.slice(0, 200)}`, status, error);
  }
}
