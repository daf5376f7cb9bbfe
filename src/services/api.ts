/**
 * Graph API Client
 * Session controller: owns the token lifecycle and follows `@odata.nextLink` pagination
 */

import { GraphRequestError } from '../lib/errors.js';
import { createRequestId, type StructuredLogger } from '../lib/logger.js';
import { GRAPH_BASE_URL, buildGraphQuery, buildUrl, type GraphQueryOptions } from '../lib/odata.js';
import type { GraphClientConfig } from '../types/config.js';
import type { GraphPage, GraphVersion } from '../types/graph.js';
import { AuthService } from './auth.js';
import { createHttpContext, type HttpContext } from './context.js';
import { RequestExecutor } from './executor.js';
import type { RetryConfig } from './retry.js';

export interface GraphApiClientOptions {
  /** Shared HTTP session; created from the config when omitted */
  context?: HttpContext;
  retry?: Partial<RetryConfig>;
  /** Delay between proactive logins */
  refreshIntervalMs?: number;
  timeoutMs?: number;
}

export class GraphApiClient {
  private config: GraphClientConfig;
  private auth: AuthService;
  private executor: RequestExecutor;
  private logger: StructuredLogger;
  private closed = false;

  constructor(config: GraphClientConfig, options: GraphApiClientOptions = {}) {
    this.config = config;
    const context =
      options.context ?? createHttpContext({ userAgent: config.userAgent, timeoutMs: options.timeoutMs });
    this.logger = context.logger;

    this.auth = new AuthService(
      () => this.config,
      (url, form) => this.executor.execute('POST', url, { body: form, authenticate: false }),
      { refreshIntervalMs: options.refreshIntervalMs, logger: context.logger.child('Auth') }
    );
    this.executor = new RequestExecutor(context, this.auth, options.retry);
  }

  /**
   * Fetch a new access token and arm the refresh timer
   */
  async login(): Promise<string> {
    this.assertOpen();
    return this.auth.login();
  }

  /**
   * Fetch every record of a collection, following `@odata.nextLink` until the last page.
   * A fatal error discards whatever was already collected.
   */
  async fetchAll(
    version: GraphVersion,
    endpoint: string,
    options: GraphQueryOptions = {}
  ): Promise<unknown[]> {
    const records: unknown[] = [];
    for await (const page of this.pages(version, endpoint, options)) {
      records.push(...page);
    }
    return records;
  }

  /**
   * Yield each page's records in server order
   */
  async *pages(
    version: GraphVersion,
    endpoint: string,
    options: GraphQueryOptions = {}
  ): AsyncGenerator<unknown[], void, undefined> {
    this.assertOpen();

    if (!this.auth.hasToken()) {
      await this.auth.login();
    }

    const requestId = createRequestId();
    let nextUrl: string | null = buildUrl(GRAPH_BASE_URL, version, endpoint, buildGraphQuery(options));
    let pageCount = 0;

    while (nextUrl) {
      this.logger.info('Making request', { requestId, method: 'GET', url: nextUrl });

      const body = await this.executor.execute('GET', nextUrl, { requestId });
      if (isEmptyPayload(body)) {
        break;
      }

      const page = parsePage(body);
      pageCount++;
      nextUrl = page.nextLink;
      yield page.records;
    }

    this.logger.debug('Pagination finished', { requestId, pages: pageCount });
  }

  /**
   * Stop the refresh timer. The client cannot be used afterwards.
   */
  close(): void {
    this.closed = true;
    this.auth.stop();
  }

  isClosed(): boolean {
    return this.closed;
  }

  getTenantId(): string {
    return this.config.tenantId;
  }

  /** Expiry of the current token, for status output */
  getTokenExpiry(): Date | null {
    const token = this.auth.getToken();
    return token ? new Date(token.expiresAt) : null;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw GraphRequestError.fatal('closed', 'Client has been closed');
    }
  }
}

/**
 * No body, null, {}, [], '', 0 and false all end pagination
 */
export function isEmptyPayload(body: unknown): boolean {
  if (!body) {
    return true;
  }
  if (Array.isArray(body)) {
    return body.length === 0;
  }
  if (typeof body === 'object') {
    return Object.keys(body).length === 0;
  }
  return false;
}

/**
 * Read the result container and the continuation cursor from a page payload
 */
export function parsePage(body: unknown): GraphPage {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw GraphRequestError.fatal('invalid-response', 'Page payload is not a JSON object');
  }

  const value: unknown = 'value' in body ? body.value : undefined;
  const cursor: unknown = '@odata.nextLink' in body ? body['@odata.nextLink'] : undefined;

  if (value !== undefined && value !== null && !Array.isArray(value)) {
    throw GraphRequestError.fatal('invalid-response', 'Page "value" is not an array');
  }

  return {
    records: Array.isArray(value) ? value : [],
    nextLink: typeof cursor === 'string' && cursor.length > 0 ? cursor : null,
  };
}
