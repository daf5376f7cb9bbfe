/**
 * Auth Service
 * OAuth2 client-credentials login for Microsoft Graph, with a self re-arming refresh timer
 */

import { GraphRequestError } from '../lib/errors.js';
import { loggers, type StructuredLogger } from '../lib/logger.js';
import type { AccessToken } from '../types/auth.js';
import type { GraphClientConfig } from '../types/config.js';
import type { TokenSession } from './executor.js';

export const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';

// Graph tokens live 3600 s; refresh one second before that
export const TOKEN_EXPIRATION_PERIOD_MS = 3599 * 1000;

export function tokenEndpoint(tenantId: string): string {
  return `https://login.microsoftonline.com/${encodeURIComponent(tenantId)}/oauth2/v2.0/token`;
}

/**
 * Posts the token request form and resolves to the decoded response body
 */
export type TokenRequester = (url: string, form: Record<string, string>) => Promise<unknown>;

export interface AuthServiceOptions {
  /** Delay before the next proactive login (default: TOKEN_EXPIRATION_PERIOD_MS) */
  refreshIntervalMs?: number;
  logger?: StructuredLogger;
}

export class AuthService implements TokenSession {
  private readConfig: () => GraphClientConfig;
  private requestToken: TokenRequester;
  private refreshIntervalMs: number;
  private logger: StructuredLogger;
  private token: AccessToken | null = null;
  private refreshTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  // Shared by concurrent callers (refresh timer, 401 handler, startup)
  private inFlightLogin: Promise<string> | null = null;

  constructor(
    readConfig: () => GraphClientConfig,
    requestToken: TokenRequester,
    options: AuthServiceOptions = {}
  ) {
    this.readConfig = readConfig;
    this.requestToken = requestToken;
    this.refreshIntervalMs = options.refreshIntervalMs ?? TOKEN_EXPIRATION_PERIOD_MS;
    this.logger = options.logger ?? loggers.api.child('Auth');
  }

  /**
   * Request a new access token and store it.
   * The refresh timer is re-armed whether or not the login succeeds.
   */
  async login(): Promise<string> {
    if (this.stopped) {
      throw GraphRequestError.fatal('closed', 'Client has been closed');
    }

    if (this.inFlightLogin) {
      return this.inFlightLogin;
    }

    this.inFlightLogin = this.fetchToken();

    try {
      return await this.inFlightLogin;
    } finally {
      this.inFlightLogin = null;
      this.scheduleRefresh();
    }
  }

  accessToken(): string | null {
    return this.token?.value ?? null;
  }

  getToken(): AccessToken | null {
    return this.token;
  }

  hasToken(): boolean {
    return this.token !== null;
  }

  isRefreshScheduled(): boolean {
    return this.refreshTimer !== null;
  }

  /**
   * Cancel the pending refresh. Further logins fail.
   */
  stop(): void {
    this.stopped = true;
    this.clearRefreshTimer();
  }

  private async fetchToken(): Promise<string> {
    // Re-read on every login so rotated credentials are picked up
    const { clientId, clientSecret, tenantId } = this.readConfig();

    this.logger.info('Refreshing token', { tenantId });

    const body = await this.logger.trackAsync(
      'POST get access token',
      () =>
        this.requestToken(tokenEndpoint(tenantId), {
          grant_type: 'client_credentials',
          client_id: clientId,
          client_secret: clientSecret,
          scope: GRAPH_SCOPE,
        }),
      { tenantId }
    );

    const value = readAccessToken(body);
    if (!value) {
      throw GraphRequestError.fatal('auth', 'Token response did not contain an access_token');
    }

    const issuedAt = Date.now();
    this.token = Object.freeze({
      value,
      issuedAt,
      expiresAt: issuedAt + TOKEN_EXPIRATION_PERIOD_MS,
    });

    return value;
  }

  private scheduleRefresh(): void {
    if (this.stopped) {
      return;
    }

    this.clearRefreshTimer();
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.login().catch((error: unknown) => {
        this.logger.error('Scheduled token refresh failed', error);
      });
    }, this.refreshIntervalMs);

    // The timer alone must not keep the process alive
    this.refreshTimer.unref();
  }

  private clearRefreshTimer(): void {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
  }
}

function readAccessToken(body: unknown): string | null {
  if (typeof body !== 'object' || body === null || !('access_token' in body)) {
    return null;
  }
  const value = body.access_token;
  return typeof value === 'string' && value.length > 0 ? value : null;
}
