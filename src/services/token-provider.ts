import axios, { AxiosInstance } from 'axios';
import type { GraphAuthConfig } from '../config/index.js';
import { ConfigError } from '../config/index.js';
import type { Logger } from '../utils/logger.js';
import { toRelayError } from './http-errors.js';

export interface AccessToken {
  token: string;
  expiresAt: Date;
}

/**
 * Bearer-token capability consumed by the provider client
 */
export interface TokenProvider {
  getToken(scope: string): Promise<AccessToken>;
  /** Forget cached credentials so the next getToken fetches fresh ones */
  refreshToken(): Promise<void>;
}

/**
 * Fixed token, for pre-provisioned credentials and tests
 */
export class StaticTokenProvider implements TokenProvider {
  constructor(
    private readonly token: string,
    private readonly expiresAt: Date = new Date(8640000000000000)
  ) {}

  async getToken(): Promise<AccessToken> {
    return { token: this.token, expiresAt: this.expiresAt };
  }

  async refreshToken(): Promise<void> {
    // Nothing to refresh; a rejected static token surfaces as ProviderRejected on retry
  }
}

export interface ClientCredentialsOptions {
  authorityUrl: string;
  tenantId: string;
  clientId: string;
  clientSecret: string;
  http?: AxiosInstance;
  logger: Logger;
  clock?: () => Date;
}

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

/** Tokens are treated as expired this long before the server says so */
const EXPIRY_BUFFER_MS = 60 * 1000;
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

/**
 * OAuth2 client-credentials grant against the Microsoft identity platform
 */
export class ClientCredentialsTokenProvider implements TokenProvider {
  private readonly http: AxiosInstance;
  private readonly clock: () => Date;
  private readonly cache = new Map<string, AccessToken>();
  private readonly inFlight = new Map<string, Promise<AccessToken>>();

  constructor(private readonly options: ClientCredentialsOptions) {
    this.http = options.http ?? axios.create({ timeout: 30000 });
    this.clock = options.clock ?? (() => new Date());
  }

  get tokenUrl(): string {
    return `${this.options.authorityUrl}/${encodeURIComponent(this.options.tenantId)}/oauth2/v2.0/token`;
  }

  async getToken(scope: string): Promise<AccessToken> {
    const cached = this.cache.get(scope);
    if (cached && this.clock().getTime() < cached.expiresAt.getTime() - EXPIRY_BUFFER_MS) {
      return cached;
    }

    const pending = this.inFlight.get(scope);
    if (pending) {
      return pending;
    }

    const request = this.requestToken(scope).finally(() => {
      this.inFlight.delete(scope);
    });
    this.inFlight.set(scope, request);
    return request;
  }

  async refreshToken(): Promise<void> {
    this.cache.clear();
    this.options.logger.debug('Cleared cached Graph access tokens');
  }

  private async requestToken(scope: string): Promise<AccessToken> {
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.options.clientId,
      client_secret: this.options.clientSecret,
      scope
    });

    try {
      const response = await this.http.post<TokenResponse>(this.tokenUrl, form);
      const accessToken = response.data.access_token;
      if (typeof accessToken !== 'string' || accessToken.length === 0) {
        throw new Error('token endpoint returned no access_token');
      }
      const expiresIn = response.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
      const token: AccessToken = {
        token: accessToken,
        expiresAt: new Date(this.clock().getTime() + expiresIn * 1000)
      };
      this.cache.set(scope, token);
      this.options.logger.info(`Obtained Graph access token (expires ${token.expiresAt.toISOString()})`);
      return token;
    } catch (error) {
      throw toRelayError(error, 'Token request');
    }
  }
}

/**
 * Build the token provider named by configuration
 */
export function createTokenProvider(auth: GraphAuthConfig, logger: Logger): TokenProvider {
  if (auth.mode === 'static') {
    if (!auth.token) {
      throw new ConfigError('graph.auth.token (or GRAPH_ACCESS_TOKEN) is required in static mode');
    }
    return new StaticTokenProvider(auth.token);
  }

  const { tenantId, clientId, clientSecret } = auth;
  if (!tenantId || !clientId || !clientSecret) {
    throw new ConfigError(
      'MICROSOFT_TENANT_ID, MICROSOFT_CLIENT_ID and MICROSOFT_CLIENT_SECRET are required for client credentials'
    );
  }
  return new ClientCredentialsTokenProvider({
    authorityUrl: auth.authorityUrl,
    tenantId,
    clientId,
    clientSecret,
    logger
  });
}
