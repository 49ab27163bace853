import axios, { AxiosInstance, Method } from 'axios';
import { RelayError, isRelayError } from '../middleware/error.js';
import type { ProviderSubscription, SubscriptionCreationParams, TeamChannel } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { RetryPolicy } from '../utils/retry.js';
import type { TokenProvider } from './token-provider.js';
import { toRelayError } from './http-errors.js';

export interface CreateSubscriptionRequest {
  resource: string;
  changeType: string;
  notificationUrl: string;
  clientState: string;
  expiresAt: Date;
}

export interface ProviderCallOptions {
  /**
   * Set false to make one attempt and leave retrying to the caller. A 401
   * still refreshes credentials once.
   */
  retry?: boolean;
}

/**
 * Upstream subscription operations. The Graph implementation talks HTTP;
 * tests substitute an in-memory fake.
 */
export interface ProviderClient {
  /** Resolves once the provider has completed the validation handshake */
  create(request: CreateSubscriptionRequest): Promise<ProviderSubscription>;
  renew(id: string, expiresAt: Date, options?: ProviderCallOptions): Promise<ProviderSubscription>;
  /** Deleting a subscription the provider no longer has is not an error */
  delete(id: string): Promise<void>;
  list(): Promise<ProviderSubscription[]>;
  listChannels(teamId: string): Promise<TeamChannel[]>;
}

export interface GraphProviderClientOptions {
  baseUrl: string;
  scope: string;
  tokens: TokenProvider;
  retryPolicy: RetryPolicy;
  logger: Logger;
  timeoutMs?: number;
  http?: AxiosInstance;
}

interface CollectionPage {
  value: unknown[];
  '@odata.nextLink'?: string;
}

/** Guards against a nextLink loop from a misbehaving upstream */
const MAX_LIST_PAGES = 50;

/**
 * Microsoft Graph /subscriptions client.
 *
 * 401 refreshes the bearer token once and repeats the call; 408, 429, 5xx and
 * network faults are retried by the retry policy, honoring Retry-After.
 */
export class GraphProviderClient implements ProviderClient {
  private readonly http: AxiosInstance;

  constructor(private readonly options: GraphProviderClientOptions) {
    this.http = options.http ?? axios.create({ timeout: options.timeoutMs ?? 30000 });
  }

  async create(request: CreateSubscriptionRequest): Promise<ProviderSubscription> {
    const body: SubscriptionCreationParams = {
      changeType: request.changeType,
      notificationUrl: request.notificationUrl,
      resource: request.resource,
      expirationDateTime: request.expiresAt.toISOString(),
      clientState: request.clientState,
      latestSupportedTlsVersion: 'v1_2'
    };
    const data = await this.request('POST', `${this.options.baseUrl}/subscriptions`, 'Create subscription', body);
    return parseSubscription(data, 'Create subscription');
  }

  async renew(id: string, expiresAt: Date, options: ProviderCallOptions = {}): Promise<ProviderSubscription> {
    const url = `${this.options.baseUrl}/subscriptions/${encodeURIComponent(id)}`;
    const action = `Renew subscription ${id}`;
    const body = { expirationDateTime: expiresAt.toISOString() };
    const data =
      options.retry === false
        ? await this.send('PATCH', url, action, body, true)
        : await this.request('PATCH', url, action, body);
    return parseSubscription(data, action);
  }

  async delete(id: string): Promise<void> {
    try {
      await this.request(
        'DELETE',
        `${this.options.baseUrl}/subscriptions/${encodeURIComponent(id)}`,
        `Delete subscription ${id}`
      );
    } catch (error) {
      if (isRelayError(error, 'providerRejected') && error.statusCode === 404) {
        this.options.logger.debug(`Subscription ${id} was already gone upstream`);
        return;
      }
      throw error;
    }
  }

  async list(): Promise<ProviderSubscription[]> {
    const items = await this.collect(`${this.options.baseUrl}/subscriptions`, 'List subscriptions');
    return items.map(item => parseSubscription(item, 'List subscriptions'));
  }

  async listChannels(teamId: string): Promise<TeamChannel[]> {
    const action = `List channels of team ${teamId}`;
    const items = await this.collect(
      `${this.options.baseUrl}/teams/${encodeURIComponent(teamId)}/channels?$select=id,displayName`,
      action
    );
    return items.map(item => parseChannel(item, action));
  }

  private async collect(firstUrl: string, action: string): Promise<unknown[]> {
    const items: unknown[] = [];
    let url: string | undefined = firstUrl;

    for (let page = 0; url && page < MAX_LIST_PAGES; page++) {
      const parsed = parsePage(await this.request('GET', url, action), action);
      items.push(...parsed.value);
      url = parsed['@odata.nextLink'];
    }

    return items;
  }

  private request(method: Method, url: string, action: string, body?: unknown): Promise<unknown> {
    return this.options.retryPolicy.execute(() => this.send(method, url, action, body, true), {
      delayHint: error => (isRelayError(error) ? error.retryAfterMs : undefined),
      onRetry: ({ attempt, error, delayMs }) => {
        const message = error instanceof Error ? error.message : String(error);
        this.options.logger.warn(`${action} attempt ${attempt} failed (${message}); retrying in ${delayMs}ms`);
      }
    });
  }

  private async send(
    method: Method,
    url: string,
    action: string,
    body: unknown,
    allowRefresh: boolean
  ): Promise<unknown> {
    const { token } = await this.options.tokens.getToken(this.options.scope);

    try {
      const response = await this.http.request<unknown>({
        method,
        url,
        data: body,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json'
        }
      });
      return response.data;
    } catch (error) {
      const relayError = toRelayError(error, action);
      if (relayError.kind !== 'unauthorized') {
        throw relayError;
      }
      if (allowRefresh) {
        this.options.logger.info(`${action} was rejected with 401; refreshing credentials`);
        await this.options.tokens.refreshToken();
        return this.send(method, url, action, body, false);
      }
      throw RelayError.providerRejected(`${relayError.message} (after credential refresh)`, 401, {
        cause: relayError
      });
    }
  }
}

function parseSubscription(data: unknown, action: string): ProviderSubscription {
  if (
    typeof data !== 'object' ||
    data === null ||
    !('id' in data) ||
    typeof data.id !== 'string' ||
    !('expirationDateTime' in data) ||
    typeof data.expirationDateTime !== 'string'
  ) {
    throw RelayError.transient(`${action} returned an unexpected body`);
  }

  return {
    id: data.id,
    expirationDateTime: data.expirationDateTime,
    resource: stringField(data, 'resource') ?? '',
    changeType: stringField(data, 'changeType') ?? '',
    notificationUrl: stringField(data, 'notificationUrl') ?? '',
    clientState: stringField(data, 'clientState') ?? null,
    applicationId: stringField(data, 'applicationId'),
    creatorId: stringField(data, 'creatorId')
  };
}

function parseChannel(data: unknown, action: string): TeamChannel {
  if (typeof data !== 'object' || data === null || !('id' in data) || typeof data.id !== 'string') {
    throw RelayError.transient(`${action} returned an unexpected body`);
  }
  const displayName = stringField(data, 'displayName');
  return displayName === undefined ? { id: data.id } : { id: data.id, displayName };
}

function parsePage(data: unknown, action: string): CollectionPage {
  if (typeof data !== 'object' || data === null || !('value' in data) || !Array.isArray(data.value)) {
    throw RelayError.transient(`${action} returned an unexpected body`);
  }
  const nextLink = stringField(data, '@odata.nextLink');
  return nextLink ? { value: data.value, '@odata.nextLink': nextLink } : { value: data.value };
}

function stringField(data: object, key: string): string | undefined {
  const value: unknown = Reflect.get(data, key);
  return typeof value === 'string' ? value : undefined;
}
