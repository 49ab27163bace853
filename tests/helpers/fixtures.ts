import type { Express } from 'express';
import axios from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { DEFAULT_CONFIG } from '../../src/config/index.js';
import type { Config } from '../../src/config/index.js';
import { RelayError } from '../../src/middleware/error.js';
import type { CreateSubscriptionRequest, ProviderCallOptions, ProviderClient } from '../../src/services/provider-client.js';
import type { CanonicalEvent, ProviderSubscription, Subscription, TeamChannel } from '../../src/types/index.js';
import { createLogger } from '../../src/utils/logger.js';
import type { Logger, LogLevel } from '../../src/utils/logger.js';

export const T0 = new Date('2024-05-01T10:00:00.000Z');

export function minutesAfter(base: Date, minutes: number): Date {
  return new Date(base.getTime() + minutes * 60 * 1000);
}

export function makeSubscription(overrides: Partial<Subscription> = {}): Subscription {
  return {
    id: 'sub-1',
    account: 'user@example.com',
    resourceType: 'Email',
    resourcePath: "/users/user@example.com/mailFolders('Inbox')/messages",
    changeType: 'created,updated',
    notificationUrl: 'https://relay.example.com/webhooks/email',
    clientState: 'test-secret',
    status: 'Active',
    expiresAt: minutesAfter(T0, 60),
    renewedAt: T0,
    nextCheckAt: minutesAfter(T0, 48),
    createdAt: T0,
    updatedAt: T0,
    ...overrides
  };
}

/**
 * Logger that keeps every line for assertions
 */
export function captureLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: createLogger(level, (line) => lines.push(line)), lines };
}

/**
 * In-memory stand-in for the Graph /subscriptions API
 */
export class FakeProvider implements ProviderClient {
  readonly subscriptions = new Map<string, ProviderSubscription>();
  readonly calls: string[] = [];
  readonly createFailures: unknown[] = [];
  readonly renewFailures: unknown[] = [];
  readonly deleteFailures: unknown[] = [];
  /** Channels per team id, for listChannels */
  readonly channels = new Map<string, TeamChannel[]>();
  readonly renewOptions: (ProviderCallOptions | undefined)[] = [];
  private nextId = 0;

  async create(request: CreateSubscriptionRequest): Promise<ProviderSubscription> {
    this.calls.push(`create:${request.resource}`);
    const failure = this.createFailures.shift();
    if (failure !== undefined) throw failure;

    const subscription: ProviderSubscription = {
      id: `sub-${++this.nextId}`,
      resource: request.resource,
      changeType: request.changeType,
      notificationUrl: request.notificationUrl,
      expirationDateTime: request.expiresAt.toISOString(),
      clientState: request.clientState
    };
    this.subscriptions.set(subscription.id, subscription);
    return { ...subscription };
  }

  async renew(id: string, expiresAt: Date, options?: ProviderCallOptions): Promise<ProviderSubscription> {
    this.calls.push(`renew:${id}`);
    this.renewOptions.push(options);
    const failure = this.renewFailures.shift();
    if (failure !== undefined) throw failure;

    const existing = this.subscriptions.get(id);
    if (!existing) {
      throw RelayError.providerRejected(`Renew subscription ${id} failed with 404: not found`, 404);
    }
    existing.expirationDateTime = expiresAt.toISOString();
    return { ...existing };
  }

  async delete(id: string): Promise<void> {
    this.calls.push(`delete:${id}`);
    const failure = this.deleteFailures.shift();
    if (failure !== undefined) throw failure;
    this.subscriptions.delete(id);
  }

  async list(): Promise<ProviderSubscription[]> {
    this.calls.push('list');
    return [...this.subscriptions.values()].map((s) => ({ ...s }));
  }

  async listChannels(teamId: string): Promise<TeamChannel[]> {
    this.calls.push(`channels:${teamId}`);
    return [...(this.channels.get(teamId) ?? [])];
  }

  /** Register a subscription that exists upstream only */
  seed(subscription: ProviderSubscription): void {
    this.subscriptions.set(subscription.id, subscription);
  }
}

export interface RunningServer {
  url: string;
  close(): Promise<void>;
}

/**
 * Listen on an ephemeral port; for in-process stand-ins of remote services
 */
export function listen(app: Express): Promise<RunningServer> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (!address || typeof address === 'string') {
        reject(new Error('Server did not bind to a TCP port'));
        return;
      }
      resolve({
        url: `http://127.0.0.1:${address.port}`,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((err) => (err ? fail(err) : done()));
          })
      });
    });
    server.on('error', reject);
  });
}

export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('Timed out waiting for condition');
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

export function makeEvent(eventId: string, subscriptionId = 'sub-1'): CanonicalEvent {
  const event: CanonicalEvent = {
    eventId,
    subscriptionId,
    account: 'user@example.com',
    resourceType: 'Email',
    changeType: 'created',
    resourceId: `msg-${eventId}`,
    receivedAt: T0.toISOString(),
    rawPayload: Object.freeze({ subscriptionId, changeType: 'created', resource: `Messages/msg-${eventId}` })
  };
  return Object.freeze(event);
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return {
    ...DEFAULT_CONFIG,
    port: 0,
    database: ':memory:',
    logging: 'error',
    publicBaseUrl: 'https://relay.example.com',
    graph: {
      ...DEFAULT_CONFIG.graph,
      auth: { mode: 'static', token: 'test-token' },
      retry: { maxAttempts: 2, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 }
    },
    dispatcher: {
      ...DEFAULT_CONFIG.dispatcher,
      consumerUrl: 'http://consumer.test/events',
      shutdownGraceMs: 50,
      retry: { maxAttempts: 3, baseDelayMs: 1, maxDelayMs: 5, jitter: 0 }
    },
    ...overrides
  };
}

/**
 * Axios client whose requests never leave the process; posted bodies are recorded
 */
export function recordingHttp(): { http: AxiosInstance; posted: unknown[]; stall: (enabled: boolean) => void } {
  const posted: unknown[] = [];
  let stalled = false;

  const adapter = (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    if (stalled) {
      return new Promise((_resolve, reject) => {
        config.signal?.addEventListener?.('abort', () => reject(new Error('aborted')));
      });
    }
    posted.push(typeof config.data === 'string' ? JSON.parse(config.data) : config.data);
    return Promise.resolve({ data: {}, status: 200, statusText: 'OK', headers: {}, config });
  };

  return {
    http: axios.create({ adapter }),
    posted,
    stall: (enabled) => {
      stalled = enabled;
    }
  };
}
