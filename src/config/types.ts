import type { LogLevel } from '../utils/logger.js';
import type { ResourceType } from '../types/index.js';

export interface AdminAuthConfig {
  mode: 'none' | 'static';
  tokens?: string[];
}

export type GraphAuthConfig =
  | { mode: 'static'; token?: string }
  | {
      mode: 'clientCredentials';
      tenantId?: string;
      clientId?: string;
      clientSecret?: string;
      authorityUrl: string;
    };

export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitter: number;
}

export interface GraphConfig {
  baseUrl: string;
  scope: string;
  timeoutMs: number;
  auth: GraphAuthConfig;
  retry: RetryConfig;
}

/**
 * One (account, resourceType) pair the relay keeps subscribed
 */
export interface AccountTarget {
  account: string;
  resourceType: ResourceType;
  resourcePath?: string;
  changeType?: string;
  /** TeamsChannel only: `account` is a team id and every channel of the team is subscribed */
  allChannels?: boolean;
}

export interface SubscriptionsConfig {
  lifetimeMinutes: number;
  /** Fraction of a subscription's lifetime left when renewal becomes due */
  renewalWindow: number;
  checkIntervalMs: number;
  retentionHours: number;
  renewalRetry: RetryConfig;
  targets: AccountTarget[];
}

export interface GatewayConfig {
  /** Largest notification body accepted, in body-parser notation ('4mb') */
  bodyLimit: string;
  dedupWindowMs: number;
  maxDedupEntries: number;
}

export interface DispatcherConfig {
  consumerUrl: string;
  consumerApiKey?: string;
  queueCapacity: number;
  concurrency: number;
  enqueueTimeoutMs: number;
  requestTimeoutMs: number;
  shutdownGraceMs: number;
  retry: RetryConfig;
}

export interface Config {
  port: number;
  database: string;
  logging: LogLevel;
  /** Public base URL Graph calls back, e.g. https://relay.example.com */
  publicBaseUrl: string;
  admin: AdminAuthConfig;
  graph: GraphConfig;
  subscriptions: SubscriptionsConfig;
  gateway: GatewayConfig;
  dispatcher: DispatcherConfig;
}

export interface CliOptions {
  port?: number;
  database?: string;
  logging?: LogLevel;
  publicBaseUrl?: string;
  consumerUrl?: string;
  configFile?: string;
}

/** Graph caps mail and chat message subscriptions well above this; the relay keeps them to a day */
export const MAX_SUBSCRIPTION_LIFETIME_MINUTES = 24 * 60;

export const WEBHOOK_PATHS: Record<ResourceType, string> = {
  Email: '/webhooks/email',
  TeamsChat: '/webhooks/teams/chat',
  TeamsChannel: '/webhooks/teams/channel'
};

export const DEFAULT_CHANGE_TYPES: Record<ResourceType, string> = {
  Email: 'created,updated',
  TeamsChat: 'created',
  TeamsChannel: 'created'
};

export const DEFAULT_CONFIG_FILE = './relay.config.json';

export const DEFAULT_CONFIG: Config = {
  port: 8000,
  database: './relay.db',
  logging: 'info',
  publicBaseUrl: 'http://localhost:8000',
  admin: { mode: 'none' },
  graph: {
    baseUrl: 'https://graph.microsoft.com/v1.0',
    scope: 'https://graph.microsoft.com/.default',
    timeoutMs: 30000,
    auth: {
      mode: 'clientCredentials',
      authorityUrl: 'https://login.microsoftonline.com'
    },
    retry: { maxAttempts: 4, baseDelayMs: 500, maxDelayMs: 30000, jitter: 0.2 }
  },
  subscriptions: {
    lifetimeMinutes: MAX_SUBSCRIPTION_LIFETIME_MINUTES,
    renewalWindow: 0.2,
    checkIntervalMs: 60000,
    retentionHours: 72,
    renewalRetry: { maxAttempts: 5, baseDelayMs: 2000, maxDelayMs: 300000, jitter: 0.2 },
    targets: []
  },
  gateway: {
    bodyLimit: '4mb',
    dedupWindowMs: 10 * 60 * 1000,
    maxDedupEntries: 10000
  },
  dispatcher: {
    consumerUrl: 'http://localhost:7860/api/v1/webhook',
    queueCapacity: 1000,
    concurrency: 4,
    enqueueTimeoutMs: 2000,
    requestTimeoutMs: 30000,
    shutdownGraceMs: 10000,
    retry: { maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 30000, jitter: 0.2 }
  }
};
