import * as fs from 'fs';
import {
  Config,
  CliOptions,
  GraphAuthConfig,
  RetryConfig,
  AccountTarget,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  MAX_SUBSCRIPTION_LIFETIME_MINUTES
} from './types.js';
import { isLogLevel } from '../utils/logger.js';
import { isResourceType } from '../types/index.js';

type Env = Record<string, string | undefined>;

type FileConfig = Partial<Omit<Config, 'graph' | 'subscriptions' | 'gateway' | 'dispatcher'>> & {
  graph?: Partial<Omit<Config['graph'], 'retry'>> & { retry?: Partial<RetryConfig> };
  subscriptions?: Partial<Omit<Config['subscriptions'], 'renewalRetry'>> & {
    renewalRetry?: Partial<RetryConfig>;
  };
  gateway?: Partial<Config['gateway']>;
  dispatcher?: Partial<Omit<Config['dispatcher'], 'retry'>> & { retry?: Partial<RetryConfig> };
};

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Merge order: defaults < config file < environment < CLI options
 */
export function loadConfig(options: CliOptions = {}, env: Env = process.env): Config {
  let fileConfig: FileConfig = {};

  const configPath = options.configFile || DEFAULT_CONFIG_FILE;
  if (fs.existsSync(configPath)) {
    const content = fs.readFileSync(configPath, 'utf-8');
    try {
      fileConfig = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Config file ${configPath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
  } else if (options.configFile) {
    throw new ConfigError(`Config file ${configPath} does not exist`);
  }

  const defaults = DEFAULT_CONFIG;
  const envLifetime = env.SUBSCRIPTION_EXPIRATION_HOURS
    ? Number(env.SUBSCRIPTION_EXPIRATION_HOURS) * 60
    : undefined;
  const envAdminTokens = env.ADMIN_TOKENS
    ? env.ADMIN_TOKENS.split(',').map(t => t.trim()).filter(Boolean)
    : undefined;

  const config: Config = {
    port: options.port ?? numberFromEnv(env.PORT) ?? fileConfig.port ?? defaults.port,
    database: options.database ?? env.RELAY_DATABASE ?? fileConfig.database ?? defaults.database,
    logging: options.logging ?? logLevelFromEnv(env.LOG_LEVEL) ?? fileConfig.logging ?? defaults.logging,
    publicBaseUrl: stripTrailingSlash(
      options.publicBaseUrl ?? env.WEBHOOK_BASE_URL ?? fileConfig.publicBaseUrl ?? defaults.publicBaseUrl
    ),
    admin: envAdminTokens
      ? { mode: 'static', tokens: envAdminTokens }
      : fileConfig.admin ?? defaults.admin,
    graph: {
      baseUrl: stripTrailingSlash(fileConfig.graph?.baseUrl ?? defaults.graph.baseUrl),
      scope: fileConfig.graph?.scope ?? defaults.graph.scope,
      timeoutMs: fileConfig.graph?.timeoutMs ?? defaults.graph.timeoutMs,
      auth: mergeGraphAuth(fileConfig.graph?.auth ?? defaults.graph.auth, env),
      retry: { ...defaults.graph.retry, ...fileConfig.graph?.retry }
    },
    subscriptions: {
      lifetimeMinutes:
        envLifetime ?? fileConfig.subscriptions?.lifetimeMinutes ?? defaults.subscriptions.lifetimeMinutes,
      renewalWindow: fileConfig.subscriptions?.renewalWindow ?? defaults.subscriptions.renewalWindow,
      checkIntervalMs: fileConfig.subscriptions?.checkIntervalMs ?? defaults.subscriptions.checkIntervalMs,
      retentionHours: fileConfig.subscriptions?.retentionHours ?? defaults.subscriptions.retentionHours,
      renewalRetry: { ...defaults.subscriptions.renewalRetry, ...fileConfig.subscriptions?.renewalRetry },
      targets: fileConfig.subscriptions?.targets ?? defaults.subscriptions.targets
    },
    gateway: { ...defaults.gateway, ...fileConfig.gateway },
    dispatcher: {
      ...defaults.dispatcher,
      ...fileConfig.dispatcher,
      consumerUrl:
        options.consumerUrl ?? env.CONSUMER_URL ?? fileConfig.dispatcher?.consumerUrl ?? defaults.dispatcher.consumerUrl,
      consumerApiKey: env.CONSUMER_API_KEY ?? fileConfig.dispatcher?.consumerApiKey,
      retry: { ...defaults.dispatcher.retry, ...fileConfig.dispatcher?.retry }
    }
  };

  validateConfig(config);
  return config;
}

function mergeGraphAuth(base: GraphAuthConfig, env: Env): GraphAuthConfig {
  if (env.GRAPH_ACCESS_TOKEN) {
    return { mode: 'static', token: env.GRAPH_ACCESS_TOKEN };
  }
  if (base.mode === 'static') {
    return base;
  }
  return {
    mode: 'clientCredentials',
    authorityUrl: stripTrailingSlash(base.authorityUrl ?? 'https://login.microsoftonline.com'),
    tenantId: env.MICROSOFT_TENANT_ID ?? base.tenantId,
    clientId: env.MICROSOFT_CLIENT_ID ?? base.clientId,
    clientSecret: env.MICROSOFT_CLIENT_SECRET ?? base.clientSecret
  };
}

/**
 * Throws ConfigError describing the first invalid setting
 */
export function validateConfig(config: Config): void {
  requireInteger('port', config.port, 0, 65535);
  if (!isLogLevel(config.logging)) {
    throw new ConfigError(`logging must be one of debug, info, warn, error (got ${String(config.logging)})`);
  }
  requireUrl('publicBaseUrl', config.publicBaseUrl);
  requireUrl('graph.baseUrl', config.graph.baseUrl);
  requireUrl('dispatcher.consumerUrl', config.dispatcher.consumerUrl);

  if (config.admin.mode !== 'none' && config.admin.mode !== 'static') {
    throw new ConfigError(`admin.mode must be none or static`);
  }
  if (config.graph.auth.mode !== 'static' && config.graph.auth.mode !== 'clientCredentials') {
    throw new ConfigError('graph.auth.mode must be static or clientCredentials');
  }

  requireInteger(
    'subscriptions.lifetimeMinutes',
    config.subscriptions.lifetimeMinutes,
    1,
    MAX_SUBSCRIPTION_LIFETIME_MINUTES
  );
  const renewalWindow = config.subscriptions.renewalWindow;
  if (typeof renewalWindow !== 'number' || !(renewalWindow > 0 && renewalWindow < 1)) {
    throw new ConfigError('subscriptions.renewalWindow must be a fraction between 0 and 1');
  }
  requireInteger('subscriptions.checkIntervalMs', config.subscriptions.checkIntervalMs, 1);
  requireNumber('subscriptions.retentionHours', config.subscriptions.retentionHours, 0);
  validateRetry('graph.retry', config.graph.retry);
  validateRetry('subscriptions.renewalRetry', config.subscriptions.renewalRetry);
  validateRetry('dispatcher.retry', config.dispatcher.retry);
  config.subscriptions.targets.forEach((target, index) => validateTarget(target, index));

  if (typeof config.gateway.bodyLimit !== 'string' || !/^\d+(b|kb|mb)$/i.test(config.gateway.bodyLimit)) {
    throw new ConfigError(`gateway.bodyLimit must be a size such as 512kb or 4mb`);
  }
  requireInteger('gateway.dedupWindowMs', config.gateway.dedupWindowMs, 0);
  requireInteger('gateway.maxDedupEntries', config.gateway.maxDedupEntries, 1);
  requireInteger('dispatcher.queueCapacity', config.dispatcher.queueCapacity, 1);
  requireInteger('dispatcher.concurrency', config.dispatcher.concurrency, 1);
  requireInteger('dispatcher.enqueueTimeoutMs', config.dispatcher.enqueueTimeoutMs, 0);
  requireInteger('dispatcher.requestTimeoutMs', config.dispatcher.requestTimeoutMs, 1);
  requireInteger('dispatcher.shutdownGraceMs', config.dispatcher.shutdownGraceMs, 0);
}

function validateTarget(target: AccountTarget, index: number): void {
  const label = `subscriptions.targets[${index}]`;
  if (typeof target.account !== 'string' || target.account.length === 0) {
    throw new ConfigError(`${label}.account is required`);
  }
  if (!isResourceType(target.resourceType)) {
    throw new ConfigError(`${label}.resourceType must be Email, TeamsChat or TeamsChannel`);
  }
  if (target.allChannels !== undefined && typeof target.allChannels !== 'boolean') {
    throw new ConfigError(`${label}.allChannels must be a boolean`);
  }
  if (target.allChannels && target.resourceType !== 'TeamsChannel') {
    throw new ConfigError(`${label}.allChannels only applies to TeamsChannel targets`);
  }
  if (target.allChannels && target.resourcePath) {
    throw new ConfigError(`${label} cannot set both resourcePath and allChannels`);
  }
  if (target.resourceType === 'TeamsChannel' && !target.resourcePath && !target.allChannels) {
    throw new ConfigError(`${label} needs resourcePath or allChannels for TeamsChannel targets`);
  }
}

function validateRetry(name: string, retry: RetryConfig): void {
  requireInteger(`${name}.maxAttempts`, retry.maxAttempts, 1);
  requireNumber(`${name}.baseDelayMs`, retry.baseDelayMs, 0);
  requireNumber(`${name}.maxDelayMs`, retry.maxDelayMs, 0);
  requireNumber(`${name}.jitter`, retry.jitter, 0, 1);
}

function requireNumber(name: string, value: unknown, min?: number, max?: number): void {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ConfigError(`${name} must be a number`);
  }
  if (min !== undefined && value < min) {
    throw new ConfigError(`${name} must be at least ${min}`);
  }
  if (max !== undefined && value > max) {
    throw new ConfigError(`${name} must be at most ${max}`);
  }
}

function requireInteger(name: string, value: unknown, min?: number, max?: number): void {
  requireNumber(name, value, min, max);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${name} must be an integer`);
  }
}

function requireUrl(name: string, value: unknown): void {
  if (typeof value !== 'string') {
    throw new ConfigError(`${name} must be a URL`);
  }
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${name} is not a valid URL: ${value}`);
  }
}

function numberFromEnv(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

function logLevelFromEnv(value: string | undefined): Config['logging'] | undefined {
  return isLogLevel(value) ? value : undefined;
}

function stripTrailingSlash(url: string): string {
  return url.replace(/\/+$/, '');
}
