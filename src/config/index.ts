export {
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILE,
  DEFAULT_CHANGE_TYPES,
  WEBHOOK_PATHS,
  MAX_SUBSCRIPTION_LIFETIME_MINUTES
} from './types.js';
export type {
  Config,
  CliOptions,
  AdminAuthConfig,
  GraphAuthConfig,
  GraphConfig,
  RetryConfig,
  AccountTarget,
  SubscriptionsConfig,
  GatewayConfig,
  DispatcherConfig
} from './types.js';
export { loadConfig, validateConfig, ConfigError } from './loader.js';
export { writeSampleConfig } from './sample.js';
