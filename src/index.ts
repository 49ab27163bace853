// Re-export server components
export { VERSION, createRelayServer } from './server.js';
export type { RelayServer, RelayComponents, RelayServerOverrides } from './server.js';
export { loadConfig, validateConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js';
export type { Config, CliOptions, AccountTarget } from './config/index.js';
export { RelayError, isRelayError } from './middleware/error.js';
export type { ErrorKind } from './middleware/error.js';
export {
  SubscriptionManager,
  ALL_CHANNELS_PATH,
  channelMessagesPath,
  computeNextCheck,
  defaultResourcePath
} from './services/subscription-manager.js';
export { NotificationGateway } from './services/gateway.js';
export type { BatchResult } from './services/gateway.js';
export { Dispatcher } from './services/dispatcher.js';
export type { DispatcherStats } from './services/dispatcher.js';
export { GraphProviderClient } from './services/provider-client.js';
export type { ProviderClient, ProviderCallOptions, CreateSubscriptionRequest } from './services/provider-client.js';
export { ClientCredentialsTokenProvider, StaticTokenProvider } from './services/token-provider.js';
export type { TokenProvider, AccessToken } from './services/token-provider.js';
export * from './utils/index.js';
export * from './types/index.js';
