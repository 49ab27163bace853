import express, { Express, Request, Response } from 'express';
import { Server } from 'http';
import type { AxiosInstance } from 'axios';
import { Config } from './config/index.js';
import { Database, createDatabase } from './services/database.js';
import { SubscriptionStore } from './services/subscription-store.js';
import { GraphProviderClient, ProviderClient } from './services/provider-client.js';
import { TokenProvider, createTokenProvider } from './services/token-provider.js';
import { SubscriptionManager } from './services/subscription-manager.js';
import { DedupCache } from './services/dedup-cache.js';
import { Dispatcher } from './services/dispatcher.js';
import { NotificationGateway } from './services/gateway.js';
import { createAdminAuthMiddleware } from './middleware/auth.js';
import { createErrorHandler, errorMessage, isTransient, notFoundHandler } from './middleware/error.js';
import { createWebhooksRouter } from './routes/webhooks.js';
import { createAdminRouter } from './routes/admin.js';
import { Logger, createLogger } from './utils/logger.js';
import { Poller, createIntervalPoller } from './utils/poller.js';
import { RetryPolicy } from './utils/retry.js';
import type { RetryConfig } from './config/index.js';

export const VERSION = '1.0.0';

/**
 * Relay server instance
 */
export interface RelayServer {
  app: Express;
  components: RelayComponents;
  start(): Promise<void>;
  stop(): Promise<void>;
  getPort(): number;
}

export interface RelayComponents {
  db: Database;
  store: SubscriptionStore;
  provider: ProviderClient;
  manager: SubscriptionManager;
  dedup: DedupCache;
  dispatcher: Dispatcher;
  gateway: NotificationGateway;
  logger: Logger;
}

/**
 * Replacements for collaborators that would otherwise be built from config
 */
export interface RelayServerOverrides {
  provider?: ProviderClient;
  tokens?: TokenProvider;
  logger?: Logger;
  clock?: () => Date;
  /** HTTP client for deliveries to the consumer */
  consumerHttp?: AxiosInstance;
  /** Skip reconciliation and configured-target creation in start() */
  skipStartupSync?: boolean;
}

function retryPolicy(config: RetryConfig): RetryPolicy {
  return new RetryPolicy({ ...config, isRetryable: isTransient });
}

/**
 * Create and configure the Express application and every relay component
 */
export function createRelayServer(config: Config, overrides: RelayServerOverrides = {}): RelayServer {
  const logger = overrides.logger ?? createLogger(config.logging);
  const clock = overrides.clock ?? (() => new Date());

  const db = createDatabase(config.database);
  const store = new SubscriptionStore(db.raw);

  const provider =
    overrides.provider ??
    new GraphProviderClient({
      baseUrl: config.graph.baseUrl,
      scope: config.graph.scope,
      tokens: overrides.tokens ?? createTokenProvider(config.graph.auth, logger.scoped('auth')),
      retryPolicy: retryPolicy(config.graph.retry),
      logger: logger.scoped('graph'),
      timeoutMs: config.graph.timeoutMs
    });

  const manager = new SubscriptionManager({
    store,
    provider,
    logger: logger.scoped('subscriptions'),
    publicBaseUrl: config.publicBaseUrl,
    lifetimeMinutes: config.subscriptions.lifetimeMinutes,
    renewalWindow: config.subscriptions.renewalWindow,
    retentionHours: config.subscriptions.retentionHours,
    renewalRetry: retryPolicy(config.subscriptions.renewalRetry),
    targets: config.subscriptions.targets,
    clock
  });

  const dispatcher = new Dispatcher({
    consumerUrl: config.dispatcher.consumerUrl,
    consumerApiKey: config.dispatcher.consumerApiKey,
    queueCapacity: config.dispatcher.queueCapacity,
    concurrency: config.dispatcher.concurrency,
    enqueueTimeoutMs: config.dispatcher.enqueueTimeoutMs,
    requestTimeoutMs: config.dispatcher.requestTimeoutMs,
    retryPolicy: retryPolicy(config.dispatcher.retry),
    logger: logger.scoped('dispatcher'),
    http: overrides.consumerHttp
  });

  const dedup = new DedupCache(config.gateway.dedupWindowMs, config.gateway.maxDedupEntries, () =>
    clock().getTime()
  );

  const gateway = new NotificationGateway({
    store,
    sink: dispatcher,
    dedup,
    logger: logger.scoped('gateway'),
    clock
  });

  const renewalPoller: Poller = createIntervalPoller(
    'Renewal loop',
    async () => {
      await manager.runRenewalCycle();
    },
    config.subscriptions.checkIntervalMs,
    logger
  );

  const app = express();
  let server: Server | null = null;
  let boundPort = config.port;

  app.use(express.json({ limit: config.gateway.bodyLimit }));
  app.use(express.text({ limit: config.gateway.bodyLimit }));

  // Logging middleware (if not in 'error' mode)
  if (config.logging !== 'error') {
    app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        logger.info(`${req.method} ${req.path} ${res.statusCode} ${duration}ms`);
      });
      next();
    });
  }

  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      version: VERSION
    });
  });

  app.use(createWebhooksRouter(gateway));
  app.use(
    '/admin',
    createAdminAuthMiddleware(config.admin),
    createAdminRouter({ manager, dispatcherStats: () => dispatcher.stats() })
  );

  // 404 handler for unmatched routes
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(createErrorHandler(logger));

  const startupSync = async (): Promise<void> => {
    try {
      await manager.reconcile();
    } catch (error) {
      logger.error(`Startup reconciliation failed: ${errorMessage(error)}`);
    }
    const { failed } = await manager.ensureConfigured();
    if (failed.length > 0) {
      logger.warn(`${failed.length} configured target(s) have no live subscription yet`);
    }
  };

  const relayServer: RelayServer = {
    app,
    components: { db, store, provider, manager, dedup, dispatcher, gateway, logger },

    async start(): Promise<void> {
      await new Promise<void>((resolve, reject) => {
        const listening = app.listen(config.port, () => {
          const address = listening.address();
          if (address && typeof address === 'object') {
            boundPort = address.port;
          }
          logger.info(`Graph webhook relay listening on port ${boundPort}`);
          resolve();
        });
        server = listening;

        listening.on('error', (error: NodeJS.ErrnoException) => {
          if (error.code === 'EADDRINUSE') {
            reject(new Error(`Port ${config.port} is already in use`));
          } else {
            reject(error);
          }
        });
      });

      // The listener has to be up first: the provider calls back during creation
      if (!overrides.skipStartupSync) {
        await startupSync();
      }
      renewalPoller.start();
    },

    async stop(): Promise<void> {
      await renewalPoller.stop();

      const listening = server;
      if (listening) {
        await new Promise<void>((resolve, reject) => {
          listening.close((err) => {
            if (err) {
              reject(err);
            } else {
              resolve();
            }
          });
        });
        server = null;
      }

      const abandoned = await dispatcher.stop(config.dispatcher.shutdownGraceMs);
      if (abandoned > 0) {
        logger.warn(`Abandoned ${abandoned} undelivered event(s) at shutdown`);
      }

      db.close();
      logger.info('Graph webhook relay stopped');
    },

    getPort(): number {
      return boundPort;
    }
  };

  return relayServer;
}
