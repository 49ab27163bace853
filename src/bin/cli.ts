#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import { VERSION } from '../server.js';
import { DEFAULT_CONFIG_FILE } from '../config/types.js';
import { loadConfig } from '../config/loader.js';
import { writeSampleConfig } from '../config/sample.js';
import { createRelayServer } from '../server.js';
import { createDatabase } from '../services/database.js';
import { SubscriptionStore } from '../services/subscription-store.js';
import { isLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import { isSubscriptionStatus } from '../types/index.js';
import type { Subscription, SubscriptionStatus } from '../types/index.js';

interface ServeOptions {
  port?: number;
  database?: string;
  logging?: LogLevel;
  config?: string;
  publicUrl?: string;
  consumerUrl?: string;
}

interface ListOptions {
  database?: string;
  config?: string;
  status?: SubscriptionStatus;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Logging level must be one of debug, info, warn, error.');
  }
  return value;
}

function parseStatus(value: string): SubscriptionStatus {
  if (!isSubscriptionStatus(value)) {
    throw new InvalidArgumentError('Status must be one of Pending, Active, Expiring, Expired, Failed.');
  }
  return value;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Start the relay and stop it cleanly on SIGINT/SIGTERM
 */
async function serveCommand(options: ServeOptions): Promise<void> {
  const config = loadConfig({
    port: options.port,
    database: options.database,
    logging: options.logging,
    publicBaseUrl: options.publicUrl,
    consumerUrl: options.consumerUrl,
    configFile: options.config
  });

  const server = createRelayServer(config);
  await server.start();

  let stopping = false;
  const shutdown = (signal: string): void => {
    if (stopping) {
      return;
    }
    stopping = true;
    console.log(`\nReceived ${signal}, shutting down relay...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error(`Shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

/**
 * Write a sample configuration file
 */
function initCommand(file: string | undefined): void {
  const written = writeSampleConfig(file ?? DEFAULT_CONFIG_FILE);
  console.log(`Created: ${written}`);
  console.log('\nSet MICROSOFT_TENANT_ID, MICROSOFT_CLIENT_ID and MICROSOFT_CLIENT_SECRET, then run:');
  console.log('  graph-webhook-relay');
}

function formatSubscriptionLine(subscription: Subscription): string {
  return [
    subscription.id,
    subscription.status.padEnd(8),
    subscription.resourceType.padEnd(12),
    subscription.account,
    `expires ${subscription.expiresAt.toISOString()}`,
    subscription.lastError ? `(${subscription.lastError})` : ''
  ]
    .join('  ')
    .trimEnd();
}

/**
 * Print stored subscriptions without starting the relay
 */
function listCommand(options: ListOptions): void {
  const config = loadConfig({ database: options.database, configFile: options.config });
  const db = createDatabase(config.database);
  try {
    const subscriptions = new SubscriptionStore(db.raw).list(options.status ? { status: options.status } : {});
    if (subscriptions.length === 0) {
      console.log('No subscriptions stored.');
      return;
    }
    for (const subscription of subscriptions) {
      console.log(formatSubscriptionLine(subscription));
    }
  } finally {
    db.close();
  }
}

/**
 * Main CLI program
 */
const program = new Command();

program
  .name('graph-webhook-relay')
  .version(VERSION)
  .description('Relay Microsoft Graph change notifications to a downstream consumer')
  // -d and -c after a subcommand name belong to the subcommand
  .enablePositionalOptions()
  .option('-p, --port <number>', 'Server port', parsePort)
  .option('-d, --database <path>', 'Database file path')
  .option('-l, --logging <level>', 'Logging level (debug|info|warn|error)', parseLogLevel)
  .option('-c, --config <path>', 'Configuration file path')
  .option('--public-url <url>', 'Public base URL Graph calls back')
  .option('--consumer-url <url>', 'Downstream consumer URL')
  .action(async () => {
    try {
      await serveCommand(program.opts<ServeOptions>());
    } catch (error) {
      console.error(`Failed to start relay: ${describeError(error)}`);
      process.exit(1);
    }
  });

program
  .command('init [file]')
  .description('Write a sample relay.config.json')
  .action((file: string | undefined) => {
    try {
      initCommand(file);
    } catch (error) {
      console.error(describeError(error));
      process.exit(1);
    }
  });

program
  .command('subscriptions')
  .description('Print the subscriptions stored in the database')
  .option('-d, --database <path>', 'Database file path')
  .option('-c, --config <path>', 'Configuration file path')
  .option('-s, --status <status>', 'Only show subscriptions in this status', parseStatus)
  .action((options: ListOptions) => {
    try {
      listCommand(options);
    } catch (error) {
      console.error(describeError(error));
      process.exit(1);
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exit(1);
});
