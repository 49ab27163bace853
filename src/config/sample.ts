import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_CONFIG } from './types.js';
import type { Config } from './types.js';

/**
 * Sample configuration written by `graph-webhook-relay init`.
 * Secrets are left out; they come from the environment.
 */
export function sampleConfig(): Config {
  return {
    ...DEFAULT_CONFIG,
    publicBaseUrl: 'https://relay.example.com',
    admin: { mode: 'static', tokens: ['change-me'] },
    graph: {
      ...DEFAULT_CONFIG.graph,
      auth: {
        mode: 'clientCredentials',
        authorityUrl: 'https://login.microsoftonline.com'
      }
    },
    subscriptions: {
      ...DEFAULT_CONFIG.subscriptions,
      targets: [
        { account: 'user@example.com', resourceType: 'Email' },
        { account: 'user@example.com', resourceType: 'TeamsChat' },
        {
          account: 'team-id',
          resourceType: 'TeamsChannel',
          resourcePath: '/teams/team-id/channels/channel-id/messages'
        },
        { account: 'other-team-id', resourceType: 'TeamsChannel', allChannels: true }
      ]
    }
  };
}

/**
 * Write the sample config; refuses to overwrite an existing file
 */
export function writeSampleConfig(filePath: string): string {
  const target = path.resolve(filePath);
  if (fs.existsSync(target)) {
    throw new Error(`${target} already exists`);
  }
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, JSON.stringify(sampleConfig(), null, 2) + '\n');
  return target;
}
