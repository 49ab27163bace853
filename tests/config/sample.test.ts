import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig } from '../../src/config/index.js';
import { writeSampleConfig } from '../../src/config/sample.js';
import * as fs from 'fs';
import * as path from 'path';

describe('writeSampleConfig', () => {
  const testDir = './test-tmp-sample';
  const configPath = path.join(testDir, 'relay.config.json');

  afterEach(() => {
    fs.rmSync(testDir, { recursive: true, force: true });
  });

  it('writes a config the loader accepts', () => {
    const written = writeSampleConfig(configPath);
    expect(written).toBe(path.resolve(configPath));

    const config = loadConfig({ configFile: configPath }, {});
    expect(config.publicBaseUrl).toBe('https://relay.example.com');
    expect(config.admin).toEqual({ mode: 'static', tokens: ['change-me'] });
    expect(config.subscriptions.targets.map((t) => t.resourceType)).toEqual(['Email', 'TeamsChat', 'TeamsChannel', 'TeamsChannel']);
  });

  it('refuses to overwrite an existing file', () => {
    writeSampleConfig(configPath);
    expect(() => writeSampleConfig(configPath)).toThrow(`${path.resolve(configPath)} already exists`);
  });
});
