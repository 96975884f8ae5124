import { describe, it, expect, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import {
  ConfigSchema,
  applyEnvOverrides,
  generateDefaultConfig,
  generateDefaultConfigYaml,
  loadConfig,
  resetConfigCache,
} from '../config.js';
import { ConfigError } from '../errors.js';

describe('ConfigSchema', () => {
  it('produces valid defaults from empty object', () => {
    const result = ConfigSchema.safeParse({});
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.fetch.timeout_ms).toBe(30000);
      expect(result.data.fetch.min_interval_ms).toBe(1000);
      expect(result.data.discovery.concurrency).toBe(3);
      expect(result.data.schedule.cron).toBe('0 6 * * *');
      expect(result.data.telemetry.enabled).toBe(true);
      expect(result.data.db.path).toBe('~/.feedscout/feedscout.db');
      expect(result.data.providers_file).toBe('~/.feedscout/providers.yaml');
    }
  });

  it('accepts valid overrides', () => {
    const result = ConfigSchema.safeParse({
      fetch: { min_interval_ms: 250 },
      discovery: { concurrency: 8 },
    });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.fetch.min_interval_ms).toBe(250);
      expect(result.data.discovery.concurrency).toBe(8);
      // defaults still apply for other fields
      expect(result.data.fetch.timeout_ms).toBe(30000);
    }
  });

  it('rejects invalid types', () => {
    expect(ConfigSchema.safeParse({ fetch: { timeout_ms: 'soon' } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ discovery: { concurrency: 0 } }).success).toBe(false);
  });
});

describe('generateDefaultConfig', () => {
  it('returns a full Config object', () => {
    const config = generateDefaultConfig();
    expect(config.fetch.user_agent).toBe('feedscout/0.1 (+article discovery)');
    expect(config.telemetry.enabled).toBe(true);
  });
});

describe('generateDefaultConfigYaml', () => {
  it('returns a YAML string', () => {
    const yaml = generateDefaultConfigYaml();
    expect(yaml).toContain('min_interval_ms: 1000');
    expect(yaml).toContain('providers_file:');
    expect(yaml).toContain('.feedscout/providers.yaml');
  });
});

describe('applyEnvOverrides', () => {
  it('overrides the providers file and database path', () => {
    const raw: Record<string, unknown> = { db: { path: '/from/file.db' } };
    applyEnvOverrides(raw, { FEEDSCOUT_PROVIDERS: '/tmp/providers.yaml', FEEDSCOUT_DB_PATH: ':memory:' });
    expect(raw).toEqual({ providers_file: '/tmp/providers.yaml', db: { path: ':memory:' } });
  });

  it('leaves the config alone without variables', () => {
    const raw: Record<string, unknown> = {};
    applyEnvOverrides(raw, {});
    expect(raw).toEqual({});
  });
});

describe('loadConfig', () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
    resetConfigCache();
  });

  function writeConfig(contents: string): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feedscout-config-'));
    const file = path.join(dir, 'config.yaml');
    fs.writeFileSync(file, contents, 'utf-8');
    return file;
  }

  it('reads the file named by FEEDSCOUT_CONFIG', async () => {
    process.env['FEEDSCOUT_CONFIG'] = writeConfig('fetch:\n  min_interval_ms: 50\n');
    const config = await loadConfig(true);
    expect(config.fetch.min_interval_ms).toBe(50);
    expect(config.fetch.timeout_ms).toBe(30000);
  });

  it('applies environment overrides on top of the file', async () => {
    process.env['FEEDSCOUT_CONFIG'] = writeConfig('db:\n  path: /var/lib/feedscout.db\n');
    process.env['FEEDSCOUT_DB_PATH'] = ':memory:';
    const config = await loadConfig(true);
    expect(config.db.path).toBe(':memory:');
  });

  it('caches the loaded config', async () => {
    process.env['FEEDSCOUT_CONFIG'] = writeConfig('discovery:\n  concurrency: 5\n');
    const first = await loadConfig(true);
    expect(await loadConfig()).toBe(first);
  });

  it('rejects a missing config file', async () => {
    process.env['FEEDSCOUT_CONFIG'] = '/nonexistent/feedscout.yaml';
    await expect(loadConfig(true)).rejects.toThrow(ConfigError);
  });

  it('rejects invalid values', async () => {
    process.env['FEEDSCOUT_CONFIG'] = writeConfig('fetch:\n  timeout_ms: -1\n');
    await expect(loadConfig(true)).rejects.toThrow('Invalid configuration');
  });
});
