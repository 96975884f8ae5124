import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath, getFeedscoutDir } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const ConfigSchema = z.object({
  fetch: z
    .object({
      timeout_ms: z.number().int().positive().default(30000),
      min_interval_ms: z.number().nonnegative().default(1000),
      user_agent: z.string().default('feedscout/0.1 (+article discovery)'),
    })
    .default({}),

  discovery: z
    .object({
      concurrency: z.number().int().positive().default(3),
    })
    .default({}),

  schedule: z
    .object({
      cron: z.string().default('0 6 * * *'),
    })
    .default({}),

  telemetry: z
    .object({
      enabled: z.boolean().default(true),
    })
    .default({}),

  db: z
    .object({
      path: z.string().default('~/.feedscout/feedscout.db'),
    })
    .default({}),

  providers_file: z.string().default('~/.feedscout/providers.yaml'),
});

export type Config = z.infer<typeof ConfigSchema>;

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  const yaml = generateDefaultConfigYaml();
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml, 'utf-8');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('feedscout', {
    searchPlaces: [
      'feedscout.config.yaml',
      'feedscout.config.yml',
      '.feedscoutrc.yaml',
      '.feedscoutrc.yml',
    ],
  });

  const envConfigPath = process.env['FEEDSCOUT_CONFIG'];
  const defaultConfigPath = path.join(getFeedscoutDir(), 'config.yaml');

  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    const loaded: unknown = result?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else if (fs.existsSync(defaultConfigPath)) {
    const result = await explorer.load(defaultConfigPath);
    const loaded: unknown = result?.config;
    rawConfig = isRecord(loaded) ? loaded : {};
  } else {
    logger.debug('No config file found, using defaults');
  }

  applyEnvOverrides(rawConfig, process.env);

  const parsed = ConfigSchema.safeParse(rawConfig);
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * FEEDSCOUT_PROVIDERS and FEEDSCOUT_DB_PATH win over the file.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): void {
  const providersFile = env['FEEDSCOUT_PROVIDERS'];
  if (providersFile) {
    rawConfig['providers_file'] = providersFile;
  }

  const dbPath = env['FEEDSCOUT_DB_PATH'];
  if (dbPath) {
    const db = isRecord(rawConfig['db']) ? rawConfig['db'] : {};
    db['path'] = dbPath;
    rawConfig['db'] = db;
  }
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
