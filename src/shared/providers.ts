import { z } from 'zod';
import fs from 'node:fs';
import { parse as yamlParse } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import type { ProviderSpec } from '../source/adapter.js';

const ProviderEntrySchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  strategy: z.string().optional(),
  // A mapping is kept as the JSON descriptor the resolver expects.
  element: z
    .union([z.string(), z.record(z.unknown())])
    .optional()
    .transform((el) => (el === undefined || typeof el === 'string' ? el : JSON.stringify(el))),
});

export const ProvidersFileSchema = z.object({
  providers: z.array(ProviderEntrySchema).default([]),
});

export function parseProvidersYaml(text: string, origin = '<inline>'): ProviderSpec[] {
  let raw: unknown;
  try {
    raw = yamlParse(text);
  } catch (err) {
    throw new ConfigError(`Providers file is not valid YAML: ${origin}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  const parsed = ProvidersFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid providers file: ${origin}`, {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  const seen = new Set<string>();
  for (const provider of parsed.data.providers) {
    const key = provider.name.toLowerCase();
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate provider name: ${provider.name}`, { origin });
    }
    seen.add(key);
  }

  return parsed.data.providers;
}

export function loadProviders(filePath: string): ProviderSpec[] {
  const resolved = resolvePath(filePath);
  if (!fs.existsSync(resolved)) {
    throw new ConfigError(`Providers file not found: ${resolved}`);
  }
  return parseProvidersYaml(fs.readFileSync(resolved, 'utf-8'), resolved);
}
