import { z } from 'zod';
import { cosmiconfig } from 'cosmiconfig';
import fs from 'node:fs';
import path from 'node:path';
import { stringify as yamlStringify } from 'yaml';
import { resolvePath } from './utils.js';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';

export const CONFIG_FILE_NAME = 'npo-feed.config.yaml';

export const ConfigSchema = z.object({
  source: z
    .object({
      url: z.string().url().default('https://npo.nl/'),
      user_agent: z
        .string()
        .default(
          'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36',
        ),
      // 0 disables the timeout
      timeout_ms: z.number().int().min(0).default(0),
    })
    .default({}),

  extract: z
    .object({
      description_tokens: z.array(z.string().min(1)).default(['desc', 'summary', 'text']),
      new_marker: z.string().min(1).default('nieuw'),
      default_description: z.string().default('Programma op NPO'),
    })
    .default({}),

  feed: z
    .object({
      title: z.string().default("NPO Nieuwe Programma's"),
      description: z.string().default("Een RSS feed van nieuwe en recente programma's op NPO"),
      link: z.string().url().default('https://npo.nl/start'),
      language: z.string().default('nl'),
      output_path: z.string().default('npo_new_programs.xml'),
      max_items: z.number().int().positive().default(20),
      new_prefix: z.string().default('NIEUW: '),
      image_type: z.string().default('image/jpeg'),
    })
    .default({}),

  cache: z
    .object({
      path: z.string().default('npo_programs_cache.json'),
      ttl_seconds: z.number().positive().default(3600),
    })
    .default({}),

  schedule: z
    .object({
      update_cron: z.string().default('0 * * * *'),
    })
    .default({}),

  server: z
    .object({
      port: z.number().int().default(8000),
      host: z.string().default('0.0.0.0'),
    })
    .default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SourceConfig = Config['source'];
export type ExtractConfig = Config['extract'];
export type FeedConfig = Config['feed'];
export type CacheConfig = Config['cache'];

let cachedConfig: Config | null = null;

export function generateDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

export function generateDefaultConfigYaml(): string {
  return yamlStringify(generateDefaultConfig());
}

export function writeDefaultConfig(configPath: string): void {
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, generateDefaultConfigYaml(), 'utf-8');
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = raw[key];
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return {};
}

/**
 * Apply NPO_FEED_* environment overrides on top of the file config.
 */
export function applyEnvOverrides(
  rawConfig: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const sourceUrl = env['NPO_FEED_SOURCE_URL'];
  const output = env['NPO_FEED_OUTPUT'];
  const cachePath = env['NPO_FEED_CACHE'];
  const port = env['NPO_FEED_PORT'];

  if (sourceUrl) rawConfig['source'] = { ...section(rawConfig, 'source'), url: sourceUrl };
  if (output) rawConfig['feed'] = { ...section(rawConfig, 'feed'), output_path: output };
  if (cachePath) rawConfig['cache'] = { ...section(rawConfig, 'cache'), path: cachePath };
  if (port) {
    const parsedPort = Number(port);
    if (!Number.isInteger(parsedPort)) {
      throw new ConfigError(`NPO_FEED_PORT is not a valid port: ${port}`);
    }
    rawConfig['server'] = { ...section(rawConfig, 'server'), port: parsedPort };
  }
  return rawConfig;
}

export async function loadConfig(force = false): Promise<Config> {
  if (cachedConfig && !force) return cachedConfig;

  const explorer = cosmiconfig('npofeed', {
    searchPlaces: [
      CONFIG_FILE_NAME,
      'npo-feed.config.yml',
      '.npofeedrc.yaml',
      '.npofeedrc.yml',
    ],
    searchStrategy: 'none',
  });

  const envConfigPath = process.env['NPO_FEED_CONFIG'];
  let rawConfig: Record<string, unknown> = {};

  if (envConfigPath) {
    const resolved = resolvePath(envConfigPath);
    if (!fs.existsSync(resolved)) {
      throw new ConfigError(`Config file not found: ${resolved}`);
    }
    const result = await explorer.load(resolved);
    rawConfig = (result?.config as Record<string, unknown> | undefined) ?? {};
  } else {
    const result = await explorer.search(process.cwd());
    if (result) {
      logger.debug({ file: result.filepath }, 'Loaded config file');
      rawConfig = (result.config as Record<string, unknown> | undefined) ?? {};
    } else {
      logger.debug('No config file found, using defaults');
    }
  }

  const parsed = ConfigSchema.safeParse(applyEnvOverrides(rawConfig));
  if (!parsed.success) {
    throw new ConfigError('Invalid configuration', {
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  cachedConfig = parsed.data;
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
