/**
 * Configuration loading.
 *
 * Order of precedence: environment variables, then config/cron.yaml, then the
 * defaults declared in the schema below.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage, type Logger } from '@cinefeed/shared';
import { formatDateInTimeZone, isIsoDate } from '@cinefeed/scraper';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const DEFAULT_CONFIG_PATH = path.resolve(__dirname, '../config/cron.yaml');

function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
const DATE_MODES = ['today', 'fixed'] as const;

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

const CatalogSchema = z.object({
  enabled: z.boolean().default(true),
  intervalSeconds: positiveInt.default(21600),
  baseUrl: z.string().url().default('https://cineplexx.me'),
  location: z.string().min(1).default('0'),
  dateMode: z.enum(DATE_MODES).default('today'),
  fixedDate: z.string().default(''),
  timezone: z.string().refine(isValidTimeZone, 'unknown time zone').default('Europe/Podgorica'),
  rssFilename: z.string().min(1).default('cineplexx_rss.xml'),
  feedTitle: z.string().default('Cineplexx repertoire'),
  feedLink: z.string().default('https://cineplexx.me'),
  feedDescription: z.string().default('Movies currently showing'),
  eventsLimit: nonNegativeInt.default(150),
  maxEventsInState: positiveInt.default(5000),
});

const FetchSchema = z.object({
  descriptionConcurrency: positiveInt.default(4),
  scheduleConcurrency: positiveInt.default(4),
  scheduleEnabled: z.boolean().default(true),
  lookaheadDays: nonNegativeInt.default(14),
  maxSessionsPerMovie: positiveInt.default(50),
  maxDatesPerMovie: positiveInt.default(10),
  renderTimeoutMs: positiveInt.default(90000),
  navigationTimeoutMs: positiveInt.default(60000),
  chromiumPath: z.string().optional(),
});

const CacheSchema = z
  .object({
    enabled: z.boolean().optional(),
    redisUrl: z.string().optional(),
    descriptionTtlSeconds: positiveInt.default(604800),
    descriptionNegativeTtlSeconds: positiveInt.default(3600),
    scheduleTtlSeconds: positiveInt.default(21600),
    scheduleNegativeTtlSeconds: positiveInt.default(3600),
  })
  // Caching is on by default exactly when a Redis URL is configured
  .transform((cache) => ({ ...cache, enabled: cache.enabled ?? Boolean(cache.redisUrl) }));

const ChannelsSchema = z.object({
  enabled: z.boolean().default(true),
  intervalSeconds: positiveInt.default(1800),
  names: z.array(z.string()).default([]),
  postLimit: positiveInt.default(5),
});

const SchedulerSchema = z.object({
  idleSeconds: positiveInt.default(300),
});

const OutputSchema = z.object({
  outDir: z.string().min(1).default('./out'),
  siteTitle: z.string().default('cinefeed'),
  gcsBucket: z.string().optional(),
});

export const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('info'),
  catalog: CatalogSchema.default({}),
  fetch: FetchSchema.default({}),
  cache: CacheSchema.default({}),
  channels: ChannelsSchema.default({}),
  scheduler: SchedulerSchema.default({}),
  output: OutputSchema.default({}),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type CatalogConfig = AppConfig['catalog'];

type EnvKind = 'string' | 'int' | 'bool' | 'list';

export interface EnvOverride {
  env: string;
  path: [string, string] | [string];
  kind: EnvKind;
  min?: number;
  values?: readonly string[];
}

/**
 * Environment variables recognised on top of the YAML file.
 */
export const ENV_OVERRIDES: readonly EnvOverride[] = [
  { env: 'LOG_LEVEL', path: ['logLevel'], kind: 'string', values: LOG_LEVELS },
  { env: 'CATALOG_ENABLED', path: ['catalog', 'enabled'], kind: 'bool' },
  { env: 'CATALOG_INTERVAL_SECONDS', path: ['catalog', 'intervalSeconds'], kind: 'int', min: 1 },
  { env: 'BASE_URL', path: ['catalog', 'baseUrl'], kind: 'string' },
  { env: 'LOCATION', path: ['catalog', 'location'], kind: 'string' },
  { env: 'DATE_MODE', path: ['catalog', 'dateMode'], kind: 'string', values: DATE_MODES },
  { env: 'FIXED_DATE', path: ['catalog', 'fixedDate'], kind: 'string' },
  { env: 'TIMEZONE', path: ['catalog', 'timezone'], kind: 'string' },
  { env: 'RSS_FILENAME', path: ['catalog', 'rssFilename'], kind: 'string' },
  { env: 'FEED_TITLE', path: ['catalog', 'feedTitle'], kind: 'string' },
  { env: 'FEED_LINK', path: ['catalog', 'feedLink'], kind: 'string' },
  { env: 'FEED_DESCRIPTION', path: ['catalog', 'feedDescription'], kind: 'string' },
  { env: 'EVENTS_LIMIT', path: ['catalog', 'eventsLimit'], kind: 'int', min: 0 },
  { env: 'MAX_EVENTS_IN_STATE', path: ['catalog', 'maxEventsInState'], kind: 'int', min: 1 },
  { env: 'DESCRIPTION_CONCURRENCY', path: ['fetch', 'descriptionConcurrency'], kind: 'int', min: 1 },
  { env: 'SCHEDULE_CONCURRENCY', path: ['fetch', 'scheduleConcurrency'], kind: 'int', min: 1 },
  { env: 'SCHEDULE_ENABLED', path: ['fetch', 'scheduleEnabled'], kind: 'bool' },
  { env: 'SCHEDULE_LOOKAHEAD_DAYS', path: ['fetch', 'lookaheadDays'], kind: 'int', min: 0 },
  { env: 'MAX_SESSIONS_PER_MOVIE', path: ['fetch', 'maxSessionsPerMovie'], kind: 'int', min: 1 },
  { env: 'MAX_DATES_PER_MOVIE', path: ['fetch', 'maxDatesPerMovie'], kind: 'int', min: 1 },
  { env: 'RENDER_TIMEOUT_MS', path: ['fetch', 'renderTimeoutMs'], kind: 'int', min: 1 },
  { env: 'NAVIGATION_TIMEOUT_MS', path: ['fetch', 'navigationTimeoutMs'], kind: 'int', min: 1 },
  { env: 'CHROMIUM_PATH', path: ['fetch', 'chromiumPath'], kind: 'string' },
  { env: 'CACHE_ENABLED', path: ['cache', 'enabled'], kind: 'bool' },
  { env: 'REDIS_URL', path: ['cache', 'redisUrl'], kind: 'string' },
  { env: 'DESCRIPTION_TTL_SECONDS', path: ['cache', 'descriptionTtlSeconds'], kind: 'int', min: 1 },
  { env: 'DESCRIPTION_NEGATIVE_TTL_SECONDS', path: ['cache', 'descriptionNegativeTtlSeconds'], kind: 'int', min: 1 },
  { env: 'SCHEDULE_TTL_SECONDS', path: ['cache', 'scheduleTtlSeconds'], kind: 'int', min: 1 },
  { env: 'SCHEDULE_NEGATIVE_TTL_SECONDS', path: ['cache', 'scheduleNegativeTtlSeconds'], kind: 'int', min: 1 },
  { env: 'TELEGRAM_ENABLED', path: ['channels', 'enabled'], kind: 'bool' },
  { env: 'TELEGRAM_INTERVAL_SECONDS', path: ['channels', 'intervalSeconds'], kind: 'int', min: 1 },
  { env: 'TELEGRAM_CHANNELS', path: ['channels', 'names'], kind: 'list' },
  { env: 'TELEGRAM_POST_LIMIT', path: ['channels', 'postLimit'], kind: 'int', min: 1 },
  { env: 'IDLE_SECONDS', path: ['scheduler', 'idleSeconds'], kind: 'int', min: 1 },
  { env: 'OUT_DIR', path: ['output', 'outDir'], kind: 'string' },
  { env: 'SITE_TITLE', path: ['output', 'siteTitle'], kind: 'string' },
  { env: 'GCS_BUCKET', path: ['output', 'gcsBucket'], kind: 'string' },
];

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

export type EnvValue = string | number | boolean | string[];

/**
 * Parse one environment value. Returns undefined when the value cannot be
 * used, in which case the file or default value stays in effect.
 */
export function parseEnvValue(override: EnvOverride, raw: string): EnvValue | undefined {
  const value = raw.trim();
  switch (override.kind) {
    case 'string':
      if (override.values && !override.values.includes(value)) return undefined;
      return value;
    case 'int': {
      if (!/^-?\d+$/.test(value)) return undefined;
      const parsed = Number.parseInt(value, 10);
      if (override.min !== undefined && parsed < override.min) return undefined;
      return parsed;
    }
    case 'bool': {
      const lower = value.toLowerCase();
      if (TRUE_VALUES.has(lower)) return true;
      if (FALSE_VALUES.has(lower)) return false;
      return undefined;
    }
    case 'list':
      return value
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(root: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = root[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  root[key] = created;
  return created;
}

export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
  logger?: Logger
): Record<string, unknown> {
  for (const override of ENV_OVERRIDES) {
    const rawValue = env[override.env];
    // Empty variables are treated as unset
    if (rawValue === undefined || rawValue.trim() === '') continue;

    const value = parseEnvValue(override, rawValue);
    if (value === undefined) {
      logger?.warn({ env: override.env, value: rawValue }, 'config_env_invalid_using_default');
      continue;
    }

    const [first, second] = override.path;
    if (second === undefined) {
      raw[first] = value;
    } else {
      section(raw, first)[second] = value;
    }
  }
  return raw;
}

function readConfigFile(resolvedPath: string, logger?: Logger): Record<string, unknown> {
  if (!fs.existsSync(resolvedPath)) {
    logger?.warn({ path: resolvedPath }, 'config_file_missing_using_defaults');
    return {};
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(fs.readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`failed to read ${resolvedPath}: ${errorMessage(error)}`, { cause: error });
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`${resolvedPath} must contain a mapping`);
  }
  return parsed;
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
}

/**
 * Load and validate the configuration.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const resolvedPath = options.configPath ?? env.CINEFEED_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;

  const raw = applyEnvOverrides(readConfigFile(resolvedPath, options.logger), env, options.logger);
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigurationError(`invalid configuration: ${issues}`);
  }
  return result.data;
}

/**
 * Date the catalog is fetched for: today in the configured time zone, or the
 * fixed date.
 */
export function resolveRunDate(config: Pick<CatalogConfig, 'dateMode' | 'fixedDate' | 'timezone'>, now: Date): string {
  if (config.dateMode === 'fixed') {
    if (!config.fixedDate) {
      throw new ConfigurationError('dateMode is "fixed" but fixedDate is empty');
    }
    if (!isIsoDate(config.fixedDate)) {
      throw new ConfigurationError(`fixedDate must be YYYY-MM-DD, got "${config.fixedDate}"`);
    }
    return config.fixedDate;
  }
  return formatDateInTimeZone(now, config.timezone);
}
