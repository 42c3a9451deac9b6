import dotenv from 'dotenv';
import { z } from 'zod';
import { GameSchema } from './types';
import { ConfigError } from './utils/errors';
import { LogLevelSchema, type LogLevel } from './utils/logger';

const boolFromEnv = (defaultValue: boolean) =>
  z.preprocess(value => {
    if (typeof value === 'boolean') return value;
    if (typeof value === 'number') return value !== 0;
    if (typeof value === 'string') {
      const normalized = value.trim().toLowerCase();
      if (normalized === '') return undefined;
      if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) return true;
      if (['false', '0', 'no', 'n', 'off'].includes(normalized)) return false;
    }
    return value;
  }, z.boolean().default(defaultValue));

const rate = (defaultValue: number) => z.coerce.number().positive().default(defaultValue);
const count = (defaultValue: number) => z.coerce.number().int().min(0).default(defaultValue);
// node-cache reads a TTL of 0 as "never expire".
const ttl = (defaultValue: number) => z.coerce.number().int().positive().default(defaultValue);

const envSchema = z.object({
  LOG_LEVEL: LogLevelSchema.default('info'),
  PRICE_DB_PATH: z.string().default('data/prices.db'),
  DEFAULT_LEAGUE: z.string().trim().min(1).default('Standard'),
  DEFAULT_GAME: GameSchema.default('GAME1'),
  DIVERGENCE_THRESHOLD: z.coerce.number().min(0).default(0.2),
  PRIMARY_SOURCE: z.string().default('ninja'),
  // Must outlast five ninja requests at the default ninja rate.
  LOOKUP_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  HTTP_USER_AGENT: z.string().default('league-price-resolver/1.0'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  // poe.ninja (both games)
  NINJA_ENABLED: boolFromEnv(true),
  NINJA_BASE_URL: z.string().url().default('https://poe.ninja/api/data'),
  NINJA2_BASE_URL: z.string().url().default('https://poe2.ninja/api/data'),
  NINJA_REQUESTS_PER_SECOND: rate(0.33),
  NINJA_CACHE_TTL_SECONDS: ttl(3600),
  NINJA_MAX_RETRIES: count(3),
  NINJA_MAX_CACHE_ENTRIES: z.coerce.number().int().positive().default(500),
  // poe.watch (first game only)
  WATCH_ENABLED: boolFromEnv(true),
  WATCH_BASE_URL: z.string().url().default('https://api.poe.watch'),
  WATCH_REQUESTS_PER_SECOND: rate(0.5),
  WATCH_CACHE_TTL_SECONDS: ttl(3600),
  WATCH_MAX_RETRIES: count(3),
  WATCH_MAX_CACHE_ENTRIES: z.coerce.number().int().positive().default(500),
  // Official trade API; strict public limits, so off unless asked for
  TRADE_ENABLED: boolFromEnv(false),
  TRADE_BASE_URL: z.string().url().default('https://www.pathofexile.com/api'),
  TRADE_REQUESTS_PER_SECOND: rate(0.25),
  TRADE_CACHE_TTL_SECONDS: ttl(300),
  TRADE_MAX_RETRIES: count(3),
  TRADE_MAX_CACHE_ENTRIES: z.coerce.number().int().positive().default(500),
  TRADE_MAX_LISTINGS: z.coerce.number().int().min(1).max(10).default(10),
});

export interface SourceSettings {
  enabled: boolean;
  baseURL: string;
  requestsPerSecond: number;
  cacheTtlSeconds: number;
  maxRetries: number;
  maxCacheEntries: number;
}

export interface ResolverConfig {
  logLevel: LogLevel;
  dbPath: string;
  defaultLeague: string;
  defaultGame: z.infer<typeof GameSchema>;
  divergenceThreshold: number;
  primarySource: string;
  lookupTimeoutMs: number;
  http: {
    userAgent: string;
    timeoutMs: number;
  };
  ninja: SourceSettings & { game2BaseURL: string };
  watch: SourceSettings;
  trade: SourceSettings & { maxListings: number };
}

/**
 * Parse an environment map into a typed configuration.
 * Every invalid key is reported in one ConfigError.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const parsed = result.data;

  return {
    logLevel: parsed.LOG_LEVEL,
    dbPath: parsed.PRICE_DB_PATH,
    defaultLeague: parsed.DEFAULT_LEAGUE,
    defaultGame: parsed.DEFAULT_GAME,
    divergenceThreshold: parsed.DIVERGENCE_THRESHOLD,
    primarySource: parsed.PRIMARY_SOURCE,
    lookupTimeoutMs: parsed.LOOKUP_TIMEOUT_MS,
    http: {
      userAgent: parsed.HTTP_USER_AGENT,
      timeoutMs: parsed.HTTP_TIMEOUT_MS,
    },
    ninja: {
      enabled: parsed.NINJA_ENABLED,
      baseURL: parsed.NINJA_BASE_URL,
      game2BaseURL: parsed.NINJA2_BASE_URL,
      requestsPerSecond: parsed.NINJA_REQUESTS_PER_SECOND,
      cacheTtlSeconds: parsed.NINJA_CACHE_TTL_SECONDS,
      maxRetries: parsed.NINJA_MAX_RETRIES,
      maxCacheEntries: parsed.NINJA_MAX_CACHE_ENTRIES,
    },
    watch: {
      enabled: parsed.WATCH_ENABLED,
      baseURL: parsed.WATCH_BASE_URL,
      requestsPerSecond: parsed.WATCH_REQUESTS_PER_SECOND,
      cacheTtlSeconds: parsed.WATCH_CACHE_TTL_SECONDS,
      maxRetries: parsed.WATCH_MAX_RETRIES,
      maxCacheEntries: parsed.WATCH_MAX_CACHE_ENTRIES,
    },
    trade: {
      enabled: parsed.TRADE_ENABLED,
      baseURL: parsed.TRADE_BASE_URL,
      requestsPerSecond: parsed.TRADE_REQUESTS_PER_SECOND,
      cacheTtlSeconds: parsed.TRADE_CACHE_TTL_SECONDS,
      maxRetries: parsed.TRADE_MAX_RETRIES,
      maxCacheEntries: parsed.TRADE_MAX_CACHE_ENTRIES,
      maxListings: parsed.TRADE_MAX_LISTINGS,
    },
  };
}

let cached: ResolverConfig | undefined;

/** Configuration from process.env, with .env loaded first. Parsed once. */
export function getConfig(): ResolverConfig {
  if (!cached) {
    dotenv.config();
    cached = loadConfig(process.env);
  }
  return cached;
}
