/**
 * Pricewise — Configuration
 *
 * Environment is parsed once into a typed config object and passed down
 * explicitly; nothing below the server entry reads process.env for tuning.
 */

import { z } from 'zod';
import { ConfigError } from './errors';

const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(5000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Dispatch
  MAX_WORKERS: z.coerce.number().int().min(1).max(64).default(5),
  SOURCE_TIMEOUT_MS: z.coerce.number().int().min(0).default(15_000),
  MAX_RESULTS_PER_SOURCE: z.coerce.number().int().min(1).max(100).default(20),

  // Scraping
  SCRAPER_TIMEOUT_MS: z.coerce.number().int().min(100).default(5_000),
  SCRAPER_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  SCRAPER_BACKOFF_MS: z.coerce.number().int().min(0).default(500),
  SITE_REQUEST_INTERVAL_MS: z.coerce.number().int().min(0).default(1_000),
  SCRAPER_USER_AGENT: z
    .string()
    .default('Pricewise/1.0 (+https://example.com/pricewise-bot)'),

  // Admission control
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(10),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().min(1_000).default(60_000),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),
  CACHE_MAX_SIZE: z.coerce.number().int().min(1).default(100),
  STALE_AFTER_SECONDS: z.coerce.number().int().min(0).default(300),

  // Normalization & dedup
  FUZZY_MATCH_THRESHOLD: z.coerce.number().min(0).max(1).default(0.85),
  DEFAULT_CURRENCY: z.string().length(3).toUpperCase().default('INR'),

  // Pagination
  DEFAULT_PAGE_SIZE: z.coerce.number().int().min(1).default(20),
  MAX_PAGE_SIZE: z.coerce.number().int().min(1).default(100),

  // Store
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).optional(),
});

export type EnvConfig = z.infer<typeof configSchema>;

export interface AppConfig {
  env: EnvConfig['NODE_ENV'];
  port: number;
  logLevel: EnvConfig['LOG_LEVEL'];
  dispatch: {
    maxWorkers: number;
    sourceTimeoutMs: number;
    maxResultsPerSource: number;
  };
  scraper: {
    timeoutMs: number;
    maxRetries: number;
    backoffMs: number;
    siteIntervalMs: number;
    userAgent: string;
  };
  rateLimit: {
    limit: number;
    windowMs: number;
  };
  cache: {
    ttlMs: number;
    maxSize: number;
  };
  staleAfterMs: number;
  fuzzyMatchThreshold: number;
  defaultCurrency: string;
  pagination: {
    defaultPageSize: number;
    maxPageSize: number;
  };
  supabase?: {
    url: string;
    serviceRoleKey: string;
  };
}

/**
 * Parse and validate configuration from an environment map.
 * Empty strings count as unset, so a copied .env.example loads cleanly.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const result = configSchema.safeParse(cleaned);

  if (!result.success) {
    const fieldErrors = result.error.flatten().fieldErrors;
    const details = Object.entries(fieldErrors)
      .map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${details}`);
  }

  const e = result.data;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    dispatch: {
      maxWorkers: e.MAX_WORKERS,
      sourceTimeoutMs: e.SOURCE_TIMEOUT_MS,
      maxResultsPerSource: e.MAX_RESULTS_PER_SOURCE,
    },
    scraper: {
      timeoutMs: e.SCRAPER_TIMEOUT_MS,
      maxRetries: e.SCRAPER_MAX_RETRIES,
      backoffMs: e.SCRAPER_BACKOFF_MS,
      siteIntervalMs: e.SITE_REQUEST_INTERVAL_MS,
      userAgent: e.SCRAPER_USER_AGENT,
    },
    rateLimit: {
      limit: e.RATE_LIMIT_PER_MINUTE,
      windowMs: e.RATE_LIMIT_WINDOW_MS,
    },
    cache: {
      ttlMs: e.CACHE_TTL_SECONDS * 1000,
      maxSize: e.CACHE_MAX_SIZE,
    },
    staleAfterMs: e.STALE_AFTER_SECONDS * 1000,
    fuzzyMatchThreshold: e.FUZZY_MATCH_THRESHOLD,
    defaultCurrency: e.DEFAULT_CURRENCY,
    pagination: {
      defaultPageSize: e.DEFAULT_PAGE_SIZE,
      maxPageSize: e.MAX_PAGE_SIZE,
    },
    supabase:
      e.SUPABASE_URL && e.SUPABASE_SERVICE_ROLE_KEY
        ? { url: e.SUPABASE_URL, serviceRoleKey: e.SUPABASE_SERVICE_ROLE_KEY }
        : undefined,
  };
}
