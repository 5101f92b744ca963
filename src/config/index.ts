/**
 * Configuration management
 * All behavior is driven by environment variables
 */

export interface Config {
  // Pages to scan, in order
  targetUrls: string[];

  // Database
  databaseUrl: string;

  // Page fetching
  pageFetchTimeoutMs: number;
  pageDelayMs: number;
  userAgent: string;

  // Safety limit, 0 disables it
  maxLinksPerPage: number;

  // Location filtering
  extraAllowedLocations: string[];
  extraDisallowedLocations: string[];
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/108.0.0.0 Safari/537.36';

type Env = Record<string, string | undefined>;

function parseStringArray(value: string | undefined, defaultValue: string[] = []): string[] {
  if (!value) return defaultValue;
  return value.split(',').map(s => s.trim()).filter(s => s.length > 0);
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

export function loadConfig(env: Env = process.env): Config {
  const requiredEnvVars = ['TARGET_URLS', 'DATABASE_URL'];

  for (const envVar of requiredEnvVars) {
    if (!env[envVar]) {
      throw new ConfigError(`Missing required environment variable: ${envVar}`);
    }
  }

  const targetUrls = parseStringArray(env.TARGET_URLS);
  if (targetUrls.length === 0) {
    throw new ConfigError('TARGET_URLS does not contain any URL');
  }

  return {
    targetUrls,
    databaseUrl: env.DATABASE_URL ?? '',
    pageFetchTimeoutMs: parseNumber(env.PAGE_FETCH_TIMEOUT_MS, 13000),
    pageDelayMs: parseNumber(env.PAGE_DELAY_MS, 1000),
    userAgent: env.SCANNER_USER_AGENT || DEFAULT_USER_AGENT,
    maxLinksPerPage: parseNumber(env.MAX_LINKS_PER_PAGE, 0),
    extraAllowedLocations: parseStringArray(env.EXTRA_ALLOWED_LOCATIONS),
    extraDisallowedLocations: parseStringArray(env.EXTRA_DISALLOWED_LOCATIONS),
  };
}
