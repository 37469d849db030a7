import path from 'node:path';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => value?.trim() || fallback;

export type { AppConfig, PublicConfig };

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

let cachedConfig: AppConfig | null = null;

export const buildConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const cwd = process.cwd();

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 8000),
      host: stringFromEnv(env.HOST, '0.0.0.0'),
    },
    crawl: {
      urlsFile: path.resolve(cwd, stringFromEnv(env.URLS_FILE, 'urls.txt')),
      politenessDelayMs: numberFromEnv(env.CRAWL_POLITENESS_DELAY_MS, 10_000),
    },
    fetch: {
      timeoutMs: numberFromEnv(env.FETCH_TIMEOUT_MS, 20_000),
      maxRetries: numberFromEnv(env.FETCH_MAX_RETRIES, 3),
      backoffStepMs: numberFromEnv(env.FETCH_BACKOFF_STEP_MS, 5_000),
      userAgent: stringFromEnv(env.FETCH_USER_AGENT, DEFAULT_USER_AGENT),
      referer: stringFromEnv(env.FETCH_REFERER, 'https://www.google.com/'),
    },
    search: {
      defaultTopN: numberFromEnv(env.SEARCH_DEFAULT_TOP_N, 10),
    },
    persistence: {
      snapshotFile: path.resolve(cwd, stringFromEnv(env.SNAPSHOT_FILE, 'scrapping_results.csv')),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return ConfigSchema.parse(rawConfig);
};

export const loadConfig = (): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = buildConfig();
  return cachedConfig;
};

export const getPublicConfig = (config: AppConfig = loadConfig()): PublicConfig => getPublicConfigShared(config);
