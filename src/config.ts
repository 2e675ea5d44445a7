import { ConfigurationError } from './core/errors';

export type StorageConfig = { backend: 'sqlite'; sqlitePath: string } | { backend: 'postgres'; databaseUrl: string };

export interface AppConfig {
  port: number;
  apiKey?: string;
  google: {
    apiKey?: string;
    cseId?: string;
    placesApiKey?: string;
  };
  storage: StorageConfig;
  requestTimeoutMs: number;
  searchPageDelayMs: number;
  redditLookupDelayMs: number;
  redditLookupConcurrency: number;
  proxyUrl?: string;
}

type Env = Record<string, string | undefined>;

const text = (env: Env, key: string): string | undefined => {
  const value = env[key]?.trim();
  return value ? value : undefined;
};

const numberFrom = (env: Env, key: string, fallback: number, min = 0): number => {
  const raw = text(env, key);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigurationError(`${key} must be a number >= ${min}, got '${raw}'`);
  }
  return value;
};

const storageFrom = (env: Env): StorageConfig => {
  const backend = (text(env, 'STORAGE_BACKEND') ?? 'sqlite').toLowerCase();
  if (backend === 'sqlite') {
    return { backend, sqlitePath: text(env, 'SQLITE_PATH') ?? 'data/leads.db' };
  }
  if (backend === 'postgres') {
    const databaseUrl = text(env, 'DATABASE_URL');
    if (!databaseUrl) throw new ConfigurationError('DATABASE_URL is required when STORAGE_BACKEND=postgres');
    return { backend, databaseUrl };
  }
  throw new ConfigurationError(`STORAGE_BACKEND must be 'sqlite' or 'postgres', got '${backend}'`);
};

export const loadConfig = (env: Env = process.env): AppConfig => ({
  port: numberFrom(env, 'PORT', 3000),
  apiKey: text(env, 'API_KEY'),
  google: {
    apiKey: text(env, 'GOOGLE_API_KEY'),
    cseId: text(env, 'GOOGLE_CSE_ID'),
    placesApiKey: text(env, 'GOOGLE_PLACES_API_KEY'),
  },
  storage: storageFrom(env),
  requestTimeoutMs: numberFrom(env, 'REQUEST_TIMEOUT_MS', 120000, 1),
  searchPageDelayMs: numberFrom(env, 'SEARCH_PAGE_DELAY_MS', 500),
  redditLookupDelayMs: numberFrom(env, 'REDDIT_LOOKUP_DELAY_MS', 200),
  redditLookupConcurrency: numberFrom(env, 'REDDIT_LOOKUP_CONCURRENCY', 1, 1),
  proxyUrl: text(env, 'PROXY_URL'),
});
