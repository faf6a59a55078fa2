import 'dotenv/config';

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Validates and returns required environment variable
 *
 * @param env - Environment to read from
 * @param name - Environment variable name
 * @param fallback - Optional fallback value
 * @param validator - Optional validation function
 * @throws Error if variable is missing or invalid
 */
const required = (
  env: Env,
  name: string,
  fallback?: string,
  validator?: (value: string) => boolean,
): string => {
  const value = env[name] ?? fallback;
  if (!value) {
    throw new Error(`Missing required env var ${name}`);
  }
  if (validator && !validator(value)) {
    throw new Error(`Invalid value for env var ${name}`);
  }
  return value;
};

/**
 * Numeric env var; rejects anything that does not parse to a finite number
 */
const numeric = (env: Env, name: string, fallback: number, min = 0): number => {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new Error(`Invalid value for env var ${name}`);
  }
  return value;
};

const flag = (env: Env, name: string, fallback: boolean): boolean => {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  return raw !== 'false' && raw !== '0';
};

/**
 * Validates API key format (minimum length)
 */
const validateApiKey = (key: string): boolean => key.length >= 8;

const validateUrl = (url: string): boolean => url.startsWith('http://') || url.startsWith('https://');

/**
 * Parses CORS origins; unset or `*` allows every origin
 */
const parseCorsOrigins = (origins?: string): string[] | boolean => {
  if (!origins || origins === '*') return true;
  return origins.split(',').map((o) => o.trim());
};

export interface ApiConfig {
  fredApiKey: string;
  fredBaseUrl: string;
  yahooBaseUrl: string;
  requestTimeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  maxConcurrentRequests: number;
}

export interface CacheConfig {
  enabled: boolean;
  maxMemorySize: number;
  diskCacheDir: string;
  defaultTtlSeconds: number;
  fredTtlSeconds: number;
  yahooTtlSeconds: number;
  /** upper bound for results computed with some inputs missing */
  degradedTtlSeconds: number;
  cleanupCron: string;
}

export interface PmiConfig {
  /** component name → FRED series id */
  components: Readonly<Record<string, string>>;
  weights: Readonly<Record<string, number>>;
  stdWindow: number;
  minPeriods: number;
  fallbackWindows: readonly number[];
  startDate: string;
}

export interface LiquidityConfig {
  fedBalance: string;
  reverseRepo: string;
  treasuryAccount: string;
}

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string[] | boolean;
  rateLimitMax: number;
  rateLimitWindow: string;
}

export interface AppConfig {
  api: ApiConfig;
  cache: CacheConfig;
  pmi: PmiConfig;
  liquidity: LiquidityConfig;
  server: ServerConfig;
  logLevel: string;
}

export type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type Config = DeepReadonly<AppConfig>;

function deepFreeze<T>(value: T): DeepReadonly<T>;
function deepFreeze(value: unknown): unknown {
  if (typeof value === 'object' && value !== null) {
    for (const nested of Object.values(value)) deepFreeze(nested);
    Object.freeze(value);
  }
  return value;
}

/**
 * Builds the application configuration from the environment.
 *
 * The result is frozen and handed to each component explicitly; nothing
 * reads `process.env` after startup.
 */
export function loadConfig(env: Env = process.env): Config {
  const config: AppConfig = {
    api: {
      fredApiKey: required(env, 'FRED_API_KEY', undefined, validateApiKey),
      fredBaseUrl: required(env, 'FRED_BASE_URL', 'https://api.stlouisfed.org/fred', validateUrl),
      yahooBaseUrl: required(
        env,
        'YAHOO_BASE_URL',
        'https://query1.finance.yahoo.com/v8/finance/chart',
        validateUrl,
      ),
      requestTimeoutMs: numeric(env, 'REQUEST_TIMEOUT_MS', 30_000, 1),
      maxRetries: numeric(env, 'MAX_RETRIES', 3),
      retryBaseDelayMs: numeric(env, 'RETRY_BASE_DELAY_MS', 1_000),
      maxConcurrentRequests: numeric(env, 'MAX_CONCURRENT_REQUESTS', 5, 1),
    },

    cache: {
      enabled: flag(env, 'CACHE_ENABLED', true),
      maxMemorySize: numeric(env, 'CACHE_MAX_MEMORY_SIZE', 512, 1),
      diskCacheDir: env.CACHE_DIR ?? 'data/cache',
      defaultTtlSeconds: numeric(env, 'CACHE_DEFAULT_TTL_SECONDS', 3_600),
      fredTtlSeconds: numeric(env, 'CACHE_FRED_TTL_SECONDS', 86_400),
      yahooTtlSeconds: numeric(env, 'CACHE_YAHOO_TTL_SECONDS', 3_600),
      degradedTtlSeconds: numeric(env, 'CACHE_DEGRADED_TTL_SECONDS', 300),
      cleanupCron: env.CACHE_CLEANUP_CRON ?? '0 * * * *',
    },

    // Manufacturing activity proxy built from regional survey substitutes
    pmi: {
      components: {
        new_orders: 'AMTMNO',
        production: 'IPMAN',
        employment: 'MANEMP',
        supplier_deliveries: 'AMDMUS',
        inventories: 'MNFCTRIMSA',
      },
      weights: {
        new_orders: 0.3,
        production: 0.25,
        employment: 0.2,
        supplier_deliveries: 0.15,
        inventories: 0.1,
      },
      stdWindow: 120,
      minPeriods: 24,
      fallbackWindows: [60, 36, 24],
      startDate: '2000-01-01',
    },

    liquidity: {
      fedBalance: 'WALCL',
      reverseRepo: 'RRPONTTLD',
      treasuryAccount: 'WTREGEN',
    },

    server: {
      port: numeric(env, 'PORT', 8787, 1),
      host: env.HOST ?? '0.0.0.0',
      corsOrigins: parseCorsOrigins(env.CORS_ORIGINS),
      rateLimitMax: numeric(env, 'RATE_LIMIT_MAX', 100, 1),
      rateLimitWindow: env.RATE_LIMIT_WINDOW ?? '1 minute',
    },

    logLevel: env.LOG_LEVEL ?? 'info',
  };

  return deepFreeze(config);
}
