/**
 * Configuration is read from the environment once, at startup, into a plain
 * ProductionConfig object. Nothing below keeps state between calls.
 */
import {StoreAccount} from '../domain';
import {ProductionConfig} from './types';
import {validateData} from '../utils/validate';
import {z} from 'zod';

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  DATABASE_URL: z.string().min(1).optional(),
  DATABASE_HOST: z.string().default('localhost'),
  DATABASE_PORT: positiveInt(5432),
  DATABASE_USER: z.string().default('appuser'),
  DATABASE_PASSWORD: z.string().default('apppassword'),
  DATABASE_NAME: z.string().default('scans'),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: positiveInt(6379),
  API_PORT: positiveInt(3000),
  RECENT_SCAN_DAYS: positiveInt(7),
  PHONE_WINDOW_DAYS: positiveInt(3),
  MAX_ORDER_DIGITS: positiveInt(6),
  ORDER_CUTOFF_DAYS: positiveInt(50),
  STORE_TIMEOUT_MS: positiveInt(15000),
  PHONE_COUNTRY_CODE: z.string().regex(/^\d*$/, 'digits only').default('212'),
  REJECT_UNTAGGED_UNFULFILLED: z.enum(['true', 'false']).default('true').transform(value => value === 'true'),
  SCAN_LOCK_TTL_MS: positiveInt(30000),
  SCAN_LOCK_WAIT_MS: positiveInt(20000),
  SCAN_LOCK_RETRY_MS: positiveInt(100),
});

const StoreListSchema = z.array(z.object({
  name: z.string().min(1),
  api_key: z.string().min(1),
  password: z.string().min(1),
  domain: z.string().min(1),
}));

/**
 * Strip the scheme and any path, keeping the bare host name.
 */
export function normalizeDomain(domain: string): string {
  return domain.trim().replace(/^https?:\/\//i, '').split('/')[0];
}

export function storesFromJson(blob: string): StoreAccount[] {
  let raw: unknown;
  try {
    raw = JSON.parse(blob);
  } catch (error) {
    throw new Error('SHOPIFY_STORES_JSON is not valid JSON', {cause: error});
  }
  return validateData(StoreListSchema, raw, 'SHOPIFY_STORES_JSON').map(store => ({
    name: store.name,
    apiKey: store.api_key,
    password: store.password,
    domain: normalizeDomain(store.domain),
  }));
}

/**
 * Every `<ID>_API_KEY` declares store `<id>`, which must come with
 * `<ID>_PASSWORD` and `<ID>_DOMAIN`.
 */
export function storesFromIndividualVars(env: NodeJS.ProcessEnv): StoreAccount[] {
  return Object.entries(env).flatMap(([variable, apiKey]) => {
    const match = /^(.+)_API_KEY$/.exec(variable);
    if (!match || apiKey === undefined) return [];

    const storeId = match[1];
    const password = env[`${storeId}_PASSWORD`];
    const domain = env[`${storeId}_DOMAIN`];
    if (password === undefined || domain === undefined) {
      throw new Error(`Missing ${storeId}_PASSWORD or ${storeId}_DOMAIN for store ${storeId}`);
    }
    return [{name: storeId.toLowerCase(), apiKey, password, domain: normalizeDomain(domain)}];
  });
}

export function loadStores(env: NodeJS.ProcessEnv): StoreAccount[] {
  const blob = env.SHOPIFY_STORES_JSON;
  return blob ? storesFromJson(blob) : storesFromIndividualVars(env);
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ProductionConfig {
  const vars = validateData(EnvSchema, env, 'environment');
  return {
    database: {
      connectionString: vars.DATABASE_URL,
      host: vars.DATABASE_HOST,
      port: vars.DATABASE_PORT,
      user: vars.DATABASE_USER,
      password: vars.DATABASE_PASSWORD,
      database: vars.DATABASE_NAME,
    },
    redis: {
      host: vars.REDIS_HOST,
      port: vars.REDIS_PORT,
    },
    lock: {
      ttlMs: vars.SCAN_LOCK_TTL_MS,
      waitMs: vars.SCAN_LOCK_WAIT_MS,
      retryDelayMs: vars.SCAN_LOCK_RETRY_MS,
    },
    api: {
      port: vars.API_PORT,
    },
    stores: loadStores(env),
    scan: {
      recencyWindowDays: vars.RECENT_SCAN_DAYS,
      phoneWindowDays: vars.PHONE_WINDOW_DAYS,
      maxOrderDigits: vars.MAX_ORDER_DIGITS,
      orderCutoffDays: vars.ORDER_CUTOFF_DAYS,
      storeTimeoutMs: vars.STORE_TIMEOUT_MS,
      phoneCountryCode: vars.PHONE_COUNTRY_CODE,
      rejectUntaggedUnfulfilled: vars.REJECT_UNTAGGED_UNFULFILLED,
    },
  };
}
