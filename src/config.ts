import 'dotenv/config';

export interface RateLimitRule {
  requests: number;
  windowSeconds: number;
  burst?: number;
}

export type LimitClass = 'global' | 'check' | 'heavy' | 'admin';

type Env = Record<string, string | undefined>;

function num(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

/**
 * Parses "requests/window/burst", e.g. "20/60/5". Burst is optional.
 */
export function parseRateLimitRule(raw: string | undefined, fallback: RateLimitRule): RateLimitRule {
  if (!raw) return fallback;
  const [requests, windowSeconds, burst] = raw.split('/').map((part) => Number(part.trim()));
  if (!Number.isFinite(requests) || requests <= 0 || !Number.isFinite(windowSeconds) || windowSeconds <= 0) {
    return fallback;
  }
  return {
    requests,
    windowSeconds,
    ...(Number.isFinite(burst) && burst > 0 ? { burst } : {}),
  };
}

export function loadConfig(env: Env = process.env) {
  return {
    port: num(env, 'PORT', 3000),
    defaultPostcode: env.DEFAULT_POSTCODE || '2000',
    adminToken: env.ADMIN_API_TOKEN || '',

    cache: {
      ttlMs: num(env, 'CACHE_TTL_MIN', 10) * 60 * 1000,
      maxSize: num(env, 'CACHE_MAX_SIZE', 1000),
    },

    retry: {
      maxRetries: num(env, 'RETRY_MAX_RETRIES', 3),
      backoffFactor: num(env, 'RETRY_BACKOFF_FACTOR', 1),
      timeoutMs: num(env, 'REQUEST_TIMEOUT_MS', 30_000),
    },

    degradation: {
      circuitBreakerThreshold: num(env, 'CIRCUIT_BREAKER_THRESHOLD', 5),
      circuitBreakerTimeoutMs: num(env, 'CIRCUIT_BREAKER_TIMEOUT_SEC', 60) * 1000,
      sourceTimeoutMs: num(env, 'SOURCE_TIMEOUT_MS', 15_000),
      minSuccessRate: num(env, 'MIN_SOURCE_SUCCESS_RATE', 0.3),
      lastGoodMaxAgeMs: num(env, 'LAST_GOOD_MAX_AGE_SEC', 3600) * 1000,
    },

    rateLimits: {
      global: parseRateLimitRule(env.RATE_LIMIT_GLOBAL, { requests: 100, windowSeconds: 60, burst: 10 }),
      check: parseRateLimitRule(env.RATE_LIMIT_CHECK, { requests: 20, windowSeconds: 60, burst: 5 }),
      heavy: parseRateLimitRule(env.RATE_LIMIT_HEAVY, { requests: 5, windowSeconds: 60, burst: 2 }),
      admin: parseRateLimitRule(env.RATE_LIMIT_ADMIN, { requests: 200, windowSeconds: 60, burst: 20 }),
    } satisfies Record<LimitClass, RateLimitRule>,

    matching: {
      minSimilarity: num(env, 'MIN_PRODUCT_SIMILARITY', 0.3),
      highConfidenceThreshold: num(env, 'HIGH_CONFIDENCE_THRESHOLD', 0.8),
      mediumConfidenceThreshold: num(env, 'MEDIUM_CONFIDENCE_THRESHOLD', 0.6),
      exactMatchBonus: num(env, 'EXACT_MATCH_BONUS', 0.2),
      brandMatchBonus: num(env, 'BRAND_MATCH_BONUS', 0.15),
      sizeMatchBonus: num(env, 'SIZE_MATCH_BONUS', 0.1),
      keywordMatchBonus: num(env, 'KEYWORD_MATCH_BONUS', 0.05),
    },

    woolworths: {
      baseUrl: (env.WOOLWORTHS_BASE_URL || 'https://www.woolworths.com.au').replace(/\/$/, ''),
      userAgent:
        env.USER_AGENT ||
        'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
    },

    history: {
      ttlDays: num(env, 'HISTORY_TTL_DAYS', 90),
      writeTimeoutMs: num(env, 'HISTORY_WRITE_TIMEOUT_MS', 2_000),
    },

    upstash: {
      url: (env.UPSTASH_REDIS_REST_URL || '').replace(/\/$/, ''),
      token: env.UPSTASH_REDIS_REST_TOKEN || '',
    },
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const cfg = loadConfig();
