/**
 * Composition root
 *
 * Builds the long-lived service objects once per process. Tests pass their own
 * sources, clock and history store through `overrides`.
 */

import type { Dispatcher } from 'undici';
import { cfg, type AppConfig } from '../config.js';
import type { ProductCandidate, SourceAdapter } from '../types/product.js';
import { ResponseCache } from '../lib/response-cache.js';
import { RetryingRequestExecutor } from '../lib/retry-request.js';
import { DegradationManager } from '../lib/graceful-degradation.js';
import { RateLimiter } from '../lib/rate-limiter.js';
import { ProductMatcher } from '../lib/product-matcher.js';
import { PriceChecker } from '../lib/price-checker.js';
import { InMemoryPriceHistory, UpstashPriceHistory, type PriceHistoryStore } from '../lib/price-history.js';
import { WoolworthsSource } from '../lib/woolworths-search.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('services');

export interface Services {
  config: AppConfig;
  cache: ResponseCache<ProductCandidate[]>;
  degradation: DegradationManager<ProductCandidate>;
  rateLimiter: RateLimiter;
  matcher: ProductMatcher;
  history: PriceHistoryStore;
  priceChecker: PriceChecker;
}

export interface ServiceOverrides {
  sources?: SourceAdapter[];
  dispatcher?: Dispatcher;
  history?: PriceHistoryStore;
  now?: () => number;
}

function createHistoryStore(config: AppConfig, now: () => number): PriceHistoryStore {
  if (config.upstash.url && config.upstash.token) {
    return new UpstashPriceHistory({
      url: config.upstash.url,
      token: config.upstash.token,
      ttlDays: config.history.ttlDays,
      timeoutMs: config.history.writeTimeoutMs,
      now,
    });
  }
  log.warn('Price history kept in memory; set UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN to persist it');
  return new InMemoryPriceHistory(now, config.history.ttlDays);
}

export function createServices(config: AppConfig = cfg, overrides: ServiceOverrides = {}): Services {
  const now = overrides.now ?? Date.now;

  const cache = new ResponseCache<ProductCandidate[]>({
    maxSize: config.cache.maxSize,
    defaultTtlMs: config.cache.ttlMs,
    now,
  });

  const degradation = new DegradationManager<ProductCandidate>(
    {
      defaultTimeoutMs: config.degradation.sourceTimeoutMs,
      minSuccessRate: config.degradation.minSuccessRate,
      circuitBreakerThreshold: config.degradation.circuitBreakerThreshold,
      circuitBreakerTimeoutMs: config.degradation.circuitBreakerTimeoutMs,
      lastGoodMaxAgeMs: config.degradation.lastGoodMaxAgeMs,
    },
    now
  );

  const rateLimiter = new RateLimiter({ limits: config.rateLimits, now });
  const matcher = new ProductMatcher(config.matching);

  const executor = new RetryingRequestExecutor({
    maxRetries: config.retry.maxRetries,
    backoffFactor: config.retry.backoffFactor,
    timeoutMs: config.retry.timeoutMs,
    dispatcher: overrides.dispatcher,
  });

  const sources = overrides.sources ?? [
    new WoolworthsSource({
      executor,
      baseUrl: config.woolworths.baseUrl,
      userAgent: config.woolworths.userAgent,
    }),
  ];

  const history = overrides.history ?? createHistoryStore(config, now);

  const priceChecker = new PriceChecker({
    sources,
    cache,
    degradation,
    matcher,
    history,
    sourceTimeoutMs: config.degradation.sourceTimeoutMs,
    historyTimeoutMs: config.history.writeTimeoutMs,
    now,
  });

  return { config, cache, degradation, rateLimiter, matcher, history, priceChecker };
}
