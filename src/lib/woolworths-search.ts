/**
 * Woolworths product search
 *
 * Public JSON search endpoint used by the retailer's own site:
 *   GET {baseUrl}/apis/ui/Search/products?searchTerm=..&postcode=..
 *
 * Transport failures resolve to [] so the degradation layer only sees
 * rejections for genuinely unexpected errors.
 */

import type { ProductCandidate, SourceAdapter } from '../types/product.js';
import type { RetryingRequestExecutor } from './retry-request.js';
import { parseWoolworthsSearch, WOOLWORTHS_SOURCE, WOOLWORTHS_SITE } from './woolworths-payload.js';
import { createLogger } from './logger.js';

const log = createLogger('woolworths');

const PAGE_SIZE = 36; // largest page the endpoint serves

export interface WoolworthsSourceOptions {
  executor: RetryingRequestExecutor;
  baseUrl?: string;
  userAgent?: string;
}

export class WoolworthsSource implements SourceAdapter {
  readonly name = WOOLWORTHS_SOURCE;
  private readonly executor: RetryingRequestExecutor;
  private readonly baseUrl: string;
  private readonly headers: Record<string, string>;

  constructor(options: WoolworthsSourceOptions) {
    this.executor = options.executor;
    this.baseUrl = (options.baseUrl ?? WOOLWORTHS_SITE).replace(/\/$/, '');
    this.headers = {
      'User-Agent': options.userAgent ?? 'Mozilla/5.0',
      Accept: 'application/json, text/plain, */*',
      'Accept-Language': 'en-AU,en;q=0.9',
      Referer: `${this.baseUrl}/shop/search/products`,
      Origin: this.baseUrl,
    };
  }

  async search(query: string, location: string, signal?: AbortSignal): Promise<ProductCandidate[]> {
    const result = await this.executor.execute({
      url: `${this.baseUrl}/apis/ui/Search/products`,
      params: {
        searchTerm: query,
        postcode: location,
        pageNumber: 1,
        pageSize: PAGE_SIZE,
        sortType: 'Relevance',
      },
      headers: this.headers,
      context: { source: this.name, query, postcode: location },
      signal,
    });

    if (!result.ok) {
      log.warn(`Search failed for "${query}"`, { reason: result.reason, status: result.status, error: result.error });
      return [];
    }

    const candidates = parseWoolworthsSearch(result.data);
    log.info(`Found ${candidates.length} products for "${query}"`, { postcode: location });
    return candidates;
  }
}
