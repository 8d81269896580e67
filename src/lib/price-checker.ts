/**
 * Price checker
 *
 * For each shopping-list item: consult the response cache per source, fan the
 * misses out through the degradation manager, merge candidates in source
 * registration order, rank them, and record what the shopper was shown.
 *
 * Items are checked one after another; sources within an item run together.
 */

import type { ProductCandidate, SourceAdapter } from '../types/product.js';
import type { ResponseCache } from './response-cache.js';
import { runWithTimeout, type DegradationManager, type SourceTask } from './graceful-degradation.js';
import type { MatchConfidence, ProductMatcher, RankedMatch } from './product-matcher.js';
import { isOnSale, type PriceHistoryStore } from './price-history.js';
import { createLogger } from './logger.js';
import { errorMessage } from './errors.js';

const log = createLogger('price-checker');

const MAX_MATCHES = 8;
const HISTORY_TIMEOUT_MS = 2_000;

export type SourceStatus = 'ok' | 'cached' | 'fallback' | 'failed';

export interface SourceReport {
  status: SourceStatus;
  candidates: number;
  bestMatch: string | null;
  error?: string;
}

export interface BestMatchSummary {
  name: string;
  source: string;
  score: number;
  confidence: MatchConfidence;
}

export interface AlternativeMatch {
  name: string;
  source: string;
  price: number | null;
  was: number | null;
  onSale: boolean;
  promoText: string | null;
  url: string | null;
  matchScore: number;
}

export interface PotentialSaving {
  alternative: string;
  currentPrice: number;
  alternativePrice: number;
  savings: number;
  percentage: number;
}

export interface ItemResult {
  input: string;
  bestMatch: BestMatchSummary | null;
  alternatives: AlternativeMatch[];
  onSale: boolean;
  price: number | null;
  was: number | null;
  promoText: string | null;
  url: string | null;
  inStock: boolean | null;
  potentialSavings: PotentialSaving[];
  sources: Record<string, SourceReport>;
}

export interface CheckItemsResponse {
  results: ItemResult[];
  location: string;
  itemsChecked: number;
}

export interface PriceCheckerDeps {
  sources: readonly SourceAdapter[];
  cache: ResponseCache<ProductCandidate[]>;
  degradation: DegradationManager<ProductCandidate>;
  matcher: ProductMatcher;
  history?: PriceHistoryStore;
  sourceTimeoutMs?: number;
  /** Longest a response waits on price-history writes. */
  historyTimeoutMs?: number;
  now?: () => number;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function emptyResult(input: string, sources: Record<string, SourceReport>): ItemResult {
  return {
    input,
    bestMatch: null,
    alternatives: [],
    onSale: false,
    price: null,
    was: null,
    promoText: null,
    url: null,
    inStock: null,
    potentialSavings: [],
    sources,
  };
}

export function potentialSavings(
  best: ProductCandidate,
  alternatives: readonly ProductCandidate[]
): PotentialSaving[] {
  const current = best.price;
  if (current === null || current <= 0) return [];

  const savings: PotentialSaving[] = [];
  for (const alt of alternatives) {
    if (alt.price === null || alt.price <= 0) continue;
    const saving = current - alt.price;
    if (saving <= 0) continue;
    savings.push({
      alternative: alt.name,
      currentPrice: round(current, 2),
      alternativePrice: round(alt.price, 2),
      savings: round(saving, 2),
      percentage: round((saving / current) * 100, 1),
    });
  }
  return savings;
}

function toAlternative(match: RankedMatch<ProductCandidate>): AlternativeMatch {
  const c = match.candidate;
  return {
    name: c.name,
    source: c.source,
    price: c.price,
    was: c.was,
    onSale: isOnSale(c),
    promoText: c.promoText,
    url: c.url,
    matchScore: round(match.score.totalScore, 2),
  };
}

export class PriceChecker {
  private readonly deps: PriceCheckerDeps;
  private readonly now: () => number;

  constructor(deps: PriceCheckerDeps) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  get sourceNames(): string[] {
    return this.deps.sources.map((s) => s.name);
  }

  async checkItems(items: readonly string[], location: string): Promise<CheckItemsResponse> {
    const results: ItemResult[] = [];
    for (const item of items) {
      log.info(`Checking item: '${item}' at postcode '${location}'`);
      results.push(await this.checkItem(item, location));
    }
    return { results, location, itemsChecked: items.length };
  }

  private async gatherCandidates(
    item: string,
    location: string
  ): Promise<{ perSource: Map<string, ProductCandidate[]>; reports: Record<string, SourceReport> }> {
    const { sources, cache, degradation } = this.deps;
    const perSource = new Map<string, ProductCandidate[]>();
    const reports: Record<string, SourceReport> = {};
    const searches: Record<string, SourceTask<ProductCandidate[]>> = {};

    for (const source of sources) {
      const cached = cache.lookup(source.name, item, location);
      if (cached.hit) {
        log.debug(`Cache hit for ${source.name}`, { query: item, location });
        perSource.set(source.name, cached.value);
        reports[source.name] = { status: 'cached', candidates: cached.value.length, bestMatch: null };
      } else {
        searches[source.name] = (signal) => source.search(item, location, signal);
      }
    }

    if (Object.keys(searches).length > 0) {
      const fanOut = await degradation.executeMultiSourceSearch(searches, {}, { timeoutMs: this.deps.sourceTimeoutMs });
      for (const [name, result] of Object.entries(fanOut.results)) {
        const candidates = fanOut.candidates[name] ?? [];
        perSource.set(name, candidates);

        if (!result.success) {
          reports[name] = { status: 'failed', candidates: 0, bestMatch: null, error: result.error };
        } else if (result.fallbackUsed) {
          reports[name] = { status: 'fallback', candidates: candidates.length, bestMatch: null };
        } else {
          reports[name] = { status: 'ok', candidates: candidates.length, bestMatch: null };
          // Adapters report transport failures as [], so only non-empty lists are cached
          if (candidates.length > 0) cache.put(name, item, location, candidates);
        }
      }
    }

    return { perSource, reports };
  }

  private async checkItem(item: string, location: string): Promise<ItemResult> {
    const { matcher } = this.deps;
    const { perSource, reports } = await this.gatherCandidates(item, location);

    // registration order, whatever order the sources finished in
    const merged: ProductCandidate[] = [];
    for (const source of this.deps.sources) {
      const candidates = perSource.get(source.name) ?? [];
      merged.push(...candidates);
      const report = reports[source.name];
      if (report && candidates.length > 0) {
        report.bestMatch = matcher.bestMatch(item, candidates)?.candidate.name ?? null;
      }
    }

    const matches = matcher.findMultipleMatches(item, merged, MAX_MATCHES);
    const [top, ...rest] = matches;
    if (!top) {
      log.info(`No match for '${item}'`, { candidates: merged.length });
      return emptyResult(item, reports);
    }

    const best = top.candidate;
    const alternativeCandidates = rest.map((m) => m.candidate);
    await this.recordHistory(item, best, alternativeCandidates);

    return {
      input: item,
      bestMatch: {
        name: best.name,
        source: best.source,
        score: round(top.score.totalScore, 2),
        confidence: top.score.confidence,
      },
      alternatives: rest.map(toAlternative),
      onSale: isOnSale(best),
      price: best.price,
      was: best.was,
      promoText: best.promoText,
      url: best.url,
      inStock: best.inStock,
      potentialSavings: potentialSavings(best, alternativeCandidates),
      sources: reports,
    };
  }

  private async recordHistory(
    item: string,
    best: ProductCandidate,
    alternatives: readonly ProductCandidate[]
  ): Promise<void> {
    const { history } = this.deps;
    if (!history) return;
    const priced = alternatives.filter((c) => c.price !== null);
    const writes: Promise<unknown>[] = [];
    if (best.price !== null) writes.push(history.recordPrice(best, this.now(), item));
    if (priced.length > 0) writes.push(history.recordAlternatives(item, priced));
    if (writes.length === 0) return;

    try {
      const deadlineMs = this.deps.historyTimeoutMs ?? HISTORY_TIMEOUT_MS;
      const settled = await runWithTimeout(() => Promise.allSettled(writes), deadlineMs);
      for (const outcome of settled) {
        if (outcome.status === 'rejected') {
          log.warn(`Failed to record price history: ${errorMessage(outcome.reason)}`, { query: item });
        }
      }
    } catch (err) {
      log.warn(`Price history writes still pending: ${errorMessage(err)}`, { query: item });
    }
  }
}
