/**
 * Product Matcher
 *
 * Scores retailer product names against a shopper's query and ranks
 * candidates. Pure: no I/O, no shared state.
 *
 * Score:
 *   base  = 0.6 * sequence ratio + 0.4 * keyword Jaccard
 *   total = min(1, base + exact-word + brand + size + keyword-count bonuses)
 */

import vocabulary from '../data/matching-vocabulary.json';
import { sequenceRatio } from './sequence-similarity.js';
import { createLogger } from './logger.js';

const log = createLogger('product-matcher');

export type MatchConfidence = 'low' | 'medium' | 'high';

export interface MatchScore {
  totalScore: number;
  baseScore: number;
  sequenceSimilarity: number;
  keywordSimilarity: number;
  exactMatchBonus: number;
  brandMatchBonus: number;
  sizeMatchBonus: number;
  keywordCountBonus: number;
  confidence: MatchConfidence;
}

export interface MatcherOptions {
  minSimilarity: number;
  highConfidenceThreshold: number;
  mediumConfidenceThreshold: number;
  exactMatchBonus: number;
  brandMatchBonus: number;
  sizeMatchBonus: number;
  /** Per shared keyword, capped at three keywords */
  keywordMatchBonus: number;
}

export const DEFAULT_MATCHER_OPTIONS: MatcherOptions = {
  minSimilarity: 0.3,
  highConfidenceThreshold: 0.8,
  mediumConfidenceThreshold: 0.6,
  exactMatchBonus: 0.2,
  brandMatchBonus: 0.15,
  sizeMatchBonus: 0.1,
  keywordMatchBonus: 0.05,
};

export interface RankedMatch<C> {
  candidate: C;
  score: MatchScore;
}

export interface NamedCandidate {
  readonly name?: string | null;
}

const KEYWORD_BONUS_CAP = 3;

const STOP_WORDS: ReadonlySet<string> = new Set(vocabulary.stopWords);
const PACK_WORDS: ReadonlySet<string> = new Set(vocabulary.packWords);
const BRAND_PATTERNS: readonly RegExp[] = vocabulary.brands.map(
  (brand) => new RegExp(`(?:^|[^a-z0-9])${escapeRegExp(brand)}(?:$|[^a-z0-9])`)
);

const UNIT_REWRITES: ReadonlyArray<[RegExp, string]> = [
  [/\b(\d+(?:\.\d+)?)\s*(?:millilitres?|milliliters?|mls?)\b/g, '$1ml'],
  [/\b(\d+(?:\.\d+)?)\s*(?:litres?|liters?|ltrs?|l)\b/g, '$1l'],
  [/\b(\d+(?:\.\d+)?)\s*(?:kilograms?|kgs?)\b/g, '$1kg'],
  [/\b(\d+(?:\.\d+)?)\s*(?:grams?|g)\b/g, '$1g'],
];

const SIZE_TOKEN = /\b(\d+(?:\.\d+)?)(ml|l|kg|g)\b/g;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Lowercases, strips one leading retailer or descriptor prefix, and rewrites
 * quantities to a compact form ("2 Litres" -> "2l", "500 grams" -> "500g").
 */
export function normalizeProductName(name: string | null | undefined): string {
  if (!name) return '';
  let normalized = name.toLowerCase().trim().replace(/\s+/g, ' ');

  for (const prefix of vocabulary.leadingPrefixes) {
    if (normalized.startsWith(prefix)) {
      normalized = normalized.slice(prefix.length);
      break;
    }
  }

  for (const [pattern, replacement] of UNIT_REWRITES) {
    normalized = normalized.replace(pattern, replacement);
  }

  return normalized.replace(/\s+/g, ' ').trim();
}

export function extractKeywords(text: string | null | undefined): string[] {
  const words = normalizeProductName(text).match(/\w+/g) ?? [];
  return words.filter((word) => word.length >= 2 && !STOP_WORDS.has(word));
}

function sizeTokens(normalized: string): Array<{ token: string; unit: string }> {
  return Array.from(normalized.matchAll(SIZE_TOKEN), (m) => ({ token: m[0], unit: m[2] }));
}

function intersectionSize(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let count = 0;
  for (const item of a) {
    if (b.has(item)) count++;
  }
  return count;
}

export class ProductMatcher {
  readonly options: MatcherOptions;

  constructor(options: Partial<MatcherOptions> = {}) {
    this.options = { ...DEFAULT_MATCHER_OPTIONS, ...options };
  }

  score(query: string, candidateName: string | null | undefined): MatchScore {
    const normQuery = normalizeProductName(query);
    const normName = normalizeProductName(candidateName);
    if (!normQuery || !normName) {
      return emptyScore();
    }

    const queryKeywords = new Set(extractKeywords(query));
    const nameKeywords = new Set(extractKeywords(candidateName));
    const shared = intersectionSize(queryKeywords, nameKeywords);
    const union = queryKeywords.size + nameKeywords.size - shared;

    const sequenceSimilarity = sequenceRatio(normQuery, normName);
    const keywordSimilarity = union > 0 && queryKeywords.size > 0 && nameKeywords.size > 0 ? shared / union : 0;
    const baseScore = sequenceSimilarity * 0.6 + keywordSimilarity * 0.4;

    const exactMatchBonus = queryKeywords.size > 0 ? (shared / queryKeywords.size) * this.options.exactMatchBonus : 0;
    const brandMatchBonus = this.brandBonus(query, candidateName ?? '');
    const sizeMatchBonus = this.sizeBonus(normQuery, normName, queryKeywords, nameKeywords);
    const keywordCountBonus = Math.min(
      shared * this.options.keywordMatchBonus,
      this.options.keywordMatchBonus * KEYWORD_BONUS_CAP
    );

    const totalScore = Math.min(
      1,
      baseScore + exactMatchBonus + brandMatchBonus + sizeMatchBonus + keywordCountBonus
    );

    return {
      totalScore,
      baseScore,
      sequenceSimilarity,
      keywordSimilarity,
      exactMatchBonus,
      brandMatchBonus,
      sizeMatchBonus,
      keywordCountBonus,
      confidence: this.confidenceFor(totalScore),
    };
  }

  /** Candidates at or above minSimilarity, best first. Ties keep input order. */
  rank<C extends NamedCandidate>(query: string, candidates: readonly C[]): RankedMatch<C>[] {
    const ranked: RankedMatch<C>[] = [];
    for (const candidate of candidates) {
      if (!candidate.name) continue;
      const score = this.score(query, candidate.name);
      if (score.totalScore >= this.options.minSimilarity) {
        ranked.push({ candidate, score });
      }
    }
    ranked.sort((a, b) => b.score.totalScore - a.score.totalScore);
    return ranked;
  }

  bestMatch<C extends NamedCandidate>(query: string, candidates: readonly C[]): RankedMatch<C> | null {
    const [top] = this.rank(query, candidates);
    if (top) {
      log.debug('Best product match found', {
        query,
        productName: top.candidate.name,
        score: top.score.totalScore,
        confidence: top.score.confidence,
      });
      return top;
    }
    log.debug('No suitable product match found', {
      query,
      candidatesCount: candidates.length,
      minSimilarity: this.options.minSimilarity,
    });
    return null;
  }

  findMultipleMatches<C extends NamedCandidate>(query: string, candidates: readonly C[], maxResults = 8): RankedMatch<C>[] {
    const matches = this.rank(query, candidates).slice(0, Math.max(0, maxResults));
    log.debug(`Found ${matches.length} matches for query '${query}' (maxResults=${maxResults})`, {
      productsCount: candidates.length,
    });
    return matches;
  }

  private confidenceFor(total: number): MatchConfidence {
    if (total >= this.options.highConfidenceThreshold) return 'high';
    if (total >= this.options.mediumConfidenceThreshold) return 'medium';
    return 'low';
  }

  private brandBonus(query: string, name: string): number {
    const q = query.toLowerCase();
    const n = name.toLowerCase();
    return BRAND_PATTERNS.some((pattern) => pattern.test(q) && pattern.test(n)) ? this.options.brandMatchBonus : 0;
  }

  /**
   * Full bonus when a quantity token ("2l", "500g") appears in both. Half
   * bonus when only the unit or a pack word ("dozen", "punnet") is shared.
   */
  private sizeBonus(
    normQuery: string,
    normName: string,
    queryKeywords: ReadonlySet<string>,
    nameKeywords: ReadonlySet<string>
  ): number {
    const full = this.options.sizeMatchBonus;
    const querySizes = sizeTokens(normQuery);
    const nameSizes = sizeTokens(normName);

    const nameTokens = new Set(nameSizes.map((s) => s.token));
    if (querySizes.some((s) => nameTokens.has(s.token))) return full;

    const nameUnits = new Set(nameSizes.map((s) => s.unit));
    const sharedUnit = querySizes.some((s) => nameUnits.has(s.unit));
    const sharedPackWord = Array.from(queryKeywords).some((word) => PACK_WORDS.has(word) && nameKeywords.has(word));
    return sharedUnit || sharedPackWord ? full * 0.5 : 0;
  }
}

function emptyScore(): MatchScore {
  return {
    totalScore: 0,
    baseScore: 0,
    sequenceSimilarity: 0,
    keywordSimilarity: 0,
    exactMatchBonus: 0,
    brandMatchBonus: 0,
    sizeMatchBonus: 0,
    keywordCountBonus: 0,
    confidence: 'low',
  };
}
