/**
 * Product & Source Types
 *
 * Shapes shared by retailer adapters, the matcher and the price checker.
 */

/* ------------------------------------------------------------------ */
/*  Candidate                                                          */
/* ------------------------------------------------------------------ */

export interface ProductCandidate {
  /** Display name as shown by the retailer, pack size included */
  readonly name: string;
  readonly price: number | null;
  /** Previous price when the retailer shows one that differs from `price` */
  readonly was: number | null;
  readonly promoFlag: boolean;
  readonly promoText: string | null;
  readonly url: string | null;
  readonly inStock: boolean | null;
  /** Adapter name, e.g. "woolworths" */
  readonly source: string;
  /** Opaque uniqueness token such as "woolworths:123456". Never matched on. */
  readonly sku: string | null;
}

/* ------------------------------------------------------------------ */
/*  Adapter                                                            */
/* ------------------------------------------------------------------ */

export interface SourceAdapter {
  readonly name: string;
  /**
   * Resolves to the retailer's candidates for a query. Transport failures
   * resolve to []; a rejection means something unexpected broke. Once
   * `signal` aborts the adapter must stop issuing requests.
   */
  search(query: string, location: string, signal?: AbortSignal): Promise<ProductCandidate[]>;
}
