import type express from 'express';
import { loadConfig } from '../../src/config.js';
import { createServices, type Services } from '../../src/server/services.js';
import { createApp } from '../../src/server/app.js';
import { InMemoryPriceHistory } from '../../src/lib/price-history.js';
import type { ProductCandidate, SourceAdapter } from '../../src/types/product.js';

export const NOW = 1_000_000;

export function product(name: string, price: number | null, sku: string): ProductCandidate {
  return {
    name,
    price,
    was: null,
    promoFlag: false,
    promoText: null,
    url: null,
    inStock: true,
    source: 'stub',
    sku,
  };
}

export type SearchMock = jest.Mock<Promise<ProductCandidate[]>, [string, string, AbortSignal?]>;

export interface TestApp {
  app: express.Express;
  services: Services;
  search: SearchMock;
}

/** Wires the real app around one stub source, a fixed clock and in-memory history. */
export function buildTestApp(env: Record<string, string> = {}): TestApp {
  const search: SearchMock = jest.fn((_query: string, _location: string, _signal?: AbortSignal) =>
    Promise.resolve([product('Milk 2L', 3.1, 'stub:1'), product('Milk 1L', 1.8, 'stub:2')])
  );
  const source: SourceAdapter = { name: 'stub', search };
  const now = () => NOW;
  const services = createServices(loadConfig({ SOURCE_TIMEOUT_MS: '200', ...env }), {
    sources: [source],
    history: new InMemoryPriceHistory(now),
    now,
  });
  return { app: createApp(services), services, search };
}
