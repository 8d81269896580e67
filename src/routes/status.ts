import express from 'express';
import type { ProductCandidate } from '../types/product.js';
import type { ResponseCache } from '../lib/response-cache.js';
import type { DegradationManager } from '../lib/graceful-degradation.js';

export interface StatusDeps {
  cache: ResponseCache<ProductCandidate[]>;
  degradation: DegradationManager<ProductCandidate>;
  sourceNames: readonly string[];
}

export function createStatusRouter(deps: StatusDeps): express.Router {
  const statusRouter = express.Router();

  statusRouter.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString(), sources: deps.sourceNames });
  });

  statusRouter.get('/status/degradation', (_req, res) => {
    res.json(deps.degradation.getStatusSummary());
  });

  statusRouter.get('/status/cache', (_req, res) => {
    res.json(deps.cache.stats());
  });

  return statusRouter;
}
