import express from 'express';
import { z } from 'zod';
import type { ProductCandidate } from '../types/product.js';
import type { ResponseCache } from '../lib/response-cache.js';
import { DEFAULT_BLOCK_SECONDS, type RateLimiter } from '../lib/rate-limiter.js';
import { requireAdmin } from '../lib/http.js';
import { AppError } from '../lib/errors.js';

export interface AdminDeps {
  rateLimiter: RateLimiter;
  cache: ResponseCache<ProductCandidate[]>;
  adminToken: string;
}

const BlockBodySchema = z.object({
  durationSeconds: z.number().positive().max(7 * 24 * 60 * 60).optional(),
});

export function createAdminRouter(deps: AdminDeps): express.Router {
  const adminRouter = express.Router();
  adminRouter.use('/admin', requireAdmin(deps.adminToken));

  adminRouter.get('/admin/clients/:clientId', (req, res) => {
    const clientId = req.params.clientId;
    res.json({ clientId, ...deps.rateLimiter.getClientStats(clientId) });
  });

  adminRouter.post('/admin/clients/:clientId/block', (req, res, next) => {
    try {
      const parsed = BlockBodySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        throw new AppError('VALIDATION_FAILED', 'durationSeconds must be a positive number of seconds', {
          details: { issues: parsed.error.issues.map((i) => i.message) },
        });
      }
      const clientId = req.params.clientId;
      const durationSeconds = parsed.data.durationSeconds ?? DEFAULT_BLOCK_SECONDS;
      const blockedUntil = deps.rateLimiter.blockClient(clientId, durationSeconds);
      res.json({ clientId, durationSeconds, blockedUntil: new Date(blockedUntil).toISOString() });
    } catch (err) {
      next(err);
    }
  });

  adminRouter.delete('/admin/clients/:clientId/block', (req, res, next) => {
    const clientId = req.params.clientId;
    if (!deps.rateLimiter.unblockClient(clientId)) {
      next(new AppError('NOT_FOUND', `Client ${clientId} is not blocked`));
      return;
    }
    res.json({ clientId, unblocked: true });
  });

  adminRouter.post('/admin/cache/clear', (_req, res) => {
    const cleared = deps.cache.size();
    deps.cache.clear();
    res.json({ cleared });
  });

  return adminRouter;
}
