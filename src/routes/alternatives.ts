import express from 'express';
import { z } from 'zod';
import type { PriceHistoryStore } from '../lib/price-history.js';
import { AppError } from '../lib/errors.js';

const AlternativesQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
  source: z.string().trim().min(1).optional(),
});

export function createAlternativesRouter(history: PriceHistoryStore): express.Router {
  const alternativesRouter = express.Router();

  // Alternatives shown for a query, e.g. /alternatives/milk%202L?days=7&source=woolworths
  alternativesRouter.get('/alternatives/:query', async (req, res, next) => {
    try {
      const parsed = AlternativesQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        throw new AppError('VALIDATION_FAILED', 'days must be a whole number between 1 and 365');
      }
      const { days, source } = parsed.data;
      const query = req.params.query;
      const alternatives = await history.readAlternatives(query, days, source);
      res.json({ query, source: source ?? null, days, alternatives, totalResults: alternatives.length });
    } catch (err) {
      next(err);
    }
  });

  return alternativesRouter;
}
