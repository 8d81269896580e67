import express from 'express';
import { z } from 'zod';
import type { PriceHistoryStore } from '../lib/price-history.js';
import { AppError } from '../lib/errors.js';

const HistoryQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(30),
});

export function createPriceHistoryRouter(history: PriceHistoryStore): express.Router {
  const priceHistoryRouter = express.Router();

  // Series for one product key, e.g. /price-history/woolworths:123456?days=30
  priceHistoryRouter.get('/price-history/:productKey', async (req, res, next) => {
    try {
      const query = HistoryQuerySchema.safeParse(req.query);
      if (!query.success) {
        throw new AppError('VALIDATION_FAILED', 'days must be a whole number between 1 and 365');
      }
      const productKey = req.params.productKey;
      const entries = await history.readPriceHistory(productKey, query.data.days);
      res.json({ productKey, days: query.data.days, entries });
    } catch (err) {
      next(err);
    }
  });

  return priceHistoryRouter;
}
