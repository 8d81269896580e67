import express from 'express';
import type { PriceChecker } from '../lib/price-checker.js';
import { validateCheckRequest } from '../lib/validation.js';
import { AppError } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('check');

export function createCheckRouter(priceChecker: PriceChecker): express.Router {
  const checkRouter = express.Router();

  // Check a shopping list: { items: "milk 2L, bread" | ["milk 2L"], postcode: "2000" }
  checkRouter.post('/check', async (req, res, next) => {
    try {
      const validation = validateCheckRequest(req.body);
      if (!validation.ok) {
        throw new AppError('VALIDATION_FAILED', 'Request validation failed', {
          details: { errors: validation.errors },
        });
      }
      if (validation.warnings.length > 0) {
        log.warn('Suspicious content in check request', { warnings: validation.warnings });
      }

      const { items, postcode } = validation.value;
      const response = await priceChecker.checkItems(items, postcode);
      res.json(response);
    } catch (err) {
      next(err);
    }
  });

  return checkRouter;
}
