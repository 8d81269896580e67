import express, { type ErrorRequestHandler } from 'express';
import type { Services } from './services.js';
import { rateLimit } from './rate-limit.js';
import { createCheckRouter } from '../routes/check.js';
import { createStatusRouter } from '../routes/status.js';
import { createAdminRouter } from '../routes/admin.js';
import { createPriceHistoryRouter } from '../routes/price-history.js';
import { createAlternativesRouter } from '../routes/alternatives.js';
import { AppError, errorEnvelope, errorMessage } from '../lib/errors.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('server');

const BODY_LIMIT = '100kb';

// body-parser tags oversized bodies with type 'entity.too.large' and status 413
function isBodyTooLarge(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && err.type === 'entity.too.large';
}

const errorHandler: ErrorRequestHandler = (err, req, res, _next) => {
  if (err instanceof AppError) {
    res.status(err.httpStatus).json(err.toJSON());
    return;
  }
  // express.json() marks malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json(errorEnvelope('VALIDATION_FAILED', 'Request body is not valid JSON'));
    return;
  }
  if (isBodyTooLarge(err)) {
    res.status(413).json(errorEnvelope('PAYLOAD_TOO_LARGE', `Request body exceeds ${BODY_LIMIT}`));
    return;
  }
  log.error(`Unhandled error on ${req.method} ${req.path}: ${errorMessage(err)}`);
  res.status(500).json(errorEnvelope('INTERNAL_ERROR', 'An unexpected error occurred'));
};

export function createApp(services: Services): express.Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(rateLimit(services.rateLimiter));
  app.use(express.json({ limit: BODY_LIMIT }));

  app.use(
    createStatusRouter({
      cache: services.cache,
      degradation: services.degradation,
      sourceNames: services.priceChecker.sourceNames,
    })
  );
  app.use(createCheckRouter(services.priceChecker));
  app.use(createPriceHistoryRouter(services.history));
  app.use(createAlternativesRouter(services.history));
  app.use(
    createAdminRouter({
      rateLimiter: services.rateLimiter,
      cache: services.cache,
      adminToken: services.config.adminToken,
    })
  );

  app.use((req, res) => {
    res.status(404).json(errorEnvelope('NOT_FOUND', `No route for ${req.method} ${req.path}`));
  });
  app.use(errorHandler);

  return app;
}
