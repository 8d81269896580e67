import type { RequestHandler } from 'express';
import type { LimitClass } from '../config.js';
import { deriveClientId, type RateLimiter } from '../lib/rate-limiter.js';
import { errorEnvelope } from '../lib/errors.js';

export function limitClassForPath(path: string): LimitClass {
  if (path === '/check' || path.startsWith('/check/')) return 'check';
  if (path.startsWith('/admin')) return 'admin';
  return 'global';
}

/**
 * Admits or rejects every request before routing. Rate-limit headers are set
 * on every response; rejected requests get a 429 envelope.
 */
export function rateLimit(
  limiter: RateLimiter,
  resolveClass: (path: string) => LimitClass = limitClassForPath
): RequestHandler {
  return (req, res, next) => {
    const clientId = deriveClientId(req.socket.remoteAddress, req.headers);
    const limitClass = resolveClass(req.path);
    const decision = limiter.checkRateLimit(clientId, limitClass);

    res.set(decision.headers);
    if (decision.allowed) {
      next();
      return;
    }

    const retryAfter = Math.floor(decision.retryAfterSeconds) + 1;
    res
      .status(429)
      .json(
        errorEnvelope(
          'RATE_LIMIT_EXCEEDED',
          'Too many requests. Please try again later.',
          { limitClass, path: req.path, method: req.method },
          retryAfter
        )
      );
  };
}
