import type { RequestHandler } from 'express';
import { errorEnvelope } from './errors.js';

type HeadersRecord = Record<string, string | string[] | undefined>;

function headerValue(headers: HeadersRecord, name: string): string {
  const raw = headers[name] ?? headers[name.toLowerCase()];
  return (Array.isArray(raw) ? raw[0] : raw) ?? '';
}

export function extractBearerToken(headers: HeadersRecord): string {
  const raw = headerValue(headers, 'authorization') || headerValue(headers, 'Authorization');
  if (!raw.startsWith('Bearer ')) return '';
  return raw.slice('Bearer '.length).trim();
}

/** With no admin token configured every caller is allowed. */
export function isAuthorized(headers: HeadersRecord, adminToken: string): boolean {
  if (!adminToken) return true;
  const token = extractBearerToken(headers);
  return Boolean(token) && token === adminToken;
}

export function requireAdmin(adminToken: string): RequestHandler {
  return (req, res, next) => {
    if (isAuthorized(req.headers, adminToken)) {
      next();
      return;
    }
    res.status(401).json(errorEnvelope('UNAUTHORIZED', 'Missing or invalid admin token'));
  };
}
