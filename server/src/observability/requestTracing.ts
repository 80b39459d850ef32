import { randomUUID } from 'crypto';
import type { RequestHandler } from 'express';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Correlation id par requête (X-Request-Id), repris dans les logs des
 * rafraîchissements déclenchés depuis le dashboard.
 */
export function applyRequestTracing(): RequestHandler {
  return (req, res, next) => {
    const incomingId =
      firstHeader(req.headers['x-request-id']) ?? firstHeader(req.headers['x-correlation-id']);

    const requestId = incomingId || randomUUID();
    req.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.locals.requestId = requestId;

    next();
  };
}
