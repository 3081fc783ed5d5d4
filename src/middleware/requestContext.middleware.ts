import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { runWithRequestContext } from '../lib/requestContext';

const FULFILLMENT_PATH = /^\/fulfillments\/([0-9a-f-]{36})(?:\/|$)/i;

function extractRequestId(req: Request): string {
  const header = req.header('x-request-id') || req.header('x-correlation-id');
  if (typeof header === 'string' && header.trim()) {
    return header.trim();
  }
  return uuidv4();
}

// Route params are not parsed yet at this point, so the id is read off the path.
function extractFulfillmentId(req: Request): string | null {
  const match = FULFILLMENT_PATH.exec(req.path);
  return match?.[1] ?? null;
}

export function requestContextMiddleware(req: Request, res: Response, next: NextFunction) {
  const requestId = extractRequestId(req);
  req.requestId = requestId;
  res.setHeader('x-request-id', requestId);

  runWithRequestContext({ requestId, fulfillmentId: extractFulfillmentId(req) }, () => next());
}
