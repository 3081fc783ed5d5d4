import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '../lib/requestContext';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  fulfillmentId?: string | null;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  userAgent?: string;
  ip?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);
  const context = getRequestContext();

  res.on('finish', () => {
    if (process.env.LOG_HTTP_REQUESTS === 'false') return;
    const durationMs = Date.now() - start;
    const bytesOut = Number(res.getHeader('content-length') ?? 0);

    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      fulfillmentId: context?.fulfillmentId ?? undefined,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs,
      bytesIn,
      bytesOut,
      userAgent: req.header('user-agent') ?? undefined,
      ip: req.ip,
      timestamp: new Date().toISOString()
    };

    console.log(JSON.stringify(entry));
  });

  next();
}
