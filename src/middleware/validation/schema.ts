import type { Request, Response, NextFunction } from 'express';
import { z } from 'zod';

/**
 * Middleware factory to validate UUID path parameters
 */
export function validateUuidParam(paramName: string = 'id') {
  const uuidSchema = z.string().uuid();

  return (req: Request, res: Response, next: NextFunction) => {
    const value = req.params[paramName];
    const result = uuidSchema.safeParse(value);

    if (!result.success) {
      return res.status(400).json({
        error: `Invalid ${paramName}.`,
        details: result.error.flatten()
      });
    }

    next();
  };
}

/**
 * Middleware to validate pagination parameters
 */
export function validatePagination(
  defaultLimit: number = 20,
  maxLimit: number = 100
) {
  return (req: Request, res: Response, next: NextFunction) => {
    const limit = Math.min(maxLimit, Math.max(1, Number(req.query.limit) || defaultLimit));
    const offset = Math.max(0, Number(req.query.offset) || 0);

    req.pagination = { limit, offset };
    next();
  };
}

// Augment Express Request type to include validated data
declare global {
  namespace Express {
    interface Request {
      pagination?: { limit: number; offset: number };
    }
  }
}
