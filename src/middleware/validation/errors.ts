import type { Request, Response, NextFunction } from 'express';
import { FULFILLMENT_ERROR, isFulfillmentError, type FulfillmentErrorCode } from '../../domains/fulfillment';
import { mapPgErrorToHttp, type HttpErrorResponse } from '../../lib/pgErrors';

/**
 * Common error handler patterns for route error handling
 */
export type ErrorHandlerMap = Record<string, (error: Error) => HttpErrorResponse>;

/**
 * Higher-order function to create async error handling middleware
 * Catches errors from async route handlers and maps them to HTTP responses
 */
export function asyncErrorHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>,
  errorMap?: ErrorHandlerMap
) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error: unknown) {
      // Check custom error map first
      if (errorMap && error instanceof Error && errorMap[error.message]) {
        const mapped = errorMap[error.message](error);
        return res.status(mapped.status).json(mapped.body);
      }

      const pgMapped = mapPgErrorToHttp(error, {
        unique: () => createErrorResponse(409, 'A record with the same key already exists.'),
        foreignKey: () => createErrorResponse(400, 'Referenced record not found.'),
        check: () => createErrorResponse(400, 'Value violates a ledger constraint.')
      });
      if (pgMapped) {
        return res.status(pgMapped.status).json(pgMapped.body);
      }

      // Default error response
      console.error(error);
      return res.status(500).json({
        error: 'An internal server error occurred.',
        ...(process.env.NODE_ENV === 'development' && error instanceof Error && { details: error.message })
      });
    }
  };
}

/**
 * Create a standardized error response
 */
export function createErrorResponse(status: number, message: string, details?: unknown): HttpErrorResponse {
  return { status, body: { error: message, ...(details ? { details } : {}) } };
}

const FULFILLMENT_ERROR_MESSAGES: Record<FulfillmentErrorCode, string> = {
  CAPACITY_EXHAUSTED: 'Vehicle capacity must be greater than zero.',
  OVER_ALLOCATION: 'Requested quantities exceed what remains to ship or the vehicle capacity.',
  OVER_COLLECTION: 'Payment would exceed the order total value.',
  ALREADY_POSTED: 'Delivery has already been posted.',
  ALREADY_DEPOSITED: 'Payment has already been deposited.',
  INVALID_ENTRY: 'Payment entry is not eligible for this operation.',
  NOT_FOUND: 'Record not found.',
  CONCURRENCY_CONFLICT: 'The fulfillment is busy. Retry the request.',
  INVALID_STATE: 'Operation is not allowed in the current state.',
  VALIDATION_FAILED: 'Request failed validation.',
  SYSTEM_RECORD_IMMUTABLE: 'System-generated records cannot be changed.'
};

function fulfillmentErrorResponse(error: Error): HttpErrorResponse {
  if (!isFulfillmentError(error)) {
    return createErrorResponse(500, 'An internal server error occurred.');
  }
  return {
    status: error.status,
    body: {
      error: FULFILLMENT_ERROR_MESSAGES[error.code],
      code: error.code,
      ...(error.details ? { details: error.details } : {})
    }
  };
}

/**
 * Service error mappings for the fulfillment engine
 */
export const fulfillmentErrorMap: ErrorHandlerMap = Object.fromEntries(
  Object.values(FULFILLMENT_ERROR).map((code) => [code, fulfillmentErrorResponse])
);
