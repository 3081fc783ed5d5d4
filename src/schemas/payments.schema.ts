import { z } from 'zod';
import { PAYMENT_METHODS } from '../domains/fulfillment/types';

const isoDateTimeString = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
    'Use ISO timestamp',
  );

export const paymentCollectSchema = z.object({
  shipmentId: z.string().uuid().optional(),
  amount: z.number(),
  method: z.enum(PAYMENT_METHODS),
  collectingBranchId: z.string().min(1),
  status: z.enum(['pending', 'completed']).optional(),
  referenceNumber: z.string().max(128).optional(),
  receiptNumber: z.string().max(128).optional(),
  collectedBy: z.string().max(255).optional(),
  paidAt: isoDateTimeString.optional(),
  notes: z.string().max(2000).optional()
});

export const paymentDepositSchema = z.object({
  targetBranchId: z.string().min(1)
});

export const paymentVoidSchema = z.object({
  reason: z.string().min(1).max(1000)
});

export const outstandingQuerySchema = z.object({
  collectingBranchId: z.string().min(1).optional(),
  fulfillmentId: z.string().uuid().optional()
});

export type PaymentCollectInput = z.infer<typeof paymentCollectSchema>;
export type OutstandingQuery = z.infer<typeof outstandingQuerySchema>;
