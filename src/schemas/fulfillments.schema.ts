import { z } from 'zod';
import { FULFILLMENT_STATUSES } from '../domains/fulfillment/types';

const optionalBoolean = z.preprocess((val) => {
  if (val === undefined || val === '') return undefined;
  if (val === 'true' || val === true) return true;
  if (val === 'false' || val === false) return false;
  return val;
}, z.boolean().optional());

const money = z.preprocess((val) => (typeof val === 'string' ? Number(val) : val), z.number().nonnegative());

export const orderLineSchema = z.object({
  lineId: z.string().min(1).max(128),
  productId: z.string().min(1).max(128),
  productName: z.string().max(255).nullable().optional(),
  quantityOrdered: z.number().int().positive(),
  unitPrice: money
});

export const orderSchema = z.object({
  id: z.string().min(1).max(128),
  orderNumber: z.string().max(64).nullable().optional(),
  lines: z.array(orderLineSchema).min(1),
  totalValue: money
});

export const fulfillmentCreateSchema = z.object({
  order: orderSchema,
  destinationBranchId: z.string().min(1).max(128),
  notes: z.string().max(2000).optional()
});

export const fulfillmentCancelSchema = z.object({
  reason: z.string().max(1000).optional()
});

export const fulfillmentListQuerySchema = z.object({
  status: z.enum(FULFILLMENT_STATUSES).optional(),
  branchId: z.string().min(1).optional(),
  orderId: z.string().min(1).optional(),
  withBalanceOnly: optionalBoolean
});

export type OrderInput = z.infer<typeof orderSchema>;
export type FulfillmentCreateInput = z.infer<typeof fulfillmentCreateSchema>;
export type FulfillmentListQuery = z.infer<typeof fulfillmentListQuerySchema>;
