import { z } from 'zod';
import { PAYMENT_METHODS, SHIPMENT_STATUSES } from '../domains/fulfillment/types';
import { MAX_IDEMPOTENCY_KEY_LENGTH } from '../lib/idempotency';

const isoDateTimeString = z
  .string()
  .regex(
    /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/,
    'Use ISO timestamp',
  );

export const shipmentProposeSchema = z.object({
  capacity: z.number(),
  lineOrder: z.array(z.string().min(1)).optional()
});

export const shipmentCommitLineSchema = z.object({
  orderLineId: z.string().min(1),
  quantity: z.number()
});

export const shipmentDetailsSchema = z.object({
  scheduledAt: isoDateTimeString.optional(),
  deliveryAddress: z.string().max(500).optional(),
  customerName: z.string().max(255).optional(),
  customerPhone: z.string().max(64).optional(),
  vehicleRef: z.string().max(128).optional(),
  driverRef: z.string().max(128).optional(),
  tripRef: z.string().max(128).optional(),
  deliveryFee: z.number().nonnegative().optional(),
  notes: z.string().max(2000).optional(),
  idempotencyKey: z.string().min(1).max(MAX_IDEMPOTENCY_KEY_LENGTH).optional()
});

export const shipmentCommitSchema = z.object({
  capacity: z.number(),
  lines: z.array(shipmentCommitLineSchema),
  details: shipmentDetailsSchema.optional()
});

export const shipmentCancelSchema = z.object({
  reason: z.string().min(1).max(1000)
});

export const shipmentFailSchema = z.object({
  reason: z.string().min(1).max(1000)
});

export const deliveryPaymentSchema = z.object({
  amount: z.number(),
  method: z.enum(PAYMENT_METHODS),
  collectingBranchId: z.string().min(1),
  referenceNumber: z.string().max(128).optional(),
  receiptNumber: z.string().max(128).optional(),
  collectedBy: z.string().max(255).optional()
});

export const deliverySchema = z.object({
  deliveredAt: isoDateTimeString.optional(),
  signed: z.boolean().default(false),
  customerName: z.string().max(255).optional(),
  notes: z.string().max(2000).optional(),
  payment: deliveryPaymentSchema.optional()
});

export const shipmentListQuerySchema = z.object({
  fulfillmentId: z.string().uuid().optional(),
  status: z.enum(SHIPMENT_STATUSES).optional()
});

export type ShipmentProposeInput = z.infer<typeof shipmentProposeSchema>;
export type ShipmentCommitInput = z.infer<typeof shipmentCommitSchema>;
export type ShipmentDetailsInput = z.infer<typeof shipmentDetailsSchema>;
export type DeliveryInput = z.infer<typeof deliverySchema>;
