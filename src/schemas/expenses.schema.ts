import { z } from 'zod';
import { EXPENSE_CATEGORIES, RECORD_ORIGINS } from '../domains/fulfillment/types';

export const expenseCreateSchema = z.object({
  branchId: z.string().min(1),
  shipmentId: z.string().uuid().optional(),
  category: z.enum(EXPENSE_CATEGORIES),
  amount: z.number().positive(),
  description: z.string().min(1).max(1000),
  incurredAt: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})$/, 'Use ISO timestamp')
    .optional()
});

export const expenseListQuerySchema = z.object({
  branchId: z.string().min(1).optional(),
  origin: z.enum(RECORD_ORIGINS).optional(),
  shipmentId: z.string().uuid().optional()
});

export type ExpenseCreateInput = z.infer<typeof expenseCreateSchema>;
