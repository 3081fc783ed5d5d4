import { Router, type Request, type Response } from 'express';
import type { FulfillmentStore } from '../domains/fulfillment';
import { updateRequestContext } from '../lib/requestContext';
import { asyncErrorHandler, fulfillmentErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import {
  outstandingQuerySchema,
  paymentCollectSchema,
  paymentDepositSchema,
  paymentVoidSchema
} from '../schemas/payments.schema';
import {
  collectPayment,
  confirmPayment,
  getPayment,
  listPayments,
  markDeposited,
  outstandingReport,
  voidPayment
} from '../services/payments.service';

export function createPaymentsRouter(store: FulfillmentStore): Router {
  const router = Router();

  router.post(
    '/fulfillments/:id/payments',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = paymentCollectSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ fulfillmentId: req.params.id });
      const { paidAt, ...draft } = parsed.data;
      const result = await collectPayment(store, req.params.id, {
        ...draft,
        paidAt: paidAt ? new Date(paidAt) : undefined
      });
      return res.status(201).json(result);
    }, fulfillmentErrorMap)
  );

  router.get(
    '/fulfillments/:id/payments',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: await listPayments(store, req.params.id) });
    }, fulfillmentErrorMap)
  );

  // Registered before /payments/:id so "outstanding" is not read as an id.
  router.get(
    '/payments/outstanding',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = outstandingQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await outstandingReport(store, parsed.data));
    }, fulfillmentErrorMap)
  );

  router.get(
    '/payments/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getPayment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/payments/:id/confirm',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await confirmPayment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/payments/:id/void',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = paymentVoidSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await voidPayment(store, req.params.id, parsed.data.reason));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/payments/:id/deposit',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = paymentDepositSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await markDeposited(store, req.params.id, parsed.data.targetBranchId));
    }, fulfillmentErrorMap)
  );

  return router;
}
