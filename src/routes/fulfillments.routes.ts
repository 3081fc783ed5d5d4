import { Router, type Request, type Response } from 'express';
import type { FulfillmentStore } from '../domains/fulfillment';
import { asyncErrorHandler, fulfillmentErrorMap } from '../middleware/validation/errors';
import { validatePagination, validateUuidParam } from '../middleware/validation/schema';
import {
  fulfillmentCancelSchema,
  fulfillmentCreateSchema,
  fulfillmentListQuerySchema
} from '../schemas/fulfillments.schema';
import {
  cancelFulfillment,
  createFulfillment,
  deleteFulfillment,
  fulfillmentStatus,
  getFulfillment,
  listFulfillments,
  recomputeFulfillment,
  verifyFulfillment
} from '../services/fulfillment.service';
import { updateRequestContext } from '../lib/requestContext';

export function createFulfillmentsRouter(store: FulfillmentStore): Router {
  const router = Router();

  router.post(
    '/fulfillments',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = fulfillmentCreateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const fulfillment = await createFulfillment(store, parsed.data.order, parsed.data.destinationBranchId, {
        notes: parsed.data.notes
      });
      return res.status(201).json(fulfillment);
    }, fulfillmentErrorMap)
  );

  router.get(
    '/fulfillments',
    validatePagination(50, 200),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = fulfillmentListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const paging = req.pagination ?? { limit: 50, offset: 0 };
      const rows = await listFulfillments(store, { ...parsed.data, ...paging });
      return res.json({ data: rows, paging });
    }, fulfillmentErrorMap)
  );

  router.get(
    '/fulfillments/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ fulfillmentId: req.params.id });
      return res.json(await getFulfillment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.get(
    '/fulfillments/:id/status',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ fulfillmentId: req.params.id });
      return res.json(await fulfillmentStatus(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/fulfillments/:id/recompute',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ fulfillmentId: req.params.id });
      return res.json(await recomputeFulfillment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.get(
    '/fulfillments/:id/verify',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ fulfillmentId: req.params.id });
      return res.json(await verifyFulfillment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/fulfillments/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = fulfillmentCancelSchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ fulfillmentId: req.params.id });
      return res.json(await cancelFulfillment(store, req.params.id, parsed.data.reason ?? null));
    }, fulfillmentErrorMap)
  );

  router.delete(
    '/fulfillments/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      updateRequestContext({ fulfillmentId: req.params.id });
      await deleteFulfillment(store, req.params.id);
      return res.status(204).send();
    }, fulfillmentErrorMap)
  );

  return router;
}
