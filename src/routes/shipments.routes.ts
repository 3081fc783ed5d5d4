import { Router, type Request, type Response } from 'express';
import type { FulfillmentStore } from '../domains/fulfillment';
import { resolveIdempotencyKey } from '../lib/idempotency';
import { updateRequestContext } from '../lib/requestContext';
import { asyncErrorHandler, fulfillmentErrorMap } from '../middleware/validation/errors';
import { validatePagination, validateUuidParam } from '../middleware/validation/schema';
import {
  deliverySchema,
  shipmentCancelSchema,
  shipmentCommitSchema,
  shipmentFailSchema,
  shipmentListQuerySchema,
  shipmentProposeSchema
} from '../schemas/shipments.schema';
import {
  branchStockLevel,
  cancelShipment,
  commitShipment,
  dispatchShipment,
  failShipment,
  getShipment,
  listShipmentMovements,
  listShipments,
  markDelivered,
  proposeShipment,
  startLoading
} from '../services/shipments.service';

export function createShipmentsRouter(store: FulfillmentStore): Router {
  const router = Router();

  router.post(
    '/fulfillments/:id/shipments/propose',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = shipmentProposeSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ fulfillmentId: req.params.id });
      const proposal = await proposeShipment(store, req.params.id, parsed.data.capacity, {
        lineOrder: parsed.data.lineOrder
      });
      return res.json(proposal);
    }, fulfillmentErrorMap)
  );

  router.post(
    '/fulfillments/:id/shipments',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = shipmentCommitSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      updateRequestContext({ fulfillmentId: req.params.id });
      const idempotencyKey = resolveIdempotencyKey(req, parsed.data.details?.idempotencyKey);
      const result = await commitShipment(
        store,
        req.params.id,
        { capacity: parsed.data.capacity, lines: parsed.data.lines },
        { ...parsed.data.details, idempotencyKey }
      );
      return res.status(result.replayed ? 200 : 201).json(result);
    }, fulfillmentErrorMap)
  );

  router.get(
    '/shipments',
    validatePagination(50, 200),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = shipmentListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const paging = req.pagination ?? { limit: 50, offset: 0 };
      const rows = await listShipments(store, { ...parsed.data, ...paging });
      return res.json({ data: rows, paging });
    }, fulfillmentErrorMap)
  );

  router.get(
    '/shipments/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getShipment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.get(
    '/shipments/:id/movements',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json({ data: await listShipmentMovements(store, req.params.id) });
    }, fulfillmentErrorMap)
  );

  router.get(
    '/branches/:branchId/stock/:productId',
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await branchStockLevel(store, req.params.branchId, req.params.productId));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/shipments/:id/loading',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await startLoading(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/shipments/:id/dispatch',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await dispatchShipment(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/shipments/:id/cancel',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = shipmentCancelSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await cancelShipment(store, req.params.id, parsed.data.reason));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/shipments/:id/fail',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = shipmentFailSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json(await failShipment(store, req.params.id, parsed.data.reason));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/shipments/:id/deliver',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = deliverySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      const result = await markDelivered(store, { shipmentId: req.params.id, ...parsed.data });
      return res.json(result);
    }, fulfillmentErrorMap)
  );

  return router;
}
