import { Router, type Request, type Response } from 'express';
import type { FulfillmentStore } from '../domains/fulfillment';
import { asyncErrorHandler, fulfillmentErrorMap } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';
import { expenseCreateSchema, expenseListQuerySchema } from '../schemas/expenses.schema';
import { createManualExpense, deleteExpense, getExpense, listExpenses } from '../services/expenses.service';

export function createExpensesRouter(store: FulfillmentStore): Router {
  const router = Router();

  router.get(
    '/expenses',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = expenseListQuerySchema.safeParse(req.query);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.json({ data: await listExpenses(store, parsed.data) });
    }, fulfillmentErrorMap)
  );

  router.get(
    '/expenses/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      return res.json(await getExpense(store, req.params.id));
    }, fulfillmentErrorMap)
  );

  router.post(
    '/expenses',
    asyncErrorHandler(async (req: Request, res: Response) => {
      const parsed = expenseCreateSchema.safeParse(req.body);
      if (!parsed.success) {
        return res.status(400).json({ error: parsed.error.flatten() });
      }
      return res.status(201).json(await createManualExpense(store, parsed.data));
    }, fulfillmentErrorMap)
  );

  router.delete(
    '/expenses/:id',
    validateUuidParam('id'),
    asyncErrorHandler(async (req: Request, res: Response) => {
      await deleteExpense(store, req.params.id);
      return res.status(204).send();
    }, fulfillmentErrorMap)
  );

  return router;
}
