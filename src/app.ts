import express, { type Express } from 'express';
import type { FulfillmentStore } from './domains/fulfillment';
import { requestContextMiddleware } from './middleware/requestContext.middleware';
import { requestLoggerMiddleware } from './middleware/requestLogger.middleware';
import { createExpensesRouter } from './routes/expenses.routes';
import { createFulfillmentsRouter } from './routes/fulfillments.routes';
import { createHealthRouter, type ReadinessProbe } from './routes/health.routes';
import { createPaymentsRouter } from './routes/payments.routes';
import { createShipmentsRouter } from './routes/shipments.routes';

export type AppOptions = {
  readinessProbe?: ReadinessProbe;
};

export function createApp(store: FulfillmentStore, options: AppOptions = {}): Express {
  const app = express();
  app.use(express.json());
  app.use(requestContextMiddleware);
  app.use(requestLoggerMiddleware);

  // Route map:
  // - Fulfillment lifecycle, status and verification: src/routes/fulfillments.routes.ts
  // - Allocation, shipment transitions and delivery posting: src/routes/shipments.routes.ts
  // - Payment ledger and deposits: src/routes/payments.routes.ts
  // - Delivery and manual expenses: src/routes/expenses.routes.ts
  app.use(createHealthRouter(options.readinessProbe));
  app.use(createFulfillmentsRouter(store));
  app.use(createShipmentsRouter(store));
  app.use(createPaymentsRouter(store));
  app.use(createExpensesRouter(store));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}
