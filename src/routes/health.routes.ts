import { Router, type Request, type Response } from 'express';

export type ReadinessProbe = () => Promise<unknown>;

export function createHealthRouter(probe?: ReadinessProbe): Router {
  const router = Router();

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    if (!probe) {
      return res.json({ status: 'ok', durationMs: Date.now() - start });
    }
    try {
      await probe();
      return res.json({ status: 'ok', durationMs: Date.now() - start });
    } catch (error) {
      return res.status(503).json({
        status: 'unavailable',
        error: error instanceof Error ? error.message : String(error),
        durationMs: Date.now() - start
      });
    }
  });

  return router;
}
