import { Router, Request, Response } from 'express';
import type { Registry } from 'prom-client';
import { asyncHandler } from '../utils/errors';

export function createMetricsRouter(registry: Registry): Router {
  const router = Router();

  router.get('/', asyncHandler(async (_req: Request, res: Response) => {
    const body = await registry.metrics();
    res.set('Content-Type', registry.contentType);
    res.send(body);
  }));

  return router;
}
