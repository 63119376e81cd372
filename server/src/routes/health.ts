import { Router, Request, Response } from 'express';
import type { AlertStateStore } from '../services/alerts/AlertStateStore';
import type { MonitorStatus } from '../services/polling/types';

export interface HealthRouteDeps {
  getStatus: () => MonitorStatus;
  alertState: AlertStateStore;
}

export interface ActiveAlert {
  url: string;
  lastAlertAt: string;
}

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const alerts: ActiveAlert[] = [...deps.alertState.snapshot()].map(([url, at]) => ({
      url,
      lastAlertAt: new Date(at).toISOString(),
    }));

    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      monitor: deps.getStatus(),
      alerts,
    });
  });

  return router;
}
