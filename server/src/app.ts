import express, { Express } from 'express';
import type { Logger } from 'pino';
import type { Registry } from 'prom-client';
import { createRequestLogger } from './middleware/requestLogger';
import { createHealthRouter, HealthRouteDeps } from './routes/health';
import { createMetricsRouter } from './routes/metrics';
import { errorHandler } from './utils/errors';

export interface AppDeps extends HealthRouteDeps {
  registry: Registry;
  logger: Logger;
  quietScrapes?: boolean;
}

/**
 * Express app for the observability listener: /metrics and /health.
 */
export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');

  app.use(createRequestLogger({ logger: deps.logger, quietScrapes: deps.quietScrapes }));

  app.use('/metrics', createMetricsRouter(deps.registry));
  app.use('/health', createHealthRouter(deps));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  // Must be registered last (Express identifies error handlers by 4-param signature).
  app.use(errorHandler);

  return app;
}
