import express from 'express';
import cors from 'cors';
import type { AppConfig } from './config/env';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { createAnalysisRouter } from './routes/analysis';
import { createHealthRouter } from './routes/health';
import type { BackgroundTasks } from './services/background';
import type { Inference } from './services/inference/types';
import type { RequestLogger } from './services/storage/requestLogger';
import type { LogStore } from './services/storage/types';
import type { Telemetry } from './services/telemetry/types';

export interface ServerDeps {
  config: Pick<AppConfig, 'ALLOWED_ORIGINS'>;
  inference: Inference;
  logStore: LogStore | null;
  requestLogger: RequestLogger;
  telemetry: Telemetry;
  background: BackgroundTasks;
}

export function createServer(deps: ServerDeps) {
  const app = express();

  app.disable('x-powered-by');

  const origins = deps.config.ALLOWED_ORIGINS;
  app.use(
    cors({
      origin: origins.includes('*') ? '*' : [...origins],
      methods: ['GET', 'POST', 'OPTIONS']
    })
  );

  app.use(requestContext(deps.telemetry));
  app.use(express.json({ limit: '1mb' }));

  app.use(
    createHealthRouter({
      logStore: deps.logStore,
      telemetry: deps.telemetry
    })
  );

  app.use(
    '/api/v1',
    createAnalysisRouter({
      inference: deps.inference,
      requestLogger: deps.requestLogger,
      telemetry: deps.telemetry,
      background: deps.background
    })
  );

  app.use(notFoundHandler());
  app.use(errorHandler(deps.telemetry, deps.background));

  return app;
}
