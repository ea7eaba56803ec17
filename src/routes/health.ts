import { Router } from 'express';
import type { LogStore } from '../services/storage/types';
import type { Telemetry } from '../services/telemetry/types';
import logger from '../utils/logger';

export const SERVICE_NAME = 'AI Gateway';
export const SERVICE_VERSION = '1.0.0';

const STORAGE_PING_TIMEOUT_MS = 2000;

export interface HealthDeps {
  logStore: LogStore | null;
  telemetry: Telemetry;
}

async function storageReachable(store: LogStore | null): Promise<boolean> {
  if (!store) {
    return false;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), STORAGE_PING_TIMEOUT_MS);
  });

  try {
    return await Promise.race([store.ping(), timeout]);
  } catch (err) {
    logger.warn({ err: err instanceof Error ? err.message : String(err) }, 'Storage health check failed');
    return false;
  } finally {
    clearTimeout(timer);
  }
}

export function createHealthRouter(deps: HealthDeps): Router {
  const router = Router();

  /**
   * GET /health
   * Always 200; service flags are best effort. Inference settings are
   * required at startup, so that flag is always set.
   */
  router.get('/health', async (_req, res) => {
    const blobStorage = await storageReachable(deps.logStore);

    res.json({
      status: 'ok',
      uptime: Math.round(process.uptime()),
      timestamp: new Date().toISOString(),
      version: SERVICE_VERSION,
      services: {
        inference: true,
        blob_storage: blobStorage,
        telemetry: deps.telemetry.enabled
      }
    });
  });

  router.get('/', (_req, res) => {
    res.json({
      message: SERVICE_NAME,
      version: SERVICE_VERSION,
      health: '/health'
    });
  });

  return router;
}
