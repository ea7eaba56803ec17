import dotenv from 'dotenv';
import { AppConfig, loadConfig } from './config/env';
import { ConfigError } from './errors';
import { createServer } from './server';
import { BackgroundTasks } from './services/background';
import { AzureOpenAIClient, azureOptionsFromConfig } from './services/inference/azureOpenAIClient';
import { InferenceClient } from './services/inference/inferenceClient';
import { BlobLogStore } from './services/storage/blobLogStore';
import { RequestLogger } from './services/storage/requestLogger';
import { AppInsightsTelemetry } from './services/telemetry/appInsightsTelemetry';
import { noopTelemetry, Telemetry } from './services/telemetry/types';
import logger, { resolveLogLevel } from './utils/logger';

dotenv.config();

const SHUTDOWN_TIMEOUT_MS = 10_000;

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.fatal({ fields: err.fields }, 'Invalid environment configuration');
    } else {
      logger.fatal({ err }, 'Failed to load configuration');
    }
    process.exit(1);
  }
}

function createTelemetry(config: AppConfig): Telemetry {
  if (!config.APPLICATIONINSIGHTS_CONNECTION_STRING) {
    logger.warn('APPLICATIONINSIGHTS_CONNECTION_STRING not set, telemetry disabled');
    return noopTelemetry;
  }
  return new AppInsightsTelemetry(config.APPLICATIONINSIGHTS_CONNECTION_STRING);
}

async function createLogStore(config: AppConfig): Promise<BlobLogStore | null> {
  if (!config.AZURE_STORAGE_CONNECTION_STRING) {
    logger.warn('AZURE_STORAGE_CONNECTION_STRING not set, request logs disabled');
    return null;
  }
  const store = new BlobLogStore(config.AZURE_STORAGE_CONNECTION_STRING, config.AZURE_STORAGE_CONTAINER_NAME);
  await store.ensureContainer();
  return store;
}

async function bootstrap() {
  const config = readConfig();
  logger.level = resolveLogLevel(config);
  const telemetry = createTelemetry(config);
  const logStore = await createLogStore(config);
  const background = new BackgroundTasks();

  const app = createServer({
    config,
    inference: new InferenceClient(new AzureOpenAIClient(azureOptionsFromConfig(config))),
    logStore,
    requestLogger: new RequestLogger(logStore, telemetry),
    telemetry,
    background
  });

  const server = app.listen(config.PORT, () => {
    logger.info(
      {
        env: config.NODE_ENV,
        deployment: config.AZURE_OPENAI_DEPLOYMENT,
        blobStorage: logStore !== null,
        telemetry: telemetry.enabled
      },
      `Server listening on port ${config.PORT}`
    );
  });

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    setTimeout(() => {
      logger.warn('Shutdown timed out, exiting');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();

    server.close(() => {
      background
        .drain()
        .then(() => telemetry.flush())
        .then(() => {
          logger.info('Shutdown complete');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

bootstrap().catch((err: unknown) => {
  logger.fatal({ err }, 'Failed to start server');
  process.exit(1);
});
