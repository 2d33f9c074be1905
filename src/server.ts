import { serve } from '@hono/node-server';
import { createApp } from '~/app';
import { env } from '~/config/env';
import { logger } from '~/config/logger';
import { createOptimizationService } from '~/components/optimize/service';
import { S3ArtifactStore, createArtifactStore } from '~/utils/storage';

const store = createArtifactStore();
if (store instanceof S3ArtifactStore) {
  await store.checkHealth();
}

const service = createOptimizationService(store);
const stopSweeper = service.startSweeper(env.SWEEP_INTERVAL_MS);
const app = createApp(service);

const server = serve(
  {
    fetch: app.fetch,
    port: env.PORT
  },
  (info) => {
    logger.info({
      port: info.port,
      storageMode: env.STORAGE_MODE,
      concurrency: env.WORKER_CONCURRENCY,
      openApiSpec: `http://localhost:${info.port}/doc`,
      apiReference: `http://localhost:${info.port}/reference`
    }, 'ZIP Image Optimizer API started');
  }
);

async function shutdown(signal: string) {
  logger.info({ signal }, 'Shutting down');
  stopSweeper();
  server.close();
  await service.onIdle();
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Shutdown failed');
      process.exit(1);
    });
  });
}
