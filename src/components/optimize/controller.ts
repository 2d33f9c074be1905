import type { OpenAPIHono } from '@hono/zod-openapi';
import { streamSSE } from 'hono/streaming';
import { env } from '~/config/env';
import { logger } from '~/config/logger';
import { NotFoundError, ValidationError, toErrorMessage } from '~/utils/errors';
import type { EventStream } from '~/utils/events';
import type { JobSnapshot } from '~/utils/registry';
import { parseBooleanFlag } from '~/utils/schemas';
import {
  artifactRoute,
  downloadRoute,
  jobEventsRoute,
  jobStatusRoute,
  optimizeRoute,
  statsRoute
} from './schemas';
import type { OptimizationService } from './service';

function toJobStatus(job: JobSnapshot) {
  return {
    jobId: job.id,
    state: job.state,
    createdAt: new Date(job.createdAt).toISOString(),
    ...(job.finishedAt !== undefined ? { finishedAt: new Date(job.finishedAt).toISOString() } : {}),
    options: { jpegQuality: job.options.jpegQuality, convertPngToJpeg: job.options.convertPngToJpeg },
    progress: job.progress,
    processedCount: job.processedCount,
    totalCount: job.totalCount,
    results: [...job.results],
    ...(job.artifactId ? { artifactId: job.artifactId, downloadUrl: `/optimize/${job.id}/download` } : {}),
    ...(job.error !== undefined ? { error: job.error } : {}),
    consumers: job.consumers
  };
}

function archiveHeaders(jobId: string) {
  return {
    'Content-Type': 'application/zip',
    'Content-Disposition': `attachment; filename="optimized-${jobId}.zip"`
  };
}

export interface OptimizeRouteOptions {
  maxFileSize?: number;
}

export function registerOptimizeRoutes(
  app: OpenAPIHono,
  service: OptimizationService,
  { maxFileSize = env.MAX_FILE_SIZE }: OptimizeRouteOptions = {}
) {
  app.openapi(optimizeRoute, async (c) => {
    try {
      const { file, jpegQuality, convertPngToJpeg } = c.req.valid('form');
      logger.info({ fileName: file.name, fileSize: file.size }, 'Archive received');

      if (file.size > maxFileSize) {
        return c.json({ error: 'File too large', message: `Archive exceeds ${maxFileSize} bytes` }, 413);
      }

      const archive = Buffer.from(await file.arrayBuffer());
      const jobId = await service.submit(archive, {
        jpegQuality,
        convertPngToJpeg: parseBooleanFlag(convertPngToJpeg)
      });

      return c.json(
        {
          jobId,
          statusUrl: `/optimize/${jobId}`,
          eventsUrl: `/optimize/${jobId}/events`
        },
        202
      );
    } catch (error) {
      if (error instanceof ValidationError) {
        return c.json({ error: 'Invalid submission', message: error.message }, 400);
      }
      const errorMessage = toErrorMessage(error);
      logger.error({ error: errorMessage }, 'Submission failed');
      return c.json({ error: 'Submission failed', message: errorMessage }, 500);
    }
  });

  app.openapi(jobStatusRoute, (c) => {
    const { jobId } = c.req.valid('param');
    const job = service.registry.lookup(jobId);
    if (!job) {
      return c.json({ error: 'Job not found' }, 404);
    }
    return c.json(toJobStatus(job), 200);
  });

  app.openAPIRegistry.registerPath(jobEventsRoute);

  app.get('/optimize/:jobId/events', (c) => {
    const jobId = c.req.param('jobId');

    let events: EventStream;
    try {
      events = service.streamEvents(jobId);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return c.json({ error: 'Job not found', message: error.message }, 404);
      }
      throw error;
    }

    logger.info({ jobId }, 'Event stream attached');

    return streamSSE(
      c,
      async (stream) => {
        stream.onAbort(() => {
          events.close();
          logger.info({ jobId }, 'Event stream disconnected');
        });

        const keepalive = setInterval(() => {
          stream.write(': keepalive\n\n').catch((error: unknown) => {
            logger.debug({ jobId, error: toErrorMessage(error) }, 'Keepalive write failed');
          });
        }, env.SSE_KEEPALIVE_MS);

        try {
          for await (const event of events) {
            await stream.writeSSE({ event: event.type, data: JSON.stringify(event) });
          }
        } finally {
          clearInterval(keepalive);
          events.close();
        }
      },
      async (error) => {
        logger.error({ jobId, error: error.message }, 'Event stream failed');
      }
    );
  });

  app.openapi(downloadRoute, async (c) => {
    const { jobId } = c.req.valid('param');
    const query = c.req.valid('query');

    try {
      const artifact = await service.fetchArtifact(jobId, { reclaim: query.delete === 'yes' });
      return c.body(new Uint8Array(artifact.bytes), 200, archiveHeaders(artifact.jobId));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return c.json({ error: 'Artifact not found', message: error.message }, 404);
      }
      throw error;
    }
  });

  app.openapi(artifactRoute, async (c) => {
    const { artifactId } = c.req.valid('param');
    const query = c.req.valid('query');

    try {
      const artifact = await service.fetchArtifact(artifactId, { reclaim: query.delete === 'yes' });
      return c.body(new Uint8Array(artifact.bytes), 200, archiveHeaders(artifact.jobId));
    } catch (error) {
      if (error instanceof NotFoundError) {
        return c.json({ error: 'Artifact not found', message: error.message }, 404);
      }
      throw error;
    }
  });

  app.openapi(statsRoute, (c) => {
    return c.json(service.stats(), 200);
  });
}
