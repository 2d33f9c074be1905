import { createRoute, z } from '@hono/zod-openapi';
import { env } from '~/config/env';
import {
  ArtifactIdParamSchema,
  BooleanFlagSchema,
  DeleteQuerySchema,
  ErrorSchema,
  FileSchema,
  JobAcceptedSchema,
  JobIdParamSchema,
  JobStatusSchema,
  StatsResponseSchema
} from '~/utils/schemas';

const errorResponse = (description: string) => ({
  content: {
    'application/json': {
      schema: ErrorSchema
    }
  },
  description
});

const archiveResponse = {
  content: {
    'application/zip': {
      schema: FileSchema
    }
  },
  description: 'Optimized images as a ZIP archive'
};

/**
 * POST /optimize - Submit a ZIP archive of images for optimization
 */
export const optimizeRoute = createRoute({
  method: 'post',
  path: '/optimize',
  tags: ['Optimize'],
  request: {
    body: {
      content: {
        'multipart/form-data': {
          schema: z.object({
            file: FileSchema,
            jpegQuality: z.coerce
              .number()
              .int()
              .min(1)
              .max(100)
              .default(env.DEFAULT_JPEG_QUALITY)
              .openapi({ example: 80, description: 'JPEG quality, 1-100' }),
            convertPngToJpeg: BooleanFlagSchema
          })
        }
      },
      required: true
    }
  },
  responses: {
    202: {
      content: {
        'application/json': {
          schema: JobAcceptedSchema
        }
      },
      description: 'Job accepted; follow eventsUrl for progress'
    },
    400: errorResponse('Invalid options or malformed archive'),
    413: errorResponse('Archive exceeds the upload limit'),
    500: errorResponse('Submission failed')
  }
});

/**
 * GET /optimize/{jobId} - Current job state, the source of truth after a reconnect
 */
export const jobStatusRoute = createRoute({
  method: 'get',
  path: '/optimize/{jobId}',
  tags: ['Optimize'],
  request: {
    params: JobIdParamSchema
  },
  responses: {
    200: {
      content: {
        'application/json': {
          schema: JobStatusSchema
        }
      },
      description: 'Job snapshot'
    },
    404: errorResponse('Unknown or reclaimed job')
  }
});

/**
 * GET /optimize/{jobId}/events - Server-Sent Events progress stream
 *
 * Registered for documentation only; the handler is a plain streaming route.
 */
export const jobEventsRoute = createRoute({
  method: 'get',
  path: '/optimize/{jobId}/events',
  tags: ['Optimize'],
  request: {
    params: JobIdParamSchema
  },
  responses: {
    200: {
      content: {
        'text/event-stream': {
          schema: z.string().openapi({
            example: 'event: progress\ndata: {"type":"progress","percent":50}\n\n'
          })
        }
      },
      description: 'One JSON event per message: progress, file_complete, then complete or failed'
    },
    404: errorResponse('Unknown or reclaimed job')
  }
});

/**
 * GET /optimize/{jobId}/download - Download the finished archive
 */
export const downloadRoute = createRoute({
  method: 'get',
  path: '/optimize/{jobId}/download',
  tags: ['Optimize'],
  request: {
    params: JobIdParamSchema,
    query: DeleteQuerySchema
  },
  responses: {
    200: archiveResponse,
    404: errorResponse('Job not finished, unknown or already reclaimed')
  }
});

/**
 * GET /artifacts/{artifactId} - Download a finished archive by artifact id
 */
export const artifactRoute = createRoute({
  method: 'get',
  path: '/artifacts/{artifactId}',
  tags: ['Optimize'],
  request: {
    params: ArtifactIdParamSchema,
    query: DeleteQuerySchema
  },
  responses: {
    200: archiveResponse,
    404: errorResponse('Unknown or already reclaimed artifact')
  }
});

/**
 * GET /stats - Lifetime optimization counter
 */
export const statsRoute = createRoute({
  method: 'get',
  path: '/stats',
  tags: ['Optimize'],
  responses: {
    200: {
      content: {
        'application/json': {
          schema: StatsResponseSchema
        }
      },
      description: 'Service counters'
    }
  }
});
