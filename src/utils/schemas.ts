import { z } from '@hono/zod-openapi';
import { ImageFormat } from './format';

/**
 * Common file upload schema
 */
export const FileSchema = z.file().openapi({
  description: 'ZIP archive of images to optimize'
});

/**
 * Form and query parameters
 */
export const BooleanFlagSchema = z
  .enum(['true', 'false', 'on', 'off', '1', '0'])
  .optional()
  .openapi({
    example: 'true',
    description: 'Checkbox-style boolean flag'
  });

export function parseBooleanFlag(value: string | undefined): boolean {
  return value === 'true' || value === 'on' || value === '1';
}

export const DeleteQuerySchema = z.object({
  delete: z
    .enum(['yes', 'no'])
    .optional()
    .default('yes')
    .openapi({
      param: {
        name: 'delete',
        in: 'query'
      },
      example: 'yes',
      description: 'Reclaim the artifact after download (yes) or keep it until retention expires (no)'
    })
});

/**
 * Path parameters
 */
export const JobIdParamSchema = z.object({
  jobId: z.string().openapi({
    param: {
      name: 'jobId',
      in: 'path'
    },
    example: '0b5e4a51-3f0a-4b52-9d0c-6a1d2f3e4b5c',
    description: 'Identifier returned when the archive was submitted'
  })
});

export const ArtifactIdParamSchema = z.object({
  artifactId: z.string().openapi({
    param: {
      name: 'artifactId',
      in: 'path'
    },
    example: '3f2b8c9d0e1f4a5b6c7d8e9f0a1b2c3d',
    description: 'Identifier carried by the complete event'
  })
});

/**
 * Response schemas
 */
export const ErrorSchema = z
  .object({
    error: z.string().openapi({
      example: 'Invalid archive'
    }),
    message: z.string().optional().openapi({
      example: 'Payload is not a well-formed ZIP archive'
    })
  })
  .openapi('Error');

export const EndpointsResponseSchema = z
  .object({
    endpoints: z.array(
      z.object({
        path: z.string(),
        method: z.string(),
        description: z.string()
      })
    )
  })
  .openapi('EndpointsResponse');

export const OptimizedResultSchema = z
  .object({
    name: z.string(),
    outputName: z.string(),
    outputFormat: z.enum(ImageFormat),
    originalSize: z.number(),
    optimizedSize: z.number(),
    savingPercentage: z.number().openapi({ description: 'Negative when the output grew' }),
    status: z.enum(['success', 'skipped', 'error']),
    converted: z.boolean(),
    errorDetail: z.string().optional()
  })
  .openapi('OptimizedResult');

export const JobAcceptedSchema = z
  .object({
    jobId: z.string(),
    statusUrl: z.string(),
    eventsUrl: z.string()
  })
  .openapi('JobAccepted');

export const JobStatusSchema = z
  .object({
    jobId: z.string(),
    state: z.enum(['created', 'running', 'done', 'failed']),
    createdAt: z.string(),
    finishedAt: z.string().optional(),
    options: z.object({
      jpegQuality: z.number(),
      convertPngToJpeg: z.boolean()
    }),
    progress: z.number(),
    processedCount: z.number(),
    totalCount: z.number(),
    results: z.array(OptimizedResultSchema),
    artifactId: z.string().optional(),
    downloadUrl: z.string().optional(),
    error: z.string().optional(),
    consumers: z.number()
  })
  .openapi('JobStatus');

export const StatsResponseSchema = z
  .object({
    optimizationCount: z.number().openapi({ description: 'Jobs completed since the process started' }),
    activeJobs: z.number(),
    queuedJobs: z.number()
  })
  .openapi('Stats');
