import { z } from 'zod';

if (process.env['NODE_ENV'] !== 'production') {
  const dotenv = await import('dotenv');
  dotenv.config();
}

const schema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),

  TEMP_DIR: z.string().default('/tmp/zip-image-optimizer'),
  MAX_FILE_SIZE: z.coerce.number().default(100 * 1024 * 1024),

  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DEFAULT_JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(85),

  STORAGE_MODE: z.enum(['local', 's3']).default('local'),

  S3_ENDPOINT: z.string().optional(),
  S3_REGION: z.string().optional(),
  S3_BUCKET: z.string().optional(),
  S3_ACCESS_KEY_ID: z.string().optional(),
  S3_SECRET_ACCESS_KEY: z.string().optional(),
  S3_PATH_PREFIX: z.string().default('zip-image-optimizer'),

  // Finished artifacts are reclaimed after this window even if nobody downloads them
  ARTIFACT_RETENTION_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  JOB_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 1000),

  EVENT_BACKLOG_LIMIT: z.coerce.number().int().positive().default(256),
  SSE_KEEPALIVE_MS: z.coerce.number().int().positive().default(10 * 1000)
});

export type Env = z.infer<typeof schema>;

export const env = schema.parse(process.env);
