import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  NoSuchKey
} from '@aws-sdk/client-s3';
import { mkdir, readFile, rm, writeFile } from 'fs/promises';
import path from 'path';
import { env } from '~/config/env';
import { logger } from '~/config/logger';

const ARTIFACT_ID_PATTERN = /^[a-f0-9]{32}$/;

/**
 * Finished archives, addressed by artifact id. Written once, read-only
 * afterwards, deleted on reclaim.
 */
export interface ArtifactStore {
  put(artifactId: string, bytes: Buffer): Promise<void>;
  get(artifactId: string): Promise<Buffer | null>;
  delete(artifactId: string): Promise<void>;
}

export function isArtifactId(value: string): boolean {
  return ARTIFACT_ID_PATTERN.test(value);
}

export class LocalArtifactStore implements ArtifactStore {
  constructor(private readonly dir: string) {}

  private pathFor(artifactId: string): string {
    return path.join(this.dir, `${artifactId}.zip`);
  }

  async put(artifactId: string, bytes: Buffer): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(artifactId), bytes, { flag: 'wx' });
  }

  async get(artifactId: string): Promise<Buffer | null> {
    if (!isArtifactId(artifactId)) return null;
    try {
      return await readFile(this.pathFor(artifactId));
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async delete(artifactId: string): Promise<void> {
    if (!isArtifactId(artifactId)) return;
    await rm(this.pathFor(artifactId), { force: true });
  }
}

export interface S3StorageConfig {
  endpoint: string;
  region: string;
  bucket: string;
  accessKeyId: string;
  secretAccessKey: string;
  pathPrefix: string;
}

export class S3ArtifactStore implements ArtifactStore {
  private readonly client: S3Client;

  constructor(private readonly config: S3StorageConfig) {
    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      forcePathStyle: true,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey
      }
    });
  }

  private keyFor(artifactId: string): string {
    return `${this.config.pathPrefix}/artifacts/${artifactId}.zip`;
  }

  async put(artifactId: string, bytes: Buffer): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: this.keyFor(artifactId),
        Body: bytes,
        ContentType: 'application/zip'
      })
    );
  }

  async get(artifactId: string): Promise<Buffer | null> {
    if (!isArtifactId(artifactId)) return null;
    try {
      const response = await this.client.send(
        new GetObjectCommand({ Bucket: this.config.bucket, Key: this.keyFor(artifactId) })
      );
      if (!response.Body) return null;
      return Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof NoSuchKey) return null;
      throw error;
    }
  }

  async delete(artifactId: string): Promise<void> {
    if (!isArtifactId(artifactId)) return;
    await this.client.send(new DeleteObjectCommand({ Bucket: this.config.bucket, Key: this.keyFor(artifactId) }));
  }

  async checkHealth(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.config.bucket }));
      logger.info({ bucket: this.config.bucket }, 'S3 health check passed');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error({ error: errorMessage }, 'S3 health check failed');
      throw new Error(`S3 health check failed: ${errorMessage}`);
    }
  }
}

export function createArtifactStore(): ArtifactStore {
  if (env.STORAGE_MODE !== 's3') {
    return new LocalArtifactStore(path.join(env.TEMP_DIR, 'artifacts'));
  }

  if (!env.S3_ENDPOINT || !env.S3_REGION || !env.S3_BUCKET ||
      !env.S3_ACCESS_KEY_ID || !env.S3_SECRET_ACCESS_KEY) {
    throw new Error('S3 mode enabled but configuration is incomplete');
  }

  return new S3ArtifactStore({
    endpoint: env.S3_ENDPOINT,
    region: env.S3_REGION,
    bucket: env.S3_BUCKET,
    accessKeyId: env.S3_ACCESS_KEY_ID,
    secretAccessKey: env.S3_SECRET_ACCESS_KEY,
    pathPrefix: env.S3_PATH_PREFIX
  });
}
