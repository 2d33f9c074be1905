import { randomUUID } from 'crypto';
import path from 'path';
import { logger } from '~/config/logger';
import { createArchive, extractEntries, isImageEntry } from '~/utils/archive';
import type { ArchiveFile, SourceEntry } from '~/utils/archive';
import { toErrorMessage } from '~/utils/errors';
import type { EventChannel } from '~/utils/events';
import type { JobRegistry } from '~/utils/registry';
import type { ArtifactStore } from '~/utils/storage';
import { transform } from './transformer';
import type { OptimizeJobData, OptimizedResult } from './schemas';

export interface OptimizeJobContext {
  registry: JobRegistry;
  channel: EventChannel;
  store: ArtifactStore;
  signal?: AbortSignal;
}

export function generateArtifactId(): string {
  return randomUUID().replace(/-/g, '');
}

/**
 * Picks an output name that no other member of the batch uses, appending
 * `-1`, `-2`, ... before the extension.
 */
export function claimName(name: string, taken: Set<string>): string {
  if (!taken.has(name)) return name;
  const ext = path.posix.extname(name);
  const base = ext ? name.slice(0, -ext.length) : name;
  for (let n = 1; ; n++) {
    const candidate = `${base}-${n}${ext}`;
    if (!taken.has(candidate)) return candidate;
  }
}

function failJob(ctx: OptimizeJobContext, jobId: string, reason: string): void {
  if (ctx.registry.fail(jobId, reason)) {
    ctx.channel.publish(jobId, { type: 'failed', reason });
    logger.error({ jobId, reason }, 'Optimization job failed');
  }
}

/**
 * Drives one batch: extract, transform each image in archive order, then
 * archive and register the result. Per-file failures are recorded and the
 * batch carries on; only archive-level faults fail the job, and then any
 * partial output is discarded.
 */
export async function processOptimizeJob(data: OptimizeJobData, ctx: OptimizeJobContext): Promise<void> {
  const { jobId, archive, options } = data;
  const { registry, channel, store, signal } = ctx;
  const startTime = Date.now();

  if (signal?.aborted) {
    failJob(ctx, jobId, toErrorMessage(signal.reason, 'Job aborted before it started'));
    return;
  }

  let entries: SourceEntry[];
  try {
    entries = await extractEntries(archive);
  } catch (error) {
    failJob(ctx, jobId, `Could not open archive: ${toErrorMessage(error)}`);
    return;
  }

  const images = entries.filter(isImageEntry);
  if (images.length === 0) {
    failJob(ctx, jobId, 'Archive contains no image entries');
    return;
  }

  if (!registry.markRunning(jobId, images.length)) {
    logger.warn({ jobId }, 'Job is no longer pending; skipping');
    return;
  }
  logger.info({ jobId, totalFiles: images.length, skipped: entries.length - images.length, options }, 'Starting optimization');

  let artifactId: string | undefined;
  try {
    const taken = new Set(images.map((entry) => entry.name));
    const outputs: ArchiveFile[] = [];

    for (const [index, entry] of images.entries()) {
      signal?.throwIfAborted();

      const transformed = await transform(entry.name, entry.bytes, entry.detectedFormat, options);
      let result: OptimizedResult = transformed.result;
      if (result.converted) {
        const outputName = claimName(result.outputName, taken);
        taken.add(outputName);
        result = { ...result, outputName };
      }
      outputs.push({ name: result.outputName, bytes: transformed.bytes });

      if (result.status === 'error') {
        logger.warn({ jobId, file: entry.name, error: result.errorDetail }, 'Image could not be optimized');
      }

      registry.recordResult(jobId, result);
      channel.publish(jobId, { type: 'file_complete', result });
      channel.publish(jobId, { type: 'progress', percent: ((index + 1) / images.length) * 100 });
    }

    signal?.throwIfAborted();
    const output = await createArchive(outputs);
    signal?.throwIfAborted();

    artifactId = generateArtifactId();
    await store.put(artifactId, output);

    if (!registry.register(jobId, artifactId)) {
      logger.warn({ jobId, artifactId }, 'Job reached a terminal state elsewhere; discarding artifact');
      await store.delete(artifactId);
      return;
    }
    channel.publish(jobId, { type: 'complete', artifactId });

    logger.info(
      { jobId, artifactId, duration: Date.now() - startTime, outputBytes: output.length },
      'Optimization job completed'
    );
  } catch (error) {
    if (artifactId && registry.lookup(jobId)?.state !== 'done') {
      await store.delete(artifactId).catch((cleanupError: unknown) => {
        logger.error({ jobId, artifactId, error: toErrorMessage(cleanupError) }, 'Failed to discard partial artifact');
      });
    }
    failJob(ctx, jobId, `Processing failed: ${toErrorMessage(error)}`);
  }
}
