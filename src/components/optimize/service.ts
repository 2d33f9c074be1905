import { randomUUID } from 'crypto';
import { env } from '~/config/env';
import { logger } from '~/config/logger';
import { JobQueue, JobType } from '~/queue';
import { processOptimizeJob } from '~/queue/optimize/processor';
import { OptimizationOptionsSchema } from '~/queue/optimize/schemas';
import type { OptimizationOptions, TerminalEvent } from '~/queue/optimize/schemas';
import { inspectArchive } from '~/utils/archive';
import { NotFoundError, ValidationError, toErrorMessage } from '~/utils/errors';
import { EventChannel } from '~/utils/events';
import type { EventStream } from '~/utils/events';
import { JobRegistry, isTerminalState } from '~/utils/registry';
import type { JobSnapshot } from '~/utils/registry';
import { createArtifactStore } from '~/utils/storage';
import type { ArtifactStore } from '~/utils/storage';

const IDLE_TIMEOUT_REASON = 'Job timed out with no attached consumer';

export interface OptimizationServiceOptions {
  store: ArtifactStore;
  concurrency: number;
  retentionMs: number;
  idleTimeoutMs: number;
  backlogLimit: number;
  now?: () => number;
}

export interface FetchedArtifact {
  jobId: string;
  artifactId: string;
  bytes: Buffer;
}

export interface SweepResult {
  timedOut: string[];
  expired: string[];
}

export interface OptimizationStats {
  optimizationCount: number;
  activeJobs: number;
  queuedJobs: number;
}

export function terminalEventOf(job: JobSnapshot): TerminalEvent | undefined {
  if (job.state === 'done' && job.artifactId) {
    return { type: 'complete', artifactId: job.artifactId };
  }
  if (job.state === 'failed') {
    return { type: 'failed', reason: job.error ?? 'Job failed' };
  }
  return undefined;
}

function singleEventStream(event: TerminalEvent): EventStream {
  let delivered = false;
  const stream: EventStream = {
    next: async () => {
      if (delivered) return { value: undefined, done: true };
      delivered = true;
      return { value: event, done: false };
    },
    return: async () => {
      delivered = true;
      return { value: undefined, done: true };
    },
    close: () => {
      delivered = true;
    },
    [Symbol.asyncIterator]: () => stream
  };
  return stream;
}

/**
 * Owns the job lifecycle: accepts submissions, hands them to the queue,
 * serves event streams and artifacts, and reclaims abandoned jobs.
 */
export class OptimizationService {
  readonly registry: JobRegistry;
  readonly channel: EventChannel;
  private readonly queue: JobQueue;
  private readonly controllers = new Map<string, AbortController>();
  private readonly now: () => number;

  constructor(private readonly options: OptimizationServiceOptions) {
    this.now = options.now ?? Date.now;
    this.registry = new JobRegistry(this.now);
    this.channel = new EventChannel({
      backlogLimit: options.backlogLimit,
      onConsumersChanged: (jobId, consumers) => {
        this.registry.setConsumers(jobId, consumers);
        logger.debug({ jobId, consumers }, 'Event consumers changed');
      }
    });
    this.queue = new JobQueue(options.concurrency);
  }

  /**
   * Validates the request and schedules the job. Rejections happen here,
   * before any job or event exists; everything after surfaces as events.
   */
  async submit(archive: Buffer, input: OptimizationOptions): Promise<string> {
    const parsed = OptimizationOptionsSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.map(String).join('.') || 'options';
      throw new ValidationError(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`);
    }

    try {
      await inspectArchive(archive);
    } catch (error) {
      throw new ValidationError(`Payload is not a well-formed ZIP archive: ${toErrorMessage(error)}`);
    }

    const jobId = randomUUID();
    const options = parsed.data;
    const controller = new AbortController();

    this.registry.create(jobId, options);
    this.channel.open(jobId);
    this.controllers.set(jobId, controller);

    this.queue.add(JobType.OPTIMIZE_ARCHIVE, jobId, async () => {
      try {
        await processOptimizeJob(
          { jobId, archive, options },
          { registry: this.registry, channel: this.channel, store: this.options.store, signal: controller.signal }
        );
      } finally {
        this.controllers.delete(jobId);
      }
    });

    logger.info({ jobId, archiveBytes: archive.length, options }, 'Optimization job accepted');
    return jobId;
  }

  lookup(jobId: string): JobSnapshot {
    return this.registry.require(jobId);
  }

  /**
   * Attaches a consumer from this point on. A job that already finished
   * yields its terminal event once.
   */
  streamEvents(jobId: string): EventStream {
    const job = this.registry.require(jobId);
    const terminal = terminalEventOf(job);
    if (terminal) {
      return singleEventStream(terminal);
    }

    const stream = this.channel.subscribe(jobId);
    if (stream) {
      return stream;
    }

    const current = terminalEventOf(this.registry.require(jobId));
    if (!current) {
      throw new NotFoundError(`No event stream for job: ${jobId}`);
    }
    return singleEventStream(current);
  }

  /**
   * Looks the artifact up by job id or artifact id. With `reclaim` the
   * artifact and its job are destroyed once the bytes are read.
   */
  async fetchArtifact(id: string, { reclaim = true }: { reclaim?: boolean } = {}): Promise<FetchedArtifact> {
    const job = this.registry.lookup(id) ?? this.registry.findByArtifact(id);
    if (!job || job.state !== 'done' || !job.artifactId) {
      throw new NotFoundError(`Artifact not found: ${id}`);
    }

    const bytes = await this.options.store.get(job.artifactId);
    if (!bytes) {
      this.forget(job.id);
      throw new NotFoundError(`Artifact not found: ${id}`);
    }

    if (reclaim) {
      await this.reclaim(job);
      logger.info({ jobId: job.id, artifactId: job.artifactId }, 'Artifact retrieved and reclaimed');
    }

    return { jobId: job.id, artifactId: job.artifactId, bytes };
  }

  /** Forces out unattended jobs and reclaims jobs past retention. */
  async sweep(): Promise<SweepResult> {
    const now = this.now();
    const result: SweepResult = { timedOut: [], expired: [] };

    for (const job of this.registry.list()) {
      if (isTerminalState(job.state)) {
        if (job.finishedAt !== undefined && now - job.finishedAt >= this.options.retentionMs) {
          await this.reclaim(job);
          result.expired.push(job.id);
        }
        continue;
      }

      if (job.consumers === 0 && now - job.lastSeenAt >= this.options.idleTimeoutMs) {
        const controller = this.controllers.get(job.id);
        if (controller && !controller.signal.aborted) {
          controller.abort(new Error(IDLE_TIMEOUT_REASON));
          result.timedOut.push(job.id);
        }
        // Not started yet: fail now; the queued task finds its signal aborted and exits
        if (job.state === 'created' && this.registry.fail(job.id, IDLE_TIMEOUT_REASON)) {
          this.channel.publish(job.id, { type: 'failed', reason: IDLE_TIMEOUT_REASON });
        }
      }
    }

    if (result.timedOut.length || result.expired.length) {
      logger.info(result, 'Sweep reclaimed jobs');
    }
    return result;
  }

  startSweeper(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.sweep().catch((error: unknown) => {
        logger.error({ error: toErrorMessage(error) }, 'Sweep failed');
      });
    }, intervalMs);
    timer.unref();
    return () => clearInterval(timer);
  }

  stats(): OptimizationStats {
    const jobs = this.registry.list();
    return {
      optimizationCount: this.registry.completedCount,
      activeJobs: jobs.filter((job) => !isTerminalState(job.state)).length,
      queuedJobs: this.queue.size
    };
  }

  onIdle(): Promise<void> {
    return this.queue.onIdle();
  }

  private async reclaim(job: JobSnapshot): Promise<void> {
    if (job.artifactId) {
      await this.options.store.delete(job.artifactId);
    }
    this.forget(job.id);
  }

  private forget(jobId: string): void {
    this.registry.remove(jobId);
    this.channel.delete(jobId);
  }
}

export function createOptimizationService(store: ArtifactStore = createArtifactStore()): OptimizationService {
  return new OptimizationService({
    store,
    concurrency: env.WORKER_CONCURRENCY,
    retentionMs: env.ARTIFACT_RETENTION_MS,
    idleTimeoutMs: env.JOB_IDLE_TIMEOUT_MS,
    backlogLimit: env.EVENT_BACKLOG_LIMIT
  });
}
