import { logger } from '~/config/logger';

export const JobType = {
  OPTIMIZE_ARCHIVE: 'optimize:archive'
} as const;

export type JobTypeName = (typeof JobType)[keyof typeof JobType];

export type JobTask = () => Promise<void>;

interface QueuedJob {
  jobId: string;
  name: JobTypeName;
  task: JobTask;
}

/**
 * In-process job queue with bounded concurrency. Jobs start on a later
 * macrotask so the caller that enqueued them returns first.
 */
export class JobQueue {
  private pending: QueuedJob[] = [];
  private active = 0;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly concurrency: number) {}

  add(name: JobTypeName, jobId: string, task: JobTask): void {
    logger.debug({ jobId, jobType: name }, 'Adding job to queue');
    this.pending.push({ jobId, name, task });
    setImmediate(() => this.drain());
  }

  get size(): number {
    return this.pending.length;
  }

  get running(): number {
    return this.active;
  }

  onIdle(): Promise<void> {
    if (this.active === 0 && this.pending.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private drain(): void {
    while (this.active < this.concurrency) {
      const job = this.pending.shift();
      if (!job) break;
      this.active += 1;
      this.run(job)
        .finally(() => {
          this.active -= 1;
          this.drain();
          this.notifyIdle();
        })
        .catch((error: unknown) => {
          logger.error({ jobId: job.jobId, error: error instanceof Error ? error.message : String(error) }, 'Queue bookkeeping failed');
        });
    }
  }

  private async run(job: QueuedJob): Promise<void> {
    logger.info({ jobId: job.jobId, jobType: job.name }, 'Processing job');
    try {
      await job.task();
      logger.info({ jobId: job.jobId }, 'Job finished');
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      logger.error({ jobId: job.jobId, error: errorMessage }, 'Job failed');
    }
  }

  private notifyIdle(): void {
    if (this.active !== 0 || this.pending.length !== 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
