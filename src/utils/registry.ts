import { NotFoundError } from './errors';
import type { OptimizationOptions, OptimizedResult } from '~/queue/optimize/schemas';

export type JobState = 'created' | 'running' | 'done' | 'failed';

export interface JobRecord {
  id: string;
  state: JobState;
  options: OptimizationOptions;
  createdAt: number;
  updatedAt: number;
  finishedAt?: number;
  totalCount: number;
  processedCount: number;
  progress: number;
  results: OptimizedResult[];
  artifactId?: string;
  error?: string;
  consumers: number;
  lastSeenAt: number;
}

export type JobSnapshot = Readonly<Omit<JobRecord, 'results'>> & { results: readonly OptimizedResult[] };

export function isTerminalState(state: JobState): boolean {
  return state === 'done' || state === 'failed';
}

/**
 * Process-wide job table. Every mutation is keyed by job id; terminal
 * states are absorbing and further transitions are refused.
 */
export class JobRegistry {
  private jobs = new Map<string, JobRecord>();
  private artifacts = new Map<string, string>();
  private completed = 0;

  constructor(private readonly now: () => number = Date.now) {}

  create(id: string, options: OptimizationOptions): JobSnapshot {
    const now = this.now();
    const job: JobRecord = {
      id,
      state: 'created',
      options,
      createdAt: now,
      updatedAt: now,
      totalCount: 0,
      processedCount: 0,
      progress: 0,
      results: [],
      consumers: 0,
      lastSeenAt: now
    };
    this.jobs.set(id, job);
    return this.snapshot(job);
  }

  lookup(id: string): JobSnapshot | undefined {
    const job = this.jobs.get(id);
    return job ? this.snapshot(job) : undefined;
  }

  require(id: string): JobSnapshot {
    const job = this.lookup(id);
    if (!job) {
      throw new NotFoundError(`Job not found: ${id}`);
    }
    return job;
  }

  findByArtifact(artifactId: string): JobSnapshot | undefined {
    const jobId = this.artifacts.get(artifactId);
    return jobId ? this.lookup(jobId) : undefined;
  }

  list(): JobSnapshot[] {
    return [...this.jobs.values()].map((job) => this.snapshot(job));
  }

  markRunning(id: string, totalCount: number): boolean {
    return this.update(id, (job) => {
      if (job.state !== 'created') return false;
      job.state = 'running';
      job.totalCount = totalCount;
      return true;
    });
  }

  recordResult(id: string, result: OptimizedResult): number | undefined {
    const job = this.jobs.get(id);
    if (!job || job.state !== 'running') return undefined;

    job.results.push(result);
    job.processedCount += 1;
    job.progress = job.totalCount > 0 ? (job.processedCount / job.totalCount) * 100 : 100;
    job.updatedAt = this.now();
    return job.progress;
  }

  /** Registers the finished artifact and moves the job to `done`. */
  register(id: string, artifactId: string): boolean {
    const registered = this.update(id, (job) => {
      if (isTerminalState(job.state)) return false;
      job.state = 'done';
      job.artifactId = artifactId;
      job.progress = 100;
      job.finishedAt = this.now();
      return true;
    });
    if (registered) {
      this.artifacts.set(artifactId, id);
      this.completed += 1;
    }
    return registered;
  }

  fail(id: string, reason: string): boolean {
    return this.update(id, (job) => {
      if (isTerminalState(job.state)) return false;
      job.state = 'failed';
      job.error = reason;
      job.finishedAt = this.now();
      return true;
    });
  }

  setConsumers(id: string, consumers: number): void {
    this.update(id, (job) => {
      job.consumers = consumers;
      job.lastSeenAt = this.now();
      return true;
    });
  }

  remove(id: string): JobSnapshot | undefined {
    const job = this.jobs.get(id);
    if (!job) return undefined;
    this.jobs.delete(id);
    if (job.artifactId) {
      this.artifacts.delete(job.artifactId);
    }
    return this.snapshot(job);
  }

  /** Lifetime number of jobs that reached `done`, including removed ones. */
  get completedCount(): number {
    return this.completed;
  }

  get size(): number {
    return this.jobs.size;
  }

  private update(id: string, mutate: (job: JobRecord) => boolean): boolean {
    const job = this.jobs.get(id);
    if (!job) return false;
    const changed = mutate(job);
    if (changed) {
      job.updatedAt = this.now();
    }
    return changed;
  }

  private snapshot(job: JobRecord): JobSnapshot {
    return { ...job, results: [...job.results] };
  }
}
