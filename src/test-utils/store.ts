import type { ArtifactStore } from '~/utils/storage';
import { OptimizationService } from '~/components/optimize/service';
import type { OptimizationServiceOptions } from '~/components/optimize/service';
import type { ProgressEvent } from '~/queue/optimize/schemas';

export class MemoryArtifactStore implements ArtifactStore {
  readonly artifacts = new Map<string, Buffer>();

  async put(artifactId: string, bytes: Buffer): Promise<void> {
    this.artifacts.set(artifactId, Buffer.from(bytes));
  }

  async get(artifactId: string): Promise<Buffer | null> {
    const bytes = this.artifacts.get(artifactId);
    return bytes ? Buffer.from(bytes) : null;
  }

  async delete(artifactId: string): Promise<void> {
    this.artifacts.delete(artifactId);
  }
}

export function createTestService(overrides: Partial<OptimizationServiceOptions> = {}) {
  const store = new MemoryArtifactStore();
  const service = new OptimizationService({
    store,
    concurrency: 2,
    retentionMs: 60_000,
    idleTimeoutMs: 30_000,
    backlogLimit: 64,
    ...overrides
  });
  return { service, store };
}

export async function collectEvents(stream: AsyncIterable<ProgressEvent>): Promise<ProgressEvent[]> {
  const events: ProgressEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}
