import { describe, it, expect } from 'vitest';
import { JobRegistry } from './registry';
import { NotFoundError } from './errors';
import type { OptimizedResult } from '~/queue/optimize/schemas';

const OPTIONS = { jpegQuality: 85, convertPngToJpeg: false };

function resultFor(name: string): OptimizedResult {
  return {
    name,
    outputName: name,
    outputFormat: 'jpeg',
    originalSize: 10,
    optimizedSize: 5,
    savingPercentage: 50,
    status: 'success',
    converted: false
  };
}

function createClock(start = 1_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    }
  };
}

describe('JobRegistry', () => {
  it('should create jobs in the created state', () => {
    const clock = createClock();
    const registry = new JobRegistry(clock.now);

    const job = registry.create('job-1', OPTIONS);

    expect(job).toMatchObject({ id: 'job-1', state: 'created', progress: 0, createdAt: 1_000, consumers: 0 });
    expect(registry.size).toBe(1);
  });

  it('should track progress as results are recorded', () => {
    const registry = new JobRegistry();
    registry.create('job-1', OPTIONS);
    registry.markRunning('job-1', 4);

    expect(registry.recordResult('job-1', resultFor('a.jpg'))).toBe(25);
    expect(registry.recordResult('job-1', resultFor('b.jpg'))).toBe(50);

    const job = registry.require('job-1');
    expect(job.processedCount).toBe(2);
    expect(job.results.map((result) => result.name)).toEqual(['a.jpg', 'b.jpg']);
  });

  it('should refuse results before the job is running', () => {
    const registry = new JobRegistry();
    registry.create('job-1', OPTIONS);

    expect(registry.recordResult('job-1', resultFor('a.jpg'))).toBeUndefined();
    expect(registry.require('job-1').results).toEqual([]);
  });

  it('should register artifacts and count completions', () => {
    const clock = createClock();
    const registry = new JobRegistry(clock.now);
    registry.create('job-1', OPTIONS);
    registry.markRunning('job-1', 1);
    clock.advance(500);

    expect(registry.register('job-1', 'artifact-1')).toBe(true);

    const job = registry.require('job-1');
    expect(job).toMatchObject({ state: 'done', artifactId: 'artifact-1', progress: 100, finishedAt: 1_500 });
    expect(registry.findByArtifact('artifact-1')?.id).toBe('job-1');
    expect(registry.completedCount).toBe(1);
  });

  it('should keep terminal states absorbing', () => {
    const registry = new JobRegistry();
    registry.create('job-1', OPTIONS);
    registry.markRunning('job-1', 1);

    expect(registry.fail('job-1', 'boom')).toBe(true);
    expect(registry.register('job-1', 'artifact-1')).toBe(false);
    expect(registry.fail('job-1', 'again')).toBe(false);
    expect(registry.markRunning('job-1', 3)).toBe(false);
    expect(registry.require('job-1')).toMatchObject({ state: 'failed', error: 'boom' });
    expect(registry.completedCount).toBe(0);
  });

  it('should return copies that do not alias internal state', () => {
    const registry = new JobRegistry();
    registry.create('job-1', OPTIONS);
    registry.markRunning('job-1', 2);
    const before = registry.require('job-1');

    registry.recordResult('job-1', resultFor('a.jpg'));

    expect(before.results).toEqual([]);
    expect(before.state).toBe('running');
  });

  it('should refresh lastSeenAt when consumers change', () => {
    const clock = createClock();
    const registry = new JobRegistry(clock.now);
    registry.create('job-1', OPTIONS);
    clock.advance(2_000);

    registry.setConsumers('job-1', 1);

    expect(registry.require('job-1')).toMatchObject({ consumers: 1, lastSeenAt: 3_000 });
  });

  it('should forget removed jobs but keep the lifetime counter', () => {
    const registry = new JobRegistry();
    registry.create('job-1', OPTIONS);
    registry.markRunning('job-1', 1);
    registry.register('job-1', 'artifact-1');

    expect(registry.remove('job-1')?.id).toBe('job-1');
    expect(registry.lookup('job-1')).toBeUndefined();
    expect(registry.findByArtifact('artifact-1')).toBeUndefined();
    expect(registry.completedCount).toBe(1);
    expect(() => registry.require('job-1')).toThrow(NotFoundError);
  });
});
