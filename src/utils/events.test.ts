import { describe, it, expect, vi } from 'vitest';
import { EventChannel } from './events';
import type { OptimizedResult } from '~/queue/optimize/schemas';
import { collectEvents } from '~/test-utils/store';

const RESULT: OptimizedResult = {
  name: 'a.jpg',
  outputName: 'a.jpg',
  outputFormat: 'jpeg',
  originalSize: 100,
  optimizedSize: 60,
  savingPercentage: 40,
  status: 'success',
  converted: false
};

describe('EventChannel', () => {
  it('should deliver events in publish order and end after the terminal event', async () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');
    const stream = channel.subscribe('job-1');
    if (!stream) throw new Error('expected a stream');

    channel.publish('job-1', { type: 'file_complete', result: RESULT });
    channel.publish('job-1', { type: 'progress', percent: 100 });
    channel.publish('job-1', { type: 'complete', artifactId: 'abc' });

    expect(await collectEvents(stream)).toEqual([
      { type: 'file_complete', result: RESULT },
      { type: 'progress', percent: 100 },
      { type: 'complete', artifactId: 'abc' }
    ]);
  });

  it('should resolve a waiting consumer as events arrive', async () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');
    const stream = channel.subscribe('job-1');
    if (!stream) throw new Error('expected a stream');

    const pending = stream.next();
    channel.publish('job-1', { type: 'progress', percent: 25 });

    await expect(pending).resolves.toEqual({ value: { type: 'progress', percent: 25 }, done: false });
  });

  it('should not replay events published before subscription', async () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');
    channel.publish('job-1', { type: 'progress', percent: 50 });

    const stream = channel.subscribe('job-1');
    if (!stream) throw new Error('expected a stream');
    channel.publish('job-1', { type: 'failed', reason: 'boom' });

    expect(await collectEvents(stream)).toEqual([{ type: 'failed', reason: 'boom' }]);
  });

  it('should reject publishes and subscriptions after the terminal event', () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');

    expect(channel.publish('job-1', { type: 'complete', artifactId: 'abc' })).toBe(true);
    expect(channel.publish('job-1', { type: 'progress', percent: 100 })).toBe(false);
    expect(channel.isOpen('job-1')).toBe(false);
    expect(channel.subscribe('job-1')).toBeUndefined();
  });

  it('should return undefined for unknown topics', () => {
    const channel = new EventChannel({ backlogLimit: 16 });

    expect(channel.subscribe('missing')).toBeUndefined();
    expect(channel.publish('missing', { type: 'progress', percent: 1 })).toBe(false);
  });

  it('should keep jobs isolated', async () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');
    channel.open('job-2');
    const first = channel.subscribe('job-1');
    const second = channel.subscribe('job-2');
    if (!first || !second) throw new Error('expected streams');

    channel.publish('job-1', { type: 'progress', percent: 10 });
    channel.publish('job-2', { type: 'progress', percent: 90 });
    channel.publish('job-2', { type: 'complete', artifactId: 'two' });
    channel.publish('job-1', { type: 'complete', artifactId: 'one' });

    expect(await collectEvents(first)).toEqual([
      { type: 'progress', percent: 10 },
      { type: 'complete', artifactId: 'one' }
    ]);
    expect(await collectEvents(second)).toEqual([
      { type: 'progress', percent: 90 },
      { type: 'complete', artifactId: 'two' }
    ]);
  });

  it('should drop superseded progress for a slow consumer but keep file results', async () => {
    const channel = new EventChannel({ backlogLimit: 2 });
    channel.open('job-1');
    const stream = channel.subscribe('job-1');
    if (!stream) throw new Error('expected a stream');

    channel.publish('job-1', { type: 'progress', percent: 10 });
    channel.publish('job-1', { type: 'progress', percent: 20 });
    channel.publish('job-1', { type: 'progress', percent: 30 });
    channel.publish('job-1', { type: 'file_complete', result: RESULT });
    channel.publish('job-1', { type: 'progress', percent: 40 });
    channel.publish('job-1', { type: 'complete', artifactId: 'abc' });

    expect(await collectEvents(stream)).toEqual([
      { type: 'file_complete', result: RESULT },
      { type: 'progress', percent: 40 },
      { type: 'complete', artifactId: 'abc' }
    ]);
  });

  it('should report consumer counts as streams attach and detach', () => {
    const onConsumersChanged = vi.fn();
    const channel = new EventChannel({ backlogLimit: 16, onConsumersChanged });
    channel.open('job-1');

    const stream = channel.subscribe('job-1');
    expect(channel.consumerCount('job-1')).toBe(1);
    stream?.close();

    expect(channel.consumerCount('job-1')).toBe(0);
    expect(onConsumersChanged.mock.calls).toEqual([
      ['job-1', 1],
      ['job-1', 0]
    ]);
  });

  it('should end open streams when a topic is deleted', async () => {
    const channel = new EventChannel({ backlogLimit: 16 });
    channel.open('job-1');
    const stream = channel.subscribe('job-1');
    if (!stream) throw new Error('expected a stream');

    const pending = stream.next();
    channel.delete('job-1');

    await expect(pending).resolves.toEqual({ value: undefined, done: true });
    expect(channel.isOpen('job-1')).toBe(false);
  });
});
