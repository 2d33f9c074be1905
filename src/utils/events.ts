import { isTerminalEvent } from '~/queue/optimize/schemas';
import type { ProgressEvent } from '~/queue/optimize/schemas';

export interface EventStream extends AsyncIterableIterator<ProgressEvent> {
  /** Detaches the consumer. Pending reads resolve as done. */
  close(): void;
}

type Waiter = (result: IteratorResult<ProgressEvent>) => void;

class Subscription implements EventStream {
  private backlog: ProgressEvent[] = [];
  private waiter: Waiter | null = null;
  private drained = false;
  private closed = false;

  constructor(
    private readonly backlogLimit: number,
    private readonly onClose: (subscription: Subscription) => void
  ) {}

  deliver(event: ProgressEvent): void {
    if (this.closed) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return;
    }

    // A slow consumer only ever loses superseded progress percentages
    if (event.type === 'progress' && this.backlog.length >= this.backlogLimit) {
      this.backlog = this.backlog.filter((queued) => queued.type !== 'progress');
    }
    this.backlog.push(event);
  }

  /** Producer is done: the consumer sees the rest of its backlog, then the end. */
  finish(): void {
    this.drained = true;
    if (this.waiter && this.backlog.length === 0) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
  }

  next(): Promise<IteratorResult<ProgressEvent>> {
    const event = this.backlog.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.drained || this.closed) {
      this.close();
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  return(): Promise<IteratorResult<ProgressEvent>> {
    this.close();
    return Promise.resolve({ value: undefined, done: true });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.backlog = [];
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }
}

interface Topic {
  subscribers: Set<Subscription>;
  closed: boolean;
}

export interface EventChannelOptions {
  backlogLimit: number;
  onConsumersChanged?: (jobId: string, consumers: number) => void;
}

/**
 * Per-job ordered fan-out of progress events. Consumers see events from the
 * moment they subscribe; nothing is replayed. The first terminal event
 * closes the topic and later publishes are rejected.
 */
export class EventChannel {
  private topics = new Map<string, Topic>();

  constructor(private readonly options: EventChannelOptions) {}

  open(jobId: string): void {
    if (!this.topics.has(jobId)) {
      this.topics.set(jobId, { subscribers: new Set(), closed: false });
    }
  }

  publish(jobId: string, event: ProgressEvent): boolean {
    const topic = this.topics.get(jobId);
    if (!topic || topic.closed) return false;

    for (const subscriber of topic.subscribers) {
      subscriber.deliver(event);
    }

    if (isTerminalEvent(event)) {
      topic.closed = true;
      for (const subscriber of topic.subscribers) {
        subscriber.finish();
      }
    }
    return true;
  }

  subscribe(jobId: string): EventStream | undefined {
    const topic = this.topics.get(jobId);
    if (!topic || topic.closed) return undefined;

    const subscription = new Subscription(this.options.backlogLimit, (closed) => {
      if (topic.subscribers.delete(closed)) {
        this.options.onConsumersChanged?.(jobId, topic.subscribers.size);
      }
    });
    topic.subscribers.add(subscription);
    this.options.onConsumersChanged?.(jobId, topic.subscribers.size);
    return subscription;
  }

  isOpen(jobId: string): boolean {
    const topic = this.topics.get(jobId);
    return topic !== undefined && !topic.closed;
  }

  consumerCount(jobId: string): number {
    return this.topics.get(jobId)?.subscribers.size ?? 0;
  }

  delete(jobId: string): void {
    const topic = this.topics.get(jobId);
    if (!topic) return;
    this.topics.delete(jobId);
    for (const subscriber of [...topic.subscribers]) {
      subscriber.close();
    }
  }
}
