import { setTimeout as delay } from 'timers/promises';
import { log } from '../log';

const DEFAULT_TTL_MS = 5 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 30_000;
const DEFAULT_POLL_INTERVAL_MS = 100;

export class PreloadQueueError extends Error {
  constructor(public readonly callControlId: string) {
    super(`preload queue already exists for ${callControlId}`);
    this.name = 'PreloadQueueError';
  }
}

function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}

/** Ordered, closable channel of encoded wire payloads produced before the socket exists. */
export class PreloadQueue {
  public readonly createdAt: number;
  private readonly items: Buffer[] = [];
  private closed = false;
  private draining = false;
  private greeting: string | null = null;
  private notify: (() => void) | null = null;

  constructor(
    private id: string,
    now: number = Date.now(),
  ) {
    this.createdAt = now;
  }

  /** Call id, or a provisional label until the call is dialled. */
  get callControlId(): string {
    return this.id;
  }

  bindCallControlId(callControlId: string): void {
    this.id = callControlId;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get pendingCount(): number {
    return this.items.length;
  }

  get greetingText(): string | null {
    return this.greeting;
  }

  setGreetingText(text: string): void {
    this.greeting = text;
  }

  push(payload: Buffer): void {
    if (this.closed) {
      throw new Error(`preload queue closed for ${this.callControlId}`);
    }
    this.items.push(payload);
    this.wake();
  }

  /** Appends the end marker. Idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wake();
  }

  /** Next payload, or null once the end marker is reached. */
  async next(signal?: AbortSignal): Promise<Buffer | null> {
    while (true) {
      const item = this.items.shift();
      if (item) return item;
      if (this.closed) return null;
      if (signal?.aborted) throw abortReason(signal);

      await new Promise<void>((resolve, reject) => {
        const onAbort = (): void => {
          this.notify = null;
          reject(signal ? abortReason(signal) : new Error('aborted'));
        };
        this.notify = () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        };
        signal?.addEventListener('abort', onAbort, { once: true });
      });
    }
  }

  /** Yields every payload in order and returns after the end marker. Single consumer. */
  async *drain(signal?: AbortSignal): AsyncGenerator<Buffer> {
    if (this.draining) {
      throw new Error(`preload queue already draining for ${this.callControlId}`);
    }
    this.draining = true;
    while (true) {
      const item = await this.next(signal);
      if (item === null) return;
      yield item;
    }
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }
}

export interface PreloadBrokerOptions {
  ttlMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

export interface WaitForQueueOptions {
  maxWaitMs: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

/** Process-wide map of call id to preload queue, at most one queue per call. */
export class PreloadBroker {
  private readonly queues = new Map<string, PreloadQueue>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly sweepTimer: NodeJS.Timeout;

  constructor(options: PreloadBrokerOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
    this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.sweepTimer.unref?.();
  }

  get size(): number {
    return this.queues.size;
  }

  create(callControlId: string): PreloadQueue {
    if (this.queues.has(callControlId)) {
      log.error({ event: 'preload_queue_duplicate', call_control_id: callControlId }, 'preload queue duplicate');
      throw new PreloadQueueError(callControlId);
    }
    const queue = new PreloadQueue(callControlId, this.now());
    this.queues.set(callControlId, queue);
    return queue;
  }

  /** Registers a queue filled before its call id was known (outbound greeting). */
  adopt(callControlId: string, queue: PreloadQueue): void {
    if (this.queues.has(callControlId)) {
      log.error({ event: 'preload_queue_duplicate', call_control_id: callControlId }, 'preload queue duplicate');
      throw new PreloadQueueError(callControlId);
    }
    queue.bindCallControlId(callControlId);
    this.queues.set(callControlId, queue);
  }

  get(callControlId: string): PreloadQueue | null {
    return this.queues.get(callControlId) ?? null;
  }

  /**
   * Polls for a queue that may be created after the caller starts looking
   * (inbound greeting generation). Returns null once maxWaitMs has passed.
   */
  async waitFor(callControlId: string, options: WaitForQueueOptions): Promise<PreloadQueue | null> {
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    const deadline = Date.now() + options.maxWaitMs;

    while (true) {
      const queue = this.get(callControlId);
      if (queue) return queue;

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await delay(Math.min(pollIntervalMs, remaining), undefined, { signal: options.signal });
    }
  }

  /** Removes the queue; with `queue` given, only if it is still the registered one. */
  discard(callControlId: string, queue?: PreloadQueue): void {
    const current = this.queues.get(callControlId);
    if (!current || (queue && current !== queue)) {
      return;
    }
    this.queues.delete(callControlId);
    current.close();
  }

  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;
    for (const [callControlId, queue] of this.queues) {
      if (queue.createdAt <= cutoff) {
        this.queues.delete(callControlId);
        queue.close();
        evicted += 1;
        log.warn(
          { event: 'preload_queue_expired', call_control_id: callControlId, pending: queue.pendingCount },
          'preload queue expired unconsumed',
        );
      }
    }
    return evicted;
  }

  stop(): void {
    clearInterval(this.sweepTimer);
  }
}
