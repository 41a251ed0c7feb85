import { randomBytes } from 'crypto';
import { log } from '../log';
import type { CallContext } from './types';

const DEFAULT_TTL_MS = 5 * 60_000;
const DEFAULT_SWEEP_INTERVAL_MS = 30_000;

export class StreamRegistrationError extends Error {
  constructor(
    public readonly streamId: string,
    public readonly reason: 'duplicate' | 'replayed',
  ) {
    super(`stream id ${reason}: ${streamId}`);
    this.name = 'StreamRegistrationError';
  }
}

export interface StreamReservation {
  readonly streamId: string;
  commit(context: CallContext): void;
  cancel(): void;
}

interface Entry {
  context: CallContext | null;
  createdAt: number;
  waiters: Array<(context: CallContext | null) => void>;
}

export interface StreamRegistryOptions {
  ttlMs?: number;
  sweepIntervalMs?: number;
  now?: () => number;
}

/** 128 bits of randomness, url-safe, carries nothing about the call. */
export function generateStreamId(): string {
  return randomBytes(16).toString('base64url');
}

/**
 * Process-wide one-shot map from stream id to call context. An id resolves
 * once; resolving or registering it again within the TTL is rejected.
 */
export class StreamRegistry {
  private readonly entries = new Map<string, Entry>();
  private readonly consumed = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly sweepTimer: NodeJS.Timeout;

  constructor(options: StreamRegistryOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS;
    this.now = options.now ?? Date.now;
    this.sweepTimer = setInterval(() => this.sweep(), options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS);
    this.sweepTimer.unref?.();
  }

  get size(): number {
    return this.entries.size;
  }

  register(streamId: string, context: CallContext): void {
    this.assertAvailable(streamId);
    this.entries.set(streamId, { context, createdAt: this.now(), waiters: [] });
    log.info(
      { event: 'stream_registered', stream_id: streamId, call_control_id: context.callControlId },
      'stream registered',
    );
  }

  /**
   * Claims a stream id before the call id is known (outbound dial). A socket
   * arriving before commit() waits for it inside resolve().
   */
  reserve(streamId: string): StreamReservation {
    this.assertAvailable(streamId);
    const entry: Entry = { context: null, createdAt: this.now(), waiters: [] };
    this.entries.set(streamId, entry);

    return {
      streamId,
      commit: (context: CallContext) => {
        if (this.entries.get(streamId) !== entry) {
          log.warn({ event: 'stream_reservation_stale', stream_id: streamId }, 'stream reservation stale');
          return;
        }
        entry.context = context;
        const waiter = entry.waiters.shift();
        if (waiter) {
          this.consume(streamId);
          waiter(context);
          this.flushWaiters(entry, null);
        }
        log.info(
          { event: 'stream_registered', stream_id: streamId, call_control_id: context.callControlId },
          'stream registered',
        );
      },
      cancel: () => {
        if (this.entries.get(streamId) === entry) {
          this.entries.delete(streamId);
          this.flushWaiters(entry, null);
        }
      },
    };
  }

  async resolve(streamId: string, options: { waitMs?: number } = {}): Promise<CallContext | null> {
    const entry = this.entries.get(streamId);
    if (!entry) {
      return null;
    }

    if (entry.context) {
      const context = entry.context;
      this.consume(streamId);
      return context;
    }

    const waitMs = options.waitMs ?? 0;
    if (waitMs <= 0) {
      return null;
    }

    return new Promise<CallContext | null>((resolve) => {
      const timer = setTimeout(() => {
        const index = entry.waiters.indexOf(settle);
        if (index !== -1) entry.waiters.splice(index, 1);
        resolve(null);
      }, waitMs);
      const settle = (context: CallContext | null): void => {
        clearTimeout(timer);
        resolve(context);
      };
      entry.waiters.push(settle);
    });
  }

  /** Drops an unconsumed registration (dial failed, session finished). */
  release(streamId: string): void {
    const entry = this.entries.get(streamId);
    if (entry) {
      this.entries.delete(streamId);
      this.flushWaiters(entry, null);
    }
  }

  sweep(): number {
    const cutoff = this.now() - this.ttlMs;
    let evicted = 0;

    for (const [streamId, entry] of this.entries) {
      if (entry.createdAt <= cutoff) {
        this.entries.delete(streamId);
        this.flushWaiters(entry, null);
        evicted += 1;
        log.warn(
          { event: 'stream_registration_expired', stream_id: streamId, call_control_id: entry.context?.callControlId },
          'stream registration expired unconnected',
        );
      }
    }
    for (const [streamId, consumedAt] of this.consumed) {
      if (consumedAt <= cutoff) {
        this.consumed.delete(streamId);
      }
    }
    return evicted;
  }

  stop(): void {
    clearInterval(this.sweepTimer);
  }

  private assertAvailable(streamId: string): void {
    if (this.entries.has(streamId)) {
      throw new StreamRegistrationError(streamId, 'duplicate');
    }
    if (this.consumed.has(streamId)) {
      throw new StreamRegistrationError(streamId, 'replayed');
    }
  }

  private consume(streamId: string): void {
    this.entries.delete(streamId);
    this.consumed.set(streamId, this.now());
  }

  private flushWaiters(entry: Entry, context: CallContext | null): void {
    const waiters = entry.waiters.splice(0);
    for (const waiter of waiters) {
      waiter(context);
    }
  }
}
