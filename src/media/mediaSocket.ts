import WebSocket from 'ws';
import { log } from '../log';

export class SocketClosedError extends Error {
  constructor(message = 'media socket closed') {
    super(message);
    this.name = 'SocketClosedError';
  }
}

/** The per-call media connection as the session sees it: text frames in and out. */
export interface MediaSocket {
  readonly closed: boolean;
  /** Next inbound text frame, or null once the socket is closed. */
  receive(signal?: AbortSignal): Promise<string | null>;
  /** Rejects with SocketClosedError after close. */
  send(text: string): Promise<void>;
  /** Idempotent. */
  close(code?: number, reason?: string): Promise<void>;
}

type Waiter = {
  resolve: (value: string | null) => void;
  reject: (error: Error) => void;
};

function abortError(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new Error('aborted');
}

/** Buffers inbound frames from the moment it wraps the socket. */
export class WsMediaSocket implements MediaSocket {
  private readonly inbox: string[] = [];
  private readonly waiters: Waiter[] = [];
  private isClosed = false;

  constructor(
    private readonly ws: WebSocket,
    private readonly logContext: Record<string, unknown> = {},
  ) {
    ws.on('message', (data: WebSocket.RawData) => {
      const text = Array.isArray(data)
        ? Buffer.concat(data).toString('utf8')
        : Buffer.isBuffer(data)
          ? data.toString('utf8')
          : Buffer.from(data).toString('utf8');
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter.resolve(text);
      } else {
        this.inbox.push(text);
      }
    });

    ws.on('close', (code: number) => {
      log.info({ event: 'media_socket_closed', code, ...this.logContext }, 'media socket closed');
      this.markClosed();
    });

    ws.on('error', (error: Error) => {
      log.warn({ event: 'media_socket_error', err: error, ...this.logContext }, 'media socket error');
      this.markClosed();
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  receive(signal?: AbortSignal): Promise<string | null> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.isClosed) {
      return Promise.resolve(null);
    }
    if (signal?.aborted) {
      return Promise.reject(abortError(signal));
    }

    return new Promise<string | null>((resolve, reject) => {
      const waiter: Waiter = {
        resolve: (value) => {
          signal?.removeEventListener('abort', onAbort);
          resolve(value);
        },
        reject,
      };
      const onAbort = (): void => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        if (signal) reject(abortError(signal));
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  send(text: string): Promise<void> {
    if (this.isClosed || this.ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new SocketClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      this.ws.send(text, (error?: Error) => {
        if (error) {
          reject(new SocketClosedError(error.message));
          return;
        }
        resolve();
      });
    });
  }

  async close(code = 1000, reason = 'normal'): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.markClosed();
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close(code, reason);
    }
  }

  private markClosed(): void {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    const waiters = this.waiters.splice(0);
    for (const waiter of waiters) {
      waiter.resolve(null);
    }
  }
}
