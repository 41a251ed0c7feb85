import { log } from '../log';

export interface ScopedTask {
  readonly name: string;
  readonly signal: AbortSignal;
  /** Settles when the task body has finished; never rejects. */
  readonly done: Promise<void>;
  readonly settled: boolean;
  cancel(): Promise<void>;
}

/**
 * Owns a set of child tasks. Each child gets its own abort signal;
 * cancelAll() aborts every live child and waits for all of them to unwind.
 */
export class TaskScope {
  private readonly tasks = new Set<ScopedTask>();

  constructor(
    private readonly name: string,
    private readonly logContext: Record<string, unknown> = {},
  ) {}

  get size(): number {
    return this.tasks.size;
  }

  spawn(name: string, body: (signal: AbortSignal) => Promise<void>): ScopedTask {
    const controller = new AbortController();
    let settled = false;

    const done = (async () => {
      try {
        await body(controller.signal);
      } catch (error) {
        if (controller.signal.aborted) {
          log.debug(
            { event: 'task_cancelled', scope: this.name, task: name, ...this.logContext },
            'task cancelled',
          );
        } else {
          log.error(
            { event: 'task_failed', scope: this.name, task: name, err: error, ...this.logContext },
            'task failed',
          );
        }
      } finally {
        settled = true;
        this.tasks.delete(task);
      }
    })();

    const task: ScopedTask = {
      name,
      signal: controller.signal,
      done,
      get settled() {
        return settled;
      },
      cancel: async () => {
        if (!settled) {
          controller.abort(new Error(`${name} cancelled`));
        }
        await done;
      },
    };
    this.tasks.add(task);
    return task;
  }

  async cancelAll(): Promise<void> {
    const live = Array.from(this.tasks);
    await Promise.all(live.map((task) => task.cancel()));
  }
}
