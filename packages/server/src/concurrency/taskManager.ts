import { CancelledError } from "../errors";
import { describeError, type Logger } from "../logger";
import { CancellationSource, type CancellationToken } from "./cancellation";

export interface TaskHandle<T> {
  readonly id: number;
  readonly name: string;
  readonly promise: Promise<T>;
  cancel(): void;
}

interface RunningTask {
  name: string;
  source: CancellationSource;
  settled: Promise<void>;
}

/**
 * Tracks background work so shutdown can cancel it and wait for it.
 * Every task receives a token derived from the manager's own.
 */
export class TaskManager {
  private readonly root = new CancellationSource();
  private readonly running = new Map<number, RunningTask>();
  private nextId = 1;

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.running.size;
  }

  get isShuttingDown(): boolean {
    return this.root.token.isCancelled;
  }

  spawn<T>(name: string, fn: (token: CancellationToken) => Promise<T>): TaskHandle<T> {
    const id = this.nextId++;
    const source = this.root.child();
    const promise = this.isShuttingDown
      ? Promise.reject(new CancelledError(name))
      : Promise.resolve().then(() => fn(source.token));

    const settled = promise.then(
      () => undefined,
      (err: unknown) => {
        if (err instanceof CancelledError) {
          this.logger.debug(`Task ${name} cancelled.`);
        } else {
          this.logger.error(`Task ${name} failed: ${describeError(err)}`);
        }
      },
    );
    this.running.set(id, { name, source, settled });
    void settled.finally(() => {
      source.dispose();
      this.running.delete(id);
    });

    return { id, name, promise, cancel: () => source.cancel() };
  }

  /** Cancel every task, then wait until all of them have settled. */
  async shutdown(): Promise<void> {
    this.root.cancel();
    const pending = [...this.running.values()];
    if (pending.length > 0) {
      this.logger.info(
        `Waiting for ${pending.length} task(s): ${pending.map((t) => t.name).join(", ")}`,
      );
    }
    await Promise.all(pending.map((task) => task.settled));
  }
}
