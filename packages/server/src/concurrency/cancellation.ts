import { CancelledError } from "../errors";

export interface CancellationToken {
  readonly isCancelled: boolean;
  /** Runs at once when already cancelled. Returns an unsubscribe function. */
  onCancelled(listener: () => void): () => void;
}

/**
 * Owner side of a cancellation token, backed by an AbortController so the
 * signal can also be handed to Node APIs.
 */
export class CancellationSource {
  private readonly controller = new AbortController();
  private readonly detach?: () => void;
  readonly token: CancellationToken;

  constructor(parent?: CancellationToken) {
    const { signal } = this.controller;
    this.token = {
      get isCancelled(): boolean {
        return signal.aborted;
      },
      onCancelled: (listener) => {
        if (signal.aborted) {
          listener();
          return () => undefined;
        }
        signal.addEventListener("abort", listener, { once: true });
        return () => signal.removeEventListener("abort", listener);
      },
    };
    if (parent) {
      this.detach = parent.onCancelled(() => this.cancel());
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /** A source that is cancelled together with this one. */
  child(): CancellationSource {
    return new CancellationSource(this.token);
  }

  dispose(): void {
    this.detach?.();
  }
}

export const NEVER_CANCELLED: CancellationToken = {
  isCancelled: false,
  onCancelled: () => () => undefined,
};

export function throwIfCancelled(token: CancellationToken, label?: string): void {
  if (token.isCancelled) throw new CancelledError(label);
}

/** Settle with the promise, or reject with CancelledError once cancelled. */
export function raceCancellation<T>(
  promise: Promise<T>,
  token: CancellationToken,
  label?: string,
): Promise<T> {
  if (token.isCancelled) {
    void promise.catch(() => undefined);
    return Promise.reject(new CancelledError(label));
  }
  let unsubscribe: (() => void) | undefined;
  const cancelled = new Promise<never>((_resolve, reject) => {
    unsubscribe = token.onCancelled(() => reject(new CancelledError(label)));
  });
  void promise.catch(() => undefined);
  return Promise.race([promise, cancelled]).finally(() => unsubscribe?.());
}
