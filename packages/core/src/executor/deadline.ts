import { DeadlineExceededError, toError } from '../errors.js';

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/**
 * Wall-clock budget for one logical request. Its signal aborts when the
 * budget runs out or when the caller's own signal aborts.
 */
export class Deadline {
  readonly budgetMs: number;
  private readonly startedAt: number;
  private readonly controller: AbortController;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private readonly parent: AbortSignal | undefined;
  private readonly onParentAbort: () => void;

  constructor(budgetMs: number, parent?: AbortSignal) {
    this.budgetMs = budgetMs;
    this.startedAt = Date.now();
    this.controller = new AbortController();
    this.parent = parent;

    this.timer = undefined;
    this.arm();

    this.onParentAbort = () => {
      this.controller.abort(
        new DeadlineExceededError('Request was cancelled by the caller', { cause: parent?.reason }),
      );
    };

    if (parent?.aborted) {
      this.onParentAbort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get expired(): boolean {
    return this.controller.signal.aborted;
  }

  elapsed(): number {
    return Date.now() - this.startedAt;
  }

  remaining(): number {
    return Math.max(0, this.budgetMs - this.elapsed());
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.timer = undefined;
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  /** Budgets past the timer limit are waited out in several steps. */
  private arm(): void {
    const remaining = this.remaining();

    if (remaining <= 0) {
      this.timer = undefined;
      this.controller.abort(new DeadlineExceededError(`Request deadline of ${this.budgetMs}ms exceeded`));
      return;
    }

    this.timer = setTimeout(() => this.arm(), Math.min(remaining, MAX_TIMER_MS));
  }
}

/** Settles with `promise`, or rejects with the signal's reason as soon as it aborts. */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(toError(signal.reason));
    };

    signal.addEventListener('abort', onAbort, { once: true });

    void promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.reject(toError(signal.reason));
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(toError(signal.reason));
    };

    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal.addEventListener('abort', onAbort, { once: true });
  });
}
