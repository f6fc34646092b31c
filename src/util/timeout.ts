// src/util/timeout.ts
// What: Deadlines and cancellation for outbound calls.
// How: withTimeout() hands the callee an AbortSignal that fires on the deadline or when the caller's signal
//      aborts, and settles as soon as either happens. A late result from the callee is dropped.

export class TimeoutError extends Error {
  readonly timeoutMs: number;
  constructor(timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class AbortedError extends Error {
  constructor(message = 'Operation aborted by caller') {
    super(message);
    this.name = 'AbortedError';
  }
}

export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) return Promise.reject(new AbortedError());

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const finish = (action: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onAbort);
      action();
    };

    const onAbort = () => {
      const err = new AbortedError();
      controller.abort(err);
      finish(() => reject(err));
    };

    const timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      controller.abort(err);
      finish(() => reject(err));
    }, timeoutMs);

    parent?.addEventListener('abort', onAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = fn(controller.signal);
    } catch (err) {
      finish(() => reject(err));
      return;
    }
    void pending.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new AbortedError());
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
