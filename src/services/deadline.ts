/**
 * Per-request deadline shared by every external call of one pipeline run.
 * The deadline's signal aborts when the timeout elapses or when the caller's
 * signal aborts (client disconnect, platform timeout).
 */

export class DeadlineExceededError extends Error {
  constructor(timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

export class RequestAbortedError extends Error {
  constructor() {
    super('Request was aborted by the caller');
    this.name = 'RequestAbortedError';
  }
}

export interface Deadline {
  readonly signal: AbortSignal;
  /** Clear the timer and detach from the parent signal. */
  dispose(): void;
}

export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();

  const timer = setTimeout(() => {
    controller.abort(new DeadlineExceededError(timeoutMs));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(new RequestAbortedError());

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Settle with the promise, or reject as soon as the signal aborts.
 * The underlying call is abandoned, not awaited, once the signal fires.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    // Keep a late rejection of the abandoned call from surfacing as unhandled.
    promise.catch(() => undefined);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(abortReason(signal));
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

/** The signal's reason when it is an Error, a RequestAbortedError otherwise. */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error ? signal.reason : new RequestAbortedError();
}
