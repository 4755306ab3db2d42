/**
 * Abort helpers shared by the transport and the session manager.
 */

/**
 * Wait for `promise`, but stop waiting when `signal` aborts.
 *
 * Only the wait is abandoned: the underlying promise keeps running and
 * its outcome still reaches every other waiter.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
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

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach listeners and clear the timer */
  dispose: () => void;
}

/**
 * Combine several optional signals and an optional timeout into one signal.
 * The first source to fire decides the abort reason.
 */
export function linkSignals(
  signals: Array<AbortSignal | undefined>,
  timeout?: { ms: number; reason: () => unknown },
): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const forward = () => controller.abort(source.reason);
    source.addEventListener('abort', forward, { once: true });
    cleanups.push(() => source.removeEventListener('abort', forward));
  }

  if (timeout && !controller.signal.aborted) {
    const timer = setTimeout(() => controller.abort(timeout.reason()), timeout.ms);
    cleanups.push(() => clearTimeout(timer));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}
