export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Races `promise` against a timer. `onTimeout` runs before the rejection so callers can abort the underlying work.
 */
export const withTimeout = <T>(
  promise: Promise<T>,
  ms: number,
  message: string,
  onTimeout?: () => void,
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      onTimeout?.();
      reject(new TimeoutError(message));
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });

/**
 * Links an optional caller signal into a fresh controller; the returned `release` detaches the listener.
 */
export const linkAbortSignal = (signal?: AbortSignal): { controller: AbortController; release: () => void } => {
  const controller = new AbortController();
  if (!signal) {
    return { controller, release: () => undefined };
  }
  if (signal.aborted) {
    controller.abort();
    return { controller, release: () => undefined };
  }
  const onAbort = () => controller.abort();
  signal.addEventListener('abort', onAbort, { once: true });
  return { controller, release: () => signal.removeEventListener('abort', onAbort) };
};
