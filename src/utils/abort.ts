export class CycleAbortedError extends Error {
  constructor(message: string = 'cycle aborted') {
    super(message);
    this.name = 'CycleAbortedError';
  }
}

/**
 * Settle with `promise`, or reject with CycleAbortedError as soon as `signal`
 * fires. The underlying work is not cancelled unless it watches the signal too.
 */
export function raceAbort<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) {
    // abandoned work must not surface as an unhandled rejection
    promise.catch(() => undefined);
    return Promise.reject(new CycleAbortedError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CycleAbortedError());
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
