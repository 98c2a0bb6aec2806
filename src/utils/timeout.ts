import { PersistenceTimeoutError } from './errors';

/**
 * Race a persistence call against a deadline and an optional abort signal.
 * The underlying operation is not cancelled; only the wait for it is.
 */
export function withDeadline<T>(
  operation: string,
  work: () => Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(new PersistenceTimeoutError(operation, 'aborted'));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new PersistenceTimeoutError(operation, 'aborted'));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      reject(new PersistenceTimeoutError(operation, 'timeout'));
    }, timeoutMs);

    signal?.addEventListener('abort', onAbort, { once: true });

    work().then(
      (value) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
