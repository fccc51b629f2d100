import { TimeoutError } from "./errors";

/**
 * Run a cancellable operation with a deadline.
 *
 * The operation receives an AbortSignal that fires when the deadline passes;
 * the returned promise rejects with TimeoutError at that moment whether or not
 * the operation honours the signal.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(label, timeoutMs));
    }, timeoutMs);

    let pending: Promise<T>;
    try {
      pending = operation(controller.signal);
    } catch (error) {
      clearTimeout(timer);
      reject(error);
      return;
    }

    pending.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}
