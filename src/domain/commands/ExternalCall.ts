import { ExternalCallTimeoutError } from "../errors/ExternalCallTimeoutError.js";

/**
 * Run an external call with a deadline. The call receives an AbortSignal
 * that fires at the deadline; the returned promise rejects with
 * {@link ExternalCallTimeoutError} then even if the call ignores the signal.
 */
export async function callWithTimeout<T>(
  operation: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ExternalCallTimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
