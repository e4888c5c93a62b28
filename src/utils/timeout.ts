import { TransportFailureError } from '../core/errors/OrchestrationError.js';

/**
 * Race a promise against a timer. The timer is cleared whichever side wins,
 * so a settled promise leaves nothing running.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportFailureError(`${label}: no acknowledgement after ${timeoutMs}ms`)),
      timeoutMs
    );
  });

  return Promise.race([promise, timeoutPromise]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}
