import { MANGABAKA_SOURCE } from '../config/env-validation';
import { NetworkError } from '../talker-errors';

/**
 * Runs `task` under a deadline. When the deadline passes, the signal handed to
 * the task is aborted and the returned promise rejects with a timed-out
 * NetworkError, whether or not the task honours the signal.
 *
 * An already-aborted `parent` signal, or one aborted later, cancels the task too.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const finish = (outcome: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      outcome();
    };

    const timeOut = (message: string) => {
      controller.abort();
      finish(() => reject(new NetworkError(MANGABAKA_SOURCE, message, true)));
    };

    const onParentAbort = () => timeOut(`${MANGABAKA_SOURCE} request cancelled`);

    const timer = setTimeout(() => timeOut(`${MANGABAKA_SOURCE} call exceeded ${timeoutMs}ms`), timeoutMs);

    if (parent?.aborted) {
      onParentAbort();
      return;
    }
    parent?.addEventListener('abort', onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => finish(() => resolve(value)),
      (error: unknown) => finish(() => reject(error))
    );
  });
}
