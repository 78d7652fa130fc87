import { DeadlineError } from '../errors.js';

/**
 * Runs `task` with its own abort signal and settles no later than `timeoutMs`
 * or the moment `parent` aborts. The task is told to stop through the signal;
 * a task that ignores it keeps running detached and its result is discarded.
 */
export function withDeadline<T>(
  label: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(new DeadlineError(label, timeoutMs, true));
      return;
    }

    const controller = new AbortController();
    const onParentAbort = () => {
      cleanup();
      controller.abort();
      reject(new DeadlineError(label, timeoutMs, true));
    };
    const timer = setTimeout(() => {
      cleanup();
      controller.abort();
      reject(new DeadlineError(label, timeoutMs, false));
    }, Math.max(0, timeoutMs));

    function cleanup() {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }

    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      cleanup();
      reject(error);
      return;
    }

    pending.then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}
