import { ToolError } from './errors.js';

export interface DeadlineOptions {
  timeoutMs: number;
  /** Used in error messages, e.g. "Statement" or "Cortex Search request". */
  label: string;
  signal?: AbortSignal;
}

/**
 * Runs `work` with its own AbortSignal that fires when the timeout elapses or
 * the caller's signal aborts. The returned promise settles with the abort
 * reason as soon as that happens, without waiting for `work` to notice.
 */
export function runWithDeadline<T>(
  work: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, label, signal }: DeadlineOptions
): Promise<T> {
  if (signal?.aborted) {
    return Promise.reject(cancelledError(label));
  }

  const controller = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let timeoutHandle: ReturnType<typeof setTimeout> | null = null;

    const onParentAbort = () => controller.abort(cancelledError(label));

    const cleanup = () => {
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }
      signal?.removeEventListener('abort', onParentAbort);
      controller.signal.removeEventListener('abort', onAbort);
    };

    const onAbort = () => {
      cleanup();
      reject(controller.signal.reason);
    };

    if (timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        controller.abort(
          new ToolError('BackendError', `${label} timed out after ${timeoutMs}ms`, { reason: 'timeout', timeoutMs })
        );
      }, timeoutMs);
    }

    signal?.addEventListener('abort', onParentAbort, { once: true });
    controller.signal.addEventListener('abort', onAbort, { once: true });

    work(controller.signal).then(
      value => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(controller.signal.aborted ? controller.signal.reason : error);
      }
    );
  });
}

function cancelledError(label: string): ToolError {
  return new ToolError('BackendError', `${label} was cancelled`, { reason: 'cancelled' });
}
