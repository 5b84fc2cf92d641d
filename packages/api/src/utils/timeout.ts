import { OperationAborted } from '../errors';

/**
 * Run `fn` with its own deadline.
 *
 * `fn` receives a signal that aborts when either the per-call timeout fires
 * or the parent signal aborts, so fetch, SDK and postgres calls can forward
 * cancellation to the backend. Timeouts reject with `onTimeout()`; parent
 * aborts reject with OperationAborted.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  parent?: AbortSignal
): Promise<T> {
  if (parent?.aborted) {
    throw new OperationAborted();
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const guard = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    if (parent) {
      onParentAbort = () => {
        const error = new OperationAborted();
        controller.abort(error);
        reject(error);
      };
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([fn(controller.signal), guard]);
  } finally {
    clearTimeout(timer);
    if (parent && onParentAbort) {
      parent.removeEventListener('abort', onParentAbort);
    }
  }
}

/**
 * Abort signal that fires when any of the given signals abort.
 */
export function linkSignals(...signals: AbortSignal[]): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const listeners: Array<[AbortSignal, () => void]> = [];

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    const listener = () => controller.abort(signal.reason);
    signal.addEventListener('abort', listener, { once: true });
    listeners.push([signal, listener]);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const [signal, listener] of listeners) {
        signal.removeEventListener('abort', listener);
      }
    },
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new OperationAborted());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(new OperationAborted());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
