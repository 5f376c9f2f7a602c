/**
 * Cancellation helpers.
 *
 * Every suspension point in the gateway (session acquire, backend invoke,
 * stream pull, admission gate) takes an AbortSignal. A per-call timeout is
 * layered on top: when it fires, the same signal aborts with a
 * BackendTimeout error as its reason, so timeouts and caller cancellation
 * travel one path.
 */

import { GatewayError, createCanceledError, createTimeoutError } from '../api/errors.js';

export interface CallSignal {
  signal: AbortSignal;
  /** Detach from the parent signal and clear the timeout timer */
  dispose(): void;
}

/**
 * Derive a signal that aborts when `parent` aborts or `timeoutMs` elapses.
 */
export function linkSignal(
  parent: AbortSignal | undefined,
  timeoutMs: number | undefined,
  operation: string,
  requestId?: string
): CallSignal {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const onParentAbort = (): void => {
    controller.abort(abortReason(parent, operation, requestId));
  };

  if (parent?.aborted) {
    onParentAbort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    timer = setTimeout(() => {
      controller.abort(createTimeoutError(operation, timeoutMs, requestId));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
        timer = undefined;
      }
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Error describing why `signal` aborted.
 *
 * A GatewayError reason (e.g. a timeout raised by linkSignal) is kept as is;
 * anything else becomes a Canceled error.
 */
export function abortReason(
  signal: AbortSignal | undefined,
  operation: string,
  requestId?: string
): GatewayError {
  const reason: unknown = signal?.reason;
  if (reason instanceof GatewayError) {
    return reason;
  }
  return createCanceledError(operation, requestId);
}

export function throwIfAborted(
  signal: AbortSignal | undefined,
  operation: string,
  requestId?: string
): void {
  if (signal?.aborted) {
    throw abortReason(signal, operation, requestId);
  }
}

/**
 * Settle with `promise`, or reject as soon as `signal` aborts.
 *
 * The underlying work is not stopped; callers abandon it and clean up
 * through their own finally blocks.
 */
export function raceAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal | undefined,
  operation: string,
  requestId?: string
): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(abortReason(signal, operation, requestId));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(abortReason(signal, operation, requestId));
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
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
