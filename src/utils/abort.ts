import { CancelledError } from '../errors';

export interface Deadline {
  signal: AbortSignal;
  /** True once the timeout fired, as opposed to the caller aborting. */
  timedOut: () => boolean;
  dispose: () => void;
}

/**
 * Links an optional caller signal with a timeout. The returned signal aborts
 * on whichever happens first; call `dispose` when the guarded call settles.
 */
export function withDeadline(timeoutMs: number, external?: AbortSignal): Deadline {
  const controller = new AbortController();
  let expired = false;

  const onAbort = () => controller.abort(external?.reason);
  if (external) {
    if (external.aborted) controller.abort(external.reason);
    else external.addEventListener('abort', onAbort, { once: true });
  }

  const timeout = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timeout);
      if (external) external.removeEventListener('abort', onAbort);
    },
  };
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError('Question cancelled by caller', signal.reason);
  }
}
