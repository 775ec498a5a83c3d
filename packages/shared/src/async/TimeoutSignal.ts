export interface TimeoutSignal {
  signal: AbortSignal;
  dispose: () => void;
}

/**
 * Combines an optional caller signal with a timeout. `dispose` must be called once the
 * guarded operation settles so the timer does not keep the process alive.
 */
export const createTimeoutSignal = (timeoutMs?: number, parent?: AbortSignal): TimeoutSignal => {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  const onParentAbort = (): void => controller.abort(parent?.reason);

  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else if (parent) {
    parent.addEventListener("abort", onParentAbort, { once: true });
  }
  if (timeoutMs !== undefined && timeoutMs > 0 && !controller.signal.aborted) {
    timeoutId = setTimeout(() => {
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      if (timeoutId) clearTimeout(timeoutId);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
};
