/**
 * Timing helpers
 */

/**
 * Waits for `ms` milliseconds. Resolves early (without throwing) when the
 * signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export const elapsedMs = (startedAt: number): number => Date.now() - startedAt;

/** Abort signal that fires on timeout or when the parent signal aborts */
export interface TimeoutScope {
  readonly signal: AbortSignal;
  timedOut(): boolean;
  /** Starts the countdown again, optionally with a new duration */
  restart(ms?: number): void;
  dispose(): void;
}

export function timeoutScope(ms: number, parent?: AbortSignal): TimeoutScope {
  const controller = new AbortController();
  let expired = false;
  let disposed = false;
  let current = ms;
  let timer: ReturnType<typeof setTimeout> | undefined;

  const arm = () => {
    clearTimeout(timer);
    timer = setTimeout(() => {
      expired = true;
      controller.abort(new Error(`Timed out after ${current}ms`));
    }, current);
  };
  const onParentAbort = () => controller.abort(parent?.reason);

  arm();
  if (parent?.aborted) onParentAbort();
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  return {
    signal: controller.signal,
    timedOut: () => expired,
    restart: (next = current) => {
      if (disposed || controller.signal.aborted) return;
      current = next;
      arm();
    },
    dispose: () => {
      disposed = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}
