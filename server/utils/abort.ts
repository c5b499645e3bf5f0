export class TimeoutError extends Error {
  readonly timeoutMs: number;
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
    this.name = "TimeoutError";
  }
}

export class AbortedError extends Error {
  constructor(message = "operation aborted") {
    super(message);
    this.name = "AbortError";
  }
}

export const abortReason = (signal: AbortSignal): Error =>
  signal.reason instanceof Error ? signal.reason : new AbortedError();

export const isAbortError = (error: unknown): boolean =>
  error instanceof AbortedError || (error instanceof Error && error.name === "AbortError");

export const throwIfAborted = (signal?: AbortSignal): void => {
  if (signal?.aborted) throw abortReason(signal);
};

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Runs `task` with its own signal that aborts on timeout or when `parent` aborts.
 * Rejects with {@link TimeoutError} as soon as the deadline passes, without waiting
 * for the task to notice.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parent?: AbortSignal,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (parent?.aborted) {
      reject(abortReason(parent));
      return;
    }
    const controller = new AbortController();
    const onParentAbort = () => {
      if (!parent) return;
      const reason = abortReason(parent);
      cleanup();
      controller.abort(reason);
      reject(reason);
    };
    const timer = setTimeout(() => {
      const error = new TimeoutError(label, timeoutMs);
      cleanup();
      controller.abort(error);
      reject(error);
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };
    parent?.addEventListener("abort", onParentAbort, { once: true });

    task(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      },
    );
  });
}
