export class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`timed out after ${ms}ms`);
    this.name = "TimeoutError";
  }
}

function whenAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Runs `task` with a bounded wall-clock budget. The signal handed to `task` aborts on
 * timeout (reason: TimeoutError) or when `parent` aborts (reason: the parent's reason),
 * and the returned promise rejects with that reason without waiting for `task` to notice.
 */
export async function withTimeout<T>(
  ms: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  const t = setTimeout(() => controller.abort(new TimeoutError(ms)), ms);
  try {
    return await Promise.race([task(controller.signal), whenAborted(controller.signal)]);
  } finally {
    clearTimeout(t);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
