import { engineUnavailable } from "../../lib/errors.js";
import { withTimeout } from "../../lib/timeout.js";

/**
 * Calls a secondary engine under the cross-validation timeout. Timeouts and engine
 * errors surface as ENGINE_UNAVAILABLE; an upstream cancellation is rethrown as is.
 */
export async function callEngine<T>(
  engineId: string,
  timeoutMs: number,
  signal: AbortSignal,
  task: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  try {
    return await withTimeout(timeoutMs, task, signal);
  } catch (err) {
    if (signal.aborted) throw signal.reason;
    throw engineUnavailable(engineId, err);
  }
}
