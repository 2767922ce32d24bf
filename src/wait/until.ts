import { browserError, isBrowserError } from "../errors.js";
import type { BrowserError } from "../errors.js";

export interface Condition<T> {
  /** Used in the timeout message, e.g. `url to equal "https://a.test/"`. */
  description: string;
  evaluate: () => Promise<T>;
}

export interface UntilOptions {
  timeoutMs: number;
  intervalMs: number;
}

function isTransient(err: unknown): err is BrowserError {
  return isBrowserError(err, "NO_SUCH_ELEMENT") || isBrowserError(err, "NAVIGATION_IN_PROGRESS");
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Poll `condition` until it yields a truthy value or `timeoutMs` elapses.
 * The condition is always evaluated at least once, and once more at the
 * deadline, so a wait never fails early.
 *
 * `NO_SUCH_ELEMENT` and `NAVIGATION_IN_PROGRESS` count as a falsy result;
 * any other error propagates immediately.
 */
export async function until<T>(condition: Condition<T>, options: UntilOptions): Promise<T> {
  const { timeoutMs, intervalMs } = options;
  const deadline = Date.now() + timeoutMs;
  let lastError: Error | undefined;

  for (;;) {
    try {
      const value = await condition.evaluate();
      if (value) return value;
    } catch (err) {
      if (!isTransient(err)) throw err;
      lastError = err;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) break;
    await sleep(Math.min(intervalMs, remaining));
  }

  const suffix = lastError ? `: ${lastError.message}` : "";
  throw browserError(
    "WAIT_TIMEOUT",
    `Timed out after ${timeoutMs}ms waiting for ${condition.description} (polled every ${intervalMs}ms)${suffix}`,
  );
}
