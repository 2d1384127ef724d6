/**
 * Supervised Loop
 *
 * Keeps a long-running task alive: when it fails (or returns on its own)
 * it is restarted after a fixed backoff. Cancellation through the signal
 * ends supervision at the next suspension point.
 */

import { log, logError } from "./logger";

export const DEFAULT_BACKOFF_MS = 5_000;

export interface SuperviseOptions {
  signal: AbortSignal;
  backoffMs?: number;
}

/** Resolves after `ms`, or as soon as the signal aborts. */
export function waitFor(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

export async function superviseLoop(
  name: string,
  run: (signal: AbortSignal) => Promise<void>,
  { signal, backoffMs = DEFAULT_BACKOFF_MS }: SuperviseOptions,
): Promise<void> {
  let attempt = 0;

  while (!signal.aborted) {
    attempt++;
    try {
      await run(signal);
      if (signal.aborted) break;
      log(`${name}_exited`, `${name} returned without cancellation, restarting`, {
        level: "warn",
        metadata: { attempt, backoffMs },
      });
    } catch (err) {
      if (signal.aborted) break;
      logError(`${name}_error`, `${name} failed (attempt ${attempt}), restarting in ${backoffMs}ms`, err);
    }

    await waitFor(backoffMs, signal);
  }

  log(`${name}_stopped`, `${name} supervision ended`, { metadata: { attempts: attempt } });
}
