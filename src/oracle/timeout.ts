/**
 * Timeout-bounded calls at the oracle boundary.
 */

import { OracleTimeoutError } from "../errors.js";
import type { OracleCallOptions, TextOracle } from "./types.js";

/**
 * Run a signal-taking call, aborting it once `timeoutMs` elapses.
 *
 * A caller-supplied signal is chained in, so either side can cancel.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  label: string,
  parentSignal?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onParentAbort = () => controller.abort(parentSignal?.reason);
  if (parentSignal?.aborted) {
    controller.abort(parentSignal.reason);
  } else {
    parentSignal?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new OracleTimeoutError(label, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Decorates an oracle so every completion is bounded by a timeout
 */
export class TimeoutBoundOracle implements TextOracle {
  constructor(
    private inner: TextOracle,
    private timeoutMs: number,
  ) {}

  complete(systemInstruction: string, userText: string, options: OracleCallOptions = {}): Promise<string> {
    return withTimeout(
      (signal) => this.inner.complete(systemInstruction, userText, { signal }),
      this.timeoutMs,
      "Oracle completion",
      options.signal,
    );
  }
}
