import { setTimeout as sleep } from "node:timers/promises";
import { OperationTimeoutError } from "../errors";
import type { PollingPolicy } from "../types";

/**
 * Snapshot of a remote job. `done` without a result means the job finished but
 * produced nothing.
 */
export type OperationState<THandle, TResult> =
  | { status: "pending"; handle: THandle }
  | { status: "done"; result?: TResult }
  | { status: "failed"; error: Error };

/**
 * A remote job that is started once and then polled until it settles.
 */
export interface LongRunningOperation<TRequest, THandle, TResult> {
  submit(request: TRequest): Promise<THandle>;
  poll(handle: THandle): Promise<OperationState<THandle, TResult>>;
}

export interface AwaitOptions {
  signal?: AbortSignal;
  /** Called after every pending poll with the 1-based attempt number. */
  onPending?: (attempt: number) => void;
}

/**
 * Submits `request` and polls until the operation leaves the pending state.
 *
 * @returns The result of a `done` state, or `undefined` if it carried none.
 * @throws The error of a `failed` state, `OperationTimeoutError` once
 * `policy.timeoutMs` is spent, or an `AbortError` when `signal` fires.
 */
export async function awaitCompletion<TRequest, THandle, TResult>(
  operation: LongRunningOperation<TRequest, THandle, TResult>,
  request: TRequest,
  policy: PollingPolicy,
  options: AwaitOptions = {}
): Promise<TResult | undefined> {
  const { signal, onPending } = options;
  signal?.throwIfAborted();

  const startedAt = Date.now();
  let handle: THandle = await operation.submit(request);
  let interval = policy.intervalMs;
  let attempt = 0;

  for (;;) {
    signal?.throwIfAborted();
    const state = await operation.poll(handle);

    if (state.status === "done") return state.result;
    if (state.status === "failed") throw state.error;

    handle = state.handle;
    attempt += 1;
    onPending?.(attempt);

    let wait = interval;
    if (policy.timeoutMs > 0) {
      const remaining = policy.timeoutMs - (Date.now() - startedAt);
      if (remaining <= 0) {
        throw new OperationTimeoutError(
          `Operation still pending after ${policy.timeoutMs} ms (${attempt} polls).`
        );
      }
      wait = Math.min(wait, remaining);
    }

    await sleep(wait, undefined, { signal });
    interval = Math.min(interval * policy.backoffFactor, policy.maxIntervalMs);
  }
}
