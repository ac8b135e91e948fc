import { TimeoutError } from "./errors.js";

export interface TimeoutOptions {
  /** Aborting this signal cancels the operation early with the signal's reason. */
  signal?: AbortSignal;
  label?: string;
}

/**
 * Run `fn` with an AbortSignal that fires after `timeoutMs` or when the
 * parent signal aborts, whichever comes first. The returned promise settles
 * as soon as the signal fires, even if `fn` ignores it.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options?: TimeoutOptions,
): Promise<T> {
  const parent = options?.signal;
  parent?.throwIfAborted();

  const controller = new AbortController();
  const label = options?.label ?? "operation";

  let rejectEarly: (reason: unknown) => void = () => undefined;
  const cancelled = new Promise<never>((_, reject) => {
    rejectEarly = reject;
  });

  const timer = setTimeout(() => {
    const error = new TimeoutError(`${label} timed out after ${String(timeoutMs)}ms`, timeoutMs);
    controller.abort(error);
    rejectEarly(error);
  }, timeoutMs);

  const onParentAbort = (): void => {
    const reason: unknown = parent?.reason;
    controller.abort(reason);
    rejectEarly(reason);
  };
  parent?.addEventListener("abort", onParentAbort, { once: true });

  try {
    return await Promise.race([fn(controller.signal), cancelled]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}
