import { CollaboratorTimeoutError } from "./errors";

export const defaultCollaboratorTimeoutMs = 10_000;

export interface DeadlineOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Runs `work` with a signal that aborts after `timeoutMs` (reason:
 * `CollaboratorTimeoutError`) or when `signal` aborts. Settles no later than
 * that, even when the work ignores its signal.
 */
export const withDeadline = <T>(
  work: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal }: DeadlineOptions
): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    const onOuterAbort = (): void => controller.abort(signal?.reason);
    const timer = setTimeout(() => controller.abort(new CollaboratorTimeoutError(timeoutMs)), timeoutMs);
    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onOuterAbort);
    };

    controller.signal.addEventListener(
      "abort",
      () => {
        cleanup();
        reject(controller.signal.reason);
      },
      { once: true }
    );

    if (signal?.aborted) {
      controller.abort(signal.reason);
      return;
    }
    signal?.addEventListener("abort", onOuterAbort, { once: true });

    void work(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
