import type { RequestContext } from "@clean-articles/types";

/**
 * Settle with `work`, or reject with the abort reason as soon as the
 * request's signal fires, whichever comes first. The repository call itself
 * keeps running; only its result is discarded.
 *
 * @param ctx - Request context carrying the deadline signal, if any.
 * @param work - Pending repository call.
 * @returns The result of `work` when it settles before the deadline.
 */
export function abortable<T>(ctx: RequestContext, work: Promise<T>): Promise<T> {
  const { signal } = ctx;
  if (!signal) {
    return work;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener("abort", onAbort, { once: true });
    }

    void work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
