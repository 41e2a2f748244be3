/**
 * One-shot cancellation signal. Firing is idempotent and never reverts; any
 * number of waiters may observe it through {@link whenCancelled} or the
 * underlying {@link signal}.
 */
export class CancellationToken {
  private readonly controller = new AbortController();
  private cancelledPromise: Promise<void> | undefined;

  public get signal(): AbortSignal {
    return this.controller.signal;
  }

  public get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  public cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /**
   * Resolves once the token fires. A pending wait holds no event-loop handle,
   * so it never keeps the process alive on its own.
   */
  public whenCancelled(): Promise<void> {
    if (!this.cancelledPromise) {
      const { signal } = this.controller;
      this.cancelledPromise = signal.aborted
        ? Promise.resolve()
        : new Promise<void>((resolve) => {
            signal.addEventListener("abort", () => resolve(), { once: true });
          });
    }
    return this.cancelledPromise;
  }
}

export type RaceOutcome<T> =
  | { status: "completed"; value: T }
  | { status: "cancelled" };

/**
 * Settles with whichever comes first: the work or the token firing. When the
 * token wins, the work keeps running but its result is discarded; a rejection
 * from it afterwards is routed to `onAbandonedError` instead of surfacing as
 * an unhandled rejection.
 */
export async function raceCancellation<T>(
  work: Promise<T>,
  token: CancellationToken,
  onAbandonedError?: (error: unknown) => void,
): Promise<RaceOutcome<T>> {
  if (token.isCancelled) {
    void work.catch((error: unknown) => onAbandonedError?.(error));
    return { status: "cancelled" };
  }

  let workSettled = false;
  const completion = work.then(
    (value): RaceOutcome<T> => {
      workSettled = true;
      return { status: "completed", value };
    },
    (error: unknown) => {
      workSettled = true;
      throw error;
    },
  );
  const cancellation = token
    .whenCancelled()
    .then((): RaceOutcome<T> => ({ status: "cancelled" }));

  const outcome = await Promise.race([completion, cancellation]);
  if (outcome.status === "cancelled" && !workSettled) {
    void completion.catch((error: unknown) => onAbandonedError?.(error));
  }
  return outcome;
}
