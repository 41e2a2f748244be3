import { describe, expect, it, jest } from "@jest/globals";

import {
  CancellationToken,
  raceCancellation,
} from "../../src/utils/cancellation.js";

describe("CancellationToken", () => {
  it("starts untriggered and fires once", () => {
    const token = new CancellationToken();
    expect(token.isCancelled).toBe(false);

    token.cancel();
    token.cancel();

    expect(token.isCancelled).toBe(true);
    expect(token.signal.aborted).toBe(true);
  });

  it("resolves every waiter when fired", async () => {
    const token = new CancellationToken();
    const first = token.whenCancelled();
    const second = token.whenCancelled();
    expect(first).toBe(second);

    token.cancel();

    await expect(first).resolves.toBeUndefined();
  });

  it("resolves immediately for an already fired token", async () => {
    const token = new CancellationToken();
    token.cancel();
    await expect(token.whenCancelled()).resolves.toBeUndefined();
  });
});

describe("raceCancellation", () => {
  it("returns the work result when it finishes first", async () => {
    const token = new CancellationToken();
    await expect(
      raceCancellation(Promise.resolve("done"), token),
    ).resolves.toEqual({ status: "completed", value: "done" });
  });

  it("propagates a failure from the work", async () => {
    const token = new CancellationToken();
    await expect(
      raceCancellation(Promise.reject(new Error("boom")), token),
    ).rejects.toThrow("boom");
  });

  it("reports cancellation when the token fires first", async () => {
    const token = new CancellationToken();
    const work = new Promise<string>(() => {});
    const race = raceCancellation(work, token);

    token.cancel();

    await expect(race).resolves.toEqual({ status: "cancelled" });
  });

  it("routes a late failure of abandoned work to the handler", async () => {
    const token = new CancellationToken();
    let failWork: (error: Error) => void = () => {};
    const work = new Promise<string>((_resolve, reject) => {
      failWork = reject;
    });
    const onAbandonedError = jest.fn<(error: unknown) => void>();

    const race = raceCancellation(work, token, onAbandonedError);
    token.cancel();
    await expect(race).resolves.toEqual({ status: "cancelled" });

    const failure = new Error("late");
    failWork(failure);
    await new Promise((resolve) => setImmediate(resolve));

    expect(onAbandonedError).toHaveBeenCalledWith(failure);
  });

  it("does not start racing when the token already fired", async () => {
    const token = new CancellationToken();
    token.cancel();
    const onAbandonedError = jest.fn<(error: unknown) => void>();
    const failure = new Error("ignored");

    await expect(
      raceCancellation(Promise.reject(failure), token, onAbandonedError),
    ).resolves.toEqual({ status: "cancelled" });
    await new Promise((resolve) => setImmediate(resolve));

    expect(onAbandonedError).toHaveBeenCalledWith(failure);
  });
});
