import { randomBytes } from "node:crypto";

import { CancellationToken } from "../utils/cancellation.js";

export const RUNNING_HOST_PATH_PREFIX =
  "/org/freedesktop/nativemessagingproxy" as const;

export interface RunningHostRegistration {
  handle: string;
  token: CancellationToken;
}

export interface RunRegistryOptions {
  /** Source of handle keys; must be unpredictable outside tests. */
  generateKey?: () => bigint;
}

function randomKey(): bigint {
  return randomBytes(8).readBigUInt64BE();
}

/**
 * Running hosts keyed by an object-path handle. Every method runs to
 * completion synchronously, so concurrent requests on the event loop cannot
 * interleave inside one.
 */
export class RunRegistry {
  private readonly running = new Map<string, CancellationToken>();
  private readonly generateKey: () => bigint;

  constructor(options: RunRegistryOptions = {}) {
    this.generateKey = options.generateKey ?? randomKey;
  }

  public get size(): number {
    return this.running.size;
  }

  public has(handle: string): boolean {
    return this.running.has(handle);
  }

  public register(): RunningHostRegistration {
    let handle: string;
    do {
      handle = `${RUNNING_HOST_PATH_PREFIX}/${this.generateKey().toString()}`;
    } while (this.running.has(handle));

    const token = new CancellationToken();
    this.running.set(handle, token);
    return { handle, token };
  }

  public unregister(handle: string): void {
    this.running.delete(handle);
  }

  /** Fires the host's token without removing it; returns whether it existed. */
  public cancel(handle: string): boolean {
    const token = this.running.get(handle);
    if (!token) {
      return false;
    }
    token.cancel();
    return true;
  }
}
