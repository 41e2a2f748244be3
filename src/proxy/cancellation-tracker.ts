import { CancellationToken } from "../utils/cancellation.js";
import type { Logger } from "../utils/log.js";

/**
 * One cancellation token per bus client. Every in-flight request from the
 * same client shares the token, so a disconnect cancels all of them at once.
 */
export class ClientCancellationTracker {
  private readonly clients = new Map<string, CancellationToken>();

  constructor(private readonly logger: Logger) {}

  public get size(): number {
    return this.clients.size;
  }

  public has(clientIdentity: string): boolean {
    return this.clients.has(clientIdentity);
  }

  public ensure(clientIdentity: string): CancellationToken {
    const existing = this.clients.get(clientIdentity);
    if (existing) {
      return existing;
    }
    const token = new CancellationToken();
    this.clients.set(clientIdentity, token);
    return token;
  }

  /**
   * Bus `NameOwnerChanged` handler. Only a unique name dropping its owner
   * means a client went away.
   */
  public handleNameOwnerChanged(
    name: string,
    oldOwner: string,
    newOwner: string,
  ): void {
    if (!name.startsWith(":") || name !== oldOwner || newOwner !== "") {
      return;
    }
    this.disconnect(name);
  }

  public disconnect(clientIdentity: string): boolean {
    const token = this.clients.get(clientIdentity);
    if (!token) {
      return false;
    }
    this.clients.delete(clientIdentity);
    this.logger.info(`Cancelling requests for client ${clientIdentity}`);
    token.cancel();
    return true;
  }

  public cancelAll(): void {
    const tokens = Array.from(this.clients.values());
    this.clients.clear();
    for (const token of tokens) {
      token.cancel();
    }
  }
}
