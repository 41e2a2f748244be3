import type { CancellationToken } from "../utils/cancellation.js";
import { toError } from "../utils/errors.js";
import type { Logger } from "../utils/log.js";
import type { RequestInvocation } from "./types.js";

/**
 * Gatekeeper between a unit of work and its invocation: once the caller's
 * token has fired, the request is abandoned and nothing more reaches the bus.
 */
export class ActiveRequest<TReply> {
  constructor(
    private readonly invocation: RequestInvocation<TReply>,
    public readonly token: CancellationToken,
    private readonly logger: Logger,
    private readonly label: string,
  ) {}

  public get sender(): string {
    return this.invocation.sender;
  }

  public get abandoned(): boolean {
    return this.token.isCancelled;
  }

  /** Returns false when the reply was dropped because the caller is gone. */
  public async reply(value: TReply): Promise<boolean> {
    if (this.abandoned) {
      this.logger.debug(`Dropping reply to abandoned ${this.label}`);
      return false;
    }
    await this.invocation.reply(value);
    return true;
  }

  public fail(error: unknown): boolean {
    if (this.abandoned) {
      this.logger.debug(`Dropping error reply to abandoned ${this.label}`);
      return false;
    }
    this.invocation.fail(toError(error));
    return true;
  }
}
