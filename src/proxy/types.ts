import type { PipeDescriptors } from "../utils/process.js";

/**
 * One inbound bus method call as the coordinator sees it. Implemented by the
 * bus adapter; replies and errors are addressed to {@link sender}.
 */
export interface RequestInvocation<TReply> {
  /** Unique bus name of the caller. */
  readonly sender: string;
  /** Resolves once the reply has been handed to the transport. */
  reply(value: TReply): Promise<void>;
  fail(error: Error): void;
}

export interface StartReply {
  descriptors: PipeDescriptors;
  handle: string;
}

export interface StartInvocation extends RequestInvocation<StartReply> {
  /** Unicasts `Closed(handle)` back to the caller of Start. */
  emitClosed(handle: string): void;
}

export interface GetManifestRequest {
  hostName: string;
  mode: string;
}

export interface StartRequest {
  hostName: string;
  extensionOrOrigin: string;
  mode: string;
}

export interface CloseRequest {
  handle: string;
}

export type RequestOutcome = "completed" | "cancelled";

export interface NativeMessagingProxy {
  getManifest(
    invocation: RequestInvocation<Buffer>,
    request: GetManifestRequest,
  ): Promise<RequestOutcome>;
  start(
    invocation: StartInvocation,
    request: StartRequest,
  ): Promise<RequestOutcome>;
  close(
    invocation: RequestInvocation<void>,
    request: CloseRequest,
  ): Promise<RequestOutcome>;
}
