import { Message, MessageType, Variant } from "dbus-next";

import type {
  NativeMessagingProxy,
  RequestInvocation,
  StartInvocation,
  StartReply,
} from "../proxy/types.js";
import { toErrorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/log.js";
import {
  closeArgumentsSchema,
  getManifestArgumentsSchema,
  parseMethodArguments,
  propertyGetAllArgumentsSchema,
  propertyGetArgumentsSchema,
  startArgumentsSchema,
} from "./arguments.js";
import {
  BUS_ERRORS,
  INTROSPECTABLE_INTERFACE,
  PEER_INTERFACE,
  PROPERTIES_INTERFACE,
  PROXY_INTERFACE,
  PROXY_INTERFACE_VERSION,
  PROXY_OBJECT_PATH,
  PROXY_SIGNATURES,
} from "./constants.js";
import { busErrorNameFor } from "./errors.js";
import { PROXY_INTROSPECTION_XML } from "./introspection.js";

export type MethodCallHandler = (message: Message) => boolean;

/** The part of a dbus-next `MessageBus` the adapter needs. */
export interface MethodCallTransport {
  addMethodHandler(handler: MethodCallHandler): void;
  removeMethodHandler(handler: MethodCallHandler): void;
  send(message: Message): void;
}

export interface BusAdapterOptions {
  transport: MethodCallTransport;
  /** Not owned: the coordinator outlives the adapter's attachment. */
  proxy: NativeMessagingProxy;
  logger: Logger;
}

interface EncodedReply {
  signature: string;
  body: unknown[];
}

// Manifests go out as NUL-terminated bytestrings; clients strip the NUL.
const BYTESTRING_TERMINATOR = Buffer.from([0]);

/**
 * Exposes a {@link NativeMessagingProxy} on the session bus: decodes method
 * calls on the proxy object path, encodes replies, errors and the `Closed`
 * signal, and answers introspection and property queries itself.
 */
export class NativeMessagingBusAdapter {
  private readonly transport: MethodCallTransport;
  private readonly proxy: NativeMessagingProxy;
  private readonly logger: Logger;
  private attached = false;

  constructor(options: BusAdapterOptions) {
    this.transport = options.transport;
    this.proxy = options.proxy;
    this.logger = options.logger;
  }

  public attach(): void {
    if (this.attached) {
      return;
    }
    this.transport.addMethodHandler(this.handleMethodCall);
    this.attached = true;
  }

  public detach(): void {
    if (!this.attached) {
      return;
    }
    this.transport.removeMethodHandler(this.handleMethodCall);
    this.attached = false;
  }

  private readonly handleMethodCall = (message: Message): boolean => {
    if (message.path !== PROXY_OBJECT_PATH) {
      return false;
    }

    switch (message.interface) {
      case PROXY_INTERFACE:
        this.handleProxyCall(message);
        return true;
      case PROPERTIES_INTERFACE:
        this.handlePropertiesCall(message);
        return true;
      case INTROSPECTABLE_INTERFACE:
        if (message.member !== "Introspect") {
          this.sendError(message, BUS_ERRORS.unknownMethod, unknown(message));
          return true;
        }
        this.sendReturn(message, {
          signature: "s",
          body: [PROXY_INTROSPECTION_XML],
        });
        return true;
      case PEER_INTERFACE:
        if (message.member !== "Ping") {
          // GetMachineId is answered by the library.
          return false;
        }
        this.sendReturn(message, { signature: "", body: [] });
        return true;
      default:
        this.sendError(
          message,
          BUS_ERRORS.unknownInterface,
          `No such interface "${String(message.interface)}"`,
        );
        return true;
    }
  };

  private handleProxyCall(message: Message): void {
    switch (message.member) {
      case "GetManifest": {
        const args = parseMethodArguments(
          getManifestArgumentsSchema,
          PROXY_SIGNATURES.getManifest.in,
          message,
        );
        if (!args) {
          this.rejectArguments(message);
          return;
        }
        const [hostName, mode] = args;
        const invocation = this.createInvocation(message, encodeManifest);
        this.track(
          "GetManifest",
          this.proxy.getManifest(invocation, { hostName, mode }),
        );
        return;
      }
      case "Start": {
        const args = parseMethodArguments(
          startArgumentsSchema,
          PROXY_SIGNATURES.start.in,
          message,
        );
        if (!args) {
          this.rejectArguments(message);
          return;
        }
        const [hostName, extensionOrOrigin, mode] = args;
        const invocation: StartInvocation = {
          ...this.createInvocation(message, encodeStartReply),
          emitClosed: (handle) => this.emitClosed(message.sender, handle),
        };
        this.track(
          "Start",
          this.proxy.start(invocation, { hostName, extensionOrOrigin, mode }),
        );
        return;
      }
      case "Close": {
        const args = parseMethodArguments(
          closeArgumentsSchema,
          PROXY_SIGNATURES.close.in,
          message,
        );
        if (!args) {
          this.rejectArguments(message);
          return;
        }
        const [handle] = args;
        const invocation = this.createInvocation(message, encodeEmpty);
        this.track("Close", this.proxy.close(invocation, { handle }));
        return;
      }
      default:
        this.sendError(message, BUS_ERRORS.unknownMethod, unknown(message));
    }
  }

  private handlePropertiesCall(message: Message): void {
    switch (message.member) {
      case "Get": {
        const args = parseMethodArguments(
          propertyGetArgumentsSchema,
          "ss",
          message,
        );
        if (!args) {
          this.rejectArguments(message);
          return;
        }
        const [interfaceName, propertyName] = args;
        if (interfaceName !== PROXY_INTERFACE || propertyName !== "version") {
          this.sendError(
            message,
            BUS_ERRORS.unknownProperty,
            `No such property "${propertyName}"`,
          );
          return;
        }
        this.sendReturn(message, {
          signature: "v",
          body: [new Variant("u", PROXY_INTERFACE_VERSION)],
        });
        return;
      }
      case "GetAll": {
        const args = parseMethodArguments(
          propertyGetAllArgumentsSchema,
          "s",
          message,
        );
        if (!args) {
          this.rejectArguments(message);
          return;
        }
        const [interfaceName] = args;
        const properties =
          interfaceName === PROXY_INTERFACE
            ? { version: new Variant("u", PROXY_INTERFACE_VERSION) }
            : {};
        this.sendReturn(message, { signature: "a{sv}", body: [properties] });
        return;
      }
      case "Set":
        this.sendError(
          message,
          BUS_ERRORS.propertyReadOnly,
          "Properties of this interface are read-only",
        );
        return;
      default:
        this.sendError(message, BUS_ERRORS.unknownMethod, unknown(message));
    }
  }

  private createInvocation<TReply>(
    call: Message,
    encode: (value: TReply) => EncodedReply,
  ): RequestInvocation<TReply> {
    return {
      sender: call.sender,
      reply: async (value) => {
        this.sendReturn(call, encode(value));
      },
      fail: (error) => {
        this.sendError(call, busErrorNameFor(error), error.message);
      },
    };
  }

  private emitClosed(destination: string, handle: string): void {
    this.send(
      new Message({
        type: MessageType.SIGNAL,
        path: PROXY_OBJECT_PATH,
        interface: PROXY_INTERFACE,
        member: "Closed",
        destination,
        signature: PROXY_SIGNATURES.closed,
        body: [handle, {}],
      }),
    );
  }

  private rejectArguments(call: Message): void {
    this.sendError(
      call,
      BUS_ERRORS.invalidArgs,
      `Invalid arguments for ${String(call.member)} (signature "${call.signature}")`,
    );
  }

  private sendReturn(call: Message, reply: EncodedReply): void {
    this.send(Message.newMethodReturn(call, reply.signature, reply.body));
  }

  private sendError(call: Message, errorName: string, text: string): void {
    this.send(Message.newError(call, errorName, text));
  }

  private send(message: Message): void {
    try {
      this.transport.send(message);
    } catch (error) {
      this.logger.warn(
        `Failed sending ${String(message.member ?? message.errorName ?? "reply")}: ${toErrorMessage(error)}`,
      );
    }
  }

  private track(method: string, request: Promise<unknown>): void {
    void request.catch((error: unknown) => {
      this.logger.error(`${method} handler failed: ${toErrorMessage(error)}`);
    });
  }
}

function encodeManifest(bytes: Buffer): EncodedReply {
  return {
    signature: PROXY_SIGNATURES.getManifest.out,
    body: [Buffer.concat([bytes, BYTESTRING_TERMINATOR])],
  };
}

function encodeStartReply(reply: StartReply): EncodedReply {
  const { descriptors, handle } = reply;
  return {
    signature: PROXY_SIGNATURES.start.out,
    body: [descriptors.stdin, descriptors.stdout, descriptors.stderr, handle],
  };
}

function encodeEmpty(): EncodedReply {
  return { signature: PROXY_SIGNATURES.close.out, body: [] };
}

function unknown(message: Message): string {
  return `No such method "${String(message.member)}"`;
}
