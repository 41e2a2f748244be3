import { describe, expect, it, jest } from "@jest/globals";
import { Message, MessageType, Variant } from "dbus-next";

import {
  type MethodCallHandler,
  type MethodCallTransport,
  NativeMessagingBusAdapter,
} from "../../src/bus/adapter.js";
import {
  BUS_ERRORS,
  PROPERTIES_INTERFACE,
  PROXY_INTERFACE,
  PROXY_OBJECT_PATH,
} from "../../src/bus/constants.js";
import {
  HostSpawnError,
  InvalidHostNameError,
  ManifestNotFoundError,
} from "../../src/hosts/errors.js";
import type { NativeMessagingProxy } from "../../src/proxy/types.js";
import { flushAsync } from "../support/async.js";
import { createMockLogger } from "../support/logger.js";

const CALLER = ":1.42";
const ECHO_LOOKUP = ["org.example.echo", "chromium", {}];

class FakeTransport implements MethodCallTransport {
  public handlers: MethodCallHandler[] = [];
  public readonly sent: Message[] = [];

  public addMethodHandler(handler: MethodCallHandler): void {
    this.handlers.push(handler);
  }

  public removeMethodHandler(handler: MethodCallHandler): void {
    this.handlers = this.handlers.filter((entry) => entry !== handler);
  }

  public send(message: Message): void {
    this.sent.push(message);
  }

  public deliver(message: Message): boolean {
    return this.handlers.some((handler) => handler(message));
  }
}

function createProxy() {
  return {
    getManifest: jest.fn<NativeMessagingProxy["getManifest"]>(
      async () => "completed",
    ),
    start: jest.fn<NativeMessagingProxy["start"]>(async () => "completed"),
    close: jest.fn<NativeMessagingProxy["close"]>(async () => "completed"),
  };
}

function createAdapter() {
  const transport = new FakeTransport();
  const proxy = createProxy();
  const logger = createMockLogger();
  const adapter = new NativeMessagingBusAdapter({ transport, proxy, logger });
  adapter.attach();
  return { adapter, transport, proxy, logger };
}

function methodCall(
  member: string,
  signature: string,
  body: unknown[],
  overrides: { interface?: string; path?: string } = {},
): Message {
  return new Message({
    type: MessageType.METHOD_CALL,
    serial: 7,
    sender: CALLER,
    path: overrides.path ?? PROXY_OBJECT_PATH,
    interface: overrides.interface ?? PROXY_INTERFACE,
    member,
    signature,
    body,
  });
}

function firstCall<TCall>(calls: TCall[]): TCall {
  const [call] = calls;
  if (!call) {
    throw new Error("proxy was not called");
  }
  return call;
}

describe("NativeMessagingBusAdapter", () => {
  it("ignores calls to other object paths", () => {
    const { transport, proxy } = createAdapter();

    const handled = transport.deliver(
      methodCall("GetManifest", "ssa{sv}", ECHO_LOOKUP, {
        path: "/org/example/other",
      }),
    );

    expect(handled).toBe(false);
    expect(proxy.getManifest).not.toHaveBeenCalled();
    expect(transport.sent).toHaveLength(0);
  });

  it("replies to GetManifest with NUL-terminated bytes", async () => {
    const { transport, proxy } = createAdapter();

    expect(
      transport.deliver(methodCall("GetManifest", "ssa{sv}", ECHO_LOOKUP)),
    ).toBe(true);

    const [invocation] = firstCall(proxy.getManifest.mock.calls);
    expect(proxy.getManifest).toHaveBeenCalledWith(invocation, {
      hostName: "org.example.echo",
      mode: "chromium",
    });
    expect(invocation.sender).toBe(CALLER);

    await invocation.reply(Buffer.from("{}"));

    const [reply] = transport.sent;
    expect(reply?.type).toBe(MessageType.METHOD_RETURN);
    expect(reply?.replySerial).toBe(7);
    expect(reply?.destination).toBe(CALLER);
    expect(reply?.signature).toBe("ay");
    expect(reply?.body).toEqual([Buffer.from([0x7b, 0x7d, 0x00])]);
  });

  it("maps failures onto bus error names", () => {
    const { transport, proxy } = createAdapter();
    transport.deliver(methodCall("GetManifest", "ssa{sv}", ECHO_LOOKUP));
    const [invocation] = firstCall(proxy.getManifest.mock.calls);

    invocation.fail(new ManifestNotFoundError("org.example.echo"));
    invocation.fail(new InvalidHostNameError("../x"));
    invocation.fail(new HostSpawnError("/usr/bin/host", "spawn EACCES"));
    invocation.fail(new Error("unexpected"));

    expect(
      transport.sent.map((message) => [message.errorName, message.body]),
    ).toEqual([
      [BUS_ERRORS.fileNotFound, ["Could not find native messaging host"]],
      [BUS_ERRORS.invalidArgs, ["Invalid native messaging host name"]],
      [
        BUS_ERRORS.spawnExecFailed,
        ['Failed to execute child process "/usr/bin/host": spawn EACCES'],
      ],
      [BUS_ERRORS.failed, ["unexpected"]],
    ]);
    expect(
      transport.sent.map((message) => [
        message.type,
        message.replySerial,
        message.destination,
      ]),
    ).toEqual(
      Array.from({ length: 4 }, () => [MessageType.ERROR, 7, CALLER]),
    );
  });

  it("rejects calls with the wrong signature", () => {
    const { transport, proxy } = createAdapter();

    transport.deliver(methodCall("Start", "ss", ["org.example.echo", "abc"]));

    expect(proxy.start).not.toHaveBeenCalled();
    const [error] = transport.sent;
    expect(error?.type).toBe(MessageType.ERROR);
    expect(error?.errorName).toBe(BUS_ERRORS.invalidArgs);
    expect(error?.body).toEqual([
      'Invalid arguments for Start (signature "ss")',
    ]);
  });

  it("encodes the Start reply and unicasts Closed to the caller", async () => {
    const { transport, proxy } = createAdapter();
    transport.deliver(
      methodCall("Start", "sssa{sv}", [
        "org.example.echo",
        "moz-ext://xyz",
        "mozilla",
        {},
      ]),
    );
    const [invocation] = firstCall(proxy.start.mock.calls);
    expect(proxy.start).toHaveBeenCalledWith(invocation, {
      hostName: "org.example.echo",
      extensionOrOrigin: "moz-ext://xyz",
      mode: "mozilla",
    });
    const handle = "/org/freedesktop/nativemessagingproxy/42";

    await invocation.reply({
      descriptors: { stdin: 20, stdout: 21, stderr: 22 },
      handle,
    });
    invocation.emitClosed(handle);

    const [reply, signal] = transport.sent;
    expect(reply?.signature).toBe("hhho");
    expect(reply?.body).toEqual([20, 21, 22, handle]);
    expect(signal?.type).toBe(MessageType.SIGNAL);
    expect(signal?.path).toBe(PROXY_OBJECT_PATH);
    expect(signal?.interface).toBe(PROXY_INTERFACE);
    expect(signal?.member).toBe("Closed");
    expect(signal?.destination).toBe(CALLER);
    expect(signal?.signature).toBe("oa{sv}");
    expect(signal?.body).toEqual([handle, {}]);
  });

  it("dispatches Close with an empty reply", async () => {
    const { transport, proxy } = createAdapter();
    const handle = "/org/freedesktop/nativemessagingproxy/42";
    transport.deliver(methodCall("Close", "oa{sv}", [handle, {}]));

    const [invocation] = firstCall(proxy.close.mock.calls);
    expect(proxy.close).toHaveBeenCalledWith(invocation, { handle });
    await invocation.reply(undefined);

    const [reply] = transport.sent;
    expect(reply?.type).toBe(MessageType.METHOD_RETURN);
    expect(reply?.signature).toBe("");
    expect(reply?.body).toEqual([]);
  });

  it("serves the version property", () => {
    const { transport } = createAdapter();

    transport.deliver(
      methodCall("Get", "ss", [PROXY_INTERFACE, "version"], {
        interface: PROPERTIES_INTERFACE,
      }),
    );
    transport.deliver(
      methodCall("GetAll", "s", [PROXY_INTERFACE], {
        interface: PROPERTIES_INTERFACE,
      }),
    );
    transport.deliver(
      methodCall("Get", "ss", [PROXY_INTERFACE, "missing"], {
        interface: PROPERTIES_INTERFACE,
      }),
    );

    const [get, getAll, missing] = transport.sent;
    expect(get?.signature).toBe("v");
    expect(get?.body).toEqual([new Variant("u", 1)]);
    expect(getAll?.signature).toBe("a{sv}");
    expect(getAll?.body).toEqual([{ version: new Variant("u", 1) }]);
    expect(missing?.errorName).toBe(BUS_ERRORS.unknownProperty);
  });

  it("answers unknown members and interfaces with errors", () => {
    const { transport } = createAdapter();

    transport.deliver(methodCall("Launch", "", []));
    transport.deliver(
      methodCall("Frobnicate", "", [], { interface: "org.example.Unknown" }),
    );

    expect(transport.sent.map((message) => message.errorName)).toEqual([
      BUS_ERRORS.unknownMethod,
      BUS_ERRORS.unknownInterface,
    ]);
  });

  it("logs a handler that fails outright", async () => {
    const { transport, proxy, logger } = createAdapter();
    proxy.close.mockRejectedValueOnce(new Error("broken"));

    transport.deliver(
      methodCall("Close", "oa{sv}", [`${PROXY_OBJECT_PATH}/1`, {}]),
    );
    await flushAsync();

    expect(logger.error).toHaveBeenCalledWith("Close handler failed: broken");
  });

  it("stops handling calls once detached", () => {
    const { adapter, transport } = createAdapter();

    adapter.detach();

    expect(transport.handlers).toHaveLength(0);
    expect(
      transport.deliver(
        methodCall("GetManifest", "ssa{sv}", ECHO_LOOKUP),
      ),
    ).toBe(false);
  });
});
