import {
  type MessageBus,
  NameFlag,
  RequestNameReply,
  sessionBus,
} from "dbus-next";

import {
  type MethodCallTransport,
  NativeMessagingBusAdapter,
} from "../bus/adapter.js";
import {
  DBUS_INTERFACE,
  DBUS_OBJECT_PATH,
  DBUS_SERVICE,
  PROXY_BUS_NAME,
} from "../bus/constants.js";
import { BusConnectionError } from "../bus/errors.js";
import {
  loadProxyEnvironment,
  loadSearchPaths,
} from "../configs/search-paths/loader.js";
import { createHostLauncher } from "../hosts/launcher.js";
import { createManifestResolver } from "../hosts/manifest.js";
import { RequestCoordinator } from "../proxy/coordinator.js";
import { toError, toErrorMessage } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/log.js";
import type { ProcessContext } from "./context.js";
import { ServiceStartupError } from "./errors.js";

export const EXIT_CODES = {
  success: 0,
  failure: 1,
  busUnavailable: 2,
} as const;

export interface BusSignalSource {
  on(event: string, listener: (...args: string[]) => void): unknown;
}

/** The part of a dbus-next `MessageBus` the service lifecycle needs. */
export interface ServiceBus extends MethodCallTransport {
  requestName(name: string, flags: number): Promise<number>;
  getProxyObject(
    name: string,
    path: string,
  ): Promise<{ getInterface(name: string): BusSignalSource }>;
  disconnect(): void;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface ProxyServiceOptions {
  replace: boolean;
  logger?: Logger;
  verbose?: boolean;
  env?: NodeJS.ProcessEnv;
  connect?: () => Promise<ServiceBus>;
}

/**
 * Connects to the session bus with descriptor passing enabled and waits until
 * the bus daemon answers, so an unreachable bus surfaces here.
 */
export async function connectSessionBus(): Promise<MessageBus> {
  const options = {
    busAddress: process.env.DBUS_SESSION_BUS_ADDRESS,
    negotiateUnixFd: true,
  };

  let bus: MessageBus;
  try {
    bus = sessionBus(options);
  } catch (error) {
    throw new BusConnectionError(toErrorMessage(error));
  }

  const failure = new Promise<Error>((resolve) => {
    bus.once("error", resolve);
  });
  const probe = bus
    .getProxyObject(DBUS_SERVICE, DBUS_OBJECT_PATH)
    .then(
      () => undefined,
      (error: unknown) => toError(error),
    );

  const connectionError = await Promise.race([probe, failure]);
  if (connectionError) {
    bus.disconnect();
    throw new BusConnectionError(connectionError.message);
  }
  return bus;
}

/**
 * Whether authentication ended with the daemon agreeing to unix fd passing.
 * dbus-next records the agreement on the connection's stream and otherwise
 * sends replies without their descriptors, which the daemon answers by
 * dropping the connection.
 */
export function supportsDescriptorPassing(bus: object): boolean {
  const connection = "_connection" in bus ? bus._connection : undefined;
  const stream =
    isObject(connection) && "stream" in connection
      ? connection.stream
      : undefined;
  return (
    isObject(stream) &&
    "supportsUnixFd" in stream &&
    stream.supportsUnixFd === true
  );
}

function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

/**
 * Owns the bus name and serves requests until the context asks to exit, then
 * tears everything down: running hosts are force-terminated before the bus
 * connection closes. Resolves with the exit status.
 */
export async function runProxyService(
  options: ProxyServiceOptions,
  context: ProcessContext,
): Promise<number> {
  const logger = options.logger ?? createLogger({ verbose: options.verbose });
  const searchPaths = loadSearchPaths(
    loadProxyEnvironment({ env: options.env }),
  );
  logger.debug(`Chromium search paths: ${searchPaths.chromium.join(":")}`);
  logger.debug(`Mozilla search paths: ${searchPaths.mozilla.join(":")}`);

  const connect: () => Promise<ServiceBus> =
    options.connect ?? connectSessionBus;
  const bus = await connect();
  if (!supportsDescriptorPassing(bus)) {
    bus.disconnect();
    throw new ServiceStartupError(
      "The session bus connection cannot pass file descriptors",
      {
        hintLines: [
          "Start needs unix fd passing: install dbus-next's optional usocket dependency and use a unix socket bus address.",
        ],
      },
    );
  }
  logger.debug("Session bus acquired");

  bus.on("error", (error) => {
    logger.error(`Session bus connection failed: ${error.message}`);
    context.requestExit(EXIT_CODES.busUnavailable);
  });

  const coordinator = new RequestCoordinator({
    resolveManifest: createManifestResolver({ searchPaths, logger }),
    launchHost: createHostLauncher({ logger }),
    logger,
  });
  const adapter = new NativeMessagingBusAdapter({
    transport: bus,
    proxy: coordinator,
    logger,
  });

  try {
    const daemon = await watchBusDaemon(bus);

    daemon.on(
      "NameOwnerChanged",
      (name: string, oldOwner: string, newOwner: string) => {
        coordinator.tracker.handleNameOwnerChanged(name, oldOwner, newOwner);
      },
    );
    daemon.on("NameAcquired", (name: string) => {
      if (name === PROXY_BUS_NAME) {
        logger.debug(`Bus name ${name} acquired`);
      }
    });
    daemon.on("NameLost", (name: string) => {
      if (name !== PROXY_BUS_NAME) {
        return;
      }
      logger.debug(`Bus name ${name} lost`);
      context.requestExit(EXIT_CODES.success);
    });

    adapter.attach();

    const flags =
      NameFlag.ALLOW_REPLACEMENT |
      (options.replace ? NameFlag.REPLACE_EXISTING : 0);
    const reply = await bus
      .requestName(PROXY_BUS_NAME, flags)
      .catch((error: unknown) => {
        throw new ServiceStartupError(
          `Failed to request bus name ${PROXY_BUS_NAME}: ${toErrorMessage(error)}`,
          { cause: error },
        );
      });
    switch (reply) {
      case RequestNameReply.PRIMARY_OWNER:
      case RequestNameReply.ALREADY_OWNER:
        logger.debug(`Bus name ${PROXY_BUS_NAME} acquired`);
        break;
      case RequestNameReply.IN_QUEUE:
        // The daemon hands the name over once the current owner releases it.
        logger.info(`Waiting for bus name ${PROXY_BUS_NAME} to be released`);
        break;
      default:
        logger.info(
          `Bus name ${PROXY_BUS_NAME} is owned by another instance; use --replace to take it over`,
        );
        context.requestExit(EXIT_CODES.success);
    }

    const status = await context.exitRequested;
    logger.debug(`Exiting with status ${status}`);
    return status;
  } finally {
    adapter.detach();
    await coordinator.shutdown();
    bus.disconnect();
  }
}

async function watchBusDaemon(bus: ServiceBus): Promise<BusSignalSource> {
  try {
    const daemon = await bus.getProxyObject(DBUS_SERVICE, DBUS_OBJECT_PATH);
    return daemon.getInterface(DBUS_INTERFACE);
  } catch (error) {
    throw new ServiceStartupError(
      `Failed to subscribe to ${DBUS_SERVICE} signals: ${toErrorMessage(error)}`,
      { cause: error },
    );
  }
}
