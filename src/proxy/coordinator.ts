import { NativeMessagingError } from "../hosts/errors.js";
import type { HostLauncher } from "../hosts/launcher.js";
import type { ManifestResolver } from "../hosts/manifest.js";
import { parseHostMode } from "../hosts/mode.js";
import { RunRegistry } from "../hosts/registry.js";
import {
  type CancellationToken,
  raceCancellation,
} from "../utils/cancellation.js";
import { toErrorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/log.js";
import type { PipedProcess, ProcessExit } from "../utils/process.js";
import { ActiveRequest } from "./active-request.js";
import { ClientCancellationTracker } from "./cancellation-tracker.js";
import type {
  CloseRequest,
  GetManifestRequest,
  NativeMessagingProxy,
  RequestInvocation,
  RequestOutcome,
  StartInvocation,
  StartReply,
  StartRequest,
} from "./types.js";

export interface RequestCoordinatorOptions {
  resolveManifest: ManifestResolver;
  launchHost: HostLauncher;
  logger: Logger;
  registry?: RunRegistry;
  tracker?: ClientCancellationTracker;
}

type HostEnding =
  | { kind: "exited"; exit: ProcessExit }
  | { kind: "closed" }
  | { kind: "disconnected" };

/**
 * Runs GetManifest, Start and Close. Each request becomes a unit of work
 * raced against its caller's cancellation token; when the token wins, the
 * request gets no reply.
 */
export class RequestCoordinator implements NativeMessagingProxy {
  public readonly registry: RunRegistry;
  public readonly tracker: ClientCancellationTracker;

  private readonly resolveManifest: ManifestResolver;
  private readonly launchHost: HostLauncher;
  private readonly logger: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: RequestCoordinatorOptions) {
    this.resolveManifest = options.resolveManifest;
    this.launchHost = options.launchHost;
    this.logger = options.logger;
    this.registry = options.registry ?? new RunRegistry();
    this.tracker =
      options.tracker ?? new ClientCancellationTracker(options.logger);
  }

  public async getManifest(
    invocation: RequestInvocation<Buffer>,
    request: GetManifestRequest,
  ): Promise<RequestOutcome> {
    const { hostName, mode } = request;
    return await this.dispatch(
      invocation,
      `GetManifest ${hostName} (${mode})`,
      async (active) => {
        const resolved = await this.resolveManifest(
          hostName,
          parseHostMode(mode),
        );
        await active.reply(resolved.bytes);
      },
    );
  }

  public async start(
    invocation: StartInvocation,
    request: StartRequest,
  ): Promise<RequestOutcome> {
    const { hostName, extensionOrOrigin, mode } = request;
    return await this.dispatch(
      invocation,
      `Start ${hostName} (${mode})`,
      async (active) => {
        const hostMode = parseHostMode(mode);
        const resolved = await this.resolveManifest(hostName, hostMode);
        const host = await this.launchHost({
          resolved,
          extensionOrOrigin,
          mode: hostMode,
        });

        // Registered before the reply so a Close naming the returned handle
        // always finds it.
        const { handle, token: hostToken } = this.registry.register();
        this.logger.debug(`Registered running messaging host ${handle}`);

        try {
          await this.superviseHost(active, host, handle, hostToken);
          if (active.abandoned) {
            this.logger.debug(
              `Not emitting Closed for ${handle}: ${active.sender} is gone`,
            );
          } else {
            this.logger.debug(
              `Emitting Closed for ${handle} to ${active.sender}`,
            );
            invocation.emitClosed(handle);
          }
        } finally {
          this.logger.debug(`Unregistering running messaging host ${handle}`);
          this.registry.unregister(handle);
        }
      },
    );
  }

  public async close(
    invocation: RequestInvocation<void>,
    request: CloseRequest,
  ): Promise<RequestOutcome> {
    const { handle } = request;
    return await this.dispatch(invocation, `Close ${handle}`, async (active) => {
      if (this.registry.cancel(handle)) {
        this.logger.debug(`Cancelling ${handle}`);
      }
      await active.reply(undefined);
    });
  }

  /** Fires every client token and waits for in-flight work to wind down. */
  public async shutdown(): Promise<void> {
    this.tracker.cancelAll();
    await Promise.allSettled(Array.from(this.inFlight));
  }

  public get pendingRequests(): number {
    return this.inFlight.size;
  }

  private async dispatch<TReply>(
    invocation: RequestInvocation<TReply>,
    label: string,
    work: (active: ActiveRequest<TReply>) => Promise<void>,
  ): Promise<RequestOutcome> {
    this.logger.info(`Handling ${label}`);

    const token = this.tracker.ensure(invocation.sender);
    const active = new ActiveRequest(invocation, token, this.logger, label);
    const task = this.runWork(active, label, work);

    this.inFlight.add(task);
    const forget = (): void => {
      this.inFlight.delete(task);
    };
    void task.then(forget, forget);

    const outcome = await raceCancellation(task, token, (error) => {
      this.logger.error(`Abandoned ${label} failed: ${toErrorMessage(error)}`);
    });
    if (outcome.status === "cancelled") {
      this.logger.debug(`Abandoned ${label}`);
    }
    return outcome.status;
  }

  private async runWork<TReply>(
    active: ActiveRequest<TReply>,
    label: string,
    work: (active: ActiveRequest<TReply>) => Promise<void>,
  ): Promise<void> {
    try {
      await work(active);
    } catch (error) {
      if (error instanceof NativeMessagingError) {
        this.logger.debug(`${label} failed: ${error.message}`);
      } else {
        this.logger.error(`${label} failed: ${toErrorMessage(error)}`);
      }
      active.fail(error);
    }
  }

  private async superviseHost(
    active: ActiveRequest<StartReply>,
    host: PipedProcess,
    handle: string,
    hostToken: CancellationToken,
  ): Promise<void> {
    try {
      const delivered = await active.reply({
        descriptors: host.descriptors,
        handle,
      });
      // The pipe ends stay open until the host ends: the transport may
      // still be writing the reply that carries them.
      if (!delivered) {
        hostToken.cancel();
      }

      const ending = await waitForHostEnding(host, hostToken, active.token);
      this.logHostEnding(handle, ending);
    } finally {
      host.forceExit();
      host.releasePipes();
    }
  }

  private logHostEnding(handle: string, ending: HostEnding): void {
    switch (ending.kind) {
      case "closed":
        this.logger.debug(`Native messaging host ${handle} closed`);
        return;
      case "disconnected":
        this.logger.debug(
          `Native messaging host ${handle} stopped: client disconnected`,
        );
        return;
      case "exited": {
        const { exitCode, signal } = ending.exit;
        if (signal) {
          this.logger.warn(
            `Native messaging host ${handle} failed: killed by signal ${signal}`,
          );
        } else if (exitCode !== 0) {
          this.logger.warn(
            `Native messaging host ${handle} failed: exited with code ${String(exitCode)}`,
          );
        } else {
          this.logger.debug(`Native messaging host ${handle} exited`);
        }
        return;
      }
    }
  }
}

async function waitForHostEnding(
  host: PipedProcess,
  hostToken: CancellationToken,
  clientToken: CancellationToken,
): Promise<HostEnding> {
  return await Promise.race<HostEnding>([
    host.exited.then((exit): HostEnding => ({ kind: "exited", exit })),
    hostToken.whenCancelled().then((): HostEnding => ({ kind: "closed" })),
    clientToken
      .whenCancelled()
      .then((): HostEnding => ({ kind: "disconnected" })),
  ]);
}
