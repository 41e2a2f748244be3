import type { HostMode } from "../configs/search-paths/types.js";
import { toErrorMessage } from "../utils/errors.js";
import { isFileSystemError } from "../utils/fs.js";
import type { Logger } from "../utils/log.js";
import { type PipedProcess, spawnPipedProcess } from "../utils/process.js";
import { HostSpawnError } from "./errors.js";
import type { ResolvedManifest } from "./manifest.js";

export interface HostLaunchRequest {
  resolved: ResolvedManifest;
  extensionOrOrigin: string;
  mode: HostMode;
}

export type HostLauncher = (request: HostLaunchRequest) => Promise<PipedProcess>;

export interface HostLauncherOptions {
  logger: Logger;
  /** Defaults to the proxy's own environment. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Chromium hosts receive the caller's extension origin only; Firefox hosts
 * additionally get the manifest path ahead of the extension id.
 */
export function buildHostArgv(
  resolved: ResolvedManifest,
  extensionOrOrigin: string,
  mode: HostMode,
): string[] {
  const argv = [resolved.manifest.path];
  if (mode === "mozilla") {
    argv.push(resolved.filePath);
  }
  argv.push(extensionOrOrigin);
  return argv;
}

export function createHostLauncher(options: HostLauncherOptions): HostLauncher {
  const { logger, env } = options;

  return async ({ resolved, extensionOrOrigin, mode }) => {
    const [command, ...args] = buildHostArgv(resolved, extensionOrOrigin, mode);
    logger.debug(`Spawning native messaging host ${command}`);

    try {
      return await spawnPipedProcess({
        command,
        args,
        env,
        onError: (error) => {
          logger.warn(
            `Native messaging host ${command} reported an error: ${error.message}`,
          );
        },
      });
    } catch (error) {
      const code = isFileSystemError(error) ? error.code : undefined;
      throw new HostSpawnError(command, toErrorMessage(error), code);
    }
  };
}
