import { readFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";

import { z } from "zod";

import type { HostMode, SearchPathSet } from "../configs/search-paths/types.js";
import { toErrorMessage } from "../utils/errors.js";
import { isMissing } from "../utils/fs.js";
import type { Logger } from "../utils/log.js";
import {
  InvalidHostNameError,
  ManifestCandidateError,
  ManifestNotFoundError,
} from "./errors.js";

export interface NativeMessagingManifest {
  name: string;
  type: "stdio";
  /** Absolute path of the host executable. */
  path: string;
}

export interface ResolvedManifest {
  /** File contents exactly as read from disk. */
  bytes: Buffer;
  /** Absolute path of the manifest file itself. */
  filePath: string;
  manifest: NativeMessagingManifest;
}

export type ManifestResolver = (
  hostName: string,
  mode: HostMode,
) => Promise<ResolvedManifest>;

export interface ManifestResolverOptions {
  searchPaths: SearchPathSet;
  logger: Logger;
}

// One or more dot-separated groups of alphanumerics and underscores.
const HOST_NAME_PATTERN = /^\w+(\.\w+)*$/u;

export function isValidHostName(hostName: string): boolean {
  return HOST_NAME_PATTERN.test(hostName);
}

function buildManifestSchema(hostName: string) {
  return z
    .object({
      name: z.literal(hostName, {
        errorMap: () => ({ message: "Metadata contains an unexpected name" }),
      }),
      type: z.literal("stdio", {
        errorMap: () => ({
          message: 'Not a "stdio" type native messaging host',
        }),
      }),
      path: z
        .string({
          errorMap: () => ({
            message: "Native messaging host path is not absolute",
          }),
        })
        .refine((value) => isAbsolute(value), {
          message: "Native messaging host path is not absolute",
        }),
    })
    .passthrough();
}

export function validateManifest(
  document: unknown,
  hostName: string,
): NativeMessagingManifest {
  const parsed = buildManifestSchema(hostName).safeParse(document);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    throw new ManifestCandidateError(
      issue ? issue.message : "Manifest failed validation",
    );
  }
  const { name, type, path } = parsed.data;
  return { name, type, path };
}

export function createManifestResolver(
  options: ManifestResolverOptions,
): ManifestResolver {
  const { searchPaths, logger } = options;

  return async (hostName, mode) => {
    if (!isValidHostName(hostName)) {
      throw new InvalidHostNameError(hostName);
    }

    const basename = `${hostName}.json`;
    for (const directory of searchPaths[mode]) {
      const filePath = join(directory, basename);
      const candidate = await loadCandidate(filePath, hostName, logger);
      if (candidate) {
        logger.debug(`Found manifest ${filePath}`);
        return candidate;
      }
      logger.debug(`Skipping file ${filePath}`);
    }

    logger.debug("Requested manifest not found");
    throw new ManifestNotFoundError(hostName);
  };
}

// Malformed UTF-8 makes the candidate invalid instead of being replaced.
const MANIFEST_DECODER = new TextDecoder("utf-8", { fatal: true });

async function loadCandidate(
  filePath: string,
  hostName: string,
  logger: Logger,
): Promise<ResolvedManifest | undefined> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    if (!isMissing(error)) {
      logger.warn(`Loading file ${filePath} failed: ${toErrorMessage(error)}`);
    }
    return undefined;
  }

  let document: unknown;
  try {
    document = JSON.parse(MANIFEST_DECODER.decode(bytes));
  } catch (error) {
    logger.warn(
      `Manifest ${filePath} is not a valid JSON file: ${toErrorMessage(error)}`,
    );
    return undefined;
  }

  try {
    const manifest = validateManifest(document, hostName);
    return { bytes, filePath, manifest };
  } catch (error) {
    if (!(error instanceof ManifestCandidateError)) {
      throw error;
    }
    logger.warn(`Manifest ${filePath} is invalid: ${error.message}`);
    return undefined;
  }
}
