import { DisplayableError, type HintedErrorOptions } from "../utils/errors.js";

export type NativeMessagingErrorKind =
  | "invalid-name"
  | "not-found"
  | "spawn-failed";

export class NativeMessagingError extends DisplayableError {
  public readonly kind: NativeMessagingErrorKind;

  constructor(
    kind: NativeMessagingErrorKind,
    message: string,
    options: HintedErrorOptions = {},
  ) {
    super(message, options);
    this.kind = kind;
    this.name = "NativeMessagingError";
  }
}

export class InvalidHostNameError extends NativeMessagingError {
  constructor(hostName: string) {
    super("invalid-name", "Invalid native messaging host name", {
      detailLines: [`Rejected name: ${JSON.stringify(hostName)}`],
    });
    this.name = "InvalidHostNameError";
  }
}

export class ManifestNotFoundError extends NativeMessagingError {
  constructor(hostName: string) {
    super("not-found", "Could not find native messaging host", {
      detailLines: [`Host: ${hostName}`],
    });
    this.name = "ManifestNotFoundError";
  }
}

export class HostSpawnError extends NativeMessagingError {
  public readonly code: string | undefined;

  constructor(executable: string, detail: string, code?: string) {
    super(
      "spawn-failed",
      `Failed to execute child process "${executable}": ${detail}`,
    );
    this.code = code;
    this.name = "HostSpawnError";
  }
}

/** Why a single manifest candidate was skipped. Logged, never returned. */
export class ManifestCandidateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestCandidateError";
  }
}
