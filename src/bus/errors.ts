import { NativeMessagingError } from "../hosts/errors.js";
import { DisplayableError } from "../utils/errors.js";
import { BUS_ERRORS } from "./constants.js";

export class BusConnectionError extends DisplayableError {
  constructor(detail: string) {
    super(`No session bus: ${detail}`, {
      hintLines: [
        "Check that a session bus is running and DBUS_SESSION_BUS_ADDRESS points at it.",
      ],
    });
    this.name = "BusConnectionError";
  }
}

export function busErrorNameFor(error: Error): string {
  if (!(error instanceof NativeMessagingError)) {
    return BUS_ERRORS.failed;
  }
  switch (error.kind) {
    case "invalid-name":
      return BUS_ERRORS.invalidArgs;
    case "not-found":
      return BUS_ERRORS.fileNotFound;
    case "spawn-failed":
      return BUS_ERRORS.spawnExecFailed;
  }
}
