import type { HostMode } from "../configs/search-paths/types.js";

/** Anything other than "chromium" selects the Firefox conventions. */
export function parseHostMode(value: string): HostMode {
  return value === "chromium" ? "chromium" : "mozilla";
}
