import { join } from "node:path";

import type { ProxyEnvironment } from "./types.js";

/**
 * Chrome and Chromium host locations, per-user first, then system wide, then
 * the same system directories under the configured prefix.
 */
export function defaultChromiumSearchPaths(
  environment: ProxyEnvironment,
): string[] {
  const { userConfigDir, sysconfDir } = environment;
  return [
    join(userConfigDir, "google-chrome", "NativeMessagingHosts"),
    join(userConfigDir, "chromium", "NativeMessagingHosts"),
    "/etc/opt/chrome/native-messaging-hosts",
    "/etc/chromium/native-messaging-hosts",
    join(sysconfDir, "opt", "chrome", "native-messaging-hosts"),
    join(sysconfDir, "chromium", "native-messaging-hosts"),
  ];
}

/**
 * Firefox host locations. The prefixed libdir entry covers distributions
 * whose libdir carries a multiarch suffix.
 */
export function defaultMozillaSearchPaths(
  environment: ProxyEnvironment,
): string[] {
  const { homeDir, userConfigDir, libDir } = environment;
  return [
    join(homeDir, ".mozilla", "native-messaging-hosts"),
    join(userConfigDir, "mozilla", "native-messaging-hosts"),
    "/usr/lib/mozilla/native-messaging-hosts",
    "/usr/lib64/mozilla/native-messaging-hosts",
    join(libDir, "mozilla", "native-messaging-hosts"),
  ];
}
