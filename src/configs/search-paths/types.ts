import { isAbsolute } from "node:path";

import { z } from "zod";

export const HOST_MODES = ["chromium", "mozilla"] as const;

export type HostMode = (typeof HOST_MODES)[number];

export type SearchPathSet = Readonly<Record<HostMode, readonly string[]>>;

export const HOST_LOCATIONS_ENV = "XNMP_HOST_LOCATIONS" as const;
export const SYSCONFDIR_ENV = "XNMP_SYSCONFDIR" as const;
export const LIBDIR_ENV = "XNMP_LIBDIR" as const;

export const DEFAULT_SYSCONF_DIR = "/usr/local/etc" as const;
export const DEFAULT_LIB_DIR = "/usr/local/lib" as const;

const absoluteDirectorySchema = z
  .string()
  .refine((value) => isAbsolute(value), {
    message: "must be an absolute path",
  });

export const proxyEnvironmentSchema = z.object({
  [HOST_LOCATIONS_ENV]: z.string().optional(),
  [SYSCONFDIR_ENV]: absoluteDirectorySchema.optional(),
  [LIBDIR_ENV]: absoluteDirectorySchema.optional(),
  XDG_CONFIG_HOME: z.string().optional(),
  HOME: z.string().optional(),
});

export interface ProxyEnvironment {
  /** Replaces both default search path sets when present. */
  hostLocations?: readonly string[];
  userConfigDir: string;
  homeDir: string;
  sysconfDir: string;
  libDir: string;
}
