import { homedir } from "node:os";
import { join } from "node:path";

import { ConfigurationError } from "../errors.js";
import {
  defaultChromiumSearchPaths,
  defaultMozillaSearchPaths,
} from "./defaults.js";
import {
  DEFAULT_LIB_DIR,
  DEFAULT_SYSCONF_DIR,
  HOST_LOCATIONS_ENV,
  LIBDIR_ENV,
  type ProxyEnvironment,
  proxyEnvironmentSchema,
  type SearchPathSet,
  SYSCONFDIR_ENV,
} from "./types.js";

export interface LoadProxyEnvironmentOptions {
  env?: NodeJS.ProcessEnv;
  /** Fallback when HOME is unset. */
  homeDir?: () => string;
}

export function loadProxyEnvironment(
  options: LoadProxyEnvironmentOptions = {},
): ProxyEnvironment {
  const { env = process.env, homeDir: resolveHomeDir = homedir } = options;

  const parsed = proxyEnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const detailLines = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError("Invalid proxy environment.", detailLines);
  }

  const variables = parsed.data;
  const homeDir = nonEmpty(variables.HOME) ?? resolveHomeDir();
  const userConfigDir =
    nonEmpty(variables.XDG_CONFIG_HOME) ?? join(homeDir, ".config");
  const hostLocations = variables[HOST_LOCATIONS_ENV];

  return {
    ...(hostLocations !== undefined
      ? { hostLocations: splitHostLocations(hostLocations) }
      : {}),
    homeDir,
    userConfigDir,
    sysconfDir: variables[SYSCONFDIR_ENV] ?? DEFAULT_SYSCONF_DIR,
    libDir: variables[LIBDIR_ENV] ?? DEFAULT_LIB_DIR,
  };
}

export function loadSearchPaths(environment: ProxyEnvironment): SearchPathSet {
  if (environment.hostLocations) {
    const locations = Object.freeze([...environment.hostLocations]);
    return Object.freeze({ chromium: locations, mozilla: locations });
  }

  return Object.freeze({
    chromium: Object.freeze(defaultChromiumSearchPaths(environment)),
    mozilla: Object.freeze(defaultMozillaSearchPaths(environment)),
  });
}

export function splitHostLocations(value: string): string[] {
  return value.split(":").filter((entry) => entry.length > 0);
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}
