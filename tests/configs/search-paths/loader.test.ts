import { describe, expect, it } from "@jest/globals";

import { ConfigurationError } from "../../../src/configs/errors.js";
import {
  loadProxyEnvironment,
  loadSearchPaths,
  splitHostLocations,
} from "../../../src/configs/search-paths/loader.js";

const noHome = (): string => {
  throw new Error("home directory lookup not expected");
};

describe("splitHostLocations", () => {
  it("splits on colons and drops empty entries", () => {
    expect(splitHostLocations("/a::/b:")).toEqual(["/a", "/b"]);
    expect(splitHostLocations("")).toEqual([]);
  });
});

describe("loadProxyEnvironment", () => {
  it("applies defaults around HOME", () => {
    expect(
      loadProxyEnvironment({ env: { HOME: "/home/tester" }, homeDir: noHome }),
    ).toEqual({
      homeDir: "/home/tester",
      userConfigDir: "/home/tester/.config",
      sysconfDir: "/usr/local/etc",
      libDir: "/usr/local/lib",
    });
  });

  it("honours explicit directories", () => {
    expect(
      loadProxyEnvironment({
        env: {
          HOME: "/home/tester",
          XDG_CONFIG_HOME: "/home/tester/conf",
          XNMP_SYSCONFDIR: "/etc",
          XNMP_LIBDIR: "/usr/lib64",
          XNMP_HOST_LOCATIONS: "/opt/hosts:/srv/hosts",
        },
        homeDir: noHome,
      }),
    ).toEqual({
      hostLocations: ["/opt/hosts", "/srv/hosts"],
      homeDir: "/home/tester",
      userConfigDir: "/home/tester/conf",
      sysconfDir: "/etc",
      libDir: "/usr/lib64",
    });
  });

  it("falls back to the account home directory", () => {
    const environment = loadProxyEnvironment({
      env: { HOME: "" },
      homeDir: () => "/var/lib/tester",
    });

    expect(environment.homeDir).toBe("/var/lib/tester");
    expect(environment.userConfigDir).toBe("/var/lib/tester/.config");
  });

  it("rejects relative installation directories", () => {
    let failure: unknown;
    try {
      loadProxyEnvironment({
        env: { HOME: "/home/tester", XNMP_LIBDIR: "lib" },
        homeDir: noHome,
      });
    } catch (error) {
      failure = error;
    }

    expect(failure).toBeInstanceOf(ConfigurationError);
    expect(failure).toMatchObject({
      message: "Invalid proxy environment.",
      detailLines: ["XNMP_LIBDIR: must be an absolute path"],
    });
  });
});

describe("loadSearchPaths", () => {
  it("lists the browser default locations in order", () => {
    const paths = loadSearchPaths(
      loadProxyEnvironment({
        env: { HOME: "/home/tester", XNMP_LIBDIR: "/usr/lib/x86_64-linux-gnu" },
        homeDir: noHome,
      }),
    );

    expect(paths.chromium).toEqual([
      "/home/tester/.config/google-chrome/NativeMessagingHosts",
      "/home/tester/.config/chromium/NativeMessagingHosts",
      "/etc/opt/chrome/native-messaging-hosts",
      "/etc/chromium/native-messaging-hosts",
      "/usr/local/etc/opt/chrome/native-messaging-hosts",
      "/usr/local/etc/chromium/native-messaging-hosts",
    ]);
    expect(paths.mozilla).toEqual([
      "/home/tester/.mozilla/native-messaging-hosts",
      "/home/tester/.config/mozilla/native-messaging-hosts",
      "/usr/lib/mozilla/native-messaging-hosts",
      "/usr/lib64/mozilla/native-messaging-hosts",
      "/usr/lib/x86_64-linux-gnu/mozilla/native-messaging-hosts",
    ]);
  });

  it("uses the override list for both modes", () => {
    const paths = loadSearchPaths(
      loadProxyEnvironment({
        env: { HOME: "/home/tester", XNMP_HOST_LOCATIONS: "/opt/hosts::" },
        homeDir: noHome,
      }),
    );

    expect(paths.chromium).toEqual(["/opt/hosts"]);
    expect(paths.mozilla).toEqual(["/opt/hosts"]);
    expect(Object.isFrozen(paths)).toBe(true);
    expect(Object.isFrozen(paths.chromium)).toBe(true);
  });
});
