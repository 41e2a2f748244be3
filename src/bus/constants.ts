export const PROXY_BUS_NAME = "org.freedesktop.NativeMessagingProxy" as const;
export const PROXY_OBJECT_PATH = "/org/freedesktop/nativemessagingproxy" as const;
export const PROXY_INTERFACE = PROXY_BUS_NAME;
export const PROXY_INTERFACE_VERSION = 1 as const;

export const DBUS_SERVICE = "org.freedesktop.DBus" as const;
export const DBUS_OBJECT_PATH = "/org/freedesktop/DBus" as const;
export const DBUS_INTERFACE = DBUS_SERVICE;

export const INTROSPECTABLE_INTERFACE =
  "org.freedesktop.DBus.Introspectable" as const;
export const PROPERTIES_INTERFACE = "org.freedesktop.DBus.Properties" as const;
export const PEER_INTERFACE = "org.freedesktop.DBus.Peer" as const;

export const BUS_ERRORS = {
  failed: "org.freedesktop.DBus.Error.Failed",
  invalidArgs: "org.freedesktop.DBus.Error.InvalidArgs",
  fileNotFound: "org.freedesktop.DBus.Error.FileNotFound",
  spawnExecFailed: "org.freedesktop.DBus.Error.Spawn.ExecFailed",
  unknownMethod: "org.freedesktop.DBus.Error.UnknownMethod",
  unknownInterface: "org.freedesktop.DBus.Error.UnknownInterface",
  unknownProperty: "org.freedesktop.DBus.Error.UnknownProperty",
  propertyReadOnly: "org.freedesktop.DBus.Error.PropertyReadOnly",
} as const;

export const PROXY_SIGNATURES = {
  getManifest: { in: "ssa{sv}", out: "ay" },
  start: { in: "sssa{sv}", out: "hhho" },
  close: { in: "oa{sv}", out: "" },
  closed: "oa{sv}",
} as const;
