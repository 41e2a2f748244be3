import {
  INTROSPECTABLE_INTERFACE,
  PEER_INTERFACE,
  PROPERTIES_INTERFACE,
  PROXY_INTERFACE,
} from "./constants.js";

export const PROXY_INTROSPECTION_XML = `<!DOCTYPE node PUBLIC "-//freedesktop//DTD D-BUS Object Introspection 1.0//EN"
 "http://www.freedesktop.org/standards/dbus/1.0/introspect.dtd">
<node>
  <interface name="${PROXY_INTERFACE}">
    <method name="GetManifest">
      <arg type="s" name="messaging_host_name" direction="in"/>
      <arg type="s" name="mode" direction="in"/>
      <arg type="a{sv}" name="options" direction="in"/>
      <arg type="ay" name="manifest" direction="out"/>
    </method>
    <method name="Start">
      <arg type="s" name="messaging_host_name" direction="in"/>
      <arg type="s" name="extension_or_origin" direction="in"/>
      <arg type="s" name="mode" direction="in"/>
      <arg type="a{sv}" name="options" direction="in"/>
      <arg type="h" name="stdin" direction="out"/>
      <arg type="h" name="stdout" direction="out"/>
      <arg type="h" name="stderr" direction="out"/>
      <arg type="o" name="handle" direction="out"/>
    </method>
    <method name="Close">
      <arg type="o" name="handle" direction="in"/>
      <arg type="a{sv}" name="options" direction="in"/>
    </method>
    <signal name="Closed">
      <arg type="o" name="handle"/>
      <arg type="a{sv}" name="options"/>
    </signal>
    <property name="version" type="u" access="read"/>
  </interface>
  <interface name="${INTROSPECTABLE_INTERFACE}">
    <method name="Introspect">
      <arg type="s" name="xml_data" direction="out"/>
    </method>
  </interface>
  <interface name="${PROPERTIES_INTERFACE}">
    <method name="Get">
      <arg type="s" name="interface_name" direction="in"/>
      <arg type="s" name="property_name" direction="in"/>
      <arg type="v" name="value" direction="out"/>
    </method>
    <method name="GetAll">
      <arg type="s" name="interface_name" direction="in"/>
      <arg type="a{sv}" name="properties" direction="out"/>
    </method>
    <method name="Set">
      <arg type="s" name="interface_name" direction="in"/>
      <arg type="s" name="property_name" direction="in"/>
      <arg type="v" name="value" direction="in"/>
    </method>
  </interface>
  <interface name="${PEER_INTERFACE}">
    <method name="Ping"/>
  </interface>
</node>
`;
