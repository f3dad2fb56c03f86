import { networkInterfaces, type NetworkInterfaceInfo } from "node:os";

export interface InterfaceDetails {
  ip: string;
  netmask: string;
  mac: string | null;
  broadcast: string;
}

export type InterfaceMap = Record<string, InterfaceDetails>;

export type InterfaceSource = () => NodeJS.Dict<NetworkInterfaceInfo[]>;

const isIPv4 = (iface: NetworkInterfaceInfo): boolean => iface.family === "IPv4";

function octets(address: string): number[] | null {
  const parts = address.split(".").map((p) => Number.parseInt(p, 10));
  if (parts.length !== 4 || parts.some((p) => Number.isNaN(p) || p < 0 || p > 255)) {
    return null;
  }
  return parts;
}

/**
 * Broadcast address of an IPv4 network, or "N/A" for loopback and host routes.
 */
export function broadcastAddress(address: string, netmask: string, internal = false): string {
  if (internal || netmask === "255.255.255.255") return "N/A";
  const ip = octets(address);
  const mask = octets(netmask);
  if (!ip || !mask) return "N/A";
  return ip.map((octet, i) => (octet | (~(mask[i] ?? 0) & 0xff))).join(".");
}

/**
 * List interfaces that carry an IPv4 address, keyed by interface name.
 * Only the first IPv4 address of each interface is reported.
 */
export function getInterfaceDetails(source: InterfaceSource = networkInterfaces): InterfaceMap {
  const interfaces: InterfaceMap = {};
  let entries: NodeJS.Dict<NetworkInterfaceInfo[]>;
  try {
    entries = source();
  } catch {
    return interfaces;
  }

  for (const [name, addrs] of Object.entries(entries)) {
    const v4 = (addrs ?? []).find(isIPv4);
    if (!v4) continue;
    interfaces[name] = {
      ip: v4.address,
      netmask: v4.netmask,
      mac: v4.mac ? v4.mac : null,
      broadcast: broadcastAddress(v4.address, v4.netmask, v4.internal),
    };
  }
  return interfaces;
}
