import { networkInterfaces } from "node:os";
import type { CommandRunner } from "../command.ts";
import type { Platform } from "../platform.ts";
import type { InterfaceSource } from "./interfaces.ts";
import { parseWindowsRoutes } from "./routes.ts";

export type AddressFamily = "IPv4" | "IPv6";

export interface GatewayEntry {
  gateway: string;
  interface: string;
}

export type GatewayMap = Partial<Record<AddressFamily, GatewayEntry>>;

const RTF_GATEWAY = 0x2;
const ALL_ZEROS = /^0+$/;

/**
 * Decode a /proc/net/route address (hex, host byte order, little-endian).
 */
export function decodeProcIPv4(hex: string): string | null {
  if (!/^[0-9A-Fa-f]{8}$/.test(hex)) return null;
  const bytes: number[] = [];
  for (let i = 6; i >= 0; i -= 2) {
    bytes.push(Number.parseInt(hex.slice(i, i + 2), 16));
  }
  return bytes.join(".");
}

/**
 * Format 32 hex digits as a compressed IPv6 address.
 */
export function formatIPv6(hex: string): string | null {
  if (!/^[0-9A-Fa-f]{32}$/.test(hex)) return null;
  const groups: string[] = [];
  for (let i = 0; i < 32; i += 4) {
    groups.push(Number.parseInt(hex.slice(i, i + 4), 16).toString(16));
  }

  // Longest run of two or more zero groups collapses to "::"
  let bestStart = -1;
  let bestLen = 0;
  for (let i = 0; i < groups.length;) {
    if (groups[i] !== "0") {
      i++;
      continue;
    }
    let j = i;
    while (j < groups.length && groups[j] === "0") j++;
    if (j - i > bestLen) {
      bestStart = i;
      bestLen = j - i;
    }
    i = j;
  }
  if (bestLen < 2) return groups.join(":");

  const head = groups.slice(0, bestStart).join(":");
  const tail = groups.slice(bestStart + bestLen).join(":");
  return `${head}::${tail}`;
}

export function parseProcRoute(text: string): GatewayEntry | null {
  for (const raw of text.split("\n").slice(1)) {
    const [iface, destination, gateway, flags, , , , mask] = raw.trim().split(/\s+/);
    if (!iface || !gateway || !flags) continue;
    if (destination !== "00000000" || mask !== "00000000") continue;
    if ((Number.parseInt(flags, 16) & RTF_GATEWAY) === 0) continue;
    const address = decodeProcIPv4(gateway);
    if (address) return { gateway: address, interface: iface };
  }
  return null;
}

export function parseProcIPv6Route(text: string): GatewayEntry | null {
  for (const raw of text.split("\n")) {
    const parts = raw.trim().split(/\s+/);
    const [destination, prefix, , , nextHop] = parts;
    const iface = parts[9];
    if (!destination || !nextHop || !iface) continue;
    if (!ALL_ZEROS.test(destination) || prefix !== "00" || ALL_ZEROS.test(nextHop)) continue;
    const address = formatIPv6(nextHop);
    if (address) return { gateway: address, interface: iface };
  }
  return null;
}

/**
 * Read the `gateway:` and `interface:` lines of macOS `route -n get`.
 */
export function parseRouteGet(text: string): GatewayEntry | null {
  const fields = new Map<string, string>();
  for (const raw of text.split("\n")) {
    const idx = raw.indexOf(":");
    if (idx === -1) continue;
    fields.set(raw.slice(0, idx).trim(), raw.slice(idx + 1).trim());
  }
  const gateway = fields.get("gateway");
  const iface = fields.get("interface");
  if (!gateway || !iface) return null;
  return { gateway, interface: iface };
}

function collect(
  runner: CommandRunner,
  command: string,
  parse: (text: string) => GatewayEntry | null,
): GatewayEntry | null {
  const result = runner.run(command);
  return result.success ? parse(result.stdout) : null;
}

/**
 * Name of the interface that owns `address`, or the address itself when no
 * interface claims it.
 */
export function interfaceNameFor(address: string, source: InterfaceSource): string {
  let entries: ReturnType<InterfaceSource>;
  try {
    entries = source();
  } catch {
    return address;
  }
  for (const [name, addrs] of Object.entries(entries)) {
    if ((addrs ?? []).some((a) => a.address === address)) return name;
  }
  return address;
}

function firstWindowsDefault(text: string): GatewayEntry | null {
  const [route] = parseWindowsRoutes(text);
  if (!route || route.interface === undefined) return null;
  return { gateway: route.gateway, interface: route.interface };
}

/**
 * Default gateway per address family. Families that cannot be determined
 * are left out of the map.
 */
export function getGateways(
  platform: Platform,
  runner: CommandRunner,
  interfaceSource: InterfaceSource = networkInterfaces,
): GatewayMap {
  const gateways: GatewayMap = {};
  let v4: GatewayEntry | null = null;
  let v6: GatewayEntry | null = null;

  switch (platform.family) {
    case "windows":
      v4 = collect(runner, "route print -4 0.0.0.0", firstWindowsDefault);
      // route print names the interface by its address
      if (v4) v4 = { ...v4, interface: interfaceNameFor(v4.interface, interfaceSource) };
      break;
    case "unix":
      if (platform.os === "linux") {
        v4 = collect(runner, "cat /proc/net/route", parseProcRoute);
        v6 = collect(runner, "cat /proc/net/ipv6_route", parseProcIPv6Route);
      } else {
        v4 = collect(runner, "route -n get default", parseRouteGet);
        v6 = collect(runner, "route -n get -inet6 default", parseRouteGet);
      }
      break;
    case "unsupported":
      break;
  }

  if (v4) gateways.IPv4 = v4;
  if (v6) gateways.IPv6 = v6;
  return gateways;
}
