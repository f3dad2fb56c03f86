import Table from "cli-table3";
import type { NetworkSnapshot } from "./net_info_tools.ts";
import type { AddressFamily, GatewayMap } from "./tools/gateways.ts";
import type { InterfaceMap } from "./tools/interfaces.ts";
import { isRouteError, type RouteResult } from "./tools/routes.ts";

const WIDTH = 80;

const ASCII_CHARS = {
  "top": "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  "bottom": "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  "left": "|",
  "left-mid": "+",
  "mid": "-",
  "mid-mid": "+",
  "right": "|",
  "right-mid": "+",
  "middle": "|",
};

const FAMILIES: AddressFamily[] = ["IPv4", "IPv6"];

export function center(text: string, width = WIDTH): string {
  const margin = Math.max(width - text.length, 0);
  const left = Math.floor(margin / 2);
  return " ".repeat(left) + text + " ".repeat(margin - left);
}

/**
 * Left-aligned ASCII table with a rule under the header only.
 */
export function renderTable(head: string[], rows: string[][]): string {
  const table = new Table({
    head,
    chars: ASCII_CHARS,
    style: { head: [], border: [], compact: true },
  });
  table.push(...rows);
  return table.toString();
}

function banner(title: string, rule: string): string[] {
  return ["", rule.repeat(WIDTH), center(title), rule.repeat(WIDTH)];
}

export function renderRoutingTable(routes: RouteResult): string[] {
  if (isRouteError(routes)) {
    return ["", `Error: ${routes.error}`];
  }
  const rows = routes.map((r) => [r.destination, r.gateway, r.mask, r.interface ?? "", r.flags]);
  return [renderTable(["Destination", "Gateway", "Netmask", "Interface", "Metric/Flags"], rows)];
}

export function renderInterfaces(interfaces: InterfaceMap): string[] {
  const entries = Object.entries(interfaces);
  if (entries.length === 0) {
    return ["No interface information available"];
  }
  const rows = entries.map(([name, d]) => [name, d.ip, d.netmask, d.mac ?? "N/A", d.broadcast]);
  return [renderTable(["Interface", "IP Address", "Netmask", "MAC Address", "Broadcast"], rows)];
}

export function renderGateways(gateways: GatewayMap): string[] {
  const rows: string[][] = [];
  for (const family of FAMILIES) {
    const entry = gateways[family];
    if (entry) rows.push([family, entry.gateway, entry.interface]);
  }
  if (rows.length === 0) {
    return ["No gateway information available"];
  }
  return [renderTable(["Type", "Gateway IP", "Interface"], rows)];
}

/**
 * Render every section of a snapshot in display order.
 */
export function renderSnapshot(snapshot: NetworkSnapshot): string {
  return [
    ...banner("NETWORK INFORMATION TOOL", "="),
    ...banner("ROUTING TABLE", "-"),
    ...renderRoutingTable(snapshot.routingTable),
    ...banner("NETWORK INTERFACES", "-"),
    ...renderInterfaces(snapshot.interfaces),
    ...banner("DEFAULT GATEWAYS", "-"),
    ...renderGateways(snapshot.gateways),
    ...banner("ARP TABLE", "-"),
    snapshot.arpTable,
    ...banner("DNS INFORMATION", "-"),
    snapshot.dnsInfo,
  ].join("\n");
}
