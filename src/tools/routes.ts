import type { CommandRunner } from "../command.ts";
import type { Platform } from "../platform.ts";

/**
 * One routing-table entry.
 *
 * `mask` holds the Windows netmask or the Unix genmask column. `flags` holds
 * the Unix flags or the Windows metric; the two share a display column.
 */
export interface RouteRecord {
  destination: string;
  gateway: string;
  mask: string;
  flags: string;
  interface?: string;
}

export interface RouteError {
  error: string;
}

export type RouteResult = RouteRecord[] | RouteError;

const DOTTED_QUAD = /^\d+\.\d+\.\d+\.\d+/;

export function isRouteError(result: RouteResult): result is RouteError {
  return !Array.isArray(result);
}

function tokenize(line: string): string[] {
  return line.split(/\s+/);
}

/**
 * Parse `route print` output. Only default-route rows (starting with
 * `0.0.0.0`) are kept; the columns are destination, netmask, gateway,
 * interface and metric.
 */
export function parseWindowsRoutes(output: string): RouteRecord[] {
  const routes: RouteRecord[] = [];
  for (const raw of output.split("\n")) {
    const line = raw.trim();
    if (!line.startsWith("0.0.0.0")) continue;

    const parts = tokenize(line);
    if (parts.length < 5) continue;
    const [destination = "", mask = "", gateway = "", iface = "", metric = ""] = parts;
    routes.push({ destination, mask, gateway, interface: iface, flags: metric });
  }
  return routes;
}

/**
 * Parse `netstat -rn` output.
 *
 * Default rows (`default` or `0.0.0.0`) need four columns, other dotted-quad
 * rows need five. Column 4 is the reference count and is never surfaced; the
 * interface is read from column 5 when present. Short rows are dropped.
 */
export function parseUnixRoutes(output: string): RouteRecord[] {
  const routes: RouteRecord[] = [];
  for (const raw of output.split("\n")) {
    const line = raw.trim();

    let minColumns: number;
    if (line.startsWith("default") || line.startsWith("0.0.0.0")) {
      minColumns = 4;
    } else if (DOTTED_QUAD.test(line)) {
      minColumns = 5;
    } else {
      continue;
    }

    const parts = tokenize(line);
    if (parts.length < minColumns) continue;
    const [destination = "", gateway = "", mask = "", flags = ""] = parts;
    const route: RouteRecord = { destination, gateway, mask, flags };
    const iface = parts[5];
    if (iface !== undefined) route.interface = iface;
    routes.push(route);
  }
  return routes;
}

/**
 * Read the routing table of the host. Runs a fresh command on every call.
 */
export function getRoutingTable(platform: Platform, runner: CommandRunner): RouteResult {
  switch (platform.family) {
    case "windows": {
      const result = runner.run("route print");
      return result.success ? parseWindowsRoutes(result.stdout) : { error: result.error };
    }
    case "unix": {
      const result = runner.run("netstat -rn");
      return result.success ? parseUnixRoutes(result.stdout) : { error: result.error };
    }
    case "unsupported":
      return { error: "Unsupported operating system" };
  }
}
