export { NetInfoTools } from "./net_info_tools.ts";
export type {
  NetInfoToolsOptions,
  NetworkSnapshot,
  PrerequisiteStatus,
} from "./net_info_tools.ts";

export { detectPlatform } from "./platform.ts";
export type { Platform, PlatformFamily } from "./platform.ts";

export { shellRunner } from "./command.ts";
export type { CommandResult, CommandRunner } from "./command.ts";

export { getRoutingTable, isRouteError, parseUnixRoutes, parseWindowsRoutes } from "./tools/routes.ts";
export type { RouteError, RouteRecord, RouteResult } from "./tools/routes.ts";
export type { InterfaceDetails, InterfaceMap, InterfaceSource } from "./tools/interfaces.ts";
export type { AddressFamily, GatewayEntry, GatewayMap } from "./tools/gateways.ts";

export { renderSnapshot } from "./presenter.ts";
