import { networkInterfaces } from "node:os";
import { type CommandRunner, shellRunner } from "./command.ts";
import { detectPlatform, type Platform } from "./platform.ts";
import { getArpTable } from "./tools/arp.ts";
import { getDnsInfo } from "./tools/dns.ts";
import { type GatewayMap, getGateways } from "./tools/gateways.ts";
import { getInterfaceDetails, type InterfaceMap, type InterfaceSource } from "./tools/interfaces.ts";
import { renderTable } from "./presenter.ts";
import { getRoutingTable, type RouteResult } from "./tools/routes.ts";

export interface NetworkSnapshot {
  routingTable: RouteResult;
  interfaces: InterfaceMap;
  arpTable: string;
  dnsInfo: string;
  gateways: GatewayMap;
}

export type PrerequisiteStatus = { status: "OK" } | { status: "Error"; error: string };

export interface NetInfoToolsOptions {
  platform?: Platform;
  runner?: CommandRunner;
  interfaceSource?: InterfaceSource;
}

export class NetInfoTools {
  readonly platform: Platform;
  private readonly runner: CommandRunner;
  private readonly interfaceSource: InterfaceSource;

  constructor(options: NetInfoToolsOptions = {}) {
    this.platform = options.platform ?? detectPlatform();
    this.runner = options.runner ?? shellRunner;
    this.interfaceSource = options.interfaceSource ?? networkInterfaces;
  }

  /**
   * Verify that interface enumeration and table rendering work on this host.
   */
  checkPrerequisites(): PrerequisiteStatus {
    try {
      this.interfaceSource();
      renderTable(["Interface"], []);
      return { status: "OK" };
    } catch (e) {
      return { status: "Error", error: e instanceof Error ? e.message : String(e) };
    }
  }

  getRoutingTable(): RouteResult {
    return getRoutingTable(this.platform, this.runner);
  }

  getInterfaceDetails(): InterfaceMap {
    return getInterfaceDetails(this.interfaceSource);
  }

  getArpTable(): string {
    return getArpTable(this.platform, this.runner);
  }

  getDnsInfo(): string {
    return getDnsInfo(this.platform, this.runner);
  }

  getGateways(): GatewayMap {
    return getGateways(this.platform, this.runner, this.interfaceSource);
  }

  /**
   * Collect every section. A failing section is recorded in place and never
   * stops the sections after it.
   */
  collectAll(): NetworkSnapshot {
    const routingTable = this.getRoutingTable();
    const interfaces = this.getInterfaceDetails();
    const arpTable = this.getArpTable();
    const dnsInfo = this.getDnsInfo();
    const gateways = this.getGateways();
    return { routingTable, interfaces, arpTable, dnsInfo, gateways };
  }
}
