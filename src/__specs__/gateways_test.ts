import assert from "node:assert/strict";
import type { NetworkInterfaceInfo } from "node:os";
import { mock, test } from "node:test";
import type { CommandResult } from "../command.ts";
import { detectPlatform } from "../platform.ts";
import {
  decodeProcIPv4,
  formatIPv6,
  getGateways,
  interfaceNameFor,
  parseProcIPv6Route,
  parseProcRoute,
  parseRouteGet,
} from "../tools/gateways.ts";

const PROC_ROUTE = [
  "Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT",
  "eth0\t0001A8C0\t00000000\t0001\t0\t0\t100\t00FFFFFF\t0\t0\t0",
  "eth0\t00000000\t0101A8C0\t0003\t0\t0\t100\t00000000\t0\t0\t0",
  "",
].join("\n");

const PROC_IPV6_ROUTE = [
  "fe800000000000000000000000000000 40 00000000000000000000000000000000 00 00000000000000000000000000000000 00000100 00000001 00000000 00000001     eth0",
  "00000000000000000000000000000000 00 00000000000000000000000000000000 00 fe800000000000000000000000000001 00000400 00000001 00000000 00000003     eth0",
  "",
].join("\n");

const ROUTE_GET_DEFAULT = [
  "   route to: default",
  "destination: default",
  "       mask: default",
  "    gateway: 192.168.1.1",
  "  interface: en0",
  "      flags: <UP,GATEWAY,DONE,STATIC,PRCLONING,GLOBAL>",
  " recvpipe  sendpipe  ssthresh  rtt,msec    rttvar  hopcount      mtu     expire",
  "       0         0         0         0         0         0      1500         0",
].join("\n");

const ROUTE_PRINT_DEFAULT = [
  "IPv4 Route Table",
  "===========================================================================",
  "Active Routes:",
  "Network Destination        Netmask          Gateway       Interface  Metric",
  "          0.0.0.0          0.0.0.0         10.0.0.1         10.0.0.7     35",
  "===========================================================================",
].join("\r\n");

function commandRunner(outputs: Record<string, string>) {
  return {
    run: mock.fn((command: string): CommandResult => {
      const stdout = outputs[command];
      return stdout === undefined
        ? { success: false, error: `Command failed: ${command}` }
        : { success: true, stdout };
    }),
  };
}

test("decodeProcIPv4 - little-endian hex", () => {
  assert.equal(decodeProcIPv4("0101A8C0"), "192.168.1.1");
  assert.equal(decodeProcIPv4("FE01000A"), "10.0.1.254");
  assert.equal(decodeProcIPv4("xyz"), null);
});

test("formatIPv6 - compresses the longest zero run", () => {
  assert.equal(formatIPv6("fe800000000000000000000000000001"), "fe80::1");
  assert.equal(formatIPv6("00000000000000000000000000000001"), "::1");
  assert.equal(formatIPv6("20010db8000100000000000000000000"), "2001:db8:1::");
  assert.equal(formatIPv6("20010db8000000010000000000000001"), "2001:db8:0:1::1");
  assert.equal(formatIPv6("20010db8000100020003000400050006"), "2001:db8:1:2:3:4:5:6");
});

test("parseProcRoute - picks the default gateway row", () => {
  assert.deepEqual(parseProcRoute(PROC_ROUTE), { gateway: "192.168.1.1", interface: "eth0" });
});

test("parseProcRoute - no gateway flag means no default gateway", () => {
  const text = [
    "Iface\tDestination\tGateway \tFlags\tRefCnt\tUse\tMetric\tMask\t\tMTU\tWindow\tIRTT",
    "wg0\t00000000\t00000000\t0001\t0\t0\t0\t00000000\t0\t0\t0",
  ].join("\n");
  assert.equal(parseProcRoute(text), null);
});

test("parseProcIPv6Route - picks the default next hop", () => {
  assert.deepEqual(parseProcIPv6Route(PROC_IPV6_ROUTE), { gateway: "fe80::1", interface: "eth0" });
});

test("parseRouteGet - reads gateway and interface", () => {
  assert.deepEqual(parseRouteGet(ROUTE_GET_DEFAULT), { gateway: "192.168.1.1", interface: "en0" });
  assert.equal(parseRouteGet("route: writing to routing socket: not in table"), null);
});

test("getGateways - linux reads /proc", () => {
  const runner = commandRunner({
    "cat /proc/net/route": PROC_ROUTE,
    "cat /proc/net/ipv6_route": PROC_IPV6_ROUTE,
  });
  assert.deepEqual(getGateways(detectPlatform("linux"), runner), {
    IPv4: { gateway: "192.168.1.1", interface: "eth0" },
    IPv6: { gateway: "fe80::1", interface: "eth0" },
  });
});

test("getGateways - macOS uses route get, missing IPv6 is left out", () => {
  const runner = commandRunner({ "route -n get default": ROUTE_GET_DEFAULT });
  assert.deepEqual(getGateways(detectPlatform("darwin"), runner), {
    IPv4: { gateway: "192.168.1.1", interface: "en0" },
  });
  assert.deepEqual(runner.run.mock.calls.map((c) => c.arguments[0]), [
    "route -n get default",
    "route -n get -inet6 default",
  ]);
});

const ETHERNET: NetworkInterfaceInfo[] = [
  {
    address: "10.0.0.7",
    netmask: "255.255.255.0",
    family: "IPv4",
    mac: "00:15:5d:01:02:03",
    internal: false,
    cidr: "10.0.0.7/24",
  },
];

test("interfaceNameFor - finds the owning interface", () => {
  const source = () => ({ "Loopback Pseudo-Interface 1": undefined, Ethernet: ETHERNET });
  assert.equal(interfaceNameFor("10.0.0.7", source), "Ethernet");
  assert.equal(interfaceNameFor("10.0.0.8", source), "10.0.0.8");
});

test("interfaceNameFor - failing source keeps the address", () => {
  const source = () => {
    throw new Error("interface enumeration unavailable");
  };
  assert.equal(interfaceNameFor("10.0.0.7", source), "10.0.0.7");
});

test("getGateways - windows reads the default route and names its interface", () => {
  const runner = commandRunner({ "route print -4 0.0.0.0": ROUTE_PRINT_DEFAULT });
  assert.deepEqual(getGateways(detectPlatform("win32"), runner, () => ({ Ethernet: ETHERNET })), {
    IPv4: { gateway: "10.0.0.1", interface: "Ethernet" },
  });
});

test("getGateways - windows falls back to the interface address", () => {
  const runner = commandRunner({ "route print -4 0.0.0.0": ROUTE_PRINT_DEFAULT });
  assert.deepEqual(getGateways(detectPlatform("win32"), runner, () => ({})), {
    IPv4: { gateway: "10.0.0.1", interface: "10.0.0.7" },
  });
});

test("getGateways - failures yield an empty map", () => {
  const runner = commandRunner({});
  assert.deepEqual(getGateways(detectPlatform("linux"), runner), {});
});

test("getGateways - unsupported platform runs nothing", () => {
  const runner = commandRunner({});
  assert.deepEqual(getGateways(detectPlatform("freebsd"), runner), {});
  assert.equal(runner.run.mock.callCount(), 0);
});
