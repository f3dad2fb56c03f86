import { NetInfoTools } from "../src/mod.ts";
import stringify from "json-stringify-pretty-compact";

const tools = new NetInfoTools();

const gateways = tools.getGateways();
if (gateways.IPv4) {
  console.log("Default IPv4 gateway:", stringify(gateways.IPv4));
} else {
  console.log("No default IPv4 gateway");
}
if (gateways.IPv6) {
  console.log("Default IPv6 gateway:", stringify(gateways.IPv6));
}
