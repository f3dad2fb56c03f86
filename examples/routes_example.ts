import { isRouteError, NetInfoTools } from "../src/mod.ts";
import stringify from "json-stringify-pretty-compact";

const tools = new NetInfoTools();

console.log(`Reading routing table (${tools.platform.os})...`);
const routes = tools.getRoutingTable();
if (isRouteError(routes)) {
  console.error("Error:", routes.error);
  process.exitCode = 1;
} else {
  console.log(`Found ${routes.length} routes`);
  console.log(stringify(routes));
}
