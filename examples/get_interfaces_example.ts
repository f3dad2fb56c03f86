import { NetInfoTools } from "../src/mod.ts";
import stringify from "json-stringify-pretty-compact";

const tools = new NetInfoTools();

console.log("Listing network interfaces...");
const prerequisites = tools.checkPrerequisites();
console.log("Prerequisites:", stringify(prerequisites));

const interfaces = tools.getInterfaceDetails();
console.log("Result:", stringify(interfaces));
