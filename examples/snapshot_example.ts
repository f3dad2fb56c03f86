import { NetInfoTools } from "../src/mod.ts";
import stringify from "json-stringify-pretty-compact";

const tools = new NetInfoTools();

console.log("Collecting snapshot...");
const snapshot = tools.collectAll();
console.log(stringify(snapshot, { maxLength: 120 }));
