import process from "node:process";
import { NetInfoTools } from "./net_info_tools.ts";
import { detectPlatform } from "./platform.ts";
import { renderSnapshot } from "./presenter.ts";

function main(): number {
  const tools = new NetInfoTools({ platform: detectPlatform() });

  const prerequisites = tools.checkPrerequisites();
  if (prerequisites.status === "Error") {
    console.error(`Missing capability: ${prerequisites.error}`);
    return 1;
  }

  console.log(renderSnapshot(tools.collectAll()));
  return 0;
}

process.exitCode = main();
