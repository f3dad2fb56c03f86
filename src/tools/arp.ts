import type { CommandRunner } from "../command.ts";
import type { Platform } from "../platform.ts";

/**
 * Raw ARP cache listing, or an error line when the command fails.
 */
export function getArpTable(platform: Platform, runner: CommandRunner): string {
  const result = runner.run(platform.family === "windows" ? "arp -a" : "arp -n");
  return result.success ? result.stdout : `Error getting ARP table: ${result.error}`;
}
