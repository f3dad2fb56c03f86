import type { CommandRunner } from "../command.ts";
import type { Platform } from "../platform.ts";

/**
 * Raw resolver configuration: `ipconfig /all` on Windows, the contents of
 * /etc/resolv.conf elsewhere.
 */
export function getDnsInfo(platform: Platform, runner: CommandRunner): string {
  const command = platform.family === "windows" ? "ipconfig /all" : "cat /etc/resolv.conf";
  const result = runner.run(command);
  return result.success ? result.stdout : `Error getting DNS info: ${result.error}`;
}
