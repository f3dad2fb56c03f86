import { execSync } from "node:child_process";

// Non-fatal decoder: invalid byte sequences become U+FFFD
const DECODER = new TextDecoder("utf-8");

export type CommandResult =
  | { success: true; stdout: string }
  | { success: false; error: string };

export interface CommandRunner {
  run(command: string): CommandResult;
}

/**
 * Decode raw command output as UTF-8.
 * @param bytes - Captured stdout
 */
export function decodeOutput(bytes: Uint8Array): string {
  return DECODER.decode(bytes);
}

/**
 * Runs command lines through the OS shell and blocks until the child exits.
 * No timeout is applied.
 */
export const shellRunner: CommandRunner = {
  run(command: string): CommandResult {
    try {
      const stdout = execSync(command, {
        encoding: "buffer",
        maxBuffer: Infinity,
        stdio: ["ignore", "pipe", "pipe"],
      });
      return { success: true, stdout: decodeOutput(stdout) };
    } catch (e) {
      return {
        success: false,
        error: e instanceof Error ? e.message : String(e),
      };
    }
  },
};
