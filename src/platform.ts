/**
 * Operating system families the tool knows how to inspect.
 * Detected once at startup and passed to every collector.
 */
export type Platform =
  | { family: "windows"; os: "win32" }
  | { family: "unix"; os: "linux" | "darwin" }
  | { family: "unsupported"; os: string };

export type PlatformFamily = Platform["family"];

/**
 * Map a Node.js platform tag onto a platform family.
 * @param os - Platform tag, defaults to the running process
 */
export function detectPlatform(os: string = process.platform): Platform {
  switch (os) {
    case "win32":
      return { family: "windows", os };
    case "linux":
    case "darwin":
      return { family: "unix", os };
    default:
      return { family: "unsupported", os };
  }
}
