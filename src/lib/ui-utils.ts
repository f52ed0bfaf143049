/**
 * Shared UI utilities for display and handing off to the desktop
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

/**
 * Convert an absolute path to a user-friendly path with ~ for home directory
 */
export function toUserPath(absolutePath: string): string {
  const home = process.env.HOME;
  if (!home) return absolutePath;

  // Exact match (path IS the home directory)
  if (absolutePath === home) {
    return "~";
  }

  // Path under home directory (must have / after home path)
  if (absolutePath.startsWith(home + "/")) {
    return "~" + absolutePath.slice(home.length);
  }

  return absolutePath;
}

/**
 * Command line that opens a URL with the platform's default handler
 */
export function getOpenCommand(
  url: string,
  platform: NodeJS.Platform = process.platform
): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // `start` is a cmd builtin; the empty argument is the window title
      return { command: "cmd", args: ["/c", "start", "", url.replace(/&/g, "^&")] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/**
 * Open a URL in the default browser (cross-platform)
 */
export async function openInBrowser(url: string): Promise<void> {
  const { command, args } = getOpenCommand(url);

  try {
    await execFileAsync(command, args);
  } catch (error) {
    throw new Error(`Could not open browser for ${url}`, { cause: error });
  }
}
