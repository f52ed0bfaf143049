import { spawn } from "node:child_process";
import { statSync } from "node:fs";
import { basename, join, resolve } from "node:path";
import { CustomizerError, describeError } from "./errors.js";

/**
 * Pick the customizer file name
 * A command-line override beats the candidate, which already reflects the
 * catalog entry or the default. Blank overrides are ignored.
 */
export function resolveCustomizerName(override: string | undefined, candidate: string): string {
  const trimmed = override?.trim();
  return trimmed ? trimmed : candidate;
}

/**
 * Locate the customizer inside a freshly cloned project
 */
export function findCustomizer(
  directory: string,
  name: string
): { path: string; exists: boolean } {
  const path = join(directory, name);

  try {
    return { path, exists: statSync(path).isFile() };
  } catch {
    return { path, exists: false };
  }
}

/**
 * Run a customizer script inside the project directory
 *
 * The script receives the directory's base name as its only argument and
 * shares this process's stdio. Resolves once it exits with status 0.
 */
export function runCustomizer(path: string, directory: string): Promise<void> {
  const cwd = resolve(directory);

  return new Promise((resolvePromise, reject) => {
    const child = spawn(resolve(path), [basename(cwd)], {
      cwd,
      stdio: "inherit",
    });

    child.once("error", (error) => {
      reject(new CustomizerError(path, describeError(error), { cause: error }));
    });

    child.once("close", (code, signal) => {
      if (code === 0) {
        resolvePromise();
      } else if (signal) {
        reject(new CustomizerError(path, `terminated by signal ${signal}`));
      } else {
        reject(new CustomizerError(path, `exited with code ${code ?? "unknown"}`));
      }
    });
  });
}
