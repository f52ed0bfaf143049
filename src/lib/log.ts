import * as p from "@clack/prompts";

/**
 * Output channels handed to anything that reports progress
 *
 * Components never write to the console themselves, so tests can pass a
 * recording implementation instead.
 */
export interface Log {
  output(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

/**
 * Log backed by @clack/prompts
 */
export function createClackLog(): Log {
  return {
    output: (message) => p.log.message(message),
    warning: (message) => p.log.warn(message),
    error: (message) => p.log.error(message),
  };
}
