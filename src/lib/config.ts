import { homedir } from 'node:os';
import { join } from 'node:path';

/**
 * Get the config directory holding repos.toml
 * Uses GIT_EXTRA_CONFIG_DIR if set, otherwise ~/.config/git_extra
 */
export function getConfigDir(): string {
  if (process.env.GIT_EXTRA_CONFIG_DIR) {
    return process.env.GIT_EXTRA_CONFIG_DIR;
  }

  return join(homedir(), '.config', 'git_extra');
}

/**
 * Get the path to the quick-start catalog
 */
export function getCatalogPath(): string {
  return join(getConfigDir(), 'repos.toml');
}

export const DEFAULTS = {
  remoteName: 'origin',
  customizer: 'customize.ts',
};
