/**
 * Centralized Path Definitions
 *
 * ~/.docchat/
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

export const DOCCHAT_DIR = join(homedir(), '.docchat');
export const CONFIG_PATH = join(DOCCHAT_DIR, 'config.toml');

/**
 * Get the docchat directory path (~/.docchat)
 */
export function getDocchatDir(): string {
  return DOCCHAT_DIR;
}

/**
 * Get the config file path (~/.docchat/config.toml)
 */
export function getConfigPath(): string {
  return CONFIG_PATH;
}
