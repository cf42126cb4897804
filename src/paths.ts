/**
 * XDG Base Directory compliant paths for tracelens.
 *
 * - Config: ~/.config/tracelens/ (or $XDG_CONFIG_HOME/tracelens/)
 *   User configuration (config.json)
 *
 * - Data: ~/.local/share/tracelens/ (or $XDG_DATA_HOME/tracelens/)
 *   Default output directory for data files and display hand-off files
 *
 * - State: ~/.local/state/tracelens/ (or $XDG_STATE_HOME/tracelens/)
 *   Pointer to the last written data file, log file
 *
 * - Project: .tracelens/
 *   Project-specific configuration in the current working directory
 *
 * These functions only compute paths; the codec and controller receive the
 * resulting directories explicitly.
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'tracelens';

/**
 * Get the configuration directory path.
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

/**
 * Get the data directory path.
 */
export function getDataDir(): string {
  const xdg = process.env.XDG_DATA_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'share', APP_DIR);
}

/**
 * Get the state directory path.
 */
export function getStateDir(): string {
  const xdg = process.env.XDG_STATE_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.local', 'state', APP_DIR);
}

/**
 * Get the project-specific directory path.
 * This is always .tracelens/ within the specified working directory.
 *
 * @param cwd - The working directory (defaults to process.cwd())
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, '.tracelens');
}

// ============================================================================
// Specific file paths
// ============================================================================

/**
 * Get the path to the user configuration file.
 */
export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}
