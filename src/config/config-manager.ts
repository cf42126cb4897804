/**
 * Unified Configuration Loader
 *
 * Single entry point for loading, merging, and validating configuration
 * from user-level (~/.config/tracelens/config.json) and project-level
 * (.tracelens/config.json) sources.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { ConfigError } from '../errors/index.js';
import { getConfigPath, getProjectDir } from '../paths.js';
import { resolveConfig, type TracelensConfig } from './defaults.js';
import { UserConfigSchema, type UserConfig } from './schema.js';
import { validateConfig } from './validate.js';

// =============================================================================
// TYPES
// =============================================================================

export interface ConfigLoadOptions {
  /** Working directory for locating project config (defaults to process.cwd()) */
  cwd?: string;
  /** Skip project-level config loading */
  skipProject?: boolean;
}

export interface ConfigLoadResult {
  /** Merged config with defaults filled in */
  config: TracelensConfig;
  /** Merged config as written by the user */
  user: UserConfig;
  /** Sources that were checked */
  sources: Array<{ path: string; level: 'user' | 'project'; loaded: boolean }>;
}

// =============================================================================
// DEEP MERGE
// =============================================================================

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Shallow spread with 1-level nested object merge; arrays replace.
 */
function deepMergeConfigs(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...base };

  for (const [key, value] of Object.entries(override)) {
    const baseValue = result[key];

    if (isPlainObject(value) && isPlainObject(baseValue)) {
      result[key] = { ...baseValue, ...value };
    } else {
      result[key] = value;
    }
  }

  return result;
}

// =============================================================================
// LOADER
// =============================================================================

/**
 * Load a JSON config file, returning the parsed object or null when the
 * file does not exist.
 *
 * @throws ConfigError when the file is not a JSON object
 */
function loadJsonFile(filePath: string): Record<string, unknown> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  const content = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(
      `${filePath}: failed to parse JSON: ${err instanceof Error ? err.message : String(err)}`,
      undefined,
      { path: filePath },
    );
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(
      `${filePath}: expected a JSON object, got ${Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed}`,
      undefined,
      { path: filePath },
    );
  }

  return parsed;
}

/**
 * Load configuration from user-level and project-level sources.
 *
 * Priority: user ← project (project overrides user). The merged result is
 * validated with Zod and then against the visualizer compatibility matrix.
 *
 * @throws ConfigError on unreadable, ill-typed or inconsistent configuration
 */
export function loadConfig(options: ConfigLoadOptions = {}): ConfigLoadResult {
  const { cwd, skipProject = false } = options;
  const sources: ConfigLoadResult['sources'] = [];

  // 1. Load user-level config
  const userConfigPath = getConfigPath();
  const userRaw = loadJsonFile(userConfigPath);
  sources.push({ path: userConfigPath, level: 'user', loaded: userRaw !== null });

  // 2. Load project-level config
  let projectRaw: Record<string, unknown> | null = null;
  if (!skipProject) {
    const projectConfigPath = join(getProjectDir(cwd), 'config.json');
    projectRaw = loadJsonFile(projectConfigPath);
    sources.push({ path: projectConfigPath, level: 'project', loaded: projectRaw !== null });
  }

  // 3. Deep merge: user ← project
  let merged: Record<string, unknown> = {};
  if (userRaw) {
    merged = { ...userRaw };
  }
  if (projectRaw) {
    merged = deepMergeConfigs(merged, projectRaw);
  }

  const loaded = sources.filter(s => s.loaded).map(s => s.path).join(' + ');

  // 4. Validate with Zod
  const result = UserConfigSchema.safeParse(merged);
  if (!result.success) {
    throw ConfigError.fromZodError(result.error, loaded || undefined);
  }

  // 5. Fill defaults and check visualizer choices
  const config = resolveConfig(result.data);
  validateConfig(config, loaded || undefined);

  return { config, user: result.data, sources };
}
