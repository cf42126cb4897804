/**
 * Default configuration values and the merge of user config onto them.
 */

import type { Visualizer } from '../display/visualizers.js';
import { getDataDir } from '../paths.js';
import type { LogLevel } from '../utilities/logger.js';
import type { AggregateGroup, UserConfig } from './schema.js';

// =============================================================================
// RESOLVED CONFIG
// =============================================================================

export interface TracelensConfig {
  outputDir: string;
  topN: number;
  treemapDepth: number;
  displayInterfaces: Readonly<Record<string, Visualizer>>;
  aggregate: readonly AggregateGroup[];
  logging: {
    level: LogLevel;
    file?: string;
  };
}

export const DEFAULT_TOP_N = 5;

export const DEFAULT_TREEMAP_DEPTH = 25;

export const DEFAULT_DISPLAY_INTERFACES: Readonly<Record<string, Visualizer>> = {
  memtime: 'stackplot',
  memleak: 'treemap',
  ipc: 'tcpplot',
};

export const DEFAULT_AGGREGATE: readonly AggregateGroup[] = [{ interfaces: ['ipc', 'cpusched'], visualizer: 'tcpplot' }];

/**
 * Fill in defaults. `displayInterfaces` entries are merged one level deep;
 * `aggregate` replaces the default list.
 */
export function resolveConfig(user: UserConfig, outputDir: string = getDataDir()): TracelensConfig {
  return {
    outputDir: user.outputDir ?? outputDir,
    topN: user.topN ?? DEFAULT_TOP_N,
    treemapDepth: user.treemapDepth ?? DEFAULT_TREEMAP_DEPTH,
    displayInterfaces: { ...DEFAULT_DISPLAY_INTERFACES, ...user.displayInterfaces },
    aggregate: user.aggregate ?? DEFAULT_AGGREGATE,
    logging: {
      level: user.logging?.level ?? 'info',
      ...(user.logging?.file !== undefined ? { file: user.logging.file } : {}),
    },
  };
}
