/**
 * Startup validation of resolved configuration against the visualizer
 * compatibility matrix, so a bad default is reported before any file is read.
 */

import { ConfigError } from '../errors/index.js';
import { isCompatible, supportsMerged } from '../display/visualizers.js';
import { interfaceDatatype } from '../interfaces.js';
import type { TracelensConfig } from './defaults.js';

export interface ConfigIssue {
  field: string;
  message: string;
}

/**
 * Problems with the configured visualizers, in config order.
 */
export function findConfigIssues(config: TracelensConfig): ConfigIssue[] {
  const issues: ConfigIssue[] = [];

  for (const [iface, visualizer] of Object.entries(config.displayInterfaces)) {
    const datatype = interfaceDatatype(iface);
    if (datatype !== undefined && !isCompatible(visualizer, datatype)) {
      issues.push({
        field: `displayInterfaces.${iface}`,
        message: `'${visualizer}' cannot render ${datatype} data written by '${iface}'`,
      });
    }
  }

  config.aggregate.forEach((group, i) => {
    if (!supportsMerged(group.visualizer)) {
      issues.push({
        field: `aggregate.${i}.visualizer`,
        message: `'${group.visualizer}' does not render merged timelines`,
      });
    }
    for (const iface of group.interfaces) {
      const datatype = interfaceDatatype(iface);
      if (datatype !== undefined && datatype !== 'event') {
        issues.push({
          field: `aggregate.${i}.interfaces`,
          message: `'${iface}' writes ${datatype} data, only event data can be merged`,
        });
      }
    }
  });

  return issues;
}

/**
 * @throws ConfigError listing every issue found
 */
export function validateConfig(config: TracelensConfig, source?: string): void {
  const issues = findConfigIssues(config);
  if (issues.length === 0) {
    return;
  }
  throw new ConfigError(
    `Invalid configuration${source ? ` in ${source}` : ''}: ${issues.map(i => `${i.field}: ${i.message}`).join(', ')}`,
    issues.map(i => i.field)
  );
}
