export { loadConfig, type ConfigLoadOptions, type ConfigLoadResult } from './config-manager.js';
export {
  DEFAULT_AGGREGATE,
  DEFAULT_DISPLAY_INTERFACES,
  DEFAULT_TOP_N,
  DEFAULT_TREEMAP_DEPTH,
  resolveConfig,
  type TracelensConfig,
} from './defaults.js';
export {
  AggregateGroupSchema,
  LogLevelSchema,
  UserConfigSchema,
  VisualizerSchema,
  type AggregateGroup,
  type UserConfig,
} from './schema.js';
export { findConfigIssues, validateConfig, type ConfigIssue } from './validate.js';
