/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates what users write in `~/.config/tracelens/config.json` or
 * `.tracelens/config.json`. Every key is optional; defaults are filled in
 * by {@link resolveConfig}.
 */

import { z } from 'zod';
import { VISUALIZERS } from '../display/visualizers.js';

// =============================================================================
// SUB-SCHEMAS
// =============================================================================

export const VisualizerSchema = z.enum(VISUALIZERS);

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Interfaces whose event sections are merged into one timeline.
 */
export const AggregateGroupSchema = z
  .object({
    interfaces: z.array(z.string().min(1)).min(2),
    visualizer: VisualizerSchema,
  })
  .strict();

const LoggingSchema = z
  .object({
    level: LogLevelSchema.optional(),
    file: z.string().min(1).optional(),
  })
  .strict();

// =============================================================================
// USER CONFIG SCHEMA
// =============================================================================

export const UserConfigSchema = z
  .object({
    /** Directory for data files and display hand-off files */
    outputDir: z.string().min(1).optional(),
    /** Groups kept by top-N aggregation */
    topN: z.number().int().nonnegative().optional(),
    /** Frames kept per stack in a treemap */
    treemapDepth: z.number().int().positive().optional(),
    /** interface name -> visualizer */
    displayInterfaces: z.record(z.string(), VisualizerSchema).optional(),
    aggregate: z.array(AggregateGroupSchema).optional(),
    logging: LoggingSchema.optional(),
  })
  .strict();

export type UserConfig = z.infer<typeof UserConfigSchema>;
export type AggregateGroup = z.infer<typeof AggregateGroupSchema>;
