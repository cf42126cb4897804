/**
 * Display Selector
 *
 * Decides which visualizer renders a section. Per section, the first of
 * these that applies wins:
 *
 * 1. a user override for the section's datatype family
 * 2. the configured visualizer for the section's interface
 * 3. the built-in default for the datatype
 *
 * The winner must accept the section's datatype; otherwise selection fails
 * with IncompatibleVisualizerError rather than falling through to the next
 * rule. Selection is a pure function of its inputs.
 */

import { ConfigError, IncompatibleVisualizerError } from '../errors/index.js';
import type { Datatype } from '../records/types.js';
import type { SectionRef } from '../sections/section.js';
import { datatypeOf, DEFAULT_VISUALIZERS, isCompatible, type Visualizer } from './visualizers.js';

// =============================================================================
// TYPES
// =============================================================================

/** At most one requested visualizer per datatype family. */
export type VisualizerOverrides = Readonly<Partial<Record<Datatype, Visualizer>>>;

/** Configured `interface -> visualizer` defaults. */
export type InterfaceDefaults = Readonly<Record<string, Visualizer>>;

export type AssignmentSource = 'override' | 'config' | 'default';

export interface SelectionTarget extends SectionRef {
  readonly datatype: Datatype;
}

export interface VisualizerAssignment extends SelectionTarget {
  readonly visualizer: Visualizer;
  readonly source: AssignmentSource;
}

// =============================================================================
// OVERRIDES
// =============================================================================

/**
 * Group requested visualizers by the datatype they render.
 *
 * @throws ConfigError when two different visualizers of one family are requested
 */
export function resolveOverrides(requested: readonly Visualizer[]): VisualizerOverrides {
  const overrides: Partial<Record<Datatype, Visualizer>> = {};
  for (const visualizer of requested) {
    const family = datatypeOf(visualizer);
    const existing = overrides[family];
    if (existing !== undefined && existing !== visualizer) {
      throw new ConfigError(
        `Conflicting visualizers for ${family} data: '${existing}' and '${visualizer}' (choose one)`,
        [family]
      );
    }
    overrides[family] = visualizer;
  }
  return overrides;
}

// =============================================================================
// SELECTION
// =============================================================================

function lookupDefault(defaults: InterfaceDefaults, iface: string): Visualizer | undefined {
  return Object.prototype.hasOwnProperty.call(defaults, iface) ? defaults[iface] : undefined;
}

/**
 * Resolve the visualizer for one section.
 *
 * @throws IncompatibleVisualizerError when the resolved visualizer cannot
 *   render the section's datatype
 */
export function selectVisualizer(
  target: SelectionTarget,
  overrides: VisualizerOverrides = {},
  defaults: InterfaceDefaults = {}
): VisualizerAssignment {
  const override = overrides[target.datatype];
  const configured = lookupDefault(defaults, target.interface);

  let visualizer: Visualizer;
  let source: AssignmentSource;
  if (override !== undefined) {
    visualizer = override;
    source = 'override';
  } else if (configured !== undefined) {
    visualizer = configured;
    source = 'config';
  } else {
    visualizer = DEFAULT_VISUALIZERS[target.datatype];
    source = 'default';
  }

  if (!isCompatible(visualizer, target.datatype)) {
    throw new IncompatibleVisualizerError(
      visualizer,
      target.datatype,
      { index: target.index, interface: target.interface },
      source === 'config'
        ? `it is configured for interface '${target.interface}' but does not accept ${target.datatype} data`
        : undefined
    );
  }

  return {
    index: target.index,
    interface: target.interface,
    datatype: target.datatype,
    visualizer,
    source,
  };
}

/**
 * Resolve every section at once; the first incompatible one throws.
 */
export function selectVisualizers(
  targets: readonly SelectionTarget[],
  overrides: VisualizerOverrides = {},
  defaults: InterfaceDefaults = {}
): VisualizerAssignment[] {
  return targets.map(target => selectVisualizer(target, overrides, defaults));
}
