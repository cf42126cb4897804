/**
 * Visualizer catalogue and compatibility matrix.
 *
 * Every visualizer renders exactly one record variant. The catalogue is the
 * single table both the Display Selector and the startup configuration check
 * consult.
 */

import type { Datatype } from '../records/types.js';

export const VISUALIZERS = ['flamegraph', 'treemap', 'g2', 'tcpplot', 'heatmap', 'stackplot'] as const;

export type Visualizer = (typeof VISUALIZERS)[number];

export interface VisualizerInfo {
  readonly name: Visualizer;
  /** The only datatype the visualizer can render */
  readonly datatype: Datatype;
  /** Accepts a timeline merged from several event sections */
  readonly merged: boolean;
  /** Short command-line flag */
  readonly flag: string;
  readonly description: string;
}

export const VISUALIZER_CATALOGUE: Readonly<Record<Visualizer, VisualizerInfo>> = {
  flamegraph: {
    name: 'flamegraph',
    datatype: 'stack',
    merged: false,
    flag: '-fg',
    description: 'Flame graph of collapsed call stacks',
  },
  treemap: {
    name: 'treemap',
    datatype: 'stack',
    merged: false,
    flag: '-tm',
    description: 'Treemap of the heaviest call stacks',
  },
  g2: {
    name: 'g2',
    datatype: 'event',
    merged: false,
    flag: '-g2',
    description: 'Per-track event timeline',
  },
  tcpplot: {
    name: 'tcpplot',
    datatype: 'event',
    merged: true,
    flag: '-tcp',
    description: 'Timeline with connecting lines between paired events',
  },
  heatmap: {
    name: 'heatmap',
    datatype: 'point',
    merged: false,
    flag: '-hm',
    description: 'Heat map of two-dimensional samples',
  },
  stackplot: {
    name: 'stackplot',
    datatype: 'point',
    merged: false,
    flag: '-sp',
    description: 'Stacked plot of the largest labels over x',
  },
};

/** One designated visualizer per record variant. */
export const DEFAULT_VISUALIZERS: Readonly<Record<Datatype, Visualizer>> = {
  stack: 'flamegraph',
  event: 'g2',
  point: 'heatmap',
};

export function isVisualizer(value: string): value is Visualizer {
  return VISUALIZERS.some(name => name === value);
}

export function datatypeOf(visualizer: Visualizer): Datatype {
  return VISUALIZER_CATALOGUE[visualizer].datatype;
}

export function isCompatible(visualizer: Visualizer, datatype: Datatype): boolean {
  return datatypeOf(visualizer) === datatype;
}

export function supportsMerged(visualizer: Visualizer): boolean {
  return VISUALIZER_CATALOGUE[visualizer].merged;
}

/**
 * Visualizers that can render a datatype, in catalogue order.
 */
export function visualizersFor(datatype: Datatype): Visualizer[] {
  return VISUALIZERS.filter(name => isCompatible(name, datatype));
}
