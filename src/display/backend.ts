/**
 * Visualizer backends
 *
 * A backend receives one prepared payload and does all of the drawing. It
 * reports back pass/fail with an optional message instead of throwing.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { DisplayPayload } from '../aggregate/payload.js';
import { formatError } from '../errors/index.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import { VISUALIZERS, type Visualizer } from './visualizers.js';

export interface RenderResult {
  ok: boolean;
  message?: string;
}

export interface VisualizerBackend {
  readonly name: string;
  accepts(visualizer: Visualizer): boolean;
  render(payload: DisplayPayload): RenderResult | Promise<RenderResult>;
}

export interface JsonHandoffOptions {
  /** Directory the payload files are written to */
  outputDir: string;
  /** Visualizers handed off; all of them by default */
  visualizers?: readonly Visualizer[];
  logger?: StructuredLogger;
}

/**
 * Writes each payload as a JSON file for an external renderer to pick up.
 * The message of a successful render is the path of the written file.
 */
export class JsonHandoffBackend implements VisualizerBackend {
  readonly name = 'json-handoff';
  private readonly outputDir: string;
  private readonly visualizers: ReadonlySet<Visualizer>;
  private readonly logger: StructuredLogger;

  constructor(options: JsonHandoffOptions) {
    this.outputDir = options.outputDir;
    this.visualizers = new Set(options.visualizers ?? VISUALIZERS);
    this.logger = options.logger ?? createComponentLogger('JsonHandoffBackend');
  }

  accepts(visualizer: Visualizer): boolean {
    return this.visualizers.has(visualizer);
  }

  /** File name for a payload: section indices, then the visualizer. */
  fileName(payload: DisplayPayload): string {
    const indices = payload.sections.map(ref => ref.index).join('-');
    return `section-${indices}.${payload.visualizer}.json`;
  }

  render(payload: DisplayPayload): RenderResult {
    const path = join(this.outputDir, this.fileName(payload));
    try {
      mkdirSync(this.outputDir, { recursive: true });
      writeFileSync(path, JSON.stringify(payload, null, 2) + '\n');
    } catch (err) {
      this.logger.error('Hand-off write failed', { path, error: formatError(err) });
      return { ok: false, message: `Cannot write ${path}: ${formatError(err)}` };
    }
    this.logger.debug('Payload handed off', { path, visualizer: payload.visualizer });
    return { ok: true, message: path };
  }
}
