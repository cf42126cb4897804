/**
 * Display Controller
 *
 * Runs one display request end to end: load the data file, pick the
 * sections, merge configured event groups, choose a visualizer for every
 * remaining section and prepare its payload. Only once every payload is
 * prepared are they handed to the backends, in the same order.
 *
 * A file that fails to decode aborts the whole request. Everything after
 * loading fails per section: a missing entry, an incompatible visualizer or
 * a failed render is recorded in the report and the other sections still
 * render.
 */

import {
  prepareMergedPayload,
  preparePayload,
  type AggregationParams,
  type DisplayPayload,
} from '../aggregate/payload.js';
import type { AggregateGroup } from '../config/schema.js';
import {
  ErrorCategory,
  formatError,
  SectionNotFoundError,
  TracelensError,
  wrapError,
} from '../errors/index.js';
import type { DataFileCodec } from '../io/codec.js';
import type { LegacyDefaults } from '../io/reader.js';
import { resolveSelector, type SectionSelector } from '../sections/select.js';
import { sectionRef, type IndexedSection, type SectionRef } from '../sections/section.js';
import { createComponentLogger, type StructuredLogger } from '../utilities/logger.js';
import type { VisualizerBackend } from './backend.js';
import {
  resolveOverrides,
  selectVisualizer,
  type AssignmentSource,
  type InterfaceDefaults,
  type VisualizerAssignment,
} from './selector.js';
import type { Visualizer } from './visualizers.js';

// =============================================================================
// TYPES
// =============================================================================

export interface DisplaySettings extends AggregationParams {
  displayInterfaces: InterfaceDefaults;
  aggregate: readonly AggregateGroup[];
}

export interface DisplayRequest {
  /** Data file to display; the last written one when absent */
  input?: string;
  /** Sections to display; all of them when absent or empty */
  entries?: readonly SectionSelector[];
  /** Render sections as read, without aggregation or merging */
  noagg?: boolean;
  /** Requested visualizers, at most one per datatype */
  visualizers?: readonly Visualizer[];
  /** Overrides the configured top-N count */
  topN?: number;
  /** Header for a file without section headers */
  legacy?: LegacyDefaults;
}

export interface RenderedSection {
  sections: SectionRef[];
  visualizer: Visualizer;
  source: AssignmentSource | 'aggregate';
  backend: string;
  message?: string;
}

export interface DisplayFailure {
  /** Sections affected; empty when a selector matched nothing */
  sections: SectionRef[];
  visualizer?: Visualizer;
  message: string;
  error?: TracelensError;
}

export interface DisplayReport {
  file: string;
  rendered: RenderedSection[];
  failures: DisplayFailure[];
}

/** State of one `run` call */
interface DisplayRun {
  report: DisplayReport;
  /** Component logger narrowed to the displayed file */
  log: StructuredLogger;
}

interface PreparedPayload {
  refs: SectionRef[];
  visualizer: Visualizer;
  source: RenderedSection['source'];
  payload: DisplayPayload;
}

export interface DisplayControllerOptions {
  codec: DataFileCodec;
  settings: DisplaySettings;
  backends: readonly VisualizerBackend[];
  logger?: StructuredLogger;
}

// =============================================================================
// CONTROLLER
// =============================================================================

export class DisplayController {
  private readonly codec: DataFileCodec;
  private readonly settings: DisplaySettings;
  private readonly backends: readonly VisualizerBackend[];
  private readonly logger: StructuredLogger;

  constructor(options: DisplayControllerOptions) {
    this.codec = options.codec;
    this.settings = options.settings;
    this.backends = options.backends;
    this.logger = options.logger ?? createComponentLogger('DisplayController');
  }

  /**
   * @throws errors from loading the file (decode errors, missing input) and
   *   ConfigError for conflicting visualizer requests
   */
  async run(request: DisplayRequest = {}): Promise<DisplayReport> {
    const overrides = resolveOverrides(request.visualizers ?? []);
    const file = this.codec.resolveInput(request.input);
    const sections = this.codec.load(file, { legacy: request.legacy });
    const report: DisplayReport = { file, rendered: [], failures: [] };
    const state: DisplayRun = { report, log: this.logger.child({ file }) };

    const entries = request.entries ?? [];
    let remaining = entries.length > 0 ? this.pick(sections, entries, state) : sections;

    const params: AggregationParams = {
      topN: request.topN ?? this.settings.topN,
      treemapDepth: this.settings.treemapDepth,
    };

    // Every payload is prepared before the first render
    const prepared: PreparedPayload[] = [];

    // Explicit entries and --noagg both disable merging
    if (!request.noagg && entries.length === 0) {
      for (const group of this.settings.aggregate) {
        const members = remaining.filter(section => group.interfaces.includes(section.header.interface));
        const present = new Set(members.map(section => section.header.interface));
        if (!group.interfaces.every(iface => present.has(iface))) {
          continue;
        }
        remaining = remaining.filter(section => !members.includes(section));
        this.prepare(state, prepared, members, group.visualizer, 'aggregate', () =>
          prepareMergedPayload(members, group.visualizer)
        );
      }
    }

    for (const section of remaining) {
      const ref = sectionRef(section);
      let assignment: VisualizerAssignment;
      try {
        assignment = selectVisualizer(
          { ...ref, datatype: section.header.datatype },
          overrides,
          this.settings.displayInterfaces
        );
      } catch (err) {
        this.fail(state, [ref], undefined, err);
        continue;
      }
      const { visualizer, source } = assignment;
      this.prepare(state, prepared, [section], visualizer, source, () =>
        preparePayload(section, visualizer, params, !request.noagg)
      );
    }

    for (const item of prepared) {
      await this.render(state, item);
    }

    state.log.info('Display finished', {
      rendered: report.rendered.length,
      failures: report.failures.length,
    });
    return report;
  }

  /**
   * Sections matched by the entries, in file order. Entries that match
   * nothing are recorded as failures.
   */
  private pick(
    sections: readonly IndexedSection[],
    entries: readonly SectionSelector[],
    state: DisplayRun
  ): IndexedSection[] {
    const refs = sections.map(sectionRef);
    const chosen = new Set<number>();
    for (const entry of entries) {
      try {
        for (const position of resolveSelector(refs, entry)) {
          chosen.add(position);
        }
      } catch (err) {
        if (!(err instanceof SectionNotFoundError)) {
          throw err;
        }
        this.fail(state, [], undefined, err);
      }
    }
    return sections.filter((_, position) => chosen.has(position));
  }

  private prepare(
    state: DisplayRun,
    prepared: PreparedPayload[],
    sections: readonly IndexedSection[],
    visualizer: Visualizer,
    source: RenderedSection['source'],
    build: () => DisplayPayload
  ): void {
    const refs = sections.map(sectionRef);
    try {
      prepared.push({ refs, visualizer, source, payload: build() });
    } catch (err) {
      this.fail(state, refs, visualizer, err);
    }
  }

  private async render(state: DisplayRun, item: PreparedPayload): Promise<void> {
    const { refs, visualizer, source, payload } = item;
    try {
      const backend = this.backends.find(candidate => candidate.accepts(visualizer));
      if (!backend) {
        throw new TracelensError(`No backend renders '${visualizer}'`, ErrorCategory.VISUALIZER, { visualizer });
      }
      const result = await backend.render(payload);
      if (!result.ok) {
        this.fail(state, refs, visualizer, new TracelensError(
          `Visualizer '${visualizer}' failed: ${result.message ?? 'no details'}`,
          ErrorCategory.VISUALIZER,
          { visualizer, backend: backend.name }
        ));
        return;
      }
      state.report.rendered.push({
        sections: refs,
        visualizer,
        source,
        backend: backend.name,
        ...(result.message !== undefined ? { message: result.message } : {}),
      });
      state.log.debug('Rendered', { sections: refs.map(ref => ref.index), visualizer, source });
    } catch (err) {
      this.fail(state, refs, visualizer, err);
    }
  }

  private fail(state: DisplayRun, sections: SectionRef[], visualizer: Visualizer | undefined, err: unknown): void {
    const error = wrapError(err, { sections: sections.map(ref => ref.index) });
    state.log.error('Section not displayed', {
      sections: sections.map(ref => ref.index),
      error: error.toLogString(),
    });
    state.report.failures.push({
      sections,
      ...(visualizer !== undefined ? { visualizer } : {}),
      message: formatError(error),
      error,
    });
  }
}
