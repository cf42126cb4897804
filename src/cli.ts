/**
 * CLI Argument Parsing and Help
 *
 * Handles command-line argument parsing and help text display.
 */

import { isDatatype } from './records/types.js';
import { parseSelector, type SectionSelector } from './sections/select.js';
import { ConfigError } from './errors/index.js';
import type { LegacyDefaults } from './io/reader.js';
import { VISUALIZER_CATALOGUE, VISUALIZERS, type Visualizer } from './display/visualizers.js';

// ANSI color codes for terminal output
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
};

export function c(text: string, color: keyof typeof colors): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export const VERSION = '1.0.0';

export type Command = 'list' | 'display';

/**
 * CLI arguments structure.
 */
export interface CLIArgs {
  command?: Command;
  help: boolean;
  version: boolean;
  debug: boolean;
  /** Data file; the last written one when absent */
  input?: string;
  /** `-l`: list the sections instead of displaying them */
  list: boolean;
  entries: SectionSelector[];
  noagg: boolean;
  visualizers: Visualizer[];
  topN?: number;
  /** Header for files written without section headers */
  legacy?: LegacyDefaults;
}

// Long and short flag of every visualizer, e.g. --flamegraph / -fg
const VISUALIZER_FLAGS = new Map<string, Visualizer>(
  VISUALIZERS.flatMap(name => [
    [`--${name}`, name] as const,
    [VISUALIZER_CATALOGUE[name].flag, name] as const,
  ])
);

function takeValue(args: readonly string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    throw new ConfigError(`${flag} requires a value`, [flag]);
  }
  return value;
}

function parseTopN(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new ConfigError(`--top expects a non-negative integer, got '${text}'`, ['--top']);
  }
  return Number(text);
}

/**
 * `INTERFACE:DATATYPE`, e.g. `memtime:point`.
 */
function parseLegacy(text: string): LegacyDefaults {
  const separator = text.lastIndexOf(':');
  const iface = text.slice(0, separator);
  const datatype = text.slice(separator + 1);
  if (separator <= 0 || !isDatatype(datatype)) {
    throw new ConfigError(`--legacy expects INTERFACE:DATATYPE (point, event or stack), got '${text}'`, ['--legacy']);
  }
  return { interface: iface, datatype };
}

/**
 * Parse command-line arguments.
 *
 * @throws ConfigError on unknown options, missing values, conflicting flags
 *   and display flags given to the list command
 */
export function parseArgs(args: readonly string[] = process.argv.slice(2)): CLIArgs {
  const result: CLIArgs = {
    help: false,
    version: false,
    debug: false,
    list: false,
    entries: [],
    noagg: false,
    visualizers: [],
  };
  let entryFlag = false;
  // Display-only flags as written, for rejecting them under `list`
  const displayFlags: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const visualizer = VISUALIZER_FLAGS.get(arg);

    if (arg === '--help' || arg === '-h') {
      result.help = true;
    } else if (arg === '--version' || arg === '-v') {
      result.version = true;
    } else if (arg === '--debug') {
      result.debug = true;
    } else if (arg === '--infile' || arg === '-i') {
      result.input = takeValue(args, i++, arg);
    } else if (arg === '--list' || arg === '-l') {
      result.list = true;
    } else if (arg === '--entry' || arg === '-e') {
      entryFlag = true;
      displayFlags.push(arg);
      while (i + 1 < args.length && !args[i + 1].startsWith('-')) {
        result.entries.push(parseSelector(args[++i]));
      }
      if (result.entries.length === 0) {
        throw new ConfigError(`${arg} requires at least one section index or interface`, ['--entry']);
      }
    } else if (arg === '--noagg') {
      result.noagg = true;
      displayFlags.push(arg);
    } else if (arg === '--top' || arg === '-n') {
      result.topN = parseTopN(takeValue(args, i++, arg));
      displayFlags.push(arg);
    } else if (arg === '--legacy') {
      result.legacy = parseLegacy(takeValue(args, i++, arg));
    } else if (visualizer !== undefined) {
      result.visualizers.push(visualizer);
      displayFlags.push(arg);
    } else if ((arg === 'list' || arg === 'display') && result.command === undefined) {
      result.command = arg;
    } else {
      throw new ConfigError(`Unknown argument '${arg}' (see --help)`, [arg]);
    }
  }

  const exclusive = [result.list && '--list', entryFlag && '--entry', result.noagg && '--noagg'].filter(
    (flag): flag is string => typeof flag === 'string'
  );
  if (exclusive.length > 1) {
    throw new ConfigError(`${exclusive.join(', ')} cannot be combined`, exclusive);
  }

  if (result.list && result.command === 'display') {
    throw new ConfigError('The display command cannot be combined with --list', ['--list']);
  }
  if (result.list && result.command === undefined) {
    result.command = 'list';
  }
  if (result.command === 'list' && displayFlags.length > 0) {
    throw new ConfigError(`The list command does not take ${displayFlags.join(', ')}`, displayFlags);
  }

  return result;
}

/**
 * Help text.
 */
export function helpText(): string {
  const visualizerLines = VISUALIZERS.map(name => {
    const info = VISUALIZER_CATALOGUE[name];
    const flags = `${info.flag}, --${name}`.padEnd(22);
    return `  ${flags}  ${info.description} (${info.datatype})`;
  }).join('\n');

  return `
${c('TRACELENS', 'bold')} ${c(`v${VERSION}`, 'dim')} - display sections of performance data files

${c('USAGE:', 'bold')}
  tracelens list [-i FILE]
  tracelens display [-i FILE] [-e ENTRY...] [--noagg] [VISUALIZER...] [--top N]

${c('COMMANDS:', 'bold')}
  list                    List the sections of a data file
  display                 Render the sections of a data file (default)

${c('OPTIONS:', 'bold')}
  -h, --help              Show this help
  -v, --version           Show version (${VERSION})
  -i, --infile FILE       Data file (default: the last one written)
  -l, --list              Same as the list command
  -e, --entry ENTRY...    Sections to display, by index or interface name
  --noagg                 Display sections as read, without aggregation
  -n, --top N             Groups kept by top-N aggregation (default: config topN)
  --legacy IFACE:TYPE     Header for a data file without section headers
  --debug                 Verbose logging

${c('VISUALIZERS:', 'bold')} (at most one per datatype)
${visualizerLines}

${c('EXAMPLES:', 'bold')}
  ${c('# List the sections of the last written file', 'dim')}
  tracelens list

  ${c('# Show the memtime section as a stacked plot of the top 8 processes', 'dim')}
  tracelens display -i run.tlens -e memtime -sp --top 8
`;
}
