/**
 * Command runner: wires configuration, logging, the codec and the display
 * controller together for one CLI invocation.
 */

import { join } from 'node:path';
import { c, helpText, parseArgs, VERSION, type CLIArgs } from './cli.js';
import { loadConfig, type TracelensConfig } from './config/index.js';
import { JsonHandoffBackend, type VisualizerBackend } from './display/backend.js';
import { DisplayController, type DisplayReport } from './display/controller.js';
import { formatError, formatErrorForLog } from './errors/index.js';
import { DataFileCodec } from './io/codec.js';
import { formatSectionTable } from './io/listing.js';
import { getStateDir } from './paths.js';
import { configureLogger, ConsoleSink, FileSink, logger, type LogSink } from './utilities/logger.js';

export interface RunOptions {
  /** Working directory for project config */
  cwd?: string;
  /** Directory holding the last-written-file pointer */
  stateDir?: string;
  /** Backends used instead of the JSON hand-off */
  backends?: readonly VisualizerBackend[];
  /** Output for command results (default: stdout) */
  print?: (line: string) => void;
  /** Output for errors (default: stderr) */
  printError?: (line: string) => void;
  /** Keep the current logger instead of configuring one from config */
  keepLogger?: boolean;
}

function setupLogging(config: TracelensConfig, args: CLIArgs): void {
  const sinks: LogSink[] = [new ConsoleSink()];
  if (config.logging.file) {
    sinks.push(new FileSink(config.logging.file));
  }
  configureLogger({ level: args.debug ? 'debug' : config.logging.level, sinks });
}

function describeReport(report: DisplayReport, print: (line: string) => void, printError: (line: string) => void): void {
  for (const rendered of report.rendered) {
    const where = rendered.sections.map(ref => `${ref.index} (${ref.interface})`).join(' + ');
    print(`${where} -> ${rendered.visualizer}${rendered.message ? `: ${rendered.message}` : ''}`);
  }
  for (const failure of report.failures) {
    printError(`${c('error', 'red')} ${failure.message}`);
  }
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function run(argv: readonly string[], options: RunOptions = {}): Promise<number> {
  const print = options.print ?? ((line: string) => process.stdout.write(line + '\n'));
  const printError = options.printError ?? ((line: string) => process.stderr.write(line + '\n'));

  try {
    const args = parseArgs(argv);
    if (args.help) {
      print(helpText());
      return 0;
    }
    if (args.version) {
      print(`tracelens ${VERSION}`);
      return 0;
    }

    const { config } = loadConfig({ cwd: options.cwd });
    if (!options.keepLogger) {
      setupLogging(config, args);
    }
    logger.debug('Configuration loaded', { outputDir: config.outputDir, topN: config.topN });

    const codec = new DataFileCodec({ outputDir: config.outputDir, stateDir: options.stateDir ?? getStateDir() });

    if (args.command === 'list') {
      const path = codec.resolveInput(args.input);
      for (const line of formatSectionTable(codec.list(path, args.legacy))) {
        print(line);
      }
      return 0;
    }

    const controller = new DisplayController({
      codec,
      settings: config,
      backends: options.backends ?? [new JsonHandoffBackend({ outputDir: join(config.outputDir, 'display') })],
    });
    const report = await controller.run({
      input: args.input,
      entries: args.entries,
      noagg: args.noagg,
      visualizers: args.visualizers,
      topN: args.topN,
      legacy: args.legacy,
    });
    describeReport(report, print, printError);
    return report.failures.length > 0 ? 1 : 0;
  } catch (err) {
    logger.debug('Command failed', { error: formatErrorForLog(err) });
    printError(`${c('error', 'red')} ${formatError(err)}`);
    return 1;
  }
}
