/**
 * `hotpath` command
 *
 * Reads an access log file and prints one ranking report per event-time window.
 *
 * Options:
 *   -w, --window <duration>    - Window length (default: HOTPATH_WINDOW_SIZE or 10s)
 *   -s, --slide <duration>     - Window slide (default: the window length)
 *   -l, --lateness <duration>  - Allowed lateness (default: HOTPATH_ALLOWED_LATENESS or 10s)
 *   -n, --top <count>          - Entries per report (default: HOTPATH_TOP_SIZE or 10)
 *   -z, --time-zone <zone>     - Zone of report times (default: HOTPATH_TIME_ZONE or UTC)
 *   -q, --quiet                - Do not report skipped lines
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, parseDuration, TopNPipeline, TopNPipelineOptions } from '@hotpath/core';
import { AccessLogParser } from '@hotpath/log-parser';
import { FileAdapter } from '@hotpath/file';

export interface CliOutput {
  write(text: string): void;
  warn(text: string): void;
}

export interface RankOptions {
  window?: string;
  slide?: string;
  lateness?: string;
  top?: number;
  timeZone?: string;
  quiet?: boolean;
}

const VERSION = '0.1.0';

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return count;
}

/**
 * Command-line flags win over HOTPATH_* variables, which win over the defaults.
 */
export function buildPipelineOptions(options: RankOptions, env: NodeJS.ProcessEnv): TopNPipelineOptions {
  const pipelineOptions: TopNPipelineOptions = { ...loadConfig(env), parser: new AccessLogParser() };

  if (options.window !== undefined) pipelineOptions.windowSize = parseDuration(options.window);
  if (options.slide !== undefined) pipelineOptions.windowSlide = parseDuration(options.slide);
  if (options.lateness !== undefined) pipelineOptions.allowedLateness = parseDuration(options.lateness);
  if (options.top !== undefined) pipelineOptions.topSize = options.top;
  if (options.timeZone !== undefined) pipelineOptions.timeZone = options.timeZone;

  return pipelineOptions;
}

/**
 * Writes the report of every window in the file.
 * @returns the number of reports written
 */
export async function rankFile(
  file: string,
  pipelineOptions: TopNPipelineOptions,
  output: CliOutput,
  quiet = false
): Promise<number> {
  const pipeline = new TopNPipeline(pipelineOptions);
  pipeline.addAdapter('file', new FileAdapter());

  if (!quiet) {
    pipeline.on('parseError', ({ line }) => {
      output.warn(`Skipping unparseable line: ${line}\n`);
    });
  }

  let reports = 0;
  try {
    for await (const { text } of pipeline.run('file', file)) {
      output.write(text);
      reports++;
    }
  } finally {
    await pipeline.destroy();
  }
  return reports;
}

export function createProgram(output: CliOutput, env: NodeJS.ProcessEnv = process.env): Command {
  return new Command()
    .name('hotpath')
    .description('Rank the most requested paths of an access log per event-time window')
    .version(VERSION, '-v, --version', 'Show version number')
    .argument('<file>', 'access log in combined or common format')
    .option('-w, --window <duration>', 'window length, e.g. 10s or 1m')
    .option('-s, --slide <duration>', 'window slide')
    .option('-l, --lateness <duration>', 'allowed lateness of out-of-order records')
    .option('-n, --top <count>', 'entries per report', parseCount)
    .option('-z, --time-zone <zone>', 'IANA zone of report times')
    .option('-q, --quiet', 'do not report skipped lines')
    .configureOutput({
      writeOut: (text) => output.write(text),
      writeErr: (text) => output.warn(text)
    })
    .action(async (file: string, options: RankOptions) => {
      await rankFile(file, buildPipelineOptions(options, env), output, options.quiet ?? false);
    });
}
