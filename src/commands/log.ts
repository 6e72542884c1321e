/**
 * Command handler for `cwtail log`
 */

import { ParseError } from '../errors';
import { logger } from '../logger';
import { LogFormatter } from '../logs/log-formatter';
import { OutputSink } from '../logs/output-sink';
import { TransformPipeline } from '../logs/transform';
import { createLogQuery, retrieveEvents, validateChunkSize } from '../logs/batch-retrieval';
import { LogsApi, eventFetchFor, findLogGroupArn } from '../logs/cloudwatch-api';
import { LiveTailEngine, LiveTailTransport } from '../logs/live-tail/live-tail-engine';
import { resolveWindow } from '../time-range';
import { CwtailConfig, LogEvent, OutputFormat } from '../types';

/**
 * Options for the log command
 */
export interface LogCommandOptions {
  group: string;
  /** Streams to read; empty reads the whole group */
  streams: string[];
  start?: string;
  end?: string;
  length?: string;
  /** Server-side filter pattern */
  filter?: string;
  /** Client-side substitution rule, e.g. `/(\d{4})[^|]+/$1` */
  messageRegexp?: string;
  datetimeFormat?: string;
  utc?: boolean;
  /** Defaults to pretty on a terminal and raw otherwise */
  format?: OutputFormat;
  /** Show the result in a pager */
  ui?: boolean;
  /** Follow new events instead of reading a window */
  tail?: boolean;
  chunkSize?: number;
}

export interface LogCommandDependencies {
  api: LogsApi;
  /** Only called for `--tail` */
  createTransport: () => Promise<LiveTailTransport>;
  createSink: (ui: boolean) => OutputSink;
  now?: () => number;
  signal?: AbortSignal;
  isTTY?: boolean;
}

export function validateLogOptions(options: LogCommandOptions): void {
  if (options.tail && options.ui) {
    throw new ParseError('--tail cannot be combined with --ui');
  }
  if (options.tail && (options.end !== undefined || options.length !== undefined)) {
    throw new ParseError('--tail cannot be combined with --end or --length', {
      context: { end: options.end, length: options.length },
    });
  }
  if (options.chunkSize !== undefined) {
    validateChunkSize(options.chunkSize);
  }
}

/**
 * Main handler for the `cwtail log` subcommand. Every argument is validated
 * before the first request.
 *
 * @returns Number of events written
 */
export async function logCommand(
  options: LogCommandOptions,
  config: CwtailConfig,
  deps: LogCommandDependencies
): Promise<number> {
  validateLogOptions(options);

  const isTTY = deps.isTTY ?? process.stdout.isTTY ?? false;
  const pipeline = new TransformPipeline({
    rule: options.messageRegexp,
    datetimeFormat: options.datetimeFormat ?? config.datetimeFormat,
    utc: options.utc ?? config.utc,
  });
  const formatter = new LogFormatter({
    format: options.format ?? (isTTY || options.ui ? 'pretty' : 'raw'),
    colorize: isTTY,
    showStream: options.streams.length !== 1,
  });

  const events = options.tail ? await openTail(options, deps) : openBatch(options, config, deps);

  const sink = deps.createSink(options.ui ?? false);
  let written = 0;
  for await (const event of events) {
    if (sink.detached) {
      break;
    }
    await sink.write(formatter.formatLine(pipeline.apply(event)));
    written++;
  }
  await sink.close();

  logger.debug(`Wrote ${written} event(s)`);
  return written;
}

function openBatch(
  options: LogCommandOptions,
  config: CwtailConfig,
  deps: LogCommandDependencies
): AsyncIterable<LogEvent> {
  const window = resolveWindow(
    { start: options.start, end: options.end, length: options.length },
    { now: (deps.now ?? Date.now)() }
  );
  const query = createLogQuery({
    group: options.group,
    streams: options.streams,
    start: window.start.instant,
    end: window.end.instant,
    filterPattern: options.filter,
    chunkSize: options.chunkSize ?? config.chunkSize,
  });
  logger.debug(
    `Reading ${query.group} from ${new Date(query.start).toISOString()} to ${new Date(window.end.instant).toISOString()}`
  );
  return retrieveEvents(eventFetchFor(deps.api, query), query, { signal: deps.signal });
}

async function openTail(options: LogCommandOptions, deps: LogCommandDependencies): Promise<AsyncIterable<LogEvent>> {
  if (options.start !== undefined) {
    logger.warn('--start is ignored with --tail; live tail starts from now');
  }
  const groupArn = await findLogGroupArn(deps.api, options.group, deps.signal);
  const transport = await deps.createTransport();
  const engine = new LiveTailEngine({
    transport,
    groupArn,
    streams: options.streams,
    filterPattern: options.filter,
    signal: deps.signal,
  });
  logger.info(`Tailing ${options.group}, press Ctrl-C to stop`);
  return engine.tail();
}
