/**
 * Command handler for `cwtail streams`
 */

import { LogStream } from '@aws-sdk/client-cloudwatch-logs';
import { formatRFC3339 } from 'date-fns';
import { LogsApi, describeLogStreamsFetch } from '../logs/cloudwatch-api';
import { paginate } from '../logs/batch-retrieval';
import { resolveTime } from '../time-range';

export interface StreamsCommandOptions {
  group: string;
  /** Only streams whose name starts with this */
  prefix?: string;
  /** Show first and last event times */
  verbose?: boolean;
  /** Hide streams whose last event is older than this time expression */
  start?: string;
}

export interface ListingDependencies {
  api: LogsApi;
  now?: () => number;
  signal?: AbortSignal;
}

/** Code-unit order, so sorting does not depend on the host locale */
export function compareNames(a: string | undefined, b: string | undefined): number {
  const left = a ?? '';
  const right = b ?? '';
  return left < right ? -1 : left > right ? 1 : 0;
}

/** RFC 3339 in the local zone with milliseconds, or `-` when unknown */
export function formatEventTime(timestamp: number | undefined): string {
  return timestamp === undefined ? '-' : formatRFC3339(new Date(timestamp), { fractionDigits: 3 });
}

export async function listStreams(
  api: LogsApi,
  group: string,
  prefix: string | undefined,
  signal?: AbortSignal
): Promise<LogStream[]> {
  const streams: LogStream[] = [];
  const pages = paginate(describeLogStreamsFetch(api, group, prefix), {
    limit: 50,
    signal,
    context: { group, prefix },
    operationName: 'describeLogStreams',
  });
  for await (const stream of pages) {
    streams.push(stream);
  }
  return streams.sort((a, b) => compareNames(a.logStreamName, b.logStreamName));
}

export function formatStream(stream: LogStream, verbose: boolean, indent = ''): string {
  const name = stream.logStreamName ?? '';
  if (!verbose) {
    return `${indent}${name}`;
  }
  return `${indent}${name} first ${formatEventTime(stream.firstEventTimestamp)} last ${formatEventTime(stream.lastEventTimestamp)}`;
}

/**
 * Prints the streams of a group, one per line, sorted by name
 */
export async function streamsCommand(options: StreamsCommandOptions, deps: ListingDependencies): Promise<void> {
  const since =
    options.start === undefined ? undefined : resolveTime(options.start, { now: (deps.now ?? Date.now)() }).instant;

  const streams = await listStreams(deps.api, options.group, options.prefix, deps.signal);
  for (const stream of streams) {
    if (since !== undefined && (stream.lastEventTimestamp ?? -Infinity) < since) {
      continue;
    }
    console.log(formatStream(stream, options.verbose ?? false));
  }
}
