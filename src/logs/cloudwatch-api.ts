/**
 * CloudWatch Logs adapters behind the {@link PagedFetch} capability
 */

import {
  CloudWatchLogsClient,
  DescribeLogGroupsCommand,
  DescribeLogGroupsCommandInput,
  DescribeLogGroupsCommandOutput,
  DescribeLogStreamsCommand,
  DescribeLogStreamsCommandInput,
  DescribeLogStreamsCommandOutput,
  FilterLogEventsCommand,
  FilterLogEventsCommandInput,
  FilterLogEventsCommandOutput,
  GetLogEventsCommand,
  GetLogEventsCommandInput,
  GetLogEventsCommandOutput,
  LogGroup,
  LogStream,
} from '@aws-sdk/client-cloudwatch-logs';
import { RemoteRejection } from '../errors';
import { LogEvent, LogQuery, createLogEvent } from '../types';
import { PagedFetch, paginate } from './batch-retrieval';

/** Per-call options handed to the SDK's `send` */
export interface RequestOptions {
  /** Cancels the HTTP request in flight */
  abortSignal?: AbortSignal;
}

/**
 * The subset of the CloudWatch Logs API cwtail calls. Tests implement it
 * in memory.
 */
export interface LogsApi {
  getLogEvents(input: GetLogEventsCommandInput, options?: RequestOptions): Promise<GetLogEventsCommandOutput>;
  filterLogEvents(input: FilterLogEventsCommandInput, options?: RequestOptions): Promise<FilterLogEventsCommandOutput>;
  describeLogGroups(
    input: DescribeLogGroupsCommandInput,
    options?: RequestOptions
  ): Promise<DescribeLogGroupsCommandOutput>;
  describeLogStreams(
    input: DescribeLogStreamsCommandInput,
    options?: RequestOptions
  ): Promise<DescribeLogStreamsCommandOutput>;
}

export function createLogsApi(client: CloudWatchLogsClient): LogsApi {
  return {
    getLogEvents: (input, options) => client.send(new GetLogEventsCommand(input), options),
    filterLogEvents: (input, options) => client.send(new FilterLogEventsCommand(input), options),
    describeLogGroups: (input, options) => client.send(new DescribeLogGroupsCommand(input), options),
    describeLogStreams: (input, options) => client.send(new DescribeLogStreamsCommand(input), options),
  };
}

/** DescribeLogGroups accepts at most 50 per page */
const DESCRIBE_GROUPS_MAX = 50;
/** DescribeLogStreams accepts at most 50 per page */
const DESCRIBE_STREAMS_MAX = 50;

/**
 * GetLogEvents over a single stream, oldest first. The service signals the
 * end by returning the forward token it was just given.
 */
export function getLogEventsFetch(api: LogsApi, query: LogQuery, stream: string): PagedFetch<LogEvent> {
  return async ({ cursor, limit, signal }) => {
    const output = await api.getLogEvents(
      {
        logGroupName: query.group,
        logStreamName: stream,
        startTime: query.start,
        endTime: query.end,
        startFromHead: true,
        limit,
        nextToken: cursor,
      },
      { abortSignal: signal }
    );
    return {
      items: (output.events ?? []).map(event =>
        createLogEvent({
          timestamp: event.timestamp ?? 0,
          ingestionTime: event.ingestionTime ?? 0,
          message: event.message ?? '',
          streamId: stream,
          group: query.group,
        })
      ),
      nextCursor: output.nextForwardToken,
    };
  };
}

/** FilterLogEvents over the whole group or a set of streams */
export function filterLogEventsFetch(api: LogsApi, query: LogQuery): PagedFetch<LogEvent> {
  return async ({ cursor, limit, signal }) => {
    const output = await api.filterLogEvents(
      {
        logGroupName: query.group,
        logStreamNames: query.streams.length > 0 ? query.streams : undefined,
        startTime: query.start,
        endTime: query.end,
        filterPattern: query.filterPattern,
        limit,
        nextToken: cursor,
      },
      { abortSignal: signal }
    );
    return {
      items: (output.events ?? []).map(event =>
        createLogEvent({
          timestamp: event.timestamp ?? 0,
          ingestionTime: event.ingestionTime ?? 0,
          message: event.message ?? '',
          streamId: event.logStreamName ?? '',
          group: query.group,
          eventId: event.eventId,
        })
      ),
      nextCursor: output.nextToken,
    };
  };
}

/**
 * Picks GetLogEvents for a single unfiltered stream and FilterLogEvents
 * for everything else.
 */
export function eventFetchFor(api: LogsApi, query: LogQuery): PagedFetch<LogEvent> {
  if (query.streams.length === 1 && query.filterPattern === undefined) {
    return getLogEventsFetch(api, query, query.streams[0]);
  }
  return filterLogEventsFetch(api, query);
}

export interface GroupListing {
  /** Substring match on the group name */
  pattern?: string;
  /** Prefix match on the group name; exclusive with pattern */
  prefix?: string;
}

export function describeLogGroupsFetch(api: LogsApi, listing: GroupListing = {}): PagedFetch<LogGroup> {
  return async ({ cursor, limit, signal }) => {
    const output = await api.describeLogGroups(
      {
        logGroupNamePattern: listing.pattern,
        logGroupNamePrefix: listing.prefix,
        limit: Math.min(limit, DESCRIBE_GROUPS_MAX),
        nextToken: cursor,
      },
      { abortSignal: signal }
    );
    return { items: output.logGroups ?? [], nextCursor: output.nextToken };
  };
}

export function describeLogStreamsFetch(api: LogsApi, group: string, prefix?: string): PagedFetch<LogStream> {
  return async ({ cursor, limit, signal }) => {
    const output = await api.describeLogStreams(
      {
        logGroupName: group,
        logStreamNamePrefix: prefix,
        limit: Math.min(limit, DESCRIBE_STREAMS_MAX),
        nextToken: cursor,
      },
      { abortSignal: signal }
    );
    return { items: output.logStreams ?? [], nextCursor: output.nextToken };
  };
}

/**
 * Looks up the ARN live tail needs for `group`. An exact name match wins
 * over other groups sharing the prefix; the `:*` suffix DescribeLogGroups
 * appends is trimmed.
 *
 * @throws RemoteRejection when no group has that name
 */
export async function findLogGroupArn(api: LogsApi, group: string, signal?: AbortSignal): Promise<string> {
  const groups = paginate(describeLogGroupsFetch(api, { prefix: group }), {
    limit: DESCRIBE_GROUPS_MAX,
    signal,
    context: { group },
    operationName: 'describeLogGroups',
  });
  for await (const candidate of groups) {
    if (candidate.logGroupName !== group) {
      continue;
    }
    const arn = candidate.logGroupArn ?? candidate.arn?.replace(/:\*$/, '');
    if (arn) {
      return arn;
    }
  }
  throw new RemoteRejection(`Log group '${group}' not found`, { context: { group } });
}
