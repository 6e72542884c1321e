/**
 * Cursor-driven historical retrieval
 *
 * The engine knows nothing about CloudWatch: it drives a {@link PagedFetch}
 * and checks what comes back. The adapters in cloudwatch-api.ts plug the
 * real service in; tests plug in an in-memory backend.
 */

import { ParseError, ProtocolError, ErrorContext } from '../errors';
import { logger } from '../logger';
import { abortable, withRetry, RetryConfig, RetryHooks } from '../retry';
import { LogEvent, LogQuery, compareEvents } from '../types';

/** Server-enforced page size ceiling */
export const MAX_CHUNK_SIZE = 10_000;
export const DEFAULT_CHUNK_SIZE = 1000;

export interface PageRequest {
  /** Continuation cursor from the previous page; absent on the first request */
  cursor?: string;
  limit: number;
  /** Aborts the request in flight */
  signal?: AbortSignal;
}

export interface Page<T> {
  items: T[];
  /** Absent when the server has nothing more */
  nextCursor?: string;
}

/** One page of a cursor-paginated listing */
export type PagedFetch<T> = (request: PageRequest) => Promise<Page<T>>;

export interface PaginateOptions {
  /** Requested page size, clamped to {@link MAX_CHUNK_SIZE} */
  limit: number;
  signal?: AbortSignal;
  retry?: Partial<RetryConfig>;
  /** Test seams forwarded to {@link withRetry} */
  retryHooks?: Pick<RetryHooks, 'sleep' | 'random' | 'onRetry'>;
  /** Included in every error raised while paging */
  context?: ErrorContext;
  /** Label used in debug output */
  operationName?: string;
}

/**
 * Validates a chunk size from the command line or the config file.
 *
 * @throws ParseError outside [1, 10000]
 */
export function validateChunkSize(chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize < 1 || chunkSize > MAX_CHUNK_SIZE) {
    throw new ParseError(`Chunk size must be an integer between 1 and ${MAX_CHUNK_SIZE}, got ${chunkSize}`, {
      context: { chunkSize },
    });
  }
  return chunkSize;
}

/**
 * Builds a validated query
 *
 * @throws ParseError for a bad chunk size or an end before the start
 */
export function createLogQuery(fields: Omit<LogQuery, 'chunkSize'> & { chunkSize?: number }): LogQuery {
  const chunkSize = validateChunkSize(fields.chunkSize ?? DEFAULT_CHUNK_SIZE);
  if (fields.end !== undefined && fields.end < fields.start) {
    throw new ParseError('End of the time window is before its start', {
      context: { group: fields.group, start: fields.start, end: fields.end },
    });
  }
  return { ...fields, streams: [...fields.streams], chunkSize };
}

/**
 * Yields every item of a paginated listing, one page request at a time.
 * Stops on an empty page, a missing cursor, a cursor equal to the one just
 * sent, or an aborted signal. The signal also reaches the page request, and
 * a request still in flight when it aborts is abandoned.
 */
export async function* paginate<T>(fetchPage: PagedFetch<T>, options: PaginateOptions): AsyncGenerator<T> {
  const limit = Math.min(Math.max(1, options.limit), MAX_CHUNK_SIZE);
  const operationName = options.operationName ?? 'fetchPage';
  let cursor: string | undefined;
  let pageNumber = 0;

  while (!options.signal?.aborted) {
    const request: PageRequest = cursor === undefined ? { limit } : { cursor, limit };
    if (options.signal) {
      request.signal = options.signal;
    }
    pageNumber++;
    let page: Page<T>;
    try {
      page = await withRetry(() => abortable(fetchPage(request), options.signal), operationName, options.retry, {
        ...options.retryHooks,
        signal: options.signal,
        context: { ...options.context, page: pageNumber },
      });
    } catch (error) {
      if (options.signal?.aborted) {
        logger.debug(`${operationName}: cancelled during page ${pageNumber}`);
        return;
      }
      throw error;
    }
    logger.trace(`${operationName}: page ${pageNumber} returned ${page.items.length} item(s)`);

    if (page.items.length === 0) {
      return;
    }
    for (const item of page.items) {
      yield item;
    }

    if (page.nextCursor === undefined || page.nextCursor === cursor) {
      return;
    }
    cursor = page.nextCursor;
  }
}

export interface RetrieveOptions extends Omit<PaginateOptions, 'limit'> {
  /** Overrides the query's chunk size */
  limit?: number;
}

/**
 * Retrieves the events of `query` in server order.
 *
 * Each event is checked against the previous one: going backwards in
 * (timestamp, streamId) raises {@link ProtocolError}. Events repeating an
 * already emitted eventId are dropped.
 */
export async function* retrieveEvents(
  fetchPage: PagedFetch<LogEvent>,
  query: LogQuery,
  options: RetrieveOptions = {}
): AsyncGenerator<LogEvent> {
  const context: ErrorContext = {
    group: query.group,
    streams: query.streams.length > 0 ? query.streams.join(',') : undefined,
    start: query.start,
    end: query.end,
    filterPattern: query.filterPattern,
    ...options.context,
  };

  const seenIds = new Set<string>();
  let previous: LogEvent | undefined;
  let emitted = 0;
  let dropped = 0;

  const events = paginate(fetchPage, {
    ...options,
    limit: options.limit ?? query.chunkSize,
    context,
    operationName: options.operationName ?? 'retrieveEvents',
  });

  for await (const event of events) {
    if (event.eventId !== undefined) {
      if (seenIds.has(event.eventId)) {
        dropped++;
        continue;
      }
      seenIds.add(event.eventId);
    }

    if (previous && compareEvents(previous, event) > 0) {
      throw new ProtocolError('Server delivered events out of order', {
        context: {
          ...context,
          previousTimestamp: previous.timestamp,
          previousStream: previous.streamId,
          timestamp: event.timestamp,
          stream: event.streamId,
        },
      });
    }

    previous = event;
    emitted++;
    yield event;
  }

  logger.debug(`Retrieved ${emitted} event(s) from ${query.group}${dropped > 0 ? `, dropped ${dropped} duplicate(s)` : ''}`);
}
