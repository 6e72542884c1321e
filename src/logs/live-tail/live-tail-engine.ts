/**
 * Live tail session driver
 *
 * States: connecting -> signing -> streaming -> reconnecting -> signing ...
 * and finally closed. Frames come from a {@link LiveTailTransport}; events
 * leave through {@link LiveTailEngine.tail} in (timestamp, streamId) order.
 */

import {
  CwtailError,
  ErrorContext,
  ProtocolError,
  TransientNetworkError,
  toCwtailError,
} from '../../errors';
import { logger } from '../../logger';
import { backoffDelay, sleep, RetryConfig, DEFAULT_RETRY_CONFIG } from '../../retry';
import { LogEvent } from '../../types';
import { LiveTailFrame, exceptionToError } from './frames';
import { KWayMerger } from './merge';

export type LiveTailState = 'connecting' | 'signing' | 'streaming' | 'reconnecting' | 'closed';

export interface LiveTailRequest {
  groupArn: string;
  streams: string[];
  filterPattern?: string;
  /**
   * Last delivered timestamp per stream. Only sent to transports that
   * support resuming.
   */
  resumeFrom?: ReadonlyMap<string, number>;
}

export interface LiveTailTransport {
  /** Whether `open` honours {@link LiveTailRequest.resumeFrom} */
  readonly supportsResume: boolean;
  /**
   * Signs and sends the request, resolving once the response headers say a
   * frame stream follows. Aborting `signal` must end the returned iterable.
   */
  open(request: LiveTailRequest, signal: AbortSignal): Promise<AsyncIterable<LiveTailFrame>>;
}

export interface LiveTailOptions {
  transport: LiveTailTransport;
  groupArn: string;
  /** Streams to tail; empty tails the whole group */
  streams?: string[];
  filterPattern?: string;
  /** Reconnect when no frame arrives for this long */
  idleTimeoutMs?: number;
  /** Bound on signing plus connection set-up */
  connectTimeoutMs?: number;
  /** Consecutive failed connections tolerated before giving up */
  maxReconnects?: number;
  reconnectBackoff?: Partial<RetryConfig>;
  /** Longest time an event waits for slower streams */
  holdBackMs?: number;
  /** Events buffered per stream before reading from the wire pauses */
  queueCapacity?: number;
  signal?: AbortSignal;
  onStateChange?: (state: LiveTailState, previous: LiveTailState) => void;
  /** Clock for hold-back bookkeeping; must advance with real time */
  clock?: () => number;
  random?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export const LIVE_TAIL_DEFAULTS = {
  idleTimeoutMs: 30_000,
  connectTimeoutMs: 10_000,
  maxReconnects: 5,
  holdBackMs: 1_000,
  queueCapacity: 1_000,
  reconnectBackoff: { baseDelayMs: 500, maxDelayMs: 30_000 },
};

/** Last delivered position of one stream */
interface StreamCursor {
  timestamp: number;
  /** Identity of every event delivered at `timestamp` */
  keys: Set<string>;
}

type EndReason = { kind: 'aborted' } | { kind: 'failed'; error: CwtailError };

type Wake =
  | { kind: 'frame'; result: IteratorResult<LiveTailFrame> }
  | { kind: 'error'; error: unknown }
  | { kind: 'idle' }
  | { kind: 'hold' }
  | { kind: 'abort' };

function eventKey(event: LogEvent): string {
  return `${event.timestamp}\u0000${event.ingestionTime}\u0000${event.message}`;
}

function isRecoverable(error: CwtailError): boolean {
  return error.retryable || error instanceof ProtocolError;
}

export class LiveTailEngine {
  private currentState: LiveTailState = 'connecting';
  private readonly cursors = new Map<string, StreamCursor>();
  private readonly streams: string[];
  private readonly clock: () => number;
  private readonly context: ErrorContext;
  private started = false;
  private sampledWarned = false;

  constructor(private readonly options: LiveTailOptions) {
    this.streams = [...(options.streams ?? [])];
    this.clock = options.clock ?? Date.now;
    this.context = {
      groupArn: options.groupArn,
      streams: this.streams.length > 0 ? this.streams.join(',') : undefined,
      filterPattern: options.filterPattern,
    };
  }

  get state(): LiveTailState {
    return this.currentState;
  }

  /**
   * Tails until the signal aborts or a fatal error occurs. Buffered events
   * are flushed before returning or throwing.
   */
  async *tail(): AsyncGenerator<LogEvent, void, undefined> {
    if (this.started) {
      throw new Error('A live tail engine can only be started once');
    }
    this.started = true;

    const maxReconnects = this.options.maxReconnects ?? LIVE_TAIL_DEFAULTS.maxReconnects;
    const backoff: RetryConfig = {
      ...DEFAULT_RETRY_CONFIG,
      ...LIVE_TAIL_DEFAULTS.reconnectBackoff,
      ...this.options.reconnectBackoff,
    };
    const wait = this.options.sleep ?? sleep;
    const merger = new KWayMerger({
      capacity: this.options.queueCapacity ?? LIVE_TAIL_DEFAULTS.queueCapacity,
      holdBackMs: this.options.holdBackMs ?? LIVE_TAIL_DEFAULTS.holdBackMs,
    });
    this.streams.forEach(stream => merger.registerStream(stream));

    let failures = 0;
    let fatal: CwtailError | undefined;

    try {
      while (!this.aborted()) {
        this.transition('signing');
        const connection = new AbortController();
        const abortConnection = () => connection.abort();
        this.options.signal?.addEventListener('abort', abortConnection, { once: true });

        let reason: EndReason;
        try {
          const frames = await this.connect(this.buildRequest(), connection);
          this.transition('streaming');
          reason = yield* this.readConnection(frames, merger, this.reconnectMarks(), () => {
            failures = 0;
          });
        } catch (error) {
          const classified = toCwtailError(error, this.context);
          if (this.aborted()) {
            reason = { kind: 'aborted' };
          } else if (isRecoverable(classified)) {
            reason = { kind: 'failed', error: classified };
          } else {
            fatal = classified;
            break;
          }
        } finally {
          connection.abort();
          this.options.signal?.removeEventListener('abort', abortConnection);
        }

        if (reason.kind === 'aborted' || this.aborted()) {
          break;
        }

        failures++;
        if (failures > maxReconnects) {
          fatal = reason.error.withContext({ reconnects: failures - 1 });
          break;
        }

        this.transition('reconnecting');
        const delayMs = backoffDelay(failures, backoff, this.options.random);
        logger.warn(`Live tail connection lost (${reason.error.message}), reconnecting in ${delayMs}ms`);
        await wait(delayMs, this.options.signal);
      }

      for (const event of merger.flush()) {
        yield event;
      }
      if (fatal) {
        throw fatal;
      }
    } finally {
      this.transition('closed');
    }
  }

  private aborted(): boolean {
    return this.options.signal?.aborted ?? false;
  }

  private transition(next: LiveTailState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }
    this.currentState = next;
    logger.debug(`Live tail: ${previous} -> ${next}`);
    this.options.onStateChange?.(next, previous);
  }

  private buildRequest(): LiveTailRequest {
    const request: LiveTailRequest = {
      groupArn: this.options.groupArn,
      streams: this.streams,
      filterPattern: this.options.filterPattern,
    };
    if (this.options.transport.supportsResume && this.cursors.size > 0) {
      request.resumeFrom = new Map([...this.cursors].map(([stream, cursor]) => [stream, cursor.timestamp]));
    }
    return request;
  }

  private async connect(request: LiveTailRequest, connection: AbortController): Promise<AsyncIterable<LiveTailFrame>> {
    const timeoutMs = this.options.connectTimeoutMs ?? LIVE_TAIL_DEFAULTS.connectTimeoutMs;
    const opening = this.options.transport.open(request, connection.signal);
    // The losing side of the race may still reject after the connection is torn down
    opening.catch(error => logger.trace('Abandoned live tail connection failed', error));

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        connection.abort();
        reject(new TransientNetworkError(`Live tail connection not established within ${timeoutMs}ms`));
      }, timeoutMs);
    });
    try {
      return await Promise.race([opening, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  /** Copy of every stream's cursor as it stood when a connection opened */
  private reconnectMarks(): Map<string, StreamCursor> {
    return new Map(
      [...this.cursors].map(([stream, cursor]): [string, StreamCursor] => [
        stream,
        { timestamp: cursor.timestamp, keys: new Set(cursor.keys) },
      ])
    );
  }

  /**
   * Records `event` against its stream's cursor. Returns false for an event
   * already delivered: one older than the stream's mark from before this
   * connection, or one whose key was seen at the mark or the cursor.
   * Late events between the mark and the cursor still go through.
   */
  private accept(event: LogEvent, marks: ReadonlyMap<string, StreamCursor>): boolean {
    const key = eventKey(event);
    const mark = marks.get(event.streamId);
    if (mark && (event.timestamp < mark.timestamp || (event.timestamp === mark.timestamp && mark.keys.has(key)))) {
      return false;
    }

    const cursor = this.cursors.get(event.streamId);
    if (!cursor) {
      this.cursors.set(event.streamId, { timestamp: event.timestamp, keys: new Set([key]) });
      return true;
    }
    if (event.timestamp < cursor.timestamp) {
      return true;
    }
    if (event.timestamp === cursor.timestamp) {
      if (cursor.keys.has(key)) {
        return false;
      }
      cursor.keys.add(key);
      return true;
    }
    cursor.timestamp = event.timestamp;
    cursor.keys = new Set([key]);
    return true;
  }

  private async *readConnection(
    frames: AsyncIterable<LiveTailFrame>,
    merger: KWayMerger,
    marks: ReadonlyMap<string, StreamCursor>,
    onSessionStart: () => void
  ): AsyncGenerator<LogEvent, EndReason, undefined> {
    const idleTimeoutMs = this.options.idleTimeoutMs ?? LIVE_TAIL_DEFAULTS.idleTimeoutMs;
    const iterator = frames[Symbol.asyncIterator]();
    let pending: Promise<IteratorResult<LiveTailFrame>> | undefined;
    let lastFrameAt = this.clock();
    let skipped = 0;

    try {
      for (;;) {
        // Released events go out before the next frame is pulled, so a slow
        // consumer holds the read loop back
        for (const event of merger.release(this.clock())) {
          yield event;
        }
        if (this.aborted()) {
          return { kind: 'aborted' };
        }

        pending ??= iterator.next();
        const wake = await this.waitFor(pending, lastFrameAt + idleTimeoutMs, merger.nextDeadline());

        if (wake.kind === 'abort') {
          return { kind: 'aborted' };
        }
        if (wake.kind === 'hold') {
          continue;
        }
        if (wake.kind === 'idle') {
          return {
            kind: 'failed',
            error: new TransientNetworkError(`No live tail data for ${idleTimeoutMs}ms`, { context: this.context }),
          };
        }
        if (wake.kind === 'error') {
          throw wake.error;
        }

        pending = undefined;
        if (wake.result.done) {
          return {
            kind: 'failed',
            error: new TransientNetworkError('Live tail stream closed by the server', { context: this.context }),
          };
        }
        lastFrameAt = this.clock();

        const frame = wake.result.value;
        switch (frame.kind) {
          case 'sessionStart':
            logger.info(`Live tail session started${frame.sessionId ? ` (${frame.sessionId})` : ''}`);
            onSessionStart();
            break;
          case 'sessionUpdate':
            if (frame.sampled && !this.sampledWarned) {
              this.sampledWarned = true;
              logger.warn('Live tail results are being sampled by the service; some events are not shown');
            }
            for (const event of frame.events) {
              if (this.accept(event, marks)) {
                merger.offer(event, lastFrameAt);
              } else {
                skipped++;
              }
            }
            break;
          case 'exception':
            if (!frame.reconnect) {
              throw exceptionToError(frame).withContext(this.context);
            }
            return {
              kind: 'failed',
              error: new TransientNetworkError(frame.message, { context: { ...this.context, exception: frame.name } }),
            };
        }
      }
    } finally {
      if (skipped > 0) {
        logger.debug(`Skipped ${skipped} already delivered live tail event(s)`);
      }
      iterator.return?.().catch(error => logger.trace('Closing live tail frame iterator failed', error));
    }
  }

  private waitFor(
    pending: Promise<IteratorResult<LiveTailFrame>>,
    idleDeadline: number,
    holdDeadline: number | undefined
  ): Promise<Wake> {
    const signal = this.options.signal;
    return new Promise<Wake>(resolve => {
      const now = this.clock();
      const idleIn = Math.max(0, idleDeadline - now);
      const holdIn = holdDeadline === undefined ? Infinity : Math.max(0, holdDeadline - now);

      const settle = (wake: Wake) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(wake);
      };
      const onAbort = () => settle({ kind: 'abort' });
      const timer = setTimeout(() => settle(holdIn < idleIn ? { kind: 'hold' } : { kind: 'idle' }), Math.min(idleIn, holdIn));

      pending.then(
        result => settle({ kind: 'frame', result }),
        error => settle({ kind: 'error', error })
      );
      if (signal?.aborted) {
        settle({ kind: 'abort' });
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
