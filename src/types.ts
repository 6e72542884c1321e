/**
 * Shared types for cwtail
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/** Output rendering for formatted lines */
export type OutputFormat = 'raw' | 'pretty' | 'json';

/**
 * A single log record, produced by either the batch or the live-tail path.
 * Instances are frozen once built (see {@link createLogEvent}).
 */
export interface LogEvent {
  /** Event time, epoch milliseconds */
  readonly timestamp: number;
  /** Name of the originating log stream */
  readonly streamId: string;
  /** Ingestion time, epoch milliseconds */
  readonly ingestionTime: number;
  readonly message: string;
  /** Log group name or ARN, when known */
  readonly group?: string;
  /** Server-assigned event id (FilterLogEvents only) */
  readonly eventId?: string;
}

export function createLogEvent(fields: LogEvent): LogEvent {
  return Object.freeze({ ...fields });
}

/**
 * Compares two events by (timestamp, streamId). Returns a negative number when
 * `a` sorts before `b`.
 */
export function compareEvents(a: LogEvent, b: LogEvent): number {
  if (a.timestamp !== b.timestamp) {
    return a.timestamp - b.timestamp;
  }
  if (a.streamId === b.streamId) {
    return 0;
  }
  return a.streamId < b.streamId ? -1 : 1;
}

/** Which time grammar produced a resolved instant */
export type TimeGrammar = 'absolute' | 'epoch' | 'duration' | 'local-time' | 'utc-time' | 'now';

/** A textual time expression and the instant it resolved to */
export interface TimeSpec {
  readonly raw: string;
  /** Epoch milliseconds */
  readonly instant: number;
  readonly grammar: TimeGrammar;
}

/** Resolved retrieval window, epoch milliseconds */
export interface TimeWindow {
  readonly start: TimeSpec;
  readonly end: TimeSpec;
}

/** Parameters of one historical retrieval */
export interface LogQuery {
  group: string;
  /** Zero or more stream names; empty means the whole group */
  streams: string[];
  /** Epoch milliseconds */
  start: number;
  /** Epoch milliseconds */
  end?: number;
  /** Server-side filter pattern, forwarded verbatim */
  filterPattern?: string;
  /** Page size, 1..10000 */
  chunkSize: number;
}

/** The output of the transform pipeline for one event */
export interface FormattedLine {
  /** Rendered timestamp */
  datetime: string;
  /** Message after substitution */
  message: string;
  streamId: string;
  /** Original event time, epoch milliseconds */
  timestamp: number;
}

/** Long-lived credential triple used for manual request signing */
export interface SigningCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

/**
 * Contents of the YAML configuration file
 */
export interface CwtailConfig {
  datetimeFormat?: string;
  utc?: boolean;
  chunkSize?: number;
  region?: string;
  profile?: string;
  /** Saved argument lists, keyed by alias name */
  aliases: Record<string, string[]>;
}

/** Options shared by every subcommand */
export interface GlobalOptions {
  profile?: string;
  region?: string;
  configPath: string;
  /** True when --config-path was passed explicitly */
  configPathExplicit: boolean;
  logLevel: LogLevel;
}
