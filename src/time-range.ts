/**
 * Resolution of textual time expressions into absolute instants
 *
 * Accepted forms:
 *   2024-01-02T03:04:05.678Z, 2024-01-02 03:04:05+01:00, 2024-01-02  absolute
 *   1700000000, 1700000000000                                        unix epoch (s or ms)
 *   10m, 1m30s, 2h, 1d 4h, 100                                       duration before now
 *   12:34, 12:34:56                                                  local time of day
 *   12:34Z                                                           UTC time of day
 *
 * Nothing here reads the clock: callers pass `now`.
 */

import { ParseError } from './errors';
import { TimeGrammar, TimeSpec, TimeWindow } from './types';

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

/** Integers at or above this are unix epoch time, below it a duration in seconds */
const EPOCH_THRESHOLD = 1_000_000_000;
/** 2000-01-01T00:00:00Z in milliseconds; larger epoch values are milliseconds */
const EPOCH_MS_THRESHOLD = 946_684_800_000;

/** Start of the window when none is given */
export const DEFAULT_START = '60m';

const UNIT_MS: Record<string, number> = {
  d: MS_PER_DAY,
  h: MS_PER_HOUR,
  m: MS_PER_MINUTE,
  s: MS_PER_SECOND,
  ms: 1,
};

const ABSOLUTE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|z|[+-]\d{1,2}(?::?\d{2})?)?$/;
const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?(Z|z)?$/;
const DURATION_TOKEN = /(\d+)\s*(ms|d|h|m|s)/gy;

export interface ResolveOptions {
  /** Reference instant, epoch milliseconds */
  now: number;
  /**
   * Offset of the local zone east of UTC, in minutes. Defaults to the host
   * zone's offset at the instant being resolved.
   */
  utcOffsetMinutes?: number;
}

interface Candidate {
  grammar: TimeGrammar;
  instant: number;
}

interface ClockFields {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

function fractionToMs(fraction: string | undefined): number {
  if (!fraction) {
    return 0;
  }
  return parseInt(fraction.padEnd(3, '0').substring(0, 3), 10);
}

function isValidClock(fields: ClockFields): boolean {
  const { year, month, day, hour, minute, second } = fields;
  if (month < 1 || month > 12 || day < 1) {
    return false;
  }
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate();
  return day <= daysInMonth && hour <= 23 && minute <= 59 && second <= 59;
}

function localToEpoch(fields: ClockFields, utcOffsetMinutes: number | undefined): number {
  const { year, month, day, hour, minute, second, millisecond } = fields;
  if (utcOffsetMinutes === undefined) {
    return new Date(year, month - 1, day, hour, minute, second, millisecond).getTime();
  }
  return Date.UTC(year, month - 1, day, hour, minute, second, millisecond) - utcOffsetMinutes * MS_PER_MINUTE;
}

/**
 * Parses a zone designator (Z, +1, -05, +0530, +05:30) into minutes east of UTC
 */
function parseZone(zone: string): number | null {
  if (zone === 'Z' || zone === 'z') {
    return 0;
  }
  const match = zone.match(/^([+-])(\d{1,2})(?::?(\d{2}))?$/);
  if (!match) {
    return null;
  }
  const [, sign, hours, minutes] = match;
  const total = parseInt(hours, 10) * 60 + (minutes ? parseInt(minutes, 10) : 0);
  if (total > 14 * 60) {
    return null;
  }
  return sign === '-' ? -total : total;
}

function parseAbsolute(value: string, options: ResolveOptions): number | null {
  const match = value.match(ABSOLUTE_PATTERN);
  if (!match) {
    return null;
  }
  const [, year, month, day, hour, minute, second, fraction, zone] = match;
  const fields: ClockFields = {
    year: parseInt(year, 10),
    month: parseInt(month, 10),
    day: parseInt(day, 10),
    hour: hour ? parseInt(hour, 10) : 0,
    minute: minute ? parseInt(minute, 10) : 0,
    second: second ? parseInt(second, 10) : 0,
    millisecond: fractionToMs(fraction),
  };
  if (!isValidClock(fields)) {
    return null;
  }
  if (zone) {
    const offset = parseZone(zone);
    return offset === null ? null : localToEpoch(fields, offset);
  }
  return localToEpoch(fields, options.utcOffsetMinutes);
}

function parseEpoch(value: string): number | null {
  if (!/^\d+$/.test(value)) {
    return null;
  }
  const number = Number(value);
  if (!Number.isSafeInteger(number) || number < EPOCH_THRESHOLD) {
    return null;
  }
  return number < EPOCH_MS_THRESHOLD ? number * MS_PER_SECOND : number;
}

/**
 * Parses a duration made of d/h/m/s/ms components into milliseconds, ignoring
 * any leading sign. A bare integer below the epoch threshold counts as seconds.
 */
export function parseDuration(value: string): number | null {
  const signed = parseSignedDuration(value);
  return signed === null ? null : signed.ms;
}

function parseSignedDuration(value: string): { ms: number; sign: '+' | '-' | '' } | null {
  const trimmed = value.trim();
  const sign = trimmed.startsWith('+') ? '+' : trimmed.startsWith('-') ? '-' : '';
  const body = trimmed.substring(sign.length).trim();
  if (body === '') {
    return null;
  }

  if (/^\d+$/.test(body)) {
    const seconds = Number(body);
    if (seconds >= EPOCH_THRESHOLD) {
      return null;
    }
    return { ms: seconds * MS_PER_SECOND, sign };
  }

  let total = 0;
  let position = 0;
  while (position < body.length) {
    while (body[position] === ' ') {
      position++;
    }
    if (position >= body.length) {
      break;
    }
    DURATION_TOKEN.lastIndex = position;
    const match = DURATION_TOKEN.exec(body);
    if (!match) {
      return null;
    }
    total += parseInt(match[1], 10) * UNIT_MS[match[2]];
    position = DURATION_TOKEN.lastIndex;
  }
  return { ms: total, sign };
}

function parseDurationOffset(value: string, now: number): number | null {
  const duration = parseSignedDuration(value);
  if (!duration) {
    return null;
  }
  return duration.sign === '+' ? now + duration.ms : now - duration.ms;
}

function parseTimeOfDay(value: string, options: ResolveOptions, utc: boolean): number | null {
  const match = value.match(TIME_OF_DAY_PATTERN);
  if (!match) {
    return null;
  }
  const [, hour, minute, second, fraction, zone] = match;
  if (Boolean(zone) !== utc) {
    return null;
  }

  const clock = {
    hour: parseInt(hour, 10),
    minute: parseInt(minute, 10),
    second: second ? parseInt(second, 10) : 0,
    millisecond: fractionToMs(fraction),
  };
  if (clock.hour > 23 || clock.minute > 59 || clock.second > 59) {
    return null;
  }

  const { now } = options;
  if (!utc && options.utcOffsetMinutes === undefined) {
    const date = new Date(now);
    date.setHours(clock.hour, clock.minute, clock.second, clock.millisecond);
    if (date.getTime() > now) {
      date.setDate(date.getDate() - 1);
    }
    return date.getTime();
  }

  const offset = utc ? 0 : options.utcOffsetMinutes ?? 0;
  const shifted = new Date(now + offset * MS_PER_MINUTE);
  let candidate =
    Date.UTC(
      shifted.getUTCFullYear(),
      shifted.getUTCMonth(),
      shifted.getUTCDate(),
      clock.hour,
      clock.minute,
      clock.second,
      clock.millisecond
    ) -
    offset * MS_PER_MINUTE;
  if (candidate > now) {
    candidate -= MS_PER_DAY;
  }
  return candidate;
}

/**
 * Resolves a start or end expression relative to `options.now`.
 *
 * @throws ParseError when no grammar matches, or when several grammars match
 *   with different instants
 */
export function resolveTime(expression: string, options: ResolveOptions): TimeSpec {
  const value = expression.trim();
  if (value === '') {
    throw new ParseError('Empty time expression');
  }

  const parsers: Array<[TimeGrammar, () => number | null]> = [
    ['absolute', () => parseAbsolute(value, options)],
    ['epoch', () => parseEpoch(value)],
    ['duration', () => parseDurationOffset(value, options.now)],
    ['local-time', () => parseTimeOfDay(value, options, false)],
    ['utc-time', () => parseTimeOfDay(value, options, true)],
  ];

  const candidates: Candidate[] = [];
  for (const [grammar, parse] of parsers) {
    const instant = parse();
    if (instant !== null && Number.isFinite(instant)) {
      candidates.push({ grammar, instant });
    }
  }

  if (candidates.length === 0) {
    throw new ParseError(
      `Failed to parse '${expression}' as a timestamp, epoch time, duration, local time or UTC time`,
      { context: { expression } }
    );
  }

  const distinct = new Set(candidates.map(c => c.instant));
  if (distinct.size > 1) {
    throw new ParseError(
      `Ambiguous time expression '${expression}' (matches ${candidates.map(c => c.grammar).join(', ')})`,
      { context: { expression } }
    );
  }

  return Object.freeze({ raw: expression, instant: candidates[0].instant, grammar: candidates[0].grammar });
}

/**
 * Resolves a length expression as a non-negative duration added to `start`.
 */
export function resolveLength(expression: string, start: TimeSpec): TimeSpec {
  const duration = parseSignedDuration(expression);
  if (!duration || duration.sign === '-') {
    throw new ParseError(`Failed to parse '${expression}' as a length`, { context: { length: expression } });
  }
  return Object.freeze({ raw: expression, instant: start.instant + duration.ms, grammar: 'duration' });
}

export interface WindowInput {
  start?: string;
  end?: string;
  length?: string;
}

/**
 * Resolves the retrieval window. `start` defaults to 60 minutes before now,
 * the end defaults to now, and `end` and `length` are mutually exclusive.
 */
export function resolveWindow(input: WindowInput, options: ResolveOptions): TimeWindow {
  if (input.end !== undefined && input.length !== undefined) {
    throw new ParseError('--end and --length are mutually exclusive', {
      context: { end: input.end, length: input.length },
    });
  }

  const start = resolveTime(input.start ?? DEFAULT_START, options);
  let end: TimeSpec;
  if (input.end !== undefined) {
    end = resolveTime(input.end, options);
  } else if (input.length !== undefined) {
    end = resolveLength(input.length, start);
  } else {
    end = Object.freeze({ raw: 'now', instant: options.now, grammar: 'now' });
  }

  if (end.instant < start.instant) {
    throw new ParseError('End of the time window is before its start', {
      context: {
        start: new Date(start.instant).toISOString(),
        end: new Date(end.instant).toISOString(),
      },
    });
  }

  return Object.freeze({ start, end });
}
