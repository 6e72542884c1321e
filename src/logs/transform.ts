/**
 * Client-side transform pipeline: optional regex substitution on the message
 * followed by timestamp rendering
 */

import { format } from 'date-fns';
import { ParseError } from '../errors';
import { FormattedLine, LogEvent } from '../types';

export const DEFAULT_DATETIME_FORMAT = '%d%b %H:%M:%S%.3f';

/**
 * A parsed `<delimiter><pattern><delimiter><replacement>` rule
 */
export interface TransformRule {
  readonly pattern: RegExp;
  /** Replacement in String.prototype.replace syntax */
  readonly replacement: string;
  readonly delimiter: string;
}

function splitOnDelimiter(body: string, delimiter: string): string[] {
  const fields: string[] = [];
  let current = '';
  for (let i = 0; i < body.length; i++) {
    const char = body[i];
    if (char === '\\' && body[i + 1] === delimiter) {
      current += char + delimiter;
      i++;
    } else if (char === delimiter) {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Converts `${1}` and `${name}` references to the `$1` and `$<name>` forms
 * String.prototype.replace understands. `$1`, `$<name>` and `$$` pass through.
 */
export function toReplacePattern(replacement: string): string {
  return replacement.replace(/\$\$|\$\{(\w+)\}/g, (match: string, reference: string | undefined) => {
    if (reference === undefined) {
      return match;
    }
    return /^\d+$/.test(reference) ? `$${reference}` : `$<${reference}>`;
  });
}

/**
 * Parses a substitution rule. The first character is the delimiter; the rest
 * must split on unescaped delimiters into exactly a pattern and a replacement.
 *
 * @throws ParseError for a wrong field count, an empty pattern or an invalid regex
 */
export function parseTransformRule(rule: string): TransformRule {
  if (rule.length < 2) {
    throw new ParseError(`Invalid message rule '${rule}': expected <delimiter><regexp><delimiter><replacement>`, {
      context: { rule },
    });
  }
  const delimiter = rule[0];
  const fields = splitOnDelimiter(rule.substring(1), delimiter);
  if (fields.length !== 2) {
    throw new ParseError(
      `Invalid message rule '${rule}': expected 2 fields separated by '${delimiter}', got ${fields.length}`,
      { context: { rule } }
    );
  }

  const [source, replacement] = fields;
  if (source === '') {
    throw new ParseError(`Invalid message rule '${rule}': empty pattern`, { context: { rule } });
  }

  let pattern: RegExp;
  try {
    pattern = new RegExp(source);
  } catch (error) {
    throw new ParseError(`Invalid message rule '${rule}': ${error instanceof Error ? error.message : String(error)}`, {
      context: { rule },
      cause: error,
    });
  }

  return Object.freeze({
    pattern,
    replacement: toReplacePattern(replacement.split(`\\${delimiter}`).join(delimiter)),
    delimiter,
  });
}

/** Replaces the first match of the rule in `message` */
export function applyTransformRule(rule: TransformRule, message: string): string {
  return message.replace(rule.pattern, rule.replacement);
}

export type FormatSegment =
  | { kind: 'pattern'; value: string }
  | { kind: 'zone'; colon: boolean }
  | { kind: 'zone-name' }
  | { kind: 'epoch' };

const STRFTIME_TOKENS: Record<string, string> = {
  Y: 'yyyy',
  y: 'yy',
  m: 'MM',
  d: 'dd',
  e: 'd',
  b: 'MMM',
  h: 'MMM',
  B: 'MMMM',
  a: 'EEE',
  A: 'EEEE',
  u: 'i',
  j: 'DDD',
  H: 'HH',
  k: 'H',
  I: 'hh',
  l: 'h',
  M: 'mm',
  S: 'ss',
  p: 'a',
  F: 'yyyy-MM-dd',
  D: 'MM/dd/yy',
  T: 'HH:mm:ss',
  R: 'HH:mm',
};

const FRACTION_PATTERN = /^(\.?)([369]?)f/;

function quoteLiteral(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

/**
 * Compiles a strftime-style template into date-fns pattern segments.
 *
 * @throws ParseError on an unknown or dangling directive
 */
export function compileDatetimeFormat(template: string): FormatSegment[] {
  const segments: FormatSegment[] = [];
  let pattern = '';
  let literal = '';

  const flushLiteral = () => {
    if (literal !== '') {
      pattern += quoteLiteral(literal);
      literal = '';
    }
  };
  const flushPattern = () => {
    flushLiteral();
    if (pattern !== '') {
      segments.push({ kind: 'pattern', value: pattern });
      pattern = '';
    }
  };

  for (let i = 0; i < template.length; i++) {
    const char = template[i];
    if (char !== '%') {
      literal += char;
      continue;
    }

    const rest = template.substring(i + 1);
    const fraction = rest.match(FRACTION_PATTERN);
    if (fraction) {
      flushLiteral();
      const digits = fraction[2] === '' ? (fraction[1] ? 3 : 9) : parseInt(fraction[2], 10);
      if (fraction[1]) {
        pattern += quoteLiteral('.');
      }
      pattern += 'S'.repeat(digits);
      i += fraction[0].length;
      continue;
    }

    const directive = rest[0];
    if (directive === undefined) {
      throw new ParseError(`Dangling '%' in datetime format '${template}'`, { context: { datetimeFormat: template } });
    }
    i++;

    if (directive === '%') {
      literal += '%';
    } else if (directive === 'n') {
      literal += '\n';
    } else if (directive === 't') {
      literal += '\t';
    } else if (directive === 'z') {
      flushPattern();
      segments.push({ kind: 'zone', colon: false });
    } else if (directive === ':' && rest[1] === 'z') {
      i++;
      flushPattern();
      segments.push({ kind: 'zone', colon: true });
    } else if (directive === 's') {
      flushPattern();
      segments.push({ kind: 'epoch' });
    } else if (directive === 'Z') {
      flushPattern();
      segments.push({ kind: 'zone-name' });
    } else if (Object.prototype.hasOwnProperty.call(STRFTIME_TOKENS, directive)) {
      flushLiteral();
      pattern += STRFTIME_TOKENS[directive];
    } else {
      throw new ParseError(`Unsupported directive '%${directive}' in datetime format '${template}'`, {
        context: { datetimeFormat: template },
      });
    }
  }
  flushPattern();
  return segments;
}

function formatOffset(offsetMinutes: number, colon: boolean): string {
  const sign = offsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(offsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return colon ? `${sign}${hours}:${minutes}` : `${sign}${hours}${minutes}`;
}

export interface DatetimeOptions {
  /** Render in UTC instead of the local zone */
  utc?: boolean;
  /** Local offset east of UTC in minutes; defaults to the host zone */
  utcOffsetMinutes?: number;
}

/**
 * Renders `instant` with compiled segments. date-fns formats in the host zone,
 * so for UTC or an injected offset the wall-clock fields are rebuilt as a host
 * local date first.
 */
export function renderDatetime(segments: FormatSegment[], instant: number, options: DatetimeOptions = {}): string {
  const hostOffset = -new Date(instant).getTimezoneOffset();
  const offset = options.utc ? 0 : options.utcOffsetMinutes ?? hostOffset;

  let date = new Date(instant);
  if (offset !== hostOffset) {
    const wall = new Date(instant + offset * 60_000);
    date = new Date(
      wall.getUTCFullYear(),
      wall.getUTCMonth(),
      wall.getUTCDate(),
      wall.getUTCHours(),
      wall.getUTCMinutes(),
      wall.getUTCSeconds(),
      wall.getUTCMilliseconds()
    );
  }

  return segments
    .map(segment => {
      switch (segment.kind) {
        case 'pattern':
          return format(date, segment.value, { useAdditionalDayOfYearTokens: true });
        case 'zone':
          return formatOffset(offset, segment.colon);
        case 'zone-name':
          return offset === 0 ? 'UTC' : formatOffset(offset, true);
        case 'epoch':
          return String(Math.floor(instant / 1000));
      }
    })
    .join('');
}

export interface TransformOptions extends DatetimeOptions {
  /** Substitution rule, raw or already parsed */
  rule?: string | TransformRule;
  datetimeFormat?: string;
}

/**
 * Maps LogEvents to FormattedLines. Construction validates the rule and the
 * template; `apply` is pure.
 */
export class TransformPipeline {
  private readonly rule?: TransformRule;
  private readonly segments: FormatSegment[];
  private readonly datetimeOptions: DatetimeOptions;

  constructor(options: TransformOptions = {}) {
    this.rule = typeof options.rule === 'string' ? parseTransformRule(options.rule) : options.rule;
    this.segments = compileDatetimeFormat(options.datetimeFormat ?? DEFAULT_DATETIME_FORMAT);
    this.datetimeOptions = { utc: options.utc, utcOffsetMinutes: options.utcOffsetMinutes };
  }

  apply(event: LogEvent): FormattedLine {
    return {
      datetime: renderDatetime(this.segments, event.timestamp, this.datetimeOptions),
      message: this.rule ? applyTransformRule(this.rule, event.message) : event.message,
      streamId: event.streamId,
      timestamp: event.timestamp,
    };
  }
}
