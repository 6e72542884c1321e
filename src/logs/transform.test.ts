import {
  parseTransformRule,
  applyTransformRule,
  toReplacePattern,
  compileDatetimeFormat,
  renderDatetime,
  TransformPipeline,
  DEFAULT_DATETIME_FORMAT,
} from './transform';
import { ParseError } from '../errors';
import { createLogEvent } from '../types';

// 2024-01-02T03:04:05.678Z
const INSTANT = Date.UTC(2024, 0, 2, 3, 4, 5, 678);

describe('parseTransformRule', () => {
  it('should split on the leading delimiter and capture the year', () => {
    const rule = parseTransformRule('/(\\d{4})[^|]+/$1');

    expect(rule.delimiter).toBe('/');
    expect(rule.pattern.source).toBe('(\\d{4})[^|]+');
    expect(rule.replacement).toBe('$1');
    expect(applyTransformRule(rule, '2024-01-02 12:00:00 INFO|payload')).toBe('2024|payload');
  });

  it('should accept any delimiter character', () => {
    const rule = parseTransformRule('#user=\\w+#user=***');
    expect(applyTransformRule(rule, 'login user=alice ok')).toBe('login user=*** ok');
  });

  it('should keep escaped delimiters inside a field', () => {
    const rule = parseTransformRule('/a\\/b/c\\/d');
    expect(applyTransformRule(rule, 'x a/b y')).toBe('x c/d y');
  });

  it('should replace the first match only', () => {
    const rule = parseTransformRule('/o/0');
    expect(applyTransformRule(rule, 'foo boo')).toBe('f0o boo');
  });

  it('should support braced and named references', () => {
    const rule = parseTransformRule('/(?<level>[A-Z]+): (.*)/${2} [${level}]');
    expect(rule.replacement).toBe('$2 [$<level>]');
    expect(applyTransformRule(rule, 'WARN: disk low')).toBe('disk low [WARN]');
  });

  it('should allow an empty replacement', () => {
    const rule = parseTransformRule('/^\\S+ //');
    expect(applyTransformRule(rule, 'req-123 done')).toBe('done');
  });

  it.each([
    ['/'],
    ['/abc'],
    ['/a/b/c'],
    ['//x'],
  ])('should reject %p', rule => {
    expect(() => parseTransformRule(rule)).toThrow(ParseError);
  });

  it('should reject an invalid regex with the rule in context', () => {
    expect(() => parseTransformRule('/(unclosed/x')).toThrow(ParseError);
    try {
      parseTransformRule('/(unclosed/x');
    } catch (error) {
      expect(error).toMatchObject({ context: { rule: '/(unclosed/x' } });
    }
  });

  it('should return a frozen rule', () => {
    expect(Object.isFrozen(parseTransformRule('/a/b'))).toBe(true);
  });
});

describe('toReplacePattern', () => {
  it('should leave native references alone', () => {
    expect(toReplacePattern('$1-$<name>-$$')).toBe('$1-$<name>-$$');
  });

  it('should rewrite braced references', () => {
    expect(toReplacePattern('${10}:${host}')).toBe('$10:$<host>');
  });
});

describe('compileDatetimeFormat', () => {
  it('should compile the default template to one date-fns pattern', () => {
    expect(compileDatetimeFormat(DEFAULT_DATETIME_FORMAT)).toEqual([
      { kind: 'pattern', value: "ddMMM' 'HH':'mm':'ss'.'SSS" },
    ]);
  });

  it('should reject unknown directives', () => {
    expect(() => compileDatetimeFormat('%Q')).toThrow("Unsupported directive '%Q'");
  });

  it('should reject a trailing percent sign', () => {
    expect(() => compileDatetimeFormat('%H%')).toThrow(ParseError);
  });
});

describe('renderDatetime', () => {
  it.each([
    [DEFAULT_DATETIME_FORMAT, '02Jan 03:04:05.678'],
    ['%Y-%m-%dT%H:%M:%S%.3fZ', '2024-01-02T03:04:05.678Z'],
    ['%F %T', '2024-01-02 03:04:05'],
    ['%H:%M:%S%.6f', '03:04:05.678000'],
    ['%a %B %e', 'Tue January 2'],
    ['%I:%M %p', '03:04 AM'],
    ['%j', '002'],
    ['%s', '1704164645'],
    ['100%%', '100%'],
    ["it's %H", "it's 03"],
    ['%z %:z %Z', '+0000 +00:00 UTC'],
  ])('should render %p in UTC', (template, expected) => {
    expect(renderDatetime(compileDatetimeFormat(template), INSTANT, { utc: true })).toBe(expected);
  });

  it('should render in an injected local offset', () => {
    const segments = compileDatetimeFormat('%F %T %z');
    expect(renderDatetime(segments, INSTANT, { utcOffsetMinutes: -480 })).toBe('2024-01-01 19:04:05 -0800');
    expect(renderDatetime(segments, INSTANT, { utcOffsetMinutes: 330 })).toBe('2024-01-02 08:34:05 +0530');
  });

  it('should prefer utc over an injected offset', () => {
    const segments = compileDatetimeFormat('%H');
    expect(renderDatetime(segments, INSTANT, { utc: true, utcOffsetMinutes: 120 })).toBe('03');
  });
});

describe('TransformPipeline', () => {
  const event = createLogEvent({
    timestamp: INSTANT,
    streamId: 'web-1',
    ingestionTime: INSTANT + 10,
    message: 'GET /health 200',
  });

  it('should format the datetime and keep the message without a rule', () => {
    const pipeline = new TransformPipeline({ utc: true });

    expect(pipeline.apply(event)).toEqual({
      datetime: '02Jan 03:04:05.678',
      message: 'GET /health 200',
      streamId: 'web-1',
      timestamp: INSTANT,
    });
  });

  it('should apply the substitution rule', () => {
    const pipeline = new TransformPipeline({ rule: '|/health|/hc', datetimeFormat: '%T', utc: true });

    expect(pipeline.apply(event)).toMatchObject({ datetime: '03:04:05', message: 'GET /hc 200' });
  });

  it('should accept a parsed rule', () => {
    const pipeline = new TransformPipeline({ rule: parseTransformRule('/ \\d+$/'), utc: true });
    expect(pipeline.apply(event).message).toBe('GET /health');
  });

  it('should be deterministic across calls', () => {
    const pipeline = new TransformPipeline({ rule: '/GET/get', utc: true });
    expect(pipeline.apply(event)).toEqual(pipeline.apply(event));
  });

  it('should fail construction on a bad rule or template', () => {
    expect(() => new TransformPipeline({ rule: 'nodelimiter' })).toThrow(ParseError);
    expect(() => new TransformPipeline({ datetimeFormat: '%Q' })).toThrow(ParseError);
  });
});
