import {
  DescribeLogGroupsCommandInput,
  DescribeLogGroupsCommandOutput,
  DescribeLogStreamsCommandInput,
  DescribeLogStreamsCommandOutput,
  FilterLogEventsCommandInput,
  FilterLogEventsCommandOutput,
  GetLogEventsCommandInput,
  GetLogEventsCommandOutput,
} from '@aws-sdk/client-cloudwatch-logs';
import { formatRFC3339 } from 'date-fns';
import { compareNames, formatEventTime, formatStream, streamsCommand } from './streams';
import { LogsApi, RequestOptions } from '../logs/cloudwatch-api';
import { ParseError } from '../errors';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const NOW = Date.UTC(2024, 0, 2, 12, 0, 0);

function fakeApi(): jest.Mocked<LogsApi> {
  return {
    getLogEvents: jest.fn(async (_input: GetLogEventsCommandInput, _options?: RequestOptions): Promise<GetLogEventsCommandOutput> => ({
      $metadata: {},
    })),
    filterLogEvents: jest.fn(async (_input: FilterLogEventsCommandInput, _options?: RequestOptions): Promise<FilterLogEventsCommandOutput> => ({
      $metadata: {},
    })),
    describeLogGroups: jest.fn(
      async (_input: DescribeLogGroupsCommandInput, _options?: RequestOptions): Promise<DescribeLogGroupsCommandOutput> => ({ $metadata: {} })
    ),
    describeLogStreams: jest.fn(
      async (input: DescribeLogStreamsCommandInput, _options?: RequestOptions): Promise<DescribeLogStreamsCommandOutput> => ({
        $metadata: {},
        logStreams: [
          { logStreamName: 'web-2', firstEventTimestamp: NOW - 7_200_000, lastEventTimestamp: NOW - 60_000 },
          { logStreamName: 'web-1', firstEventTimestamp: NOW - 86_400_000, lastEventTimestamp: NOW - 3_600_000 },
          { logStreamName: 'empty' },
        ].filter(stream => stream.logStreamName.startsWith(input.logStreamNamePrefix ?? '')),
      })
    ),
  };
}

describe('formatEventTime', () => {
  it('should render RFC 3339 with milliseconds', () => {
    expect(formatEventTime(NOW)).toBe(formatRFC3339(new Date(NOW), { fractionDigits: 3 }));
    expect(formatEventTime(NOW)).toMatch(/^2024-01-0[123]T\d{2}:\d{2}:00\.000([+-]\d{2}:\d{2}|Z)$/);
  });

  it('should print a dash for unknown times', () => {
    expect(formatEventTime(undefined)).toBe('-');
  });
});

describe('compareNames', () => {
  it('should order by code unit regardless of locale', () => {
    expect(['b', 'B', 'a'].sort(compareNames)).toEqual(['B', 'a', 'b']);
  });
});

describe('formatStream', () => {
  it('should print the name alone unless verbose', () => {
    expect(formatStream({ logStreamName: 'web-1' }, false)).toBe('web-1');
    expect(formatStream({ logStreamName: 'web-1' }, false, '\t')).toBe('\tweb-1');
  });

  it('should add first and last event times when verbose', () => {
    expect(formatStream({ logStreamName: 'empty' }, true)).toBe('empty first - last -');
  });
});

describe('streamsCommand', () => {
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  const printed = (): unknown[] => logSpy.mock.calls.map(call => call[0]);

  it('should print stream names sorted', async () => {
    const api = fakeApi();

    await streamsCommand({ group: '/app/web' }, { api, now: () => NOW });

    expect(printed()).toEqual(['empty', 'web-1', 'web-2']);
    expect(api.describeLogStreams).toHaveBeenCalledWith(
      expect.objectContaining({ logGroupName: '/app/web' }),
      expect.anything()
    );
  });

  it('should filter by prefix', async () => {
    await streamsCommand({ group: '/app/web', prefix: 'web' }, { api: fakeApi(), now: () => NOW });

    expect(printed()).toEqual(['web-1', 'web-2']);
  });

  it('should hide streams idle since before --start', async () => {
    await streamsCommand({ group: '/app/web', start: '30m' }, { api: fakeApi(), now: () => NOW });

    expect(printed()).toEqual(['web-2']);
  });

  it('should show event times when verbose', async () => {
    await streamsCommand({ group: '/app/web', prefix: 'web-2', verbose: true }, { api: fakeApi(), now: () => NOW });

    expect(printed()).toEqual([
      `web-2 first ${formatEventTime(NOW - 7_200_000)} last ${formatEventTime(NOW - 60_000)}`,
    ]);
  });

  it('should reject a malformed --start before listing', async () => {
    const api = fakeApi();

    await expect(streamsCommand({ group: '/app/web', start: 'yesterday-ish' }, { api })).rejects.toThrow(ParseError);
    expect(api.describeLogStreams).not.toHaveBeenCalled();
  });
});
