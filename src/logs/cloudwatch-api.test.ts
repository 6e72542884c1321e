import {
  GetLogEventsCommandInput,
  GetLogEventsCommandOutput,
  FilterLogEventsCommandInput,
  FilterLogEventsCommandOutput,
  DescribeLogGroupsCommandInput,
  DescribeLogGroupsCommandOutput,
  DescribeLogStreamsCommandInput,
  DescribeLogStreamsCommandOutput,
} from '@aws-sdk/client-cloudwatch-logs';
import {
  LogsApi,
  RequestOptions,
  eventFetchFor,
  getLogEventsFetch,
  filterLogEventsFetch,
  describeLogGroupsFetch,
  describeLogStreamsFetch,
  findLogGroupArn,
} from './cloudwatch-api';
import { createLogQuery, retrieveEvents } from './batch-retrieval';
import { RemoteRejection } from '../errors';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const metadata = { $metadata: {} };

function fakeApi(): jest.Mocked<LogsApi> {
  return {
    getLogEvents: jest.fn(async (_input: GetLogEventsCommandInput, _options?: RequestOptions): Promise<GetLogEventsCommandOutput> => ({
      ...metadata,
      events: [],
    })),
    filterLogEvents: jest.fn(async (_input: FilterLogEventsCommandInput, _options?: RequestOptions): Promise<FilterLogEventsCommandOutput> => ({
      ...metadata,
      events: [],
    })),
    describeLogGroups: jest.fn(
      async (_input: DescribeLogGroupsCommandInput, _options?: RequestOptions): Promise<DescribeLogGroupsCommandOutput> => ({
        ...metadata,
        logGroups: [],
      })
    ),
    describeLogStreams: jest.fn(
      async (_input: DescribeLogStreamsCommandInput, _options?: RequestOptions): Promise<DescribeLogStreamsCommandOutput> => ({
        ...metadata,
        logStreams: [],
      })
    ),
  };
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

describe('getLogEventsFetch', () => {
  it('should read from the head and map events to the stream', async () => {
    const api = fakeApi();
    api.getLogEvents.mockResolvedValueOnce({
      ...metadata,
      events: [{ timestamp: 10, ingestionTime: 12, message: 'hello' }],
      nextForwardToken: 'f/2',
    });
    const query = createLogQuery({ group: '/app', streams: ['web-1'], start: 5, end: 50, chunkSize: 20 });

    const page = await getLogEventsFetch(api, query, 'web-1')({ limit: 20 });

    expect(api.getLogEvents).toHaveBeenCalledWith(
      {
        logGroupName: '/app',
        logStreamName: 'web-1',
        startTime: 5,
        endTime: 50,
        startFromHead: true,
        limit: 20,
        nextToken: undefined,
      },
      { abortSignal: undefined }
    );
    expect(page.nextCursor).toBe('f/2');
    expect(page.items).toEqual([
      { timestamp: 10, ingestionTime: 12, message: 'hello', streamId: 'web-1', group: '/app' },
    ]);
  });

  it('should end retrieval when the forward token repeats', async () => {
    const api = fakeApi();
    api.getLogEvents
      .mockResolvedValueOnce({ ...metadata, events: [{ timestamp: 1, message: 'a' }], nextForwardToken: 'f/1' })
      .mockResolvedValueOnce({ ...metadata, events: [{ timestamp: 2, message: 'b' }], nextForwardToken: 'f/1' });
    const query = createLogQuery({ group: '/app', streams: ['web-1'], start: 0 });

    const events = await collect(retrieveEvents(eventFetchFor(api, query), query));

    expect(events.map(e => e.message)).toEqual(['a', 'b']);
    expect(api.getLogEvents).toHaveBeenCalledTimes(2);
    expect(api.getLogEvents.mock.calls[1][0].nextToken).toBe('f/1');
  });
});

describe('filterLogEventsFetch', () => {
  it('should forward the filter pattern verbatim and keep event ids', async () => {
    const api = fakeApi();
    api.filterLogEvents.mockResolvedValueOnce({
      ...metadata,
      events: [{ timestamp: 3, ingestionTime: 4, message: 'boom', logStreamName: 'w2', eventId: 'e1' }],
      nextToken: 'n1',
    });
    const query = createLogQuery({
      group: '/app',
      streams: ['w1', 'w2'],
      start: 0,
      filterPattern: '{ $.level = "error" }',
    });

    const page = await filterLogEventsFetch(api, query)({ cursor: 'n0', limit: 100 });

    expect(api.filterLogEvents).toHaveBeenCalledWith(
      {
        logGroupName: '/app',
        logStreamNames: ['w1', 'w2'],
        startTime: 0,
        endTime: undefined,
        filterPattern: '{ $.level = "error" }',
        limit: 100,
        nextToken: 'n0',
      },
      { abortSignal: undefined }
    );
    expect(page).toEqual({
      items: [{ timestamp: 3, ingestionTime: 4, message: 'boom', streamId: 'w2', group: '/app', eventId: 'e1' }],
      nextCursor: 'n1',
    });
  });
});

describe('eventFetchFor', () => {
  it('should use GetLogEvents for one unfiltered stream', async () => {
    const api = fakeApi();
    await eventFetchFor(api, createLogQuery({ group: 'g', streams: ['s'], start: 0 }))({ limit: 1 });
    expect(api.getLogEvents).toHaveBeenCalledTimes(1);
    expect(api.filterLogEvents).not.toHaveBeenCalled();
  });

  it.each([
    [{ streams: [] }],
    [{ streams: ['a', 'b'] }],
    [{ streams: ['a'], filterPattern: 'ERROR' }],
  ])('should use FilterLogEvents for %p', async fields => {
    const api = fakeApi();
    await eventFetchFor(api, createLogQuery({ group: 'g', start: 0, ...fields }))({ limit: 1 });
    expect(api.filterLogEvents).toHaveBeenCalledTimes(1);
    expect(api.getLogEvents).not.toHaveBeenCalled();
  });
});

describe('describe fetches', () => {
  it('should cap group pages at 50', async () => {
    const api = fakeApi();
    await describeLogGroupsFetch(api, { pattern: 'web' })({ limit: 1000, cursor: 't' });
    expect(api.describeLogGroups).toHaveBeenCalledWith(
      {
        logGroupNamePattern: 'web',
        logGroupNamePrefix: undefined,
        limit: 50,
        nextToken: 't',
      },
      { abortSignal: undefined }
    );
  });

  it('should list streams by prefix', async () => {
    const api = fakeApi();
    api.describeLogStreams.mockResolvedValueOnce({ ...metadata, logStreams: [{ logStreamName: 'web-1' }], nextToken: 'x' });

    const page = await describeLogStreamsFetch(api, '/app', 'web')({ limit: 10 });

    expect(api.describeLogStreams.mock.calls[0][0]).toMatchObject({ logGroupName: '/app', logStreamNamePrefix: 'web', limit: 10 });
    expect(page).toEqual({ items: [{ logStreamName: 'web-1' }], nextCursor: 'x' });
  });
});

describe('findLogGroupArn', () => {
  it('should prefer the exact name and trim the wildcard suffix', async () => {
    const api = fakeApi();
    api.describeLogGroups.mockResolvedValueOnce({
      ...metadata,
      logGroups: [
        { logGroupName: '/app/web-canary', arn: 'arn:aws:logs:us-east-1:123456789012:log-group:/app/web-canary:*' },
        { logGroupName: '/app/web', arn: 'arn:aws:logs:us-east-1:123456789012:log-group:/app/web:*' },
      ],
    });

    await expect(findLogGroupArn(api, '/app/web')).resolves.toBe('arn:aws:logs:us-east-1:123456789012:log-group:/app/web');
    expect(api.describeLogGroups.mock.calls[0][0].logGroupNamePrefix).toBe('/app/web');
  });

  it('should use logGroupArn when present', async () => {
    const api = fakeApi();
    api.describeLogGroups.mockResolvedValueOnce({
      ...metadata,
      logGroups: [{ logGroupName: 'svc', logGroupArn: 'arn:aws:logs:eu-west-1:123456789012:log-group:svc' }],
    });

    await expect(findLogGroupArn(api, 'svc')).resolves.toBe('arn:aws:logs:eu-west-1:123456789012:log-group:svc');
  });

  it('should reject an unknown group', async () => {
    const api = fakeApi();
    await expect(findLogGroupArn(api, 'missing')).rejects.toBeInstanceOf(RemoteRejection);
  });
});
