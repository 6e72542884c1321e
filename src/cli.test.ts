import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { CommanderError } from 'commander';
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
import {
  CliContext,
  MAX_ALIAS_DEPTH,
  commandIndex,
  createProgram,
  expandAliases,
  globalOptionValue,
  main,
  parseInteger,
  parseOutputFormat,
  resolveGlobalOptions,
} from './cli';
import { loadConfig } from './config';
import { ParseError } from './errors';
import { LogsApi, RequestOptions } from './logs/cloudwatch-api';
import { OutputSink } from './logs/output-sink';

jest.mock('./logger', () => ({
  isLogLevel: (value: string) => ['trace', 'debug', 'info', 'warn', 'error'].includes(value),
  logger: {
    setLevel: jest.fn(),
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    success: jest.fn(),
  },
}));

const { logger } = jest.requireMock<{ logger: { error: jest.Mock } }>('./logger');

const EVENT_TIME = Date.UTC(2024, 0, 2, 9, 30, 0);

function fakeApi(): jest.Mocked<LogsApi> {
  return {
    getLogEvents: jest.fn(
      async (_input: GetLogEventsCommandInput, _options?: RequestOptions): Promise<GetLogEventsCommandOutput> => ({
        $metadata: {},
        events: [{ timestamp: EVENT_TIME, ingestionTime: EVENT_TIME, message: 'hello' }],
      })
    ),
    filterLogEvents: jest.fn(
      async (_input: FilterLogEventsCommandInput, _options?: RequestOptions): Promise<FilterLogEventsCommandOutput> => ({ $metadata: {} })
    ),
    describeLogGroups: jest.fn(
      async (_input: DescribeLogGroupsCommandInput, _options?: RequestOptions): Promise<DescribeLogGroupsCommandOutput> => ({
        $metadata: {},
        logGroups: [{ logGroupName: '/app/web', storedBytes: 1000 }],
      })
    ),
    describeLogStreams: jest.fn(
      async (_input: DescribeLogStreamsCommandInput, _options?: RequestOptions): Promise<DescribeLogStreamsCommandOutput> => ({
        $metadata: {},
        logStreams: [{ logStreamName: 'web-1' }],
      })
    ),
  };
}

describe('cli', () => {
  describe('commandIndex', () => {
    it('should skip program options and their values', () => {
      expect(commandIndex(['--region', 'eu-west-1', '--log-level=debug', 'log', '/app/web'])).toBe(3);
      expect(commandIndex(['groups'])).toBe(0);
    });

    it('should return -1 without a command', () => {
      expect(commandIndex(['--help'])).toBe(-1);
      expect(commandIndex(['--', 'log'])).toBe(-1);
      expect(commandIndex([])).toBe(-1);
    });
  });

  describe('globalOptionValue', () => {
    it('should read both flag spellings', () => {
      expect(globalOptionValue(['--region', 'eu-west-1', 'log'], '--region')).toBe('eu-west-1');
      expect(globalOptionValue(['--region=us-east-2', 'log'], '--region')).toBe('us-east-2');
    });

    it('should ignore flags after the subcommand', () => {
      expect(globalOptionValue(['log', '/app/web', '--region', 'eu-west-1'], '--region')).toBeUndefined();
    });
  });

  describe('resolveGlobalOptions', () => {
    it('should default to the home config and info level', () => {
      expect(resolveGlobalOptions(['log', 'g'], {}, '/home/test')).toEqual({
        profile: undefined,
        region: undefined,
        configPath: path.join('/home/test', '.config', 'cwtail', 'config.yml'),
        configPathExplicit: false,
        logLevel: 'info',
      });
    });

    it('should prefer the flag over CWTAIL_LOG_LEVEL', () => {
      expect(resolveGlobalOptions([], { CWTAIL_LOG_LEVEL: 'debug' }, '/home/test').logLevel).toBe('debug');
      expect(resolveGlobalOptions(['--log-level', 'warn'], { CWTAIL_LOG_LEVEL: 'debug' }, '/home/test').logLevel).toBe(
        'warn'
      );
    });

    it('should mark an explicit config path', () => {
      const globals = resolveGlobalOptions(['--config-path', '/tmp/cwtail.yml', '--profile', 'dev'], {}, '/home/test');

      expect(globals.configPath).toBe('/tmp/cwtail.yml');
      expect(globals.configPathExplicit).toBe(true);
      expect(globals.profile).toBe('dev');
    });

    it('should reject an unknown log level', () => {
      expect(() => resolveGlobalOptions(['--log-level', 'loud'], {}, '/home/test')).toThrow(ParseError);
    });
  });

  describe('expandAliases', () => {
    const aliases = {
      web: ['log', '/app/web'],
      errors: ['web', '--filter', 'ERROR'],
      loop: ['loop'],
    };

    it('should replace the alias and keep the extra words', () => {
      expect(expandAliases(['web', '--tail'], aliases)).toEqual(['log', '/app/web', '--tail']);
    });

    it('should keep program options in front of the alias', () => {
      expect(expandAliases(['--region', 'eu-west-1', 'web'], aliases)).toEqual([
        '--region',
        'eu-west-1',
        'log',
        '/app/web',
      ]);
    });

    it('should expand aliases of aliases', () => {
      expect(expandAliases(['errors', '--utc'], aliases)).toEqual(['log', '/app/web', '--filter', 'ERROR', '--utc']);
    });

    it('should leave commands and unknown words alone', () => {
      expect(expandAliases(['log', 'web'], aliases)).toEqual(['log', 'web']);
      expect(expandAliases(['nope'], aliases)).toEqual(['nope']);
      expect(expandAliases(['log'], { log: ['groups'] })).toEqual(['log']);
    });

    it('should stop a cycle', () => {
      expect(() => expandAliases(['loop'], aliases)).toThrow(
        `Alias 'loop' expands through more than ${MAX_ALIAS_DEPTH} aliases`
      );
    });
  });

  describe('flag parsers', () => {
    it('should parse whole numbers only', () => {
      expect(parseInteger('500')).toBe(500);
      expect(() => parseInteger('5e2')).toThrow(ParseError);
      expect(() => parseInteger('-1')).toThrow(ParseError);
    });

    it('should accept the three output formats', () => {
      expect(parseOutputFormat('json')).toBe('json');
      expect(() => parseOutputFormat('xml')).toThrow("Invalid format 'xml': expected raw, pretty or json");
    });
  });

  describe('createProgram', () => {
    let tempDir: string;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cwtail-cli-'));
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
      logSpy.mockRestore();
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    function context(api: LogsApi, sink: OutputSink): CliContext {
      return {
        globals: {
          configPath: path.join(tempDir, 'config.yml'),
          configPathExplicit: false,
          logLevel: 'info',
        },
        config: { aliases: {} },
        signal: new AbortController().signal,
        connect: () => ({
          api,
          createTransport: async () => {
            throw new Error('live tail not expected');
          },
        }),
        createSink: () => sink,
      };
    }

    it('should run the log command with parsed flags', async () => {
      const api = fakeApi();
      const lines: string[] = [];
      const sink: OutputSink = {
        write: async text => {
          lines.push(text);
        },
        detached: false,
        close: async () => undefined,
      };

      await createProgram(context(api, sink)).parseAsync(
        ['log', '/app/web', 'web-1', '--utc', '--datetime-format', '%H:%M', '--format', 'raw', '--chunk-size', '500'],
        { from: 'user' }
      );

      expect(lines).toEqual(['09:30|hello\n']);
      expect(api.getLogEvents).toHaveBeenCalledWith(
        expect.objectContaining({ logGroupName: '/app/web', logStreamName: 'web-1', limit: 500 }),
        { abortSignal: expect.any(AbortSignal) }
      );
    });

    it('should accept logs as an alias of log', async () => {
      const api = fakeApi();
      const sink: OutputSink = { write: async () => undefined, detached: false, close: async () => undefined };

      await createProgram(context(api, sink)).parseAsync(['logs', '/app/web', 'web-1'], { from: 'user' });

      expect(api.getLogEvents).toHaveBeenCalledTimes(1);
    });

    it('should list groups and streams', async () => {
      const api = fakeApi();
      const sink: OutputSink = { write: async () => undefined, detached: false, close: async () => undefined };

      await createProgram(context(api, sink)).parseAsync(['groups', '-v'], { from: 'user' });
      await createProgram(context(api, sink)).parseAsync(['streams', '/app/web', '-p', 'web'], { from: 'user' });

      expect(logSpy.mock.calls.map(call => call[0])).toEqual([
        '/app/web size 1.00 kB',
        'Total: 1 groups, size: 1.00 kB',
        'web-1',
      ]);
      expect(api.describeLogStreams).toHaveBeenCalledWith(
        expect.objectContaining({ logGroupName: '/app/web', logStreamNamePrefix: 'web' }),
        expect.anything()
      );
    });

    it('should save an alias given after --', async () => {
      const ctx = context(fakeApi(), { write: async () => undefined, detached: false, close: async () => undefined });

      await createProgram(ctx).parseAsync(['alias', 'errors', '--', 'log', '/app/web', '--filter', 'ERROR'], {
        from: 'user',
      });

      expect(loadConfig(ctx.globals.configPath, true).aliases).toEqual({
        errors: ['log', '/app/web', '--filter', 'ERROR'],
      });
    });

    it('should raise a commander error for an unknown option', async () => {
      const ctx = context(fakeApi(), { write: async () => undefined, detached: false, close: async () => undefined });
      const stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);

      await expect(createProgram(ctx).parseAsync(['groups', '--bogus'], { from: 'user' })).rejects.toThrow(
        CommanderError
      );
      stderrSpy.mockRestore();
    });

    it('should raise ParseError for a bad chunk size before any request', async () => {
      const api = fakeApi();
      const ctx = context(api, { write: async () => undefined, detached: false, close: async () => undefined });

      await expect(
        createProgram(ctx).parseAsync(['log', '/app/web', '--chunk-size', '0'], { from: 'user' })
      ).rejects.toThrow(ParseError);
      expect(api.filterLogEvents).not.toHaveBeenCalled();
    });
  });

  describe('main', () => {
    let tempDir: string;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'cwtail-main-'));
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
      logSpy.mockRestore();
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should expand an alias from the config file', async () => {
      const configPath = path.join(tempDir, 'config.yml');
      fs.writeFileSync(configPath, 'aliases:\n  show:\n    - aliases\n');

      const exitCode = await main(['node', 'cwtail', '--config-path', configPath, 'show'], {});

      expect(exitCode).toBe(0);
      expect(logSpy).toHaveBeenCalledWith('show\t"aliases"');
    });

    it('should exit 2 with the error for a bad log level', async () => {
      const exitCode = await main(['node', 'cwtail', '--log-level', 'loud', 'groups'], {});

      expect(exitCode).toBe(2);
      expect(logger.error).toHaveBeenCalledWith(
        "Invalid log level 'loud': expected trace, debug, info, warn or error (logLevel=loud)"
      );
    });

    it('should exit 1 for a local failure outside the taxonomy', async () => {
      const exitCode = await main(['node', 'cwtail', '--config-path', tempDir, 'aliases'], {});

      expect(exitCode).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(expect.stringContaining('EISDIR'));
    });

    it('should exit 2 for a missing explicit config file', async () => {
      const configPath = path.join(tempDir, 'missing.yml');

      const exitCode = await main(['node', 'cwtail', '--config-path', configPath, 'aliases'], {});

      expect(exitCode).toBe(2);
      expect(logger.error).toHaveBeenCalledWith(`Config file not found: ${configPath} (config=${configPath})`);
    });
  });
});
