#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { GlobalOptions, CwtailConfig, OutputFormat } from './types';
import { isLogLevel, logger } from './logger';
import { ParseError, describeError, toCwtailError } from './errors';
import { defaultConfigPath, loadConfig } from './config';
import { redactSecrets } from './redact-secrets';
import { createLogsClient, credentialSource, resolveRegion } from './aws-client';
import { LogsApi, createLogsApi } from './logs/cloudwatch-api';
import { OutputSink, PagerSink, StdoutSink } from './logs/output-sink';
import { LiveTailTransport } from './logs/live-tail/live-tail-engine';
import { HttpLiveTailTransport } from './logs/live-tail/http-transport';
import { DEFAULT_CHUNK_SIZE } from './logs/batch-retrieval';
import { DEFAULT_DATETIME_FORMAT } from './logs/transform';
import { DEFAULT_START } from './time-range';
import { logCommand } from './commands/log';
import { groupsCommand } from './commands/groups';
import { streamsCommand } from './commands/streams';
import { RESERVED_NAMES, aliasCommand, aliasesCommand } from './commands/alias';

/** Program-level flags that consume the following word */
const GLOBAL_VALUE_FLAGS = ['--profile', '--region', '--config-path', '--log-level'];

/** Deepest chain of aliases expanding into other aliases */
export const MAX_ALIAS_DEPTH = 10;

/** Exit code for usage errors reported by commander, same as ParseError */
const USAGE_EXIT_CODE = 2;

/**
 * Index of the first word that is not a program-level option, or -1 when
 * there is none before `--`
 */
export function commandIndex(args: readonly string[]): number {
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      return -1;
    }
    if (GLOBAL_VALUE_FLAGS.includes(arg)) {
      i++;
      continue;
    }
    if (!arg.startsWith('-')) {
      return i;
    }
  }
  return -1;
}

/**
 * Reads a program-level flag given as `--flag value` or `--flag=value`
 * before the subcommand
 */
export function globalOptionValue(args: readonly string[], flag: string): string | undefined {
  const index = commandIndex(args);
  const end = index === -1 ? args.length : index;
  for (let i = 0; i < end; i++) {
    if (args[i] === flag) {
      return args[i + 1];
    }
    if (args[i].startsWith(`${flag}=`)) {
      return args[i].substring(flag.length + 1);
    }
  }
  return undefined;
}

/**
 * Resolves the program-level options ahead of commander, since the config
 * file and log level are needed before aliases can be expanded.
 *
 * @throws ParseError for an unknown log level
 */
export function resolveGlobalOptions(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
  home?: string
): GlobalOptions {
  const logLevel = globalOptionValue(args, '--log-level') ?? env.CWTAIL_LOG_LEVEL ?? 'info';
  if (!isLogLevel(logLevel)) {
    throw new ParseError(`Invalid log level '${logLevel}': expected trace, debug, info, warn or error`, {
      context: { logLevel },
    });
  }
  const configPath = globalOptionValue(args, '--config-path');
  return {
    profile: globalOptionValue(args, '--profile'),
    region: globalOptionValue(args, '--region'),
    configPath: configPath ?? defaultConfigPath(home),
    configPathExplicit: configPath !== undefined,
    logLevel,
  };
}

/**
 * Replaces a leading alias name with its saved arguments, repeatedly, so an
 * alias may start with another alias. Words after the alias are kept.
 *
 * @throws ParseError when the chain is deeper than {@link MAX_ALIAS_DEPTH}
 */
export function expandAliases(args: readonly string[], aliases: Record<string, string[]>): string[] {
  let expanded = [...args];
  const chain: string[] = [];

  for (;;) {
    const index = commandIndex(expanded);
    if (index === -1) {
      return expanded;
    }
    const word = expanded[index];
    if (RESERVED_NAMES.has(word) || !Object.prototype.hasOwnProperty.call(aliases, word)) {
      return expanded;
    }
    chain.push(word);
    if (chain.length > MAX_ALIAS_DEPTH) {
      throw new ParseError(`Alias '${chain[0]}' expands through more than ${MAX_ALIAS_DEPTH} aliases`, {
        context: { alias: chain[0] },
      });
    }
    expanded = [...expanded.slice(0, index), ...aliases[word], ...expanded.slice(index + 1)];
    logger.debug(`Expanded alias '${word}' to: ${expanded.join(' ')}`);
  }
}

/**
 * Parses a positive integer flag value
 *
 * @throws ParseError for anything else
 */
export function parseInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new ParseError(`Expected a whole number, got '${value}'`, { context: { value } });
  }
  return parseInt(value, 10);
}

export function parseOutputFormat(value: string): OutputFormat {
  if (value === 'raw' || value === 'pretty' || value === 'json') {
    return value;
  }
  throw new ParseError(`Invalid format '${value}': expected raw, pretty or json`, { context: { format: value } });
}

export interface AwsServices {
  api: LogsApi;
  createTransport: () => Promise<LiveTailTransport>;
}

/**
 * Builds the AWS-backed services. Flags win over the config file; anything
 * left unset falls through to the SDK's own provider chain.
 */
export function connectAws(globals: GlobalOptions, config: CwtailConfig): AwsServices {
  const client = createLogsClient({
    region: globals.region ?? config.region,
    profile: globals.profile ?? config.profile,
  });
  return {
    api: createLogsApi(client),
    createTransport: async () =>
      new HttpLiveTailTransport({ region: await resolveRegion(client), credentials: credentialSource(client) }),
  };
}

export function createSink(ui: boolean): OutputSink {
  return ui ? new PagerSink() : new StdoutSink();
}

/**
 * Everything the command tree needs from outside
 */
export interface CliContext {
  globals: GlobalOptions;
  config: CwtailConfig;
  signal: AbortSignal;
  /** Called once per command that talks to AWS */
  connect: (globals: GlobalOptions, config: CwtailConfig) => AwsServices;
  createSink: (ui: boolean) => OutputSink;
}

interface LogFlags {
  start?: string;
  end?: string;
  length?: string;
  filter?: string;
  messageRegexp?: string;
  datetimeFormat?: string;
  utc?: boolean;
  format?: OutputFormat;
  ui?: boolean;
  tail?: boolean;
  chunkSize?: number;
}

interface GroupsFlags {
  pattern?: string;
  verbose?: boolean;
  streams?: boolean;
}

interface StreamsFlags {
  prefix?: string;
  verbose?: boolean;
  start?: string;
}

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('cwtail')
    .description('Tail, filter and format AWS CloudWatch Logs')
    .version('0.1.0')
    .option('--profile <name>', 'AWS profile to use')
    .option('--region <region>', 'AWS region to use')
    .option('--config-path <path>', 'Path to the configuration file', defaultConfigPath())
    .option('--log-level <level>', 'Log level: trace, debug, info, warn, error (env: CWTAIL_LOG_LEVEL)')
    .enablePositionalOptions()
    .showHelpAfterError()
    .exitOverride();

  program
    .command('log')
    .alias('logs')
    .description('Print the events of a log group or some of its streams')
    .argument('<group>', 'Log group name')
    .argument('[streams...]', 'Log streams; all streams of the group when omitted')
    .option('--start <time>', `Start of the window: duration ago, time of day, date or epoch (default: ${DEFAULT_START})`)
    .option('--end <time>', 'End of the window (default: now)')
    .option('--length <duration>', 'Window length counted from the start')
    .option('--filter <pattern>', 'Server-side filter pattern')
    .option('--message-regexp <rule>', 'Client-side substitution, e.g. /(\\d{4})[^|]+/$1')
    .option('--datetime-format <format>', `strftime-style timestamp format (default: ${DEFAULT_DATETIME_FORMAT})`)
    .option('--utc', 'Print timestamps in UTC')
    .option('--format <format>', 'Output format: raw, pretty or json', parseOutputFormat)
    .option('--ui', 'Show the events in $PAGER')
    .option('--tail', 'Follow new events with live tail')
    .option('--chunk-size <n>', `Events per request, at most 10000 (default: ${DEFAULT_CHUNK_SIZE})`, parseInteger)
    .action(async (group: string, streams: string[], flags: LogFlags) => {
      const { api, createTransport } = context.connect(context.globals, context.config);
      await logCommand({ group, streams, ...flags }, context.config, {
        api,
        createTransport,
        createSink: context.createSink,
        signal: context.signal,
      });
    });

  program
    .command('groups')
    .description('List log groups')
    .option('-p, --pattern <pattern>', 'Only groups whose name contains this')
    .option('-v, --verbose', 'Show stored sizes')
    .option('-s, --streams', "List each group's streams")
    .action(async (flags: GroupsFlags) => {
      const { api } = context.connect(context.globals, context.config);
      await groupsCommand(flags, { api, signal: context.signal });
    });

  program
    .command('streams')
    .description('List the streams of a log group')
    .argument('<group>', 'Log group name')
    .option('-p, --prefix <prefix>', 'Only streams whose name starts with this')
    .option('-v, --verbose', 'Show first and last event times')
    .option('-s, --start <time>', 'Hide streams without events since this time')
    .action(async (group: string, flags: StreamsFlags) => {
      const { api } = context.connect(context.globals, context.config);
      await streamsCommand({ group, ...flags }, { api, signal: context.signal });
    });

  program
    .command('alias')
    .description('Save an argument list under a name: cwtail alias <name> -- <args...>')
    .argument('[params...]', 'Alias name followed by its arguments')
    .action((params: string[]) => {
      aliasCommand(params, context.config, context.globals.configPath);
    });

  program
    .command('aliases')
    .description('List saved aliases')
    .action(() => {
      aliasesCommand(context.config);
    });

  return program;
}

/**
 * Runs the CLI and resolves to the process exit code
 */
export async function main(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`Received ${signal}, stopping`);
    controller.abort();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const args = argv.slice(2);
    const initial = resolveGlobalOptions(args, env);
    logger.setLevel(initial.logLevel);

    const config = loadConfig(initial.configPath, initial.configPathExplicit);
    const expanded = expandAliases(args, config.aliases);
    const globals: GlobalOptions = {
      ...resolveGlobalOptions(expanded, env),
      configPath: initial.configPath,
      configPathExplicit: initial.configPathExplicit,
    };
    logger.setLevel(globals.logLevel);

    const program = createProgram({ globals, config, signal: controller.signal, connect: connectAws, createSink });
    await program.parseAsync(expanded, { from: 'user' });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? 0 : USAGE_EXIT_CODE;
    }
    if (controller.signal.aborted) {
      logger.debug(`Stopped after cancellation: ${error instanceof Error ? error.message : String(error)}`);
      return 0;
    }
    const failure = toCwtailError(error);
    logger.error(redactSecrets(describeError(failure)));
    return failure.exitCode;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

// Only run when executed directly (not imported as a module)
if (require.main === module) {
  void main().then(exitCode => process.exit(exitCode));
}
