import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { dump, load } from 'js-yaml';
import { ParseError } from './errors';
import { logger } from './logger';
import { validateChunkSize } from './logs/batch-retrieval';
import { CwtailConfig } from './types';

const KNOWN_KEYS = new Set(['datetimeFormat', 'utc', 'chunkSize', 'region', 'profile', 'aliases']);

export function defaultConfigPath(home: string = os.homedir()): string {
  return path.join(home, '.config', 'cwtail', 'config.yml');
}

export function emptyConfig(): CwtailConfig {
  return { aliases: {} };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown, key: string, source: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ParseError(`Invalid "${key}" in ${source}: expected a non-empty string`, { context: { config: source } });
  }
  return value;
}

function validateAliases(value: unknown, source: string): Record<string, string[]> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ParseError(`Invalid "aliases" in ${source}: expected a mapping`, { context: { config: source } });
  }
  const aliases: Record<string, string[]> = {};
  for (const [name, args] of Object.entries(value)) {
    if (!Array.isArray(args) || !args.every((arg): arg is string => typeof arg === 'string')) {
      throw new ParseError(`Alias "${name}" in ${source} must be a list of strings`, { context: { config: source } });
    }
    aliases[name] = args;
  }
  return aliases;
}

export function validateConfig(value: unknown, source: string): CwtailConfig {
  if (value === undefined || value === null) {
    return emptyConfig();
  }
  if (!isRecord(value)) {
    throw new ParseError(`Invalid config in ${source}: expected a mapping`, { context: { config: source } });
  }

  for (const key of Object.keys(value)) {
    if (!KNOWN_KEYS.has(key)) {
      logger.warn(`Ignoring unknown config key "${key}" in ${source}`);
    }
  }

  const { utc, chunkSize } = value;
  if (utc !== undefined && typeof utc !== 'boolean') {
    throw new ParseError(`Invalid "utc" in ${source}: expected true or false`, { context: { config: source } });
  }
  if (chunkSize !== undefined && typeof chunkSize !== 'number') {
    throw new ParseError(`Invalid "chunkSize" in ${source}: expected a number`, { context: { config: source } });
  }

  return {
    datetimeFormat: optionalString(value.datetimeFormat, 'datetimeFormat', source),
    utc,
    chunkSize: chunkSize === undefined ? undefined : validateChunkSize(chunkSize),
    region: optionalString(value.region, 'region', source),
    profile: optionalString(value.profile, 'profile', source),
    aliases: validateAliases(value.aliases, source),
  };
}

/**
 * Loads the config file. A missing file is an empty config unless the path
 * was given explicitly.
 */
export function loadConfig(filePath: string, explicit = false): CwtailConfig {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new ParseError(`Config file not found: ${filePath}`, { context: { config: filePath } });
    }
    logger.debug(`No config file at ${filePath}`);
    return emptyConfig();
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = load(content);
  } catch (error) {
    throw new ParseError(`Config file ${filePath} is not valid YAML`, { cause: error, context: { config: filePath } });
  }
  return validateConfig(parsed, filePath);
}

export function saveConfig(filePath: string, config: CwtailConfig): void {
  const document: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(config)) {
    if (value !== undefined) {
      document[key] = value;
    }
  }
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, dump(document), 'utf-8');
  logger.debug(`Wrote config to ${filePath}`);
}

export function setAlias(config: CwtailConfig, name: string, args: string[]): CwtailConfig {
  return { ...config, aliases: { ...config.aliases, [name]: [...args] } };
}

/**
 * One line per alias, sorted by name: `name<TAB>"arg" "arg"`
 */
export function formatAliases(config: CwtailConfig): string[] {
  return Object.keys(config.aliases)
    .sort()
    .map(name => `${name}\t${config.aliases[name].map(arg => JSON.stringify(arg)).join(' ')}`);
}
