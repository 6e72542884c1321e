/**
 * Command handlers for `cwtail alias` and `cwtail aliases`
 */

import { ParseError } from '../errors';
import { logger } from '../logger';
import { formatAliases, saveConfig, setAlias } from '../config';
import { CwtailConfig } from '../types';

/** Subcommand names an alias may not shadow */
export const RESERVED_NAMES = new Set(['log', 'logs', 'groups', 'streams', 'alias', 'aliases', 'help']);

const ALIAS_NAME = /^[A-Za-z0-9][\w.-]*$/;

export function validateAliasName(name: string): string {
  if (!ALIAS_NAME.test(name)) {
    throw new ParseError(`Invalid alias name '${name}': use letters, digits, '.', '_' and '-'`, {
      context: { alias: name },
    });
  }
  if (RESERVED_NAMES.has(name)) {
    throw new ParseError(`Alias name '${name}' is a cwtail command`, { context: { alias: name } });
  }
  return name;
}

/**
 * Saves `params[1..]` as the argument list of alias `params[0]`
 *
 * @returns The updated config
 */
export function aliasCommand(params: string[], config: CwtailConfig, configPath: string): CwtailConfig {
  const [name, ...args] = params;
  if (name === undefined) {
    throw new ParseError('Usage: cwtail alias <name> -- <args...>');
  }
  validateAliasName(name);
  if (args.length === 0) {
    throw new ParseError(`Alias '${name}' needs at least one argument`, { context: { alias: name } });
  }

  const updated = setAlias(config, name, args);
  saveConfig(configPath, updated);
  logger.success(`Saved alias '${name}' to ${configPath}`);
  return updated;
}

export function aliasesCommand(config: CwtailConfig): void {
  for (const line of formatAliases(config)) {
    console.log(line);
  }
}
