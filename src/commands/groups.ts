/**
 * Command handler for `cwtail groups`
 */

import { LogGroup } from '@aws-sdk/client-cloudwatch-logs';
import { describeLogGroupsFetch } from '../logs/cloudwatch-api';
import { paginate } from '../logs/batch-retrieval';
import { ListingDependencies, compareNames, formatStream, listStreams } from './streams';

export interface GroupsCommandOptions {
  /** Case-sensitive substring of the group name */
  pattern?: string;
  /** Show stored sizes */
  verbose?: boolean;
  /** List each group's streams under it */
  streams?: boolean;
}

const DECIMAL_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB'];

/** Byte count in powers of 1000: `999 B`, `1.50 kB` */
export function formatDecimalSize(bytes: number): string {
  if (bytes < 1000) {
    return `${bytes} B`;
  }
  let value = bytes;
  let unit = 0;
  while (value >= 1000 && unit < DECIMAL_UNITS.length - 1) {
    value /= 1000;
    unit++;
  }
  return `${value.toFixed(2)} ${DECIMAL_UNITS[unit]}`;
}

/**
 * Prints log groups sorted by name, followed by a total line
 */
export async function groupsCommand(options: GroupsCommandOptions, deps: ListingDependencies): Promise<void> {
  const groups: LogGroup[] = [];
  const pages = paginate(describeLogGroupsFetch(deps.api, { pattern: options.pattern }), {
    limit: 50,
    signal: deps.signal,
    context: { pattern: options.pattern },
    operationName: 'describeLogGroups',
  });
  for await (const group of pages) {
    groups.push(group);
  }
  groups.sort((a, b) => compareNames(a.logGroupName, b.logGroupName));

  let totalBytes = 0;
  for (const group of groups) {
    const name = group.logGroupName;
    totalBytes += group.storedBytes ?? 0;
    if (!name) {
      continue;
    }
    console.log(options.verbose ? `${name} size ${formatDecimalSize(group.storedBytes ?? 0)}` : name);

    if (options.streams) {
      const streams = await listStreams(deps.api, name, undefined, deps.signal);
      for (const stream of streams) {
        console.log(formatStream(stream, options.verbose ?? false, '\t'));
      }
    }
  }

  console.log(`Total: ${groups.length} groups, size: ${formatDecimalSize(totalBytes)}`);
}
