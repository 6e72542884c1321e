/**
 * Log formatter for different output formats (raw, pretty, json)
 */

import chalk from 'chalk';
import { FormattedLine, OutputFormat } from '../types';

/**
 * Options for log formatting
 */
export interface LogFormatterOptions {
  /** Output format */
  format: OutputFormat;
  /** Whether to colorize output (for pretty format). Defaults to true if stdout is TTY */
  colorize?: boolean;
  /** Whether pretty output tags each line with its stream. Defaults to true */
  showStream?: boolean;
}

const STREAM_COLORS = [chalk.cyan, chalk.magenta, chalk.yellow, chalk.blue, chalk.green];

/**
 * Picks a stable color for a stream so lines from one stream read as a column
 */
export function streamColorIndex(streamId: string): number {
  let sum = 0;
  for (let i = 0; i < streamId.length; i++) {
    sum += streamId.charCodeAt(i);
  }
  return sum % STREAM_COLORS.length;
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : text + '\n';
}

/**
 * Renders formatted lines for the terminal
 */
export class LogFormatter {
  private format: OutputFormat;
  private colorize: boolean;
  private showStream: boolean;

  constructor(options: LogFormatterOptions) {
    this.format = options.format;
    this.colorize = options.colorize ?? process.stdout.isTTY ?? false;
    this.showStream = options.showStream ?? true;
  }

  /**
   * Formats one line
   *
   * @returns Formatted string with newline
   */
  formatLine(line: FormattedLine): string {
    switch (this.format) {
      case 'raw':
        return withNewline(`${line.datetime}|${line.message}`);
      case 'pretty':
        return this.formatPretty(line);
      case 'json':
        return JSON.stringify(line) + '\n';
    }
  }

  private formatPretty(line: FormattedLine): string {
    const message = line.message.replace(/\n$/, '');
    const tag = this.showStream ? `[${line.streamId}]` : '';

    if (!this.colorize) {
      return [line.datetime, tag, message].filter(part => part !== '').join(' ') + '\n';
    }

    const colorStream = STREAM_COLORS[streamColorIndex(line.streamId)];
    const parts = [chalk.dim(line.datetime), tag ? colorStream(tag) : '', message];
    return parts.filter(part => part !== '').join(' ') + '\n';
  }
}
