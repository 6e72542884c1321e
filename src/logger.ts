import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const debugTrace = debug('cwtail:trace');
const debugDebug = debug('cwtail:debug');
const debugInfo = debug('cwtail:info');
const debugWarn = debug('cwtail:warn');
const debugError = debug('cwtail:error');
const debugSuccess = debug('cwtail:success');

// stdout carries log lines, so diagnostics go to stderr
debug.log = (...args: unknown[]) => console.error(...args);

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
    this.updateDebugNamespaces();
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.updateDebugNamespaces();
  }

  private updateDebugNamespaces(): void {
    const namespaces: string[] = [];

    if (LOG_LEVELS[this.level] <= LOG_LEVELS.trace) {
      namespaces.push('cwtail:trace');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.debug) {
      namespaces.push('cwtail:debug');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.info) {
      namespaces.push('cwtail:info', 'cwtail:success');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.warn) {
      namespaces.push('cwtail:warn');
    }
    namespaces.push('cwtail:error');

    debug.enable(namespaces.join(','));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      debugTrace(chalk.dim(`[TRACE] ${message}`), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      debugDebug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugInfo(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      debugWarn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      debugError(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugSuccess(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
