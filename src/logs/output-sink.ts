/**
 * Destinations for rendered log lines
 */

import { Writable } from 'stream';
import execa from 'execa';
import { logger } from '../logger';

export interface OutputSink {
  /** Resolves once the destination can take more */
  write(text: string): Promise<void>;
  /** True once the reader has gone away; later writes are dropped */
  readonly detached: boolean;
  /** Finishes output; for the pager this is when it runs */
  close(): Promise<void>;
}

function isBrokenPipe(error: Error): boolean {
  return 'code' in error && error.code === 'EPIPE';
}

/**
 * Writes to stdout, waiting for 'drain' whenever the stream's buffer is
 * full. A reader that exits early (`cwtail log g | head`) detaches the sink
 * instead of failing the command.
 */
export class StdoutSink implements OutputSink {
  private broken = false;
  private failure: Error | undefined;

  constructor(private readonly stream: Writable = process.stdout) {
    stream.on('error', error => this.onError(error));
  }

  get detached(): boolean {
    return this.broken;
  }

  async write(text: string): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.broken || this.stream.write(text)) {
      return;
    }
    await new Promise<void>(resolve => {
      const done = () => {
        this.stream.off('drain', done);
        this.stream.off('close', done);
        this.stream.off('error', done);
        resolve();
      };
      this.stream.on('drain', done);
      this.stream.on('close', done);
      this.stream.on('error', done);
    });
    if (this.failure) {
      throw this.failure;
    }
  }

  async close(): Promise<void> {
    // stdout stays open for the rest of the process
  }

  private onError(error: Error): void {
    if (isBrokenPipe(error)) {
      if (!this.broken) {
        logger.debug('Output reader closed the pipe, stopping');
      }
      this.broken = true;
      return;
    }
    this.failure = error;
  }
}

export const DEFAULT_PAGER = 'less -R';

/**
 * Splits a `$PAGER` value into a command and its arguments
 */
export function pagerCommand(pager: string | undefined = process.env.PAGER): [string, string[]] {
  const words = (pager?.trim() || DEFAULT_PAGER).split(/\s+/);
  const [command, ...args] = words;
  return [command, args];
}

/**
 * Collects every line, then shows them all in the user's pager
 */
export class PagerSink implements OutputSink {
  private readonly chunks: string[] = [];
  readonly detached = false;

  constructor(private readonly pager: string | undefined = process.env.PAGER) {}

  async write(text: string): Promise<void> {
    this.chunks.push(text);
  }

  async close(): Promise<void> {
    if (this.chunks.length === 0) {
      logger.info('No log events to show');
      return;
    }
    const [command, args] = pagerCommand(this.pager);
    logger.debug(`Opening ${this.chunks.length} line(s) in ${command}`);
    await execa(command, args, {
      input: this.chunks.join(''),
      stdout: 'inherit',
      stderr: 'inherit',
    });
  }
}
