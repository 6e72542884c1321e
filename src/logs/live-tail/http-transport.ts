/**
 * StartLiveTail over HTTPS, signed by hand and decoded frame by frame
 */

import { Dispatcher, request } from 'undici';
import { AuthError, CwtailError, ProtocolError, errorForStatus } from '../../errors';
import { logger } from '../../logger';
import { SigningCredentials } from '../../types';
import { EventStreamDecoder } from './event-stream';
import { LiveTailFrame, parseLiveTailFrame } from './frames';
import { LiveTailRequest, LiveTailTransport } from './live-tail-engine';
import { sha256Hex, signRequest } from './signing';

export const LIVE_TAIL_TARGET = 'Logs_20140328.StartLiveTail';
export const LIVE_TAIL_CONTENT_TYPE = 'application/x-amz-json-1.1';

export interface HttpLiveTailTransportOptions {
  region: string;
  /** Resolved before every connection so rotated credentials are picked up */
  credentials: () => Promise<SigningCredentials>;
  /** Overrides the regional streaming endpoint */
  endpoint?: string;
  dispatcher?: Dispatcher;
  clock?: () => Date;
}

export function liveTailEndpoint(region: string): string {
  const suffix = region.startsWith('cn-') ? 'amazonaws.com.cn' : 'amazonaws.com';
  return `https://streaming-logs.${region}.${suffix}/`;
}

export function liveTailBody(tail: LiveTailRequest): string {
  return JSON.stringify({
    logGroupIdentifiers: [tail.groupArn],
    ...(tail.streams.length > 0 ? { logStreamNames: tail.streams } : {}),
    ...(tail.filterPattern ? { logEventFilterPattern: tail.filterPattern } : {}),
  });
}

/**
 * Reads the service's JSON error document. The error name comes from
 * `__type` (namespace prefix dropped) or the `x-amzn-errortype` header.
 */
export function errorFromResponse(status: number, text: string, errorType?: string): CwtailError {
  let name = errorType?.split(':')[0];
  let message = text.trim() || `Live tail request failed with HTTP ${status}`;
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null) {
      const type: unknown = Reflect.get(parsed, '__type');
      const detail: unknown = Reflect.get(parsed, 'message') ?? Reflect.get(parsed, 'Message');
      if (typeof type === 'string') {
        name = type.split('#').pop();
      }
      if (typeof detail === 'string') {
        message = detail;
      }
    }
  } catch {
    logger.trace('Live tail error body is not JSON');
  }
  return errorForStatus(status, name, message, { context: { status, exception: name } });
}

export class HttpLiveTailTransport implements LiveTailTransport {
  readonly supportsResume = false;
  private readonly endpoint: URL;

  constructor(private readonly options: HttpLiveTailTransportOptions) {
    this.endpoint = new URL(options.endpoint ?? liveTailEndpoint(options.region));
  }

  async open(tail: LiveTailRequest, signal: AbortSignal): Promise<AsyncIterable<LiveTailFrame>> {
    let credentials: SigningCredentials;
    try {
      credentials = await this.options.credentials();
    } catch (error) {
      throw new AuthError('Unable to load AWS credentials', { cause: error });
    }

    const body = liveTailBody(tail);
    const signed = signRequest({
      credentials,
      method: 'POST',
      path: this.endpoint.pathname,
      headers: {
        host: this.endpoint.host,
        'content-type': LIVE_TAIL_CONTENT_TYPE,
        'x-amz-target': LIVE_TAIL_TARGET,
      },
      payloadHash: sha256Hex(body),
      timestamp: (this.options.clock ?? (() => new Date()))(),
      scope: { region: this.options.region, service: 'logs' },
    });

    logger.debug(`Starting live tail at ${this.endpoint.host} for ${tail.groupArn}`);
    const response = await request(this.endpoint, {
      method: 'POST',
      headers: signed.headers,
      body,
      signal,
      dispatcher: this.options.dispatcher,
    });

    if (response.statusCode !== 200) {
      const text = await response.body.text();
      const errorType = response.headers['x-amzn-errortype'];
      throw errorFromResponse(response.statusCode, text, typeof errorType === 'string' ? errorType : undefined);
    }

    return this.frames(response.body);
  }

  private async *frames(body: AsyncIterable<Uint8Array>): AsyncGenerator<LiveTailFrame, void, undefined> {
    const decoder = new EventStreamDecoder();
    for await (const chunk of body) {
      for (const message of decoder.push(chunk)) {
        const frame = parseLiveTailFrame(message);
        if (frame) {
          yield frame;
        } else {
          logger.trace('Ignoring unknown live tail event type');
        }
      }
    }
    if (decoder.pending > 0) {
      throw new ProtocolError('Live tail stream ended inside a frame', { context: { pendingBytes: decoder.pending } });
    }
  }
}
