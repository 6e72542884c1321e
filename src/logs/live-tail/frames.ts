/**
 * StartLiveTail frame interpretation
 */

import { AuthError, CwtailError, ProtocolError, RemoteRejection, errorForStatus } from '../../errors';
import { LogEvent, createLogEvent } from '../../types';
import { EventStreamMessage, HeaderValue } from './event-stream';

export interface SessionStartFrame {
  kind: 'sessionStart';
  requestId?: string;
  sessionId?: string;
}

export interface SessionUpdateFrame {
  kind: 'sessionUpdate';
  /** The service dropped events to stay within its rate limit */
  sampled: boolean;
  events: LogEvent[];
}

export interface ExceptionFrame {
  kind: 'exception';
  name: string;
  message: string;
  /** Whether a new session may succeed */
  reconnect: boolean;
}

export type LiveTailFrame = SessionStartFrame | SessionUpdateFrame | ExceptionFrame;

/** Exceptions that end a session without making a new one pointless */
const RECONNECTABLE_EXCEPTIONS = new Set(['SessionTimeoutException', 'SessionStreamingException']);

function stringHeader(headers: Record<string, HeaderValue>, name: string): string | undefined {
  const header = headers[name];
  return header?.type === 'string' ? header.value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function parsePayload(message: EventStreamMessage, eventType: string): Record<string, unknown> {
  const text = Buffer.from(message.payload).toString('utf8');
  if (text.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ProtocolError(`Malformed ${eventType} payload`, { cause: error, context: { eventType } });
  }
  if (!isRecord(parsed)) {
    throw new ProtocolError(`Unexpected ${eventType} payload`, { context: { eventType } });
  }
  return parsed;
}

function parseResult(value: unknown, index: number): LogEvent {
  if (!isRecord(value) || typeof value.timestamp !== 'number' || typeof value.message !== 'string') {
    throw new ProtocolError('Malformed live tail result', { context: { index } });
  }
  return createLogEvent({
    timestamp: value.timestamp,
    ingestionTime: typeof value.ingestionTime === 'number' ? value.ingestionTime : value.timestamp,
    message: value.message,
    streamId: optionalString(value.logStreamName) ?? '',
    group: optionalString(value.logGroupIdentifier),
  });
}

/**
 * Maps a decoded frame to a live tail frame. Returns null for event types
 * this client does not know.
 *
 * @throws ProtocolError for malformed payloads or unknown message types
 */
export function parseLiveTailFrame(message: EventStreamMessage): LiveTailFrame | null {
  const messageType = stringHeader(message.headers, ':message-type');

  if (messageType === 'exception') {
    const name = stringHeader(message.headers, ':exception-type') ?? 'UnknownException';
    const body = parsePayload(message, name);
    return {
      kind: 'exception',
      name,
      message: optionalString(body.message) ?? optionalString(body.Message) ?? name,
      reconnect: RECONNECTABLE_EXCEPTIONS.has(name),
    };
  }

  if (messageType === 'error') {
    const name = stringHeader(message.headers, ':error-code') ?? 'UnknownError';
    return {
      kind: 'exception',
      name,
      message: stringHeader(message.headers, ':error-message') ?? name,
      reconnect: RECONNECTABLE_EXCEPTIONS.has(name),
    };
  }

  if (messageType !== 'event') {
    throw new ProtocolError(`Unknown event stream message type '${messageType ?? ''}'`);
  }

  const eventType = stringHeader(message.headers, ':event-type');
  switch (eventType) {
    case 'sessionStart': {
      const body = parsePayload(message, eventType);
      return {
        kind: 'sessionStart',
        requestId: optionalString(body.requestId),
        sessionId: optionalString(body.sessionId),
      };
    }
    case 'sessionUpdate': {
      const body = parsePayload(message, eventType);
      const metadata: Record<string, unknown> = isRecord(body.sessionMetadata) ? body.sessionMetadata : {};
      const results = body.sessionResults === undefined ? [] : body.sessionResults;
      if (!Array.isArray(results)) {
        throw new ProtocolError('Malformed sessionUpdate payload', { context: { eventType } });
      }
      return {
        kind: 'sessionUpdate',
        sampled: metadata.sampled === true,
        events: results.map((result: unknown, index) => parseResult(result, index)),
      };
    }
    default:
      return null;
  }
}

/** Turns a fatal exception frame into the error surfaced to the caller */
export function exceptionToError(frame: ExceptionFrame): CwtailError {
  const context = { exception: frame.name };
  if (frame.name === 'AccessDeniedException') {
    return new AuthError(frame.message, { context });
  }
  if (frame.name === 'ValidationException' || frame.name === 'InvalidParameterException') {
    return new RemoteRejection(frame.message, { context });
  }
  return errorForStatus(400, frame.name, frame.message, { context });
}
