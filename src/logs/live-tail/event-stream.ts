/**
 * Codec for the binary `application/vnd.amazon.eventstream` framing
 *
 * Frame layout, all integers big-endian:
 *
 *   total length (u32) | headers length (u32) | prelude CRC32 (u32)
 *   headers
 *   payload
 *   message CRC32 (u32, over everything before it)
 *
 * Each header is: name length (u8), name (utf-8), value type (u8), value.
 */

import { crc32 } from '@aws-crypto/crc32';
import { ProtocolError } from '../../errors';

const PRELUDE_LENGTH = 12;
const CHECKSUM_LENGTH = 4;
const MINIMUM_MESSAGE_LENGTH = PRELUDE_LENGTH + CHECKSUM_LENGTH;
/** Upper bound on a single frame */
export const MAX_MESSAGE_LENGTH = 16 * 1024 * 1024;

export type HeaderValue =
  | { type: 'boolean'; value: boolean }
  | { type: 'byte'; value: number }
  | { type: 'short'; value: number }
  | { type: 'integer'; value: number }
  | { type: 'long'; value: bigint }
  | { type: 'binary'; value: Uint8Array }
  | { type: 'string'; value: string }
  | { type: 'timestamp'; value: Date }
  | { type: 'uuid'; value: string };

export interface EventStreamMessage {
  headers: Record<string, HeaderValue>;
  payload: Uint8Array;
}

enum HeaderType {
  BoolTrue = 0,
  BoolFalse = 1,
  Byte = 2,
  Short = 3,
  Integer = 4,
  Long = 5,
  ByteArray = 6,
  String = 7,
  Timestamp = 8,
  Uuid = 9,
}

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

function view(bytes: Uint8Array): DataView {
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function formatUuid(bytes: Uint8Array): string {
  const hex = Buffer.from(bytes).toString('hex');
  return `${hex.slice(0, 8)}-${hex.slice(8, 12)}-${hex.slice(12, 16)}-${hex.slice(16, 20)}-${hex.slice(20)}`;
}

function decodeUtf8(bytes: Uint8Array, what: string): string {
  try {
    return textDecoder.decode(bytes);
  } catch (error) {
    throw new ProtocolError(`Invalid UTF-8 in ${what}`, { cause: error });
  }
}

export function decodeHeaders(bytes: Uint8Array): Record<string, HeaderValue> {
  const headers: Record<string, HeaderValue> = {};
  const data = view(bytes);
  let offset = 0;

  const need = (count: number) => {
    if (offset + count > bytes.length) {
      throw new ProtocolError('Truncated event stream header', { context: { offset } });
    }
  };

  while (offset < bytes.length) {
    need(1);
    const nameLength = data.getUint8(offset);
    offset += 1;
    need(nameLength + 1);
    const name = decodeUtf8(bytes.subarray(offset, offset + nameLength), 'header name');
    offset += nameLength;
    const type = data.getUint8(offset);
    offset += 1;

    let value: HeaderValue;
    switch (type) {
      case HeaderType.BoolTrue:
        value = { type: 'boolean', value: true };
        break;
      case HeaderType.BoolFalse:
        value = { type: 'boolean', value: false };
        break;
      case HeaderType.Byte:
        need(1);
        value = { type: 'byte', value: data.getInt8(offset) };
        offset += 1;
        break;
      case HeaderType.Short:
        need(2);
        value = { type: 'short', value: data.getInt16(offset) };
        offset += 2;
        break;
      case HeaderType.Integer:
        need(4);
        value = { type: 'integer', value: data.getInt32(offset) };
        offset += 4;
        break;
      case HeaderType.Long:
        need(8);
        value = { type: 'long', value: data.getBigInt64(offset) };
        offset += 8;
        break;
      case HeaderType.ByteArray:
      case HeaderType.String: {
        need(2);
        const length = data.getUint16(offset);
        offset += 2;
        need(length);
        const raw = bytes.slice(offset, offset + length);
        offset += length;
        value =
          type === HeaderType.String
            ? { type: 'string', value: decodeUtf8(raw, `header '${name}'`) }
            : { type: 'binary', value: raw };
        break;
      }
      case HeaderType.Timestamp:
        need(8);
        value = { type: 'timestamp', value: new Date(Number(data.getBigInt64(offset))) };
        offset += 8;
        break;
      case HeaderType.Uuid:
        need(16);
        value = { type: 'uuid', value: formatUuid(bytes.subarray(offset, offset + 16)) };
        offset += 16;
        break;
      default:
        throw new ProtocolError(`Unknown event stream header type ${type}`, { context: { header: name } });
    }
    headers[name] = value;
  }
  return headers;
}

/**
 * Decodes exactly one complete frame
 *
 * @throws ProtocolError on a length mismatch or a bad checksum
 */
export function decodeMessage(frame: Uint8Array): EventStreamMessage {
  if (frame.length < MINIMUM_MESSAGE_LENGTH) {
    throw new ProtocolError('Event stream frame shorter than its prelude', { context: { length: frame.length } });
  }
  const data = view(frame);
  const totalLength = data.getUint32(0);
  const headersLength = data.getUint32(4);
  const preludeCrc = data.getUint32(8);

  if (totalLength !== frame.length) {
    throw new ProtocolError('Event stream frame length mismatch', {
      context: { declared: totalLength, actual: frame.length },
    });
  }
  if (crc32(frame.subarray(0, 8)) !== preludeCrc) {
    throw new ProtocolError('Event stream prelude checksum mismatch');
  }
  const messageCrc = data.getUint32(totalLength - CHECKSUM_LENGTH);
  if (crc32(frame.subarray(0, totalLength - CHECKSUM_LENGTH)) !== messageCrc) {
    throw new ProtocolError('Event stream message checksum mismatch');
  }
  if (PRELUDE_LENGTH + headersLength > totalLength - CHECKSUM_LENGTH) {
    throw new ProtocolError('Event stream headers overrun the frame', { context: { headersLength, totalLength } });
  }

  const headersEnd = PRELUDE_LENGTH + headersLength;
  return {
    headers: decodeHeaders(frame.subarray(PRELUDE_LENGTH, headersEnd)),
    payload: frame.slice(headersEnd, totalLength - CHECKSUM_LENGTH),
  };
}

/**
 * Incremental decoder: feed it body chunks as they arrive and it hands back
 * every frame completed so far.
 */
export class EventStreamDecoder {
  private buffer: Uint8Array = new Uint8Array(0);

  push(chunk: Uint8Array): EventStreamMessage[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const messages: EventStreamMessage[] = [];

    while (this.buffer.length >= PRELUDE_LENGTH) {
      const prelude = view(this.buffer);
      if (crc32(this.buffer.subarray(0, 8)) !== prelude.getUint32(8)) {
        throw new ProtocolError('Event stream prelude checksum mismatch');
      }
      const totalLength = prelude.getUint32(0);
      if (totalLength < MINIMUM_MESSAGE_LENGTH || totalLength > MAX_MESSAGE_LENGTH) {
        throw new ProtocolError('Invalid event stream frame length', { context: { totalLength } });
      }
      if (this.buffer.length < totalLength) {
        break;
      }
      messages.push(decodeMessage(this.buffer.subarray(0, totalLength)));
      this.buffer = this.buffer.subarray(totalLength);
    }
    return messages;
  }

  /** Bytes received but not yet part of a complete frame */
  get pending(): number {
    return this.buffer.length;
  }
}

function encodeHeader(name: string, header: HeaderValue): Uint8Array {
  const nameBytes = textEncoder.encode(name);
  if (nameBytes.length > 255) {
    throw new ProtocolError(`Header name too long: ${name}`);
  }

  let body: Uint8Array;
  switch (header.type) {
    case 'boolean':
      body = Uint8Array.of(header.value ? HeaderType.BoolTrue : HeaderType.BoolFalse);
      break;
    case 'byte':
      body = new Uint8Array(2);
      body[0] = HeaderType.Byte;
      view(body).setInt8(1, header.value);
      break;
    case 'short':
      body = new Uint8Array(3);
      body[0] = HeaderType.Short;
      view(body).setInt16(1, header.value);
      break;
    case 'integer':
      body = new Uint8Array(5);
      body[0] = HeaderType.Integer;
      view(body).setInt32(1, header.value);
      break;
    case 'long':
      body = new Uint8Array(9);
      body[0] = HeaderType.Long;
      view(body).setBigInt64(1, header.value);
      break;
    case 'timestamp':
      body = new Uint8Array(9);
      body[0] = HeaderType.Timestamp;
      view(body).setBigInt64(1, BigInt(header.value.getTime()));
      break;
    case 'binary':
    case 'string': {
      const bytes = header.type === 'string' ? textEncoder.encode(header.value) : header.value;
      body = new Uint8Array(3 + bytes.length);
      body[0] = header.type === 'string' ? HeaderType.String : HeaderType.ByteArray;
      view(body).setUint16(1, bytes.length);
      body.set(bytes, 3);
      break;
    }
    case 'uuid': {
      const hex = header.value.replace(/-/g, '');
      if (!/^[0-9a-fA-F]{32}$/.test(hex)) {
        throw new ProtocolError(`Invalid UUID header value: ${header.value}`);
      }
      body = new Uint8Array(17);
      body[0] = HeaderType.Uuid;
      body.set(Buffer.from(hex, 'hex'), 1);
      break;
    }
  }

  const encoded = new Uint8Array(1 + nameBytes.length + body.length);
  encoded[0] = nameBytes.length;
  encoded.set(nameBytes, 1);
  encoded.set(body, 1 + nameBytes.length);
  return encoded;
}

export function encodeMessage(message: EventStreamMessage): Uint8Array {
  const headers = Buffer.concat(Object.entries(message.headers).map(([name, value]) => encodeHeader(name, value)));
  const totalLength = PRELUDE_LENGTH + headers.length + message.payload.length + CHECKSUM_LENGTH;

  const frame = new Uint8Array(totalLength);
  const data = view(frame);
  data.setUint32(0, totalLength);
  data.setUint32(4, headers.length);
  data.setUint32(8, crc32(frame.subarray(0, 8)));
  frame.set(headers, PRELUDE_LENGTH);
  frame.set(message.payload, PRELUDE_LENGTH + headers.length);
  data.setUint32(totalLength - CHECKSUM_LENGTH, crc32(frame.subarray(0, totalLength - CHECKSUM_LENGTH)));
  return frame;
}

/** Shorthand for string-valued headers */
export function stringHeaders(values: Record<string, string>): Record<string, HeaderValue> {
  const headers: Record<string, HeaderValue> = {};
  for (const [name, value] of Object.entries(values)) {
    headers[name] = { type: 'string', value };
  }
  return headers;
}
