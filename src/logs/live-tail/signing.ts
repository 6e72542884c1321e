/**
 * AWS Signature Version 4 request signing
 *
 * Pure: the same inputs always give the same headers, and nothing is cached
 * between calls.
 */

import { createHash, createHmac } from 'node:crypto';
import { SigningCredentials } from '../../types';

export const SIGNING_ALGORITHM = 'AWS4-HMAC-SHA256';

export interface SigningScope {
  region: string;
  service: string;
}

export interface SignRequestInput {
  credentials: SigningCredentials;
  method: string;
  /** Absolute path, unencoded */
  path: string;
  /** Headers to sign; `host` is required */
  headers: Record<string, string>;
  /** Lowercase hex SHA-256 of the body */
  payloadHash: string;
  timestamp: Date;
  scope: SigningScope;
}

export interface SigningResult {
  /** The input headers plus the authentication headers */
  headers: Record<string, string>;
  canonicalRequest: string;
  stringToSign: string;
  signature: string;
}

export function sha256Hex(data: string | Uint8Array): string {
  return createHash('sha256').update(data).digest('hex');
}

function hmac(key: string | Buffer, data: string): Buffer {
  return createHmac('sha256', key).update(data, 'utf8').digest();
}

/** `20240102T030405Z` */
export function toAmzDate(timestamp: Date): string {
  return timestamp.toISOString().replace(/[:-]|\.\d{3}/g, '');
}

function encodeRfc3986(value: string): string {
  return encodeURIComponent(value).replace(/[!'()*]/g, char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

function canonicalUri(path: string): string {
  if (path === '' || path === '/') {
    return '/';
  }
  return path
    .split('/')
    .map(segment => encodeRfc3986(segment))
    .join('/');
}

export function credentialScope(date: string, scope: SigningScope): string {
  return `${date}/${scope.region}/${scope.service}/aws4_request`;
}

/**
 * kSigning = HMAC(HMAC(HMAC(HMAC("AWS4" + secret, date), region), service), "aws4_request")
 */
export function deriveSigningKey(secretAccessKey: string, date: string, scope: SigningScope): Buffer {
  const kDate = hmac(`AWS4${secretAccessKey}`, date);
  const kRegion = hmac(kDate, scope.region);
  const kService = hmac(kRegion, scope.service);
  return hmac(kService, 'aws4_request');
}

export function signRequest(input: SignRequestInput): SigningResult {
  const { credentials, scope } = input;
  const amzDate = toAmzDate(input.timestamp);
  const date = amzDate.substring(0, 8);

  const headers: Record<string, string> = {
    ...input.headers,
    'x-amz-date': amzDate,
    'x-amz-content-sha256': input.payloadHash,
  };
  if (credentials.sessionToken) {
    headers['x-amz-security-token'] = credentials.sessionToken;
  }

  const canonical = new Map<string, string>();
  for (const [name, value] of Object.entries(headers)) {
    canonical.set(name.toLowerCase(), value.trim().replace(/\s+/g, ' '));
  }
  const names = [...canonical.keys()].sort();
  const signedHeaders = names.join(';');

  const canonicalRequest = [
    input.method.toUpperCase(),
    canonicalUri(input.path),
    '',
    names.map(name => `${name}:${canonical.get(name) ?? ''}\n`).join(''),
    signedHeaders,
    input.payloadHash,
  ].join('\n');

  const scopeString = credentialScope(date, scope);
  const stringToSign = [SIGNING_ALGORITHM, amzDate, scopeString, sha256Hex(canonicalRequest)].join('\n');
  const signature = createHmac('sha256', deriveSigningKey(credentials.secretAccessKey, date, scope))
    .update(stringToSign, 'utf8')
    .digest('hex');

  headers.authorization =
    `${SIGNING_ALGORITHM} Credential=${credentials.accessKeyId}/${scopeString}, ` +
    `SignedHeaders=${signedHeaders}, Signature=${signature}`;

  return { headers, canonicalRequest, stringToSign, signature };
}
