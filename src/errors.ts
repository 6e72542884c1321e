/**
 * Error taxonomy for cwtail
 *
 * Every failure that reaches the user is one of these classes. Each carries a
 * stable code, the process exit code the CLI uses for it, and a context record
 * with the query or session parameters needed to reproduce the request.
 */

export type ErrorContext = Record<string, string | number | boolean | undefined>;

export type CwtailErrorCode =
  | 'PARSE'
  | 'AUTH'
  | 'TRANSIENT_NETWORK'
  | 'THROTTLING'
  | 'PROTOCOL'
  | 'REMOTE_REJECTION'
  | 'INTERNAL';

export interface CwtailErrorOptions {
  context?: ErrorContext;
  cause?: unknown;
}

export abstract class CwtailError extends Error {
  abstract readonly code: CwtailErrorCode;
  abstract readonly exitCode: number;
  /** Whether retrying the same request may succeed */
  readonly retryable: boolean = false;
  readonly context: ErrorContext;

  constructor(message: string, options: CwtailErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.context = { ...options.context };
  }

  /**
   * Merges extra context into this error. Existing keys win so the innermost
   * context is never overwritten.
   */
  withContext(context: ErrorContext): this {
    Object.assign(this.context, { ...context, ...this.context });
    return this;
  }
}

/** Malformed time expression, transform rule, or contradictory arguments */
export class ParseError extends CwtailError {
  readonly code = 'PARSE';
  readonly exitCode = 2;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/** Signing or credential failure, or a 401/403 from the service */
export class AuthError extends CwtailError {
  readonly code = 'AUTH';
  readonly exitCode = 3;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'AuthError';
  }
}

/** Connection reset, timeout, or a 5xx response */
export class TransientNetworkError extends CwtailError {
  readonly code = 'TRANSIENT_NETWORK';
  readonly exitCode = 4;
  readonly retryable = true;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'TransientNetworkError';
  }
}

/** The service asked us to slow down */
export class ThrottlingError extends CwtailError {
  readonly code = 'THROTTLING';
  readonly exitCode = 4;
  readonly retryable = true;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'ThrottlingError';
  }
}

/** Bad frame checksum, malformed frame, or out-of-order delivery */
export class ProtocolError extends CwtailError {
  readonly code = 'PROTOCOL';
  readonly exitCode = 5;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/** Non-retryable 4xx from the service, carrying the server's message */
export class RemoteRejection extends CwtailError {
  readonly code = 'REMOTE_REJECTION';
  readonly exitCode = 6;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'RemoteRejection';
  }
}

/** Anything not raised by the service or the network: a bug, or a local I/O failure */
export class InternalError extends CwtailError {
  readonly code = 'INTERNAL';
  readonly exitCode = 1;

  constructor(message: string, options?: CwtailErrorOptions) {
    super(message, options);
    this.name = 'InternalError';
  }
}

const THROTTLING_NAMES = new Set([
  'ThrottlingException',
  'Throttling',
  'TooManyRequestsException',
  'RequestLimitExceeded',
  'LimitExceededException',
  'RateExceeded',
]);

const AUTH_NAMES = new Set([
  'AccessDeniedException',
  'UnrecognizedClientException',
  'ExpiredTokenException',
  'InvalidSignatureException',
  'IncompleteSignature',
  'MissingAuthenticationToken',
  'CredentialsProviderError',
]);

const TRANSIENT_NAMES = new Set([
  'ServiceUnavailableException',
  'InternalFailure',
  'InternalServerError',
  'RequestTimeout',
  'RequestTimeoutException',
  'TimeoutError',
  'AbortError',
]);

const TRANSIENT_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
  'UND_ERR_CLOSED',
]);

function readString(value: unknown, key: string): string | undefined {
  if (value && typeof value === 'object' && key in value) {
    const field: unknown = Reflect.get(value, key);
    return typeof field === 'string' ? field : undefined;
  }
  return undefined;
}

function readStatus(value: unknown): number | undefined {
  if (!value || typeof value !== 'object') {
    return undefined;
  }
  const metadata: unknown = Reflect.get(value, '$metadata');
  if (metadata && typeof metadata === 'object') {
    const status: unknown = Reflect.get(metadata, 'httpStatusCode');
    if (typeof status === 'number') {
      return status;
    }
  }
  const statusCode: unknown = Reflect.get(value, 'statusCode');
  return typeof statusCode === 'number' ? statusCode : undefined;
}

/**
 * Classifies an HTTP status and optional service error name into the taxonomy.
 */
export function errorForStatus(
  status: number,
  name: string | undefined,
  message: string,
  options?: CwtailErrorOptions
): CwtailError {
  if ((name && THROTTLING_NAMES.has(name)) || status === 429) {
    return new ThrottlingError(message, options);
  }
  if ((name && AUTH_NAMES.has(name)) || status === 401 || status === 403) {
    return new AuthError(message, options);
  }
  if (status >= 500 || (name && TRANSIENT_NAMES.has(name))) {
    return new TransientNetworkError(message, options);
  }
  return new RemoteRejection(message, options);
}

/**
 * Maps any thrown value (AWS SDK service exception, undici error, Node system
 * error) onto the taxonomy. Values that already belong to it are returned as is;
 * anything unrecognised becomes an InternalError.
 */
export function toCwtailError(error: unknown, context?: ErrorContext): CwtailError {
  if (error instanceof CwtailError) {
    return context ? error.withContext(context) : error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const name = readString(error, 'name');
  const code = readString(error, 'code');
  const status = readStatus(error);
  const options: CwtailErrorOptions = { context, cause: error };

  if (name && THROTTLING_NAMES.has(name)) {
    return new ThrottlingError(message, options);
  }
  if (name && AUTH_NAMES.has(name)) {
    return new AuthError(message, options);
  }
  if (status !== undefined) {
    return errorForStatus(status, name, message, options);
  }
  if ((name && TRANSIENT_NAMES.has(name)) || (code && TRANSIENT_CODES.has(code))) {
    return new TransientNetworkError(message, options);
  }
  if (readString(error, '$fault') !== undefined) {
    return new RemoteRejection(message, options);
  }
  return new InternalError(message, options);
}

/**
 * Renders an error and its context as a single line for the terminal
 */
export function describeError(error: CwtailError): string {
  const pairs = Object.entries(error.context)
    .filter(([, value]) => value !== undefined && value !== '')
    .map(([key, value]) => `${key}=${String(value)}`);
  return pairs.length > 0 ? `${error.message} (${pairs.join(' ')})` : error.message;
}
