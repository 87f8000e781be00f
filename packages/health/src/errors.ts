/**
 * @schoolbell/health - Error taxonomy and classifier
 *
 * Every failure raised while refreshing school data maps onto exactly one
 * `ErrorKind`. Transport errors carry the kind as a readonly discriminant;
 * anything else goes through `classify`, which is total and defaults to
 * `data_format`.
 */

// ---------------------------------------------------------------------------
// Kinds
// ---------------------------------------------------------------------------

export const ERROR_KINDS = ['authentication', 'connection', 'rate_limit', 'data_format'] as const;

export type ErrorKind = (typeof ERROR_KINDS)[number];

export function isErrorKind(value: unknown): value is ErrorKind {
  return ERROR_KINDS.some((kind) => kind === value);
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

/** Base class for classified refresh failures. */
export class SchoolSyncError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SchoolSyncError';
  }

  /** Credentials do not self-heal; the config layer must re-authenticate. */
  get requiresReauth(): boolean {
    return this.kind === 'authentication';
  }
}

export class AuthenticationError extends SchoolSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'authentication', options);
    this.name = 'AuthenticationError';
  }
}

export class TokenExpiredError extends AuthenticationError {
  constructor(message = 'Authentication token expired', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TokenExpiredError';
  }
}

export class ConnectionError extends SchoolSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'connection', options);
    this.name = 'ConnectionError';
  }
}

export class RateLimitError extends SchoolSyncError {
  constructor(message = 'Rate limit exceeded', options?: { cause?: unknown }) {
    super(message, 'rate_limit', options);
    this.name = 'RateLimitError';
  }
}

export class DataFormatError extends SchoolSyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'data_format', options);
    this.name = 'DataFormatError';
  }
}

/**
 * Custom error that carries an HTTP status code so the classifier can tell
 * auth, throttling and server failures apart.
 */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// ---------------------------------------------------------------------------
// Classifier
// ---------------------------------------------------------------------------

/** Socket / DNS / undici error codes that mean the service was unreachable. */
const NETWORK_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
]);

/**
 * Map an HTTP status code onto an error kind.
 *
 *   - 401 / 403          -> authentication
 *   - 429                -> rate_limit
 *   - 0 / 408 / 5xx      -> connection
 *   - everything else    -> data_format
 */
export function classifyHttpStatus(statusCode: number): ErrorKind {
  if (statusCode === 401 || statusCode === 403) return 'authentication';
  if (statusCode === 429) return 'rate_limit';
  if (statusCode === 0 || statusCode === 408) return 'connection';
  if (statusCode >= 500 && statusCode <= 599) return 'connection';
  return 'data_format';
}

function readProperty(value: object, key: string): unknown {
  return key in value ? Reflect.get(value, key) : undefined;
}

function isNetworkShaped(err: object): boolean {
  const code = readProperty(err, 'code');
  if (typeof code === 'string' && (NETWORK_CODES.has(code) || code.startsWith('UND_ERR_'))) {
    return true;
  }

  const name = readProperty(err, 'name');
  if (name === 'AbortError' || name === 'TimeoutError') {
    return true;
  }

  // undici surfaces socket failures as `TypeError: fetch failed` with the real error as cause
  if (err instanceof TypeError && err.message === 'fetch failed') {
    return true;
  }

  const cause = readProperty(err, 'cause');
  return typeof cause === 'object' && cause !== null && cause !== err && isNetworkShaped(cause);
}

/**
 * Classify any thrown value. Pure and total: unknown shapes are `data_format`.
 */
export function classify(err: unknown): ErrorKind {
  if (typeof err !== 'object' || err === null) {
    return 'data_format';
  }

  const kind = readProperty(err, 'kind');
  if (isErrorKind(kind)) {
    return kind;
  }

  if (err instanceof HttpError) {
    return classifyHttpStatus(err.statusCode);
  }

  if (isNetworkShaped(err)) {
    return 'connection';
  }

  return 'data_format';
}

/**
 * Wrap any thrown value into the SchoolSyncError subclass of its kind. Values
 * that already are classified errors are returned unchanged.
 */
export function toSyncError(err: unknown): SchoolSyncError {
  if (err instanceof SchoolSyncError) {
    return err;
  }

  const message = err instanceof Error ? err.message : String(err);
  const options = { cause: err };

  switch (classify(err)) {
    case 'authentication':
      return new AuthenticationError(message, options);
    case 'connection':
      return new ConnectionError(message, options);
    case 'rate_limit':
      return new RateLimitError(message, options);
    case 'data_format':
      return new DataFormatError(message, options);
  }
}
