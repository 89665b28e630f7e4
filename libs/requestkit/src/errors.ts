const textDecoder = new TextDecoder();

export class RequestKitError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RequestKitError';
  }
}

/** Missing or unusable TLS material, or an invalid environment setting. */
export class ConfigError extends RequestKitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

export class MissingURLError extends RequestKitError {
  constructor() {
    super('missing URL');
    this.name = 'MissingURLError';
  }
}

export class ParseError extends RequestKitError {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`error parsing URL "${url}": ${describeError(cause)}`, { cause });
    this.name = 'ParseError';
    this.url = url;
  }
}

export class EncodeError extends RequestKitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodeError';
  }
}

export class RequestBuildError extends RequestKitError {
  constructor(message: string) {
    super(message);
    this.name = 'RequestBuildError';
  }
}

/** Network-level failure: refused connection, DNS, unsupported scheme, abort. */
export class TransportError extends RequestKitError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransportError';
  }
}

export class TimeoutError extends TransportError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`request timed out after ${timeoutMs}ms: context deadline exceeded`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * An error raised after a response arrived. Carries the status and the exact
 * response body bytes.
 */
export class ResponseError extends RequestKitError {
  readonly status: number;
  readonly body: Uint8Array;

  constructor(message: string, options: { status: number; body: Uint8Array; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'ResponseError';
    this.status = options.status;
    this.body = options.body;
  }

  get bodyText(): string {
    return textDecoder.decode(this.body);
  }
}

/**
 * The status differed from the expected one and the body was decoded into the
 * request's error target.
 */
export class UnexpectedStatusCodeError extends ResponseError {
  readonly expectedStatus: number;

  constructor(options: { status: number; expectedStatus: number; body: Uint8Array }) {
    super(`unexpected status code: expected ${options.expectedStatus}, got ${options.status}`, options);
    this.name = 'UnexpectedStatusCodeError';
    this.expectedStatus = options.expectedStatus;
  }
}

export class DecodeError extends ResponseError {
  constructor(options: { status: number; body: Uint8Array; cause: unknown }) {
    super(`error decoding response: ${describeError(options.cause)}`, options);
    this.name = 'DecodeError';
  }
}

export class UnsupportedContentTypeError extends ResponseError {
  readonly contentType?: string;

  constructor(options: { status: number; body: Uint8Array; contentType?: string }) {
    super(`unsupported content type: ${options.contentType ?? '(none)'}`, options);
    this.name = 'UnsupportedContentTypeError';
    this.contentType = options.contentType;
  }
}

/**
 * Flattens an error and its cause chain into one line, e.g.
 * `other side closed: read ECONNRESET`.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.cause !== undefined && error.cause !== error) {
    return `${error.message}: ${describeError(error.cause)}`;
  }
  return error.message;
}
