import type { SecureVersion } from 'node:tls';

export type HttpHeaders = Record<string, string>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Transport request structure.
 */
export interface TransportRequest {
  method: string;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

/**
 * Transport layer raw HTTP response.
 */
export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * HTTP transport abstraction.
 * Takes a transport request and abort signal, returns a raw HTTP response.
 * The body must be fully read before the promise settles so the client
 * timeout covers it.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

/**
 * The underlying HTTP client: a transport plus the deadline applied to each
 * attempt issued through it.
 */
export interface HttpClientHandle {
  transport: HttpTransport;
  timeoutMs?: number;
}

/**
 * TLS settings handed to the undici transport's connector.
 */
export interface TLSConfiguration {
  ca?: string;
  cert?: string;
  key?: string;
  rejectUnauthorized: boolean;
  minVersion?: SecureVersion;
}

export interface SendOptions {
  /** Cancels the in-flight attempt when aborted. */
  signal?: AbortSignal;
}

/**
 * Destination a response body is decoded into.
 */
export interface DecodeTarget {
  decode(input: unknown): void;
  /** Forgets any previously decoded value. */
  reset(): void;
}
