import { z } from 'zod';
import { decodeInto, errorBodySchema } from './decode';
import type { DecodeTarget, HttpHeaders, SendOptions } from './types';

export const DEFAULT_HEADERS: Readonly<HttpHeaders> = Object.freeze({
  'Content-Type': 'application/json',
  Accept: 'application/json',
});

/** Header carrying the zero-based attempt index on retried requests. */
export const RETRY_COUNT_HEADER = 'Retry-Count';

/**
 * Executes one attempt of a request and resolves with the raw response body.
 */
export interface RequestClient {
  do(request: Request, options?: SendOptions): Promise<Uint8Array>;
}

/**
 * A request intent, built fluently and sent through a {@link RequestClient}.
 *
 * Defaults: method `GET`, headers `Content-Type: application/json` and
 * `Accept: application/json`, expected status 200, error target `{ error: string }`.
 *
 * A request is not safe to send concurrently: retries and responses mutate it.
 */
export class Request {
  method = 'GET';
  url = '';
  headers: HttpHeaders = { ...DEFAULT_HEADERS };
  body: unknown = undefined;

  private retries = 0;
  private expectedStatusCode = 200;
  private response?: DecodeTarget;
  private errorResponse: DecodeTarget = decodeInto(errorBodySchema);
  private statusCode = 0;

  setMethod(method: string): this {
    this.method = method;
    return this;
  }

  setURL(url: string | URL): this {
    this.url = url.toString();
    return this;
  }

  /** Sets the Authorization header to `Bearer <token>`. */
  setAuthToken(token: string): this {
    this.headers['Authorization'] = `Bearer ${token}`;
    return this;
  }

  /** Body encoded as JSON when sent. `undefined` and `null` send no body. */
  setRequestBody(body: unknown): this {
    this.body = body;
    return this;
  }

  setWantedResponseBody(target: DecodeTarget): this {
    this.response = target;
    return this;
  }

  setErrorResponseBody(target: DecodeTarget): this {
    this.errorResponse = target;
    return this;
  }

  setExpectedStatusCode(expectedStatusCode: number): this {
    this.expectedStatusCode = expectedStatusCode;
    return this;
  }

  /** Sends up to `retries` attempts; 0 sends exactly one. */
  enableRetries(retries: number): this {
    this.retries = retries;
    return this;
  }

  addHeader(key: string, value: string): this {
    this.headers[key] = value;
    return this;
  }

  /**
   * Sends the request and resolves with the raw response body.
   *
   * With retries enabled, each attempt carries a `Retry-Count` header with its
   * zero-based index. The first successful attempt resolves; when every
   * attempt fails, the last attempt's error is thrown.
   */
  async send(client: RequestClient, options: SendOptions = {}): Promise<Uint8Array> {
    if (this.retries <= 0) {
      return client.do(this, options);
    }

    let lastError: unknown;
    for (let attempt = 0; attempt < this.retries; attempt++) {
      this.addHeader(RETRY_COUNT_HEADER, String(attempt));
      try {
        return await client.do(this, options);
      } catch (error) {
        lastError = error;
      }
    }
    throw lastError;
  }

  /** Status code of the last response; 0 before any response. */
  getStatusCode(): number {
    return this.statusCode;
  }

  /** The success target, holding the decoded body after a matching response. */
  getResponse(): DecodeTarget | undefined {
    return this.response;
  }

  /** The error target, holding the decoded body after an unexpected status. */
  getErrorResponse(): DecodeTarget {
    return this.errorResponse;
  }

  getExpectedStatusCode(): number {
    return this.expectedStatusCode;
  }

  getRetries(): number {
    return this.retries;
  }

  /** @internal Called by the client before each attempt. */
  beginAttempt(): void {
    this.statusCode = 0;
    this.response?.reset();
    this.errorResponse.reset();
  }

  /** @internal Called by the client when a response arrives. */
  recordStatusCode(statusCode: number): void {
    this.statusCode = statusCode;
  }

  /** @internal Success target for the client to decode into; installed on first use. */
  successTarget(): DecodeTarget {
    this.response ??= decodeInto(z.unknown());
    return this.response;
  }
}

export const newRequest = (): Request => new Request();
