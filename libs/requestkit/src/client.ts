import type { Agent } from 'undici';
import { decodeResponse } from './decode';
import {
  EncodeError,
  MissingURLError,
  ParseError,
  RequestBuildError,
  TimeoutError,
  TransportError,
  UnexpectedStatusCodeError,
  describeError,
} from './errors';
import { defaultLogger } from './logger';
import { RETRY_COUNT_HEADER, type Request, type RequestClient } from './request';
import { HTTP_TOKEN, createTLSAgent, createUndiciTransport, undiciTransport } from './transport/undiciTransport';
import type {
  DecodeTarget,
  HttpClientHandle,
  Logger,
  RawHttpResponse,
  SendOptions,
  TLSConfiguration,
  TransportRequest,
} from './types';

const textEncoder = new TextEncoder();

// ============================================================================
// Options
// ============================================================================

export type ClientOption =
  | { kind: 'tls'; tls: TLSConfiguration }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'http-client'; httpClient: HttpClientHandle }
  | { kind: 'logger'; logger: Logger };

/**
 * Sends requests through an agent carrying the given TLS settings.
 * Replaces any transport set by an earlier option; keeps the timeout.
 */
export const withTLSClientConfig = (tls: TLSConfiguration): ClientOption => ({ kind: 'tls', tls });

/** Deadline for each attempt, from dispatch until the body is read. 0 disables it. */
export const withTimeout = (timeoutMs: number): ClientOption => ({ kind: 'timeout', timeoutMs });

/**
 * Uses the given transport and timeout as they are.
 *
 * Warning: this discards the transport and timeout set by earlier options.
 * Pass it first when combining it with them.
 */
export const withHTTPClient = (httpClient: HttpClientHandle): ClientOption => ({
  kind: 'http-client',
  httpClient,
});

export const withLogger = (logger: Logger): ClientOption => ({ kind: 'logger', logger });

interface ClientSettings {
  httpClient: HttpClientHandle;
  logger?: Logger;
  tls?: TLSConfiguration;
  agents: Agent[];
}

function applyOption(settings: ClientSettings, option: ClientOption): ClientSettings {
  switch (option.kind) {
    case 'tls': {
      const agent = createTLSAgent(option.tls);
      return {
        ...settings,
        tls: option.tls,
        agents: [...settings.agents, agent],
        httpClient: { ...settings.httpClient, transport: createUndiciTransport({ dispatcher: agent }) },
      };
    }
    case 'timeout':
      return { ...settings, httpClient: { ...settings.httpClient, timeoutMs: option.timeoutMs } };
    case 'http-client':
      return { ...settings, httpClient: option.httpClient, tls: undefined };
    case 'logger':
      return { ...settings, logger: option.logger };
  }
}

// ============================================================================
// Client
// ============================================================================

/**
 * Reusable client that executes {@link Request}s. Its configuration is fixed
 * at construction, so one client can serve many concurrent requests.
 */
export class Client implements RequestClient {
  readonly httpClient: HttpClientHandle;
  readonly logger: Logger;
  readonly tls?: TLSConfiguration;
  private readonly agents: Agent[];

  /** @internal Use {@link newClient}. */
  constructor(settings: ClientSettings) {
    this.httpClient = settings.httpClient;
    this.logger = settings.logger ?? defaultLogger;
    this.tls = settings.tls;
    this.agents = settings.agents;
  }

  /**
   * Sends one attempt of `request` and resolves with the raw response body.
   *
   * The request's status code and decode targets are cleared first, then the
   * status code is recorded when a response arrives. When it matches the expected
   * status the body is decoded into the success target; otherwise into the
   * error target, and an UnexpectedStatusCodeError is thrown. Errors raised
   * after a response arrived carry the exact body bytes.
   */
  async do(request: Request, options: SendOptions = {}): Promise<Uint8Array> {
    request.beginAttempt();
    const url = this.resolveURL(request);
    const body = this.encodeBody(request);
    this.checkMethod(request.method, url);

    const transportRequest: TransportRequest = {
      method: request.method,
      url,
      headers: { ...request.headers },
      body,
    };
    const meta = { method: request.method, url };

    this.logger.debug('http.request.attempt', {
      ...meta,
      retryCount: request.headers[RETRY_COUNT_HEADER],
    });

    const response = await this.dispatch(transportRequest, options.signal);
    request.recordStatusCode(response.status);

    const expectedStatus = request.getExpectedStatusCode();
    if (response.status !== expectedStatus) {
      this.logger.error('http.response.unexpected_status', {
        ...meta,
        expected: expectedStatus,
        actual: response.status,
      });
      this.decode(response, request.getErrorResponse(), meta);
      throw new UnexpectedStatusCodeError({
        status: response.status,
        expectedStatus,
        body: response.body,
      });
    }

    this.decode(response, request.successTarget(), meta);
    return response.body;
  }

  /** Closes the TLS agents this client created. */
  async close(): Promise<void> {
    await Promise.all(this.agents.map((agent) => agent.close()));
  }

  private resolveURL(request: Request): string {
    if (!request.url) {
      this.logger.error('http.request.build.error', { error: 'missing URL' });
      throw new MissingURLError();
    }

    try {
      return new URL(request.url).toString();
    } catch (error) {
      this.logger.error('http.request.build.error', { url: request.url, error: describeError(error) });
      throw new ParseError(request.url, error);
    }
  }

  private encodeBody(request: Request): Uint8Array | undefined {
    if (request.body === undefined || request.body === null) {
      return undefined;
    }

    try {
      return textEncoder.encode(stringifyBody(request.body));
    } catch (error) {
      this.logger.error('http.request.encode.error', { error: describeError(error) });
      if (error instanceof EncodeError) {
        throw error;
      }
      throw new EncodeError(`error encoding request body: ${describeError(error)}`, { cause: error });
    }
  }

  private checkMethod(method: string, url: string): void {
    if (!HTTP_TOKEN.test(method)) {
      const problem = `invalid method "${method}"`;
      this.logger.error('http.request.build.error', { method, url, error: problem });
      throw new RequestBuildError(problem);
    }
  }

  private async dispatch(req: TransportRequest, signal?: AbortSignal): Promise<RawHttpResponse> {
    const { transport, timeoutMs } = this.httpClient;
    const controller = new AbortController();
    const abortFromCaller = () => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', abortFromCaller, { once: true });
    }

    let didTimeout = false;
    const timeoutHandle =
      timeoutMs !== undefined && timeoutMs > 0
        ? setTimeout(() => {
            didTimeout = true;
            controller.abort();
          }, timeoutMs)
        : undefined;

    try {
      return await transport(req, controller.signal);
    } catch (error) {
      if (didTimeout && timeoutMs !== undefined) {
        this.logger.error('http.request.timeout', { method: req.method, url: req.url, timeoutMs });
        throw new TimeoutError(timeoutMs);
      }
      this.logger.error('http.request.send.error', {
        method: req.method,
        url: req.url,
        error: describeError(error),
      });
      throw new TransportError(`error sending request: ${describeError(error)}`, { cause: error });
    } finally {
      clearTimeout(timeoutHandle);
      signal?.removeEventListener('abort', abortFromCaller);
    }
  }

  private decode(response: RawHttpResponse, target: DecodeTarget, meta: Record<string, unknown>): void {
    try {
      decodeResponse(response, target);
    } catch (error) {
      this.logger.error('http.response.decode.error', {
        ...meta,
        status: response.status,
        error: describeError(error),
      });
      throw error;
    }
  }
}

function rejectNonFinite(_key: string, value: unknown): unknown {
  if (typeof value === 'number' && !Number.isFinite(value)) {
    throw new EncodeError(`unsupported value: ${value}`);
  }
  return value;
}

function stringifyBody(body: unknown): string {
  const encoded: string | undefined = JSON.stringify(body, rejectNonFinite);
  if (encoded === undefined) {
    throw new EncodeError(`unsupported value of type ${typeof body}`);
  }
  return encoded;
}

/**
 * Builds a client from the given options, applied in order, starting from
 * the undici transport with no timeout and the console logger.
 */
export function newClient(...options: ClientOption[]): Client {
  const defaults: ClientSettings = { httpClient: { transport: undiciTransport }, agents: [] };
  return new Client(options.reduce(applyOption, defaults));
}
