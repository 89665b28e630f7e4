import { Agent, request, type Dispatcher } from 'undici';
import type { HttpHeaders, HttpTransport, RawHttpResponse, TLSConfiguration, TransportRequest } from '../types';

/** RFC 9110 token characters. */
export const HTTP_TOKEN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

/** Redirects followed before the last redirect response is returned as is. */
export const MAX_REDIRECTIONS = 10;

export interface UndiciTransportOptions {
  /** undici dispatcher the requests go through; the global one when omitted. */
  dispatcher?: Dispatcher;
}

// undici sends any token as the method; its typings name only the standard ones.
const isHttpMethod = (method: string): method is Dispatcher.HttpMethod => HTTP_TOKEN.test(method);

function toHeaders(incoming: Record<string, string | string[] | undefined>): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const [key, value] of Object.entries(incoming)) {
    if (typeof value === 'string') {
      headers[key.toLowerCase()] = value;
    } else if (Array.isArray(value)) {
      headers[key.toLowerCase()] = value.join(', ');
    }
  }
  return headers;
}

/**
 * undici request-based HTTP transport.
 * Sends the body on every method, reads the whole response body before
 * resolving and converts the response to RawHttpResponse.
 */
export const createUndiciTransport = (options: UndiciTransportOptions = {}): HttpTransport => {
  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    if (!isHttpMethod(req.method)) {
      throw new TypeError(`invalid method "${req.method}"`);
    }

    const response = await request(req.url, {
      method: req.method,
      headers: req.headers,
      body: req.body,
      signal,
      dispatcher: options.dispatcher,
      maxRedirections: MAX_REDIRECTIONS,
    });

    const body = new Uint8Array(await response.body.arrayBuffer());

    return {
      status: response.statusCode,
      headers: toHeaders(response.headers),
      body,
    };
  };
};

export const undiciTransport: HttpTransport = createUndiciTransport();

/**
 * Agent whose connections are opened with the given TLS settings.
 */
export const createTLSAgent = (tls: TLSConfiguration): Agent =>
  new Agent({
    connect: {
      ca: tls.ca,
      cert: tls.cert,
      key: tls.key,
      rejectUnauthorized: tls.rejectUnauthorized,
      minVersion: tls.minVersion,
    },
  });
