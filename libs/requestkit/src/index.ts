/**
 * @requestkit/core
 *
 * Fluent HTTP requests over a reusable client.
 *
 * ## Usage
 *
 * ```typescript
 * import { decodeInto, newClient, newRequest, withTimeout } from '@requestkit/core';
 * import { z } from 'zod';
 *
 * const client = newClient(withTimeout(5_000));
 * const todo = decodeInto(z.object({ id: z.number(), title: z.string() }));
 *
 * const body = await newRequest()
 *   .setURL('https://api.example.com/todos/1')
 *   .setAuthToken(token)
 *   .setWantedResponseBody(todo)
 *   .send(client);
 * ```
 *
 * ## Environment Variables
 *
 * Read by `createClientFromEnv`:
 * - `REQUESTKIT_TIMEOUT_MS`
 * - `REQUESTKIT_TLS_CA`, `REQUESTKIT_TLS_CERT`, `REQUESTKIT_TLS_KEY`
 * - `REQUESTKIT_TLS_INSECURE_SKIP_VERIFY`
 */

export * from './types';
export * from './errors';
export {
  Client,
  newClient,
  withHTTPClient,
  withLogger,
  withTLSClientConfig,
  withTimeout,
} from './client';
export type { ClientOption } from './client';
export { DEFAULT_HEADERS, RETRY_COUNT_HEADER, Request, newRequest } from './request';
export type { RequestClient } from './request';
export {
  JSON_CONTENT_TYPE,
  ResponseTarget,
  XML_CONTENT_TYPE,
  decodeInto,
  decodeResponse,
  errorBodySchema,
  mediaType,
} from './decode';
export type { ErrorBody } from './decode';
export { TLSConfig } from './tls';
export { createClientFromEnv, loadClientOptionsFromEnv } from './config';
export type { RequestKitEnv } from './config';
export { ConsoleLogger, defaultLogger } from './logger';
export * from './transport/undiciTransport';
