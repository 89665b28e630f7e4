/**
 * Sends a request that succeeds and one that fails against a local server.
 *
 *   npx tsx libs/requestkit/examples/basic.ts
 */
import http from 'node:http';
import { z } from 'zod';
import {
  ConsoleLogger,
  UnexpectedStatusCodeError,
  decodeInto,
  errorBodySchema,
  newClient,
  newRequest,
  withLogger,
  withTimeout,
} from '../src';

const server = http.createServer((req, res) => {
  res.setHeader('Content-Type', 'application/json');
  if (req.url === '/todos/1') {
    res.end(JSON.stringify({ id: 1, title: 'write the docs', done: false }));
    return;
  }
  res.statusCode = 404;
  res.end(JSON.stringify({ error: `no route for ${req.url}` }));
});

async function main(): Promise<void> {
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  const port = typeof address === 'object' && address ? address.port : 0;
  const baseUrl = `http://127.0.0.1:${port}`;

  const client = newClient(withTimeout(5_000), withLogger(new ConsoleLogger()));

  const todo = decodeInto(z.object({ id: z.number(), title: z.string(), done: z.boolean() }));
  await newRequest().setURL(`${baseUrl}/todos/1`).setAuthToken('test-token').setWantedResponseBody(todo).send(client);
  console.log('todo:', todo.value);

  const failure = decodeInto(errorBodySchema);
  try {
    await newRequest().setURL(`${baseUrl}/todos/2`).setErrorResponseBody(failure).send(client);
  } catch (error) {
    if (!(error instanceof UnexpectedStatusCodeError)) throw error;
    console.log(`status ${error.status}:`, failure.value?.error);
  }
}

main()
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  })
  .finally(() => server.close());
