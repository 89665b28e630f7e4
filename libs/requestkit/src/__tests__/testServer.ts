import http from 'node:http';
import https from 'node:https';
import type { AddressInfo } from 'node:net';

export type Handler = (req: http.IncomingMessage, res: http.ServerResponse) => void;

export interface TestServer {
  url: string;
  close(): Promise<void>;
}

interface ListeningServer {
  listen(port: number, host: string, callback: () => void): unknown;
  address(): AddressInfo | string | null;
  close(callback: () => void): unknown;
  closeAllConnections(): void;
}

function listen(server: ListeningServer, protocol: 'http' | 'https'): Promise<TestServer> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr = server.address();
      const port = typeof addr === 'object' && addr ? addr.port : 0;
      resolve({
        url: `${protocol}://127.0.0.1:${port}`,
        close: () =>
          new Promise((done) => {
            server.closeAllConnections();
            server.close(() => done());
          }),
      });
    });
  });
}

export const startServer = (handler: Handler): Promise<TestServer> => listen(http.createServer(handler), 'http');

export const startTLSServer = (options: https.ServerOptions, handler: Handler): Promise<TestServer> =>
  listen(https.createServer(options, handler), 'https');

export const sendJson = (res: http.ServerResponse, status: number, body: string): void => {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(body);
};

export const readBody = (req: http.IncomingMessage): Promise<string> =>
  new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on('data', (chunk: Buffer) => chunks.push(chunk));
    req.on('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    req.on('error', reject);
  });

export const text = (body: Uint8Array): string => new TextDecoder().decode(body);

/** Responds after `delayMs`, unless the connection closes first. */
export const respondLater = (res: http.ServerResponse, delayMs: number, status: number, body: string): void => {
  const timer = setTimeout(() => sendJson(res, status, body), delayMs);
  res.on('close', () => clearTimeout(timer));
};
