import { readFileSync } from 'node:fs';
import { TLSSocket } from 'node:tls';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { newClient, withLogger, withTLSClientConfig, type Client } from '../client';
import { decodeInto } from '../decode';
import { ConfigError, TransportError } from '../errors';
import { newRequest } from '../request';
import { TLSConfig } from '../tls';
import type { Logger } from '../types';
import { sendJson, startTLSServer, type TestServer } from './testServer';

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const CA = fixture('ca.crt');
const CLIENT_CERT = fixture('client.crt');
const CLIENT_KEY = fixture('client.key');

const silentLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

describe('TLSConfig', () => {
  it('requires both a cert and a key path', () => {
    expect(() => TLSConfig(CA, '', CLIENT_KEY)).toThrow(
      new ConfigError('TLS key and cert file paths not provided, TLS not configured'),
    );
    expect(() => TLSConfig(CA, CLIENT_CERT, '')).toThrow(ConfigError);
  });

  it('reports an unreadable CA bundle', () => {
    const missing = fixture('missing.crt');

    expect(() => TLSConfig(missing, CLIENT_CERT, CLIENT_KEY)).toThrow(`could not read certificate ${missing}: `);
  });

  it('reports a CA bundle without certificates', () => {
    const notPem = fixture('not-a-certificate.pem');

    expect(() => TLSConfig(notPem, CLIENT_CERT, CLIENT_KEY)).toThrow(
      new ConfigError(`could not parse any PEM certificates ${notPem}`),
    );
  });

  it('reports a certificate and key that do not belong together', () => {
    expect(() => TLSConfig(CA, CLIENT_CERT, fixture('server.key'))).toThrow(/^could not load keypair /);
  });

  it('loads the CA bundle and key pair', () => {
    const config = TLSConfig(CA, CLIENT_CERT, CLIENT_KEY);

    expect(config.ca).toContain('-----BEGIN CERTIFICATE-----');
    expect(config.cert).toBe(readFileSync(CLIENT_CERT, 'utf8'));
    expect(config.key).toBe(readFileSync(CLIENT_KEY, 'utf8'));
    expect(config.rejectUnauthorized).toBe(true);
    expect(config.minVersion).toBe('TLSv1.2');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('leaves the CA unset without a path', () => {
    expect(TLSConfig('', CLIENT_CERT, CLIENT_KEY).ca).toBeUndefined();
  });

  it('turns off verification when asked', () => {
    expect(TLSConfig(CA, CLIENT_CERT, CLIENT_KEY, true).rejectUnauthorized).toBe(false);
  });
});

describe('mutual TLS', () => {
  let server: TestServer | undefined;
  let client: Client | undefined;
  const peers: string[] = [];

  const startServer = async (): Promise<TestServer> =>
    startTLSServer(
      {
        key: readFileSync(fixture('server.key')),
        cert: readFileSync(fixture('server.crt')),
        ca: readFileSync(CA),
        requestCert: true,
        rejectUnauthorized: true,
      },
      (req, res) => {
        if (req.socket instanceof TLSSocket && req.socket.authorized) {
          peers.push(req.socket.getPeerCertificate().subject.CN);
        }
        sendJson(res, 200, '{"status":"ok"}');
      },
    );

  afterEach(async () => {
    await client?.close();
    await server?.close();
    client = undefined;
    server = undefined;
    peers.length = 0;
  });

  it('presents the client certificate to the server', async () => {
    server = await startServer();
    client = newClient(withLogger(silentLogger), withTLSClientConfig(TLSConfig(CA, CLIENT_CERT, CLIENT_KEY)));
    const ok = decodeInto(z.object({ status: z.string() }));

    await newRequest().setURL(server.url).setWantedResponseBody(ok).send(client);

    expect(ok.value).toEqual({ status: 'ok' });
    expect(peers).toEqual(['requestkit test client']);
  });

  it('fails when the server certificate is not trusted', async () => {
    server = await startServer();
    client = newClient(withLogger(silentLogger), withTLSClientConfig(TLSConfig('', CLIENT_CERT, CLIENT_KEY)));

    await expect(newRequest().setURL(server.url).send(client)).rejects.toThrow(TransportError);
    expect(peers).toEqual([]);
  });

  it('connects to an untrusted server when verification is off', async () => {
    server = await startServer();
    client = newClient(
      withLogger(silentLogger),
      withTLSClientConfig(TLSConfig('', CLIENT_CERT, CLIENT_KEY, true)),
    );

    await newRequest().setURL(server.url).send(client);

    expect(peers).toEqual(['requestkit test client']);
  });
});
