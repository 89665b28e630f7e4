import { X509Certificate } from 'node:crypto';
import { readFileSync } from 'node:fs';
import { createSecureContext } from 'node:tls';
import { ConfigError, describeError } from './errors';
import type { TLSConfiguration } from './types';

const PEM_CERTIFICATE = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g;

function readFile(path: string, what: string): string {
  try {
    return readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`could not read ${what} ${path}: ${describeError(error)}`, { cause: error });
  }
}

// Every certificate in a CA bundle must parse; at least one is required.
function loadCertPool(path: string): string {
  const pem = readFile(path, 'certificate');
  const blocks = pem.match(PEM_CERTIFICATE) ?? [];
  if (blocks.length === 0) {
    throw new ConfigError(`could not parse any PEM certificates ${path}`);
  }

  for (const block of blocks) {
    try {
      new X509Certificate(block);
    } catch (error) {
      throw new ConfigError(`could not parse any PEM certificates ${path}: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  return blocks.join('\n');
}

function loadKeyPair(certPath: string, keyPath: string): { cert: string; key: string } {
  const cert = readFile(certPath, 'certificate');
  const key = readFile(keyPath, 'key');

  try {
    createSecureContext({ cert, key });
  } catch (error) {
    throw new ConfigError(`could not load keypair ${certPath}:${keyPath}: ${describeError(error)}`, {
      cause: error,
    });
  }

  return { cert, key };
}

/**
 * Builds a TLS configuration from PEM files: an optional CA bundle to trust
 * and a client certificate and key.
 *
 * The configuration requires TLS 1.2 or newer. `insecureSkipVerify` turns off
 * server certificate verification and is meant for tests only.
 *
 * @throws ConfigError when the cert or key path is empty, or a file cannot be read or parsed
 */
export function TLSConfig(
  caPath: string,
  certPath: string,
  keyPath: string,
  insecureSkipVerify = false,
): TLSConfiguration {
  if (certPath === '' || keyPath === '') {
    throw new ConfigError('TLS key and cert file paths not provided, TLS not configured');
  }

  const ca = caPath !== '' ? loadCertPool(caPath) : undefined;
  const { cert, key } = loadKeyPair(certPath, keyPath);

  const config: TLSConfiguration = {
    ca,
    cert,
    key,
    rejectUnauthorized: !insecureSkipVerify,
    minVersion: 'TLSv1.2',
  };
  return Object.freeze(config);
}
