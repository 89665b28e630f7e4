import { z } from 'zod';
import { newClient, withTLSClientConfig, withTimeout, type Client, type ClientOption } from './client';
import { ConfigError } from './errors';
import { TLSConfig } from './tls';

const envSchema = z.object({
  REQUESTKIT_TIMEOUT_MS: z.coerce.number().int().nonnegative().optional(),
  REQUESTKIT_TLS_CA: z.string().optional(),
  REQUESTKIT_TLS_CERT: z.string().optional(),
  REQUESTKIT_TLS_KEY: z.string().optional(),
  REQUESTKIT_TLS_INSECURE_SKIP_VERIFY: z.enum(['true', 'false']).optional(),
});

export type RequestKitEnv = z.infer<typeof envSchema>;

type Env = Record<string, string | undefined>;

/**
 * Reads client settings from environment variables. Empty values count as unset.
 *
 * - `REQUESTKIT_TIMEOUT_MS` - per-attempt timeout in milliseconds
 * - `REQUESTKIT_TLS_CERT`, `REQUESTKIT_TLS_KEY` - client certificate and key (PEM paths)
 * - `REQUESTKIT_TLS_CA` - CA bundle to trust (PEM path)
 * - `REQUESTKIT_TLS_INSECURE_SKIP_VERIFY` - `true` skips server verification (tests only)
 *
 * @throws ConfigError when a value is invalid or the TLS files cannot be loaded
 */
export function loadClientOptionsFromEnv(env: Env = process.env): ClientOption[] {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`invalid environment: ${details}`, { cause: parsed.error });
  }

  const settings = parsed.data;
  const options: ClientOption[] = [];

  if (settings.REQUESTKIT_TLS_CERT || settings.REQUESTKIT_TLS_KEY) {
    options.push(
      withTLSClientConfig(
        TLSConfig(
          settings.REQUESTKIT_TLS_CA ?? '',
          settings.REQUESTKIT_TLS_CERT ?? '',
          settings.REQUESTKIT_TLS_KEY ?? '',
          settings.REQUESTKIT_TLS_INSECURE_SKIP_VERIFY === 'true',
        ),
      ),
    );
  }

  if (settings.REQUESTKIT_TIMEOUT_MS !== undefined) {
    options.push(withTimeout(settings.REQUESTKIT_TIMEOUT_MS));
  }

  return options;
}

/**
 * Builds a client from environment variables; `extra` options apply after them.
 */
export function createClientFromEnv(env: Env = process.env, ...extra: ClientOption[]): Client {
  return newClient(...loadClientOptionsFromEnv(env), ...extra);
}
