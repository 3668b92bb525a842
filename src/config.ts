import type { Logger } from 'pino';
import { z } from 'zod';
import { DEFAULT_ENDPOINT, MAX_PAGES, REQUEST_TIMEOUT_MS } from './constants.js';
import { InvalidInputError } from './errors.js';

const configSchema = z.object({
  endpoint: z.string().url('endpoint must be a URL').default(DEFAULT_ENDPOINT),
  authEmail: z
    .string({ required_error: 'authEmail is required' })
    .min(1, 'authEmail is required'),
  authKey: z
    .string({ required_error: 'authKey is required' })
    .min(1, 'authKey is required'),
  timeoutMs: z.number().int().positive().default(REQUEST_TIMEOUT_MS),
  maxPages: z.number().int().positive().default(MAX_PAGES),
});

const envSchema = z.object({
  DNS_API_ENDPOINT: z.string().url('DNS_API_ENDPOINT must be a URL').optional(),
  DNS_API_EMAIL: z
    .string({ required_error: 'DNS_API_EMAIL is required' })
    .min(1, 'DNS_API_EMAIL is required'),
  DNS_API_KEY: z
    .string({ required_error: 'DNS_API_KEY is required' })
    .min(1, 'DNS_API_KEY is required'),
  DNS_API_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

/** Client configuration after defaults are applied */
export type DnsClientConfig = z.output<typeof configSchema>;

export type DnsClientOptions = z.input<typeof configSchema> & {
  /** pino logger; when omitted the client logs nothing */
  logger?: Logger;
};

function firstIssue(error: z.ZodError): string {
  return error.issues[0]?.message ?? 'invalid configuration';
}

/** Validate client options and apply defaults */
export function resolveConfig(options: DnsClientOptions): DnsClientConfig {
  const parsed = configSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidInputError(`DNS client: ${firstIssue(parsed.error)}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Read client options from environment variables:
 * `DNS_API_EMAIL`, `DNS_API_KEY`, and optionally `DNS_API_ENDPOINT` and
 * `DNS_API_TIMEOUT_MS`.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): DnsClientOptions {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new InvalidInputError(`DNS client: ${firstIssue(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const vars = parsed.data;
  return {
    endpoint: vars.DNS_API_ENDPOINT,
    authEmail: vars.DNS_API_EMAIL,
    authKey: vars.DNS_API_KEY,
    timeoutMs: vars.DNS_API_TIMEOUT_MS,
  };
}
