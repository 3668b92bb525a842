export type DnsErrorKind =
  | 'invalid_input'
  | 'authentication'
  | 'rate_limit'
  | 'api'
  | 'transport';

export interface DnsErrorOptions {
  /** Provider result marker; `'error'` for failures raised before any response */
  result?: string;
  /** Provider `err_code`, when one was returned */
  code?: string;
  cause?: unknown;
}

/**
 * Base class of every error the client raises.
 *
 * Branch on `kind` rather than on the class: the union `DnsClientError`
 * narrows on it.
 */
export abstract class DnsError extends Error {
  abstract readonly kind: DnsErrorKind;
  readonly result: string;
  readonly code: string | undefined;

  constructor(message: string, options: DnsErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.result = options.result ?? 'error';
    this.code = options.code;
  }
}

/** Bad caller input, or input the provider flagged as invalid (`E_INVLDINPUT`) */
export class InvalidInputError extends DnsError {
  readonly kind = 'invalid_input' as const;
  override readonly name = 'InvalidInputError';
}

/** Missing or rejected credentials (`E_UNAUTH`) */
export class AuthenticationError extends DnsError {
  readonly kind = 'authentication' as const;
  override readonly name = 'AuthenticationError';
}

/** Provider call-volume limit hit (`E_MAXAPI`) */
export class RateLimitError extends DnsError {
  readonly kind = 'rate_limit' as const;
  override readonly name = 'RateLimitError';
}

/** Any other provider-reported failure, or a response the client cannot read */
export class GenericApiError extends DnsError {
  readonly kind = 'api' as const;
  override readonly name = 'GenericApiError';
}

/** Network failure, timeout or HTTP error before a provider envelope was obtained */
export class TransportError extends DnsError {
  readonly kind = 'transport' as const;
  override readonly name = 'TransportError';
}

export type DnsClientError =
  | InvalidInputError
  | AuthenticationError
  | RateLimitError
  | GenericApiError
  | TransportError;

export function isDnsClientError(err: unknown): err is DnsClientError {
  return err instanceof DnsError;
}
