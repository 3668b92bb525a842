import { isDnsClientError, type DnsClientError } from './errors.js';

export type DnsResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DnsClientError };

/**
 * Run a client operation and capture its outcome as a tagged result.
 *
 * Client errors resolve to `{ ok: false, error }`; anything else is rethrown.
 *
 * @example
 * ```typescript
 * const outcome = await settle(() => client.listRecords('example.com'));
 * if (!outcome.ok && outcome.error.kind === 'rate_limit') {
 *   // back off
 * }
 * ```
 */
export async function settle<T>(
  operation: () => Promise<T>
): Promise<DnsResult<T>> {
  try {
    return { ok: true, value: await operation() };
  } catch (err) {
    if (isDnsClientError(err)) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
