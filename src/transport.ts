import { z } from 'zod';
import { REQUEST_TIMEOUT_MS } from './constants.js';
import { TransportError } from './errors.js';

export type QueryParams = Record<string, string | number | undefined>;

export interface TransportOptions {
  timeoutMs?: number;
}

/**
 * Build `?key=value&...` from params in insertion order, skipping `undefined`.
 */
export function buildQueryString(params: QueryParams): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      search.append(key, String(value));
    }
  }
  return `?${search.toString()}`;
}

const envelopeShape = z.object({ result: z.string() });

/** True when the body is a provider envelope, whatever the HTTP status */
function isEnvelope(body: string): boolean {
  try {
    return envelopeShape.safeParse(JSON.parse(body)).success;
  } catch {
    return false;
  }
}

function isTimeout(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

/**
 * GET `endpoint + queryString` and return the raw body. No parsing, no retries.
 *
 * A non-2xx response still returns its body when that body is a provider
 * envelope; only other non-2xx bodies raise TransportError.
 */
export async function sendRequest(
  endpoint: string,
  queryString: string,
  options: TransportOptions = {}
): Promise<string> {
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  let res: Response;
  let body: string;
  try {
    res = await fetch(`${endpoint}${queryString}`, {
      method: 'GET',
      signal: AbortSignal.timeout(timeoutMs),
    });
    body = await res.text();
  } catch (err) {
    if (isTimeout(err)) {
      throw new TransportError(`Request timed out after ${timeoutMs}ms`, {
        cause: err,
      });
    }
    const reason = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Request failed: ${reason}`, { cause: err });
  }

  if (!res.ok && !isEnvelope(body)) {
    throw new TransportError(`DNS API error ${res.status}: ${body}`);
  }

  return body;
}
