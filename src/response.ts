import { z } from 'zod';
import {
  AuthenticationError,
  GenericApiError,
  InvalidInputError,
  RateLimitError,
  type DnsClientError,
  type DnsErrorOptions,
} from './errors.js';

const envelopeSchema = z.object({
  result: z.string(),
  msg: z.string().nullish(),
  err_code: z.string().nullish(),
  response: z.unknown(),
});

const apiRecordSchema = z.object({
  rec_id: z.union([z.string(), z.number()]).transform(String),
  type: z.string(),
  name: z.string(),
  ttl: z.coerce.number(),
  content: z.string().nullish(),
});

const recordPageSchema = z.object({
  recs: z.object({
    has_more: z.boolean(),
    count: z.coerce.number(),
    objs: z.array(apiRecordSchema),
  }),
});

/** A record as the API serializes it in `response.recs.objs` */
export type ApiRecord = z.infer<typeof apiRecordSchema>;

/** One page of a `rec_load_all` listing */
export interface RecordPage {
  hasMore: boolean;
  count: number;
  records: ApiRecord[];
}

/**
 * Map a provider error envelope to the matching client error.
 *
 * | err_code      | error               |
 * |---------------|---------------------|
 * | E_UNAUTH      | AuthenticationError |
 * | E_INVLDINPUT  | InvalidInputError   |
 * | E_MAXAPI      | RateLimitError      |
 * | anything else | GenericApiError     |
 */
export function toApiError(
  result: string,
  message: string,
  errCode?: string
): DnsClientError {
  const options: DnsErrorOptions = { result, code: errCode };
  switch (errCode) {
    case 'E_UNAUTH':
      return new AuthenticationError(message, options);
    case 'E_INVLDINPUT':
      return new InvalidInputError(message, options);
    case 'E_MAXAPI':
      return new RateLimitError(message, options);
    default:
      return new GenericApiError(message, options);
  }
}

/**
 * Decode a raw response body and return its `response` payload.
 *
 * Throws the mapped client error when `result` is not `"success"`, and
 * GenericApiError when the body is not a JSON envelope.
 */
export function interpretResponse(body: string): unknown {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new GenericApiError('DNS API returned a malformed response', {
      cause: err,
    });
  }

  const parsed = envelopeSchema.safeParse(json);
  if (!parsed.success) {
    throw new GenericApiError('DNS API returned an unexpected response', {
      cause: parsed.error,
    });
  }

  const envelope = parsed.data;
  if (envelope.result !== 'success') {
    throw toApiError(
      envelope.result,
      envelope.msg ?? 'unknown error',
      envelope.err_code ?? undefined
    );
  }

  return envelope.response;
}

/** Read the `recs` block of a `rec_load_all` payload */
export function parseRecordPage(payload: unknown): RecordPage {
  const parsed = recordPageSchema.safeParse(payload);
  if (!parsed.success) {
    throw new GenericApiError('DNS API returned an unexpected record listing', {
      cause: parsed.error,
    });
  }

  const { recs } = parsed.data;
  return { hasMore: recs.has_more, count: recs.count, records: recs.objs };
}
