import type { ACTION_CREATE, ACTION_DELETE, ACTION_LIST, RECORD_TYPES } from './constants.js';

/** One of the record types the API accepts */
export type RecordType = (typeof RECORD_TYPES)[number];

/** TTL in seconds, or `'auto'` to let the provider decide */
export type Ttl = number | 'auto';

export type ApiAction =
  | typeof ACTION_LIST
  | typeof ACTION_CREATE
  | typeof ACTION_DELETE;

/** A DNS record held by the provider */
export interface DnsRecord {
  /** Provider-assigned record ID */
  id: string;
  /** Record type as reported by the provider */
  type: string;
  /** Fully qualified name the record answers for */
  name: string;
  ttl: Ttl;
  /** Record value (IP address, target host, text), when the provider returned one */
  content?: string;
}

/** Input for creating a record */
export interface CreateRecordInput {
  /** Fully qualified name, e.g. `api.example.com` */
  name: string;
  /** Must be an IP address literal, whatever the record type */
  content: string;
  /** Defaults to `A`; case-insensitive */
  type?: string;
  /** Defaults to `'auto'` */
  ttl?: Ttl;
  /** Sent only when nonzero */
  priority?: number;
}
