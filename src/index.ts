export { createDnsClient } from './client.js';
export type { DnsClient } from './client.js';
export { extractDomain, extractSubdomain } from './domain.js';
export { RecordStore, toDnsRecord } from './record-store.js';
export type { RecordFilter } from './record-store.js';
export { resolveConfig, configFromEnv } from './config.js';
export type { DnsClientConfig, DnsClientOptions } from './config.js';
export { createLogger, DEFAULT_REDACT_PATHS } from './logger.js';
export type { CreateLoggerOptions } from './logger.js';
export {
  DnsError,
  InvalidInputError,
  AuthenticationError,
  RateLimitError,
  GenericApiError,
  TransportError,
  isDnsClientError,
} from './errors.js';
export type { DnsClientError, DnsErrorKind, DnsErrorOptions } from './errors.js';
export { settle } from './result.js';
export type { DnsResult } from './result.js';
export {
  DEFAULT_ENDPOINT,
  REQUEST_TIMEOUT_MS,
  MAX_PAGES,
  RECORD_TYPES,
} from './constants.js';
export type { DnsRecord, RecordType, Ttl, CreateRecordInput } from './types.js';
