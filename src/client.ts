import { z } from 'zod';
import {
  ACTION_CREATE,
  ACTION_DELETE,
  ACTION_LIST,
  AUTO_TTL,
  RECORD_TYPES,
} from './constants.js';
import { resolveConfig, type DnsClientOptions } from './config.js';
import { extractDomain, extractSubdomain } from './domain.js';
import { GenericApiError, InvalidInputError, isDnsClientError } from './errors.js';
import { createLogger } from './logger.js';
import { RecordStore } from './record-store.js';
import { interpretResponse, parseRecordPage } from './response.js';
import { buildQueryString, sendRequest, type QueryParams } from './transport.js';
import type { ApiAction, CreateRecordInput, DnsRecord, RecordType } from './types.js';

/** Client for the legacy GET-based DNS management API */
export interface DnsClient {
  /**
   * List the records of a domain or subdomain, following pagination.
   *
   * A record is kept when its name contains `name` as a plain substring and,
   * if `recordType` is given, its type matches. One record per name: the
   * first one the provider returns wins.
   */
  listRecords(name: string, recordType?: string): Promise<DnsRecord[]>;
  /** Create a record, then return a fresh listing for its name */
  createRecord(input: CreateRecordInput): Promise<DnsRecord[]>;
  /**
   * Delete the records `listRecords(name, recordType)` returns.
   *
   * The listing holds one record per name (the first the provider returns),
   * so without `recordType` a name carrying several records, say A and MX,
   * loses only the first; call once per type to clear them all.
   *
   * Resolves to an empty array: the provider applies deletions with some
   * latency, so a listing right afterwards may still show the records.
   */
  deleteRecords(name: string, recordType?: string): Promise<DnsRecord[]>;
}

const ipAddress = z.string().ip();

function isRecordType(value: string): value is RecordType {
  return RECORD_TYPES.some((type) => type === value);
}

function parseRecordType(value: string, message: string): RecordType {
  const upper = value.toUpperCase();
  if (!isRecordType(upper)) {
    throw new InvalidInputError(message);
  }
  return upper;
}

/**
 * Create a DNS API client.
 *
 * Uses native `fetch` (Node 18+). Credentials are sent as the `tkn` and
 * `email` query parameters on every call.
 */
export function createDnsClient(options: DnsClientOptions): DnsClient {
  const config = resolveConfig(options);
  const baseLogger = options.logger ?? createLogger({ level: 'silent' });
  const logger = baseLogger.child({ module: 'dns-client' });

  async function call(
    action: ApiAction,
    zone: string,
    params: QueryParams = {}
  ): Promise<unknown> {
    const queryString = buildQueryString({
      a: action,
      tkn: config.authKey,
      email: config.authEmail,
      z: zone,
      ...params,
    });

    logger.debug({ action, zone }, 'Sending DNS API request');
    const body = await sendRequest(config.endpoint, queryString, {
      timeoutMs: config.timeoutMs,
    });

    try {
      return interpretResponse(body);
    } catch (err) {
      if (isDnsClientError(err)) {
        logger.warn({ action, zone, errCode: err.code }, err.message);
      }
      throw err;
    }
  }

  async function listRecords(
    name: string,
    recordType?: string
  ): Promise<DnsRecord[]> {
    const type =
      recordType === undefined
        ? undefined
        : parseRecordType(recordType, 'The record type is not valid');
    const zone = extractDomain(name);
    const store = new RecordStore();

    let offset = 0;
    for (let page = 1; ; page++) {
      if (page > config.maxPages) {
        throw new GenericApiError(
          `Listing for ${zone} did not finish within ${config.maxPages} pages`
        );
      }

      const payload = await call(ACTION_LIST, zone, {
        o: offset > 0 ? offset : undefined,
      });
      const { hasMore, count, records } = parseRecordPage(payload);
      store.collect(records, { match: name, type });

      logger.debug({ zone, page, offset, count, hasMore }, 'Fetched record page');

      if (!hasMore) break;
      offset += count;
    }

    return store.toArray();
  }

  return {
    listRecords,

    async createRecord(input: CreateRecordInput): Promise<DnsRecord[]> {
      const { name, content, ttl = 'auto', priority = 0 } = input;

      if (!name || !content) {
        throw new InvalidInputError(
          'Record name or content (IP address) is missing'
        );
      }

      const type = parseRecordType(
        input.type ?? 'A',
        'The new record does not have a valid type'
      );
      const zone = extractDomain(name).toLowerCase();
      const subdomain = extractSubdomain(name).toLowerCase();

      // Applied to every type, CNAME and TXT included
      if (!ipAddress.safeParse(content).success) {
        throw new InvalidInputError(
          'The new record does not have a valid IP address'
        );
      }

      await call(ACTION_CREATE, zone, {
        type,
        name: subdomain,
        content,
        ttl: ttl === 'auto' ? AUTO_TTL : ttl,
        prio: priority !== 0 ? priority : undefined,
      });
      logger.info({ zone, name, type }, 'Created DNS record');

      return listRecords(name);
    },

    async deleteRecords(
      name: string,
      recordType?: string
    ): Promise<DnsRecord[]> {
      const type =
        recordType === undefined
          ? undefined
          : parseRecordType(
              recordType,
              'The record type to delete is not valid'
            );

      const zone = extractDomain(name);
      if (
        zone.toLowerCase() === name.toLowerCase() &&
        (type === undefined || type === 'A')
      ) {
        throw new InvalidInputError(
          'Deleting the A record of a main domain is forbidden. Select a subdomain or another record type'
        );
      }

      const records = await listRecords(name, type);
      for (const record of records) {
        await call(ACTION_DELETE, zone, { id: record.id });
      }
      logger.info({ zone, name, type, deleted: records.length }, 'Deleted DNS records');

      return [];
    },
  };
}
