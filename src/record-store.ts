import { AUTO_TTL } from './constants.js';
import type { ApiRecord } from './response.js';
import type { DnsRecord, RecordType } from './types.js';

export interface RecordFilter {
  /** Plain substring the record name must contain (not a label-boundary match) */
  match: string;
  type?: RecordType;
}

/** Reduce an API record to the fields the client exposes */
export function toDnsRecord(record: ApiRecord): DnsRecord {
  const result: DnsRecord = {
    id: record.rec_id,
    type: record.type,
    name: record.name,
    ttl: record.ttl === AUTO_TTL ? 'auto' : record.ttl,
  };
  if (record.content) {
    result.content = record.content;
  }
  return result;
}

/**
 * Accumulates the records of one listing, keyed by name.
 *
 * The first record stored under a name wins; later pages never overwrite it.
 */
export class RecordStore {
  private readonly records = new Map<string, DnsRecord>();

  get size(): number {
    return this.records.size;
  }

  has(name: string): boolean {
    return this.records.has(name);
  }

  /** Returns false when a record with the same name is already held */
  add(record: DnsRecord): boolean {
    if (this.records.has(record.name)) return false;
    this.records.set(record.name, record);
    return true;
  }

  /** Store every record of a page that passes the filter; returns how many were added */
  collect(records: ApiRecord[], filter: RecordFilter): number {
    let added = 0;
    for (const record of records) {
      if (this.has(record.name)) continue;
      if (!record.name.includes(filter.match)) continue;
      if (filter.type && record.type !== filter.type) continue;
      if (this.add(toDnsRecord(record))) added++;
    }
    return added;
  }

  toArray(): DnsRecord[] {
    return [...this.records.values()];
  }
}
