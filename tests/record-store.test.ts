import { describe, it, expect } from 'vitest';
import { RecordStore, toDnsRecord } from '../src/record-store.js';
import type { ApiRecord } from '../src/response.js';

function apiRecord(
  id: string,
  type: string,
  name: string,
  content: string | null = '192.0.2.1'
): ApiRecord {
  return { rec_id: id, type, name, ttl: 1, content };
}

describe('toDnsRecord', () => {
  it('maps ttl 1 to auto', () => {
    expect(toDnsRecord(apiRecord('1', 'A', 'example.com'))).toEqual({
      id: '1',
      type: 'A',
      name: 'example.com',
      ttl: 'auto',
      content: '192.0.2.1',
    });
  });

  it('keeps explicit ttl values', () => {
    expect(toDnsRecord({ ...apiRecord('1', 'A', 'example.com'), ttl: 3600 }).ttl).toBe(
      3600
    );
  });

  it('omits empty content', () => {
    expect(toDnsRecord(apiRecord('1', 'A', 'example.com', ''))).not.toHaveProperty(
      'content'
    );
    expect(toDnsRecord(apiRecord('1', 'A', 'example.com', null))).not.toHaveProperty(
      'content'
    );
  });
});

describe('RecordStore', () => {
  it('keeps the first record stored under a name', () => {
    const store = new RecordStore();

    expect(store.add(toDnsRecord(apiRecord('1', 'A', 'www.example.com')))).toBe(true);
    expect(store.add(toDnsRecord(apiRecord('2', 'CNAME', 'www.example.com')))).toBe(
      false
    );

    expect(store.size).toBe(1);
    expect(store.toArray().map((r) => r.id)).toEqual(['1']);
  });

  it('collects records whose name contains the match', () => {
    const store = new RecordStore();
    const added = store.collect(
      [
        apiRecord('1', 'A', 'example.com'),
        apiRecord('2', 'A', 'api.example.com'),
        apiRecord('3', 'A', 'api.other.org'),
      ],
      { match: 'example.com' }
    );

    expect(added).toBe(2);
    expect(store.toArray().map((r) => r.name)).toEqual(['example.com', 'api.example.com']);
  });

  it('matches names as plain substrings, not on label boundaries', () => {
    const store = new RecordStore();
    store.collect([apiRecord('1', 'A', 'notexample.com')], { match: 'example.com' });

    expect(store.has('notexample.com')).toBe(true);
  });

  it('filters by type', () => {
    const store = new RecordStore();
    store.collect(
      [
        apiRecord('1', 'CNAME', 'sub.example.com'),
        apiRecord('2', 'A', 'sub.example.com'),
      ],
      { match: 'sub.example.com', type: 'A' }
    );

    expect(store.toArray()).toEqual([
      { id: '2', type: 'A', name: 'sub.example.com', ttl: 'auto', content: '192.0.2.1' },
    ]);
  });

  it('skips names already collected from an earlier page', () => {
    const store = new RecordStore();
    store.collect([apiRecord('1', 'A', 'a.example.com')], { match: 'example.com' });
    const added = store.collect(
      [apiRecord('9', 'A', 'a.example.com'), apiRecord('2', 'A', 'b.example.com')],
      { match: 'example.com' }
    );

    expect(added).toBe(1);
    expect(store.toArray().map((r) => r.id)).toEqual(['1', '2']);
  });
});
