/**
 * Live test: list, create or delete records through the DNS API.
 *
 * Usage:
 *   DNS_API_EMAIL=you@example.com DNS_API_KEY=xxx npx tsx examples/manage-records.ts list example.com [type]
 *   DNS_API_EMAIL=you@example.com DNS_API_KEY=xxx npx tsx examples/manage-records.ts create api.example.com 192.0.2.10 [type]
 *   DNS_API_EMAIL=you@example.com DNS_API_KEY=xxx npx tsx examples/manage-records.ts delete api.example.com [type]
 */

import { configFromEnv, createDnsClient, settle } from '../src/index.js';
import type { DnsRecord } from '../src/index.js';

const [command, name, ...rest] = process.argv.slice(2);

if (!command || !name) {
  console.error(
    'Usage: npx tsx examples/manage-records.ts <list|create|delete> <name> [content] [type]'
  );
  process.exit(1);
}

function printRecords(records: DnsRecord[]) {
  if (records.length === 0) {
    console.log('  (no records)');
    return;
  }
  for (const r of records) {
    const ttl = r.ttl === 'auto' ? 'auto' : `${r.ttl}s`;
    console.log(`  ${r.type.padEnd(6)} ${r.name} -> ${r.content ?? '-'} (ttl ${ttl}, id ${r.id})`);
  }
}

async function run(command: string, name: string): Promise<DnsRecord[]> {
  const client = createDnsClient(configFromEnv());
  switch (command) {
    case 'list':
      return client.listRecords(name, rest[0]);
    case 'create': {
      const [content = '', type] = rest;
      return client.createRecord({ name, content, type });
    }
    case 'delete':
      return client.deleteRecords(name, rest[0]);
    default:
      throw new Error(`Unknown command "${command}"`);
  }
}

async function main(command: string, name: string) {
  const outcome = await settle(() => run(command, name));

  if (!outcome.ok) {
    console.error(`\n[${outcome.error.kind}] ${outcome.error.message}`);
    process.exit(1);
  }

  console.log(`\n${command} ${name}:`);
  printRecords(outcome.value);
  if (command === 'delete') {
    console.log('Deletion requested; the provider may take a moment to apply it.');
  }
}

main(command, name).catch((err) => {
  console.error('\nError:', err instanceof Error ? err.message : err);
  process.exit(1);
});
