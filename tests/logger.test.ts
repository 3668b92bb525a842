import { describe, it, expect } from 'vitest';
import { createLogger } from '../src/logger.js';

function createCapture() {
  const lines: Record<string, unknown>[] = [];
  const destination = {
    write(msg: string) {
      lines.push(JSON.parse(msg));
    },
  };
  return { lines, destination };
}

describe('createLogger', () => {
  it('upper-cases level labels', () => {
    const { lines, destination } = createCapture();
    createLogger({ destination }).info('ready');

    expect(lines[0]).toMatchObject({ level: 'INFO', msg: 'ready' });
  });

  it('redacts credentials by default', () => {
    const { lines, destination } = createCapture();
    createLogger({ level: 'debug', destination }).debug(
      { tkn: 'test-secret', zone: 'example.com' },
      'Request'
    );

    expect(lines[0]).toMatchObject({
      tkn: '[Redacted]',
      zone: 'example.com',
      msg: 'Request',
    });
  });

  it('redacts nested credentials', () => {
    const { lines, destination } = createCapture();
    createLogger({ destination }).info({ options: { authKey: 'test-secret' } }, 'Config');

    expect(lines[0]).toMatchObject({ options: { authKey: '[Redacted]' } });
  });

  it('merges custom paths with the defaults', () => {
    const { lines, destination } = createCapture();
    createLogger({ destination, redact: ['zone'] }).info(
      { tkn: 'test-secret', zone: 'example.com' },
      'Request'
    );

    expect(lines[0]).toMatchObject({ tkn: '[Redacted]', zone: '[Redacted]' });
  });

  it('can disable redaction', () => {
    const { lines, destination } = createCapture();
    createLogger({ destination, redact: false }).info({ tkn: 'test-secret' }, 'Request');

    expect(lines[0]).toMatchObject({ tkn: 'test-secret' });
  });

  it('writes nothing below the configured level', () => {
    const { lines, destination } = createCapture();
    createLogger({ destination, level: 'warn' }).info('ignored');

    expect(lines).toEqual([]);
  });
});
