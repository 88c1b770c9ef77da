import { describe, it, expect } from 'vitest';

import { createLogger, logger } from '../../src/lib/logger.js';

function captureLines(): { lines: string[]; stream: { write(msg: string): void } } {
  const lines: string[] = [];
  return { lines, stream: { write: msg => lines.push(msg) } };
}

describe('Logger', () => {
  it('should honour the configured level', () => {
    expect(logger.level).toBe('silent');
  });

  it('should remove card numbers and key material from log lines', () => {
    const { lines, stream } = captureLines();
    const log = createLogger(stream, 'info');

    log.info(
      { operationId: 'op-1', cardNumber: '4532123456789012', key: 'test-secret', rsaPublicKeyHex: 'AB' },
      'Encrypting'
    );

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.operationId).toBe('op-1');
    expect(entry.msg).toBe('Encrypting');
    expect(entry.app).toBe('card-envelope-crypto');
    expect(entry).not.toHaveProperty('cardNumber');
    expect(entry).not.toHaveProperty('key');
    expect(entry).not.toHaveProperty('rsaPublicKeyHex');
  });

  it('should remove nested card numbers', () => {
    const { lines, stream } = captureLines();
    const log = createLogger(stream, 'info');

    log.info({ request: { cardNumber: '4532123456789012', rsaPublicKeyHex: 'AB' } }, 'Received');

    const entry = JSON.parse(lines[0] ?? '{}');
    expect(entry.request).toEqual({});
  });

  it('should drop entries below the configured level', () => {
    const { lines, stream } = captureLines();
    const log = createLogger(stream, 'warn');

    log.info('ignored');
    log.warn('kept');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '{}').msg).toBe('kept');
  });
});
