import { describe, it, expect } from 'vitest';

import { maskCardNumber, previewHex } from '../../src/lib/masking.js';

describe('masking', () => {
  it('should keep only the last four card digits', () => {
    expect(maskCardNumber('4532123456789012')).toBe('****9012');
  });

  it('should fully mask short values', () => {
    expect(maskCardNumber('123')).toBe('****');
  });

  it('should shorten long hex', () => {
    expect(previewHex('ABCDEF0123', 4)).toBe('ABCD...');
  });

  it('should leave short hex untouched', () => {
    expect(previewHex('ABCD', 4)).toBe('ABCD');
  });
});
