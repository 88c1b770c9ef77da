import { describe, it, expect } from 'vitest';

import type { CryptoProvider } from '../src/crypto/index.js';
import { CardEncryptionService, bootstrap, runSelfTest } from '../src/index.js';

describe('bootstrap', () => {
  it('should build a service without a self-test by default in tests', () => {
    expect(bootstrap()).toBeInstanceOf(CardEncryptionService);
  });

  it('should run the self-test when asked', () => {
    expect(bootstrap({ selfTest: true })).toBeInstanceOf(CardEncryptionService);
  });

  it('should fail when the self-test cannot encrypt', () => {
    const provider: CryptoProvider = {
      name: 'short-key',
      randomBytes: size => Buffer.alloc(size === 32 ? 16 : size)
    };

    expect(() => bootstrap({ provider, selfTest: true })).toThrow(
      'Self-test encryption failed: Encryption failed: Provider short-key returned a 16-byte key, expected 32 bytes'
    );
  });

  it('should round trip through runSelfTest directly', () => {
    expect(() => runSelfTest(new CardEncryptionService(), 2048)).not.toThrow();
  });
});
