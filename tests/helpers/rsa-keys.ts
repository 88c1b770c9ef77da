import { generateKeyPairSync, type KeyObject } from 'node:crypto';

import { encodeHex } from '../../src/codec/hex.js';

export interface TestKeyPair {
  publicKey: KeyObject;
  privateKey: KeyObject;
  publicKeyHex: string;
}

const cache = new Map<number, TestKeyPair>();

/**
 * Generate (once per size) an RSA key pair with its SPKI public key in hex
 */
export function rsaKeyPair(modulusLength = 2048): TestKeyPair {
  const cached = cache.get(modulusLength);
  if (cached) {
    return cached;
  }

  const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength });
  const pair = {
    publicKey,
    privateKey,
    publicKeyHex: encodeHex(publicKey.export({ format: 'der', type: 'spki' }))
  };
  cache.set(modulusLength, pair);
  return pair;
}
