import type { KeyObject } from 'node:crypto';

import { decodeHex } from '../codec/hex.js';
import { unframe } from '../crypto/framing.js';
import { unwrap } from '../crypto/key-wrap.js';
import { open, zeroizeKey } from '../crypto/symmetric.js';

/**
 * Recover the card number from a hex envelope with the recipient's private key.
 * Throws FormatError, FramingError, WrapError, CipherError or AuthenticityError.
 */
export function openEnvelope(encryptedDataHex: string, privateKey: KeyObject): string {
  const { nonce, sealed, wrappedKey } = unframe(decodeHex(encryptedDataHex));
  const key = unwrap(wrappedKey, privateKey);

  try {
    return open(sealed, key, nonce).toString('utf8');
  } finally {
    zeroizeKey(key);
  }
}
