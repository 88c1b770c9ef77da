import { describe, it, expect } from 'vitest';

import { decodeHex, encodeHex } from '../../src/codec/hex.js';
import { frame, unframe } from '../../src/crypto/index.js';
import {
  AuthenticityError,
  FormatError,
  FramingError,
  WrapError
} from '../../src/lib/errors.js';
import { CardEncryptionService } from '../../src/services/card-encryption.js';
import { openEnvelope } from '../../src/services/envelope-reader.js';
import { rsaKeyPair } from '../helpers/rsa-keys.js';

const CARD_NUMBER = '4532123456789012';

function encryptFor(modulusLength = 2048): string {
  const outcome = new CardEncryptionService().encrypt({
    rsaPublicKeyHex: rsaKeyPair(modulusLength).publicKeyHex,
    cardNumber: CARD_NUMBER
  });
  if (!outcome.success) {
    throw new Error(outcome.message);
  }
  return outcome.encryptedDataHex;
}

describe('openEnvelope', () => {
  it('should recover the card number with the matching private key', () => {
    expect(openEnvelope(encryptFor(), rsaKeyPair(2048).privateKey)).toBe(CARD_NUMBER);
  });

  it('should fail with WrapError for a different private key', () => {
    expect(() => openEnvelope(encryptFor(2048), rsaKeyPair(3072).privateKey)).toThrow(WrapError);
  });

  it('should fail with AuthenticityError when the sealed payload is tampered', () => {
    const { nonce, sealed, wrappedKey } = unframe(decodeHex(encryptFor()));
    const tampered = Buffer.from(sealed);
    tampered[0] ^= 0x01;

    expect(() =>
      openEnvelope(encodeHex(frame(nonce, tampered, wrappedKey)), rsaKeyPair(2048).privateKey)
    ).toThrow(AuthenticityError);
  });

  it('should fail with AuthenticityError when the nonce is swapped', () => {
    const { sealed, wrappedKey } = unframe(decodeHex(encryptFor()));

    expect(() =>
      openEnvelope(encodeHex(frame(Buffer.alloc(12), sealed, wrappedKey)), rsaKeyPair(2048).privateKey)
    ).toThrow(AuthenticityError);
  });

  it('should fail with FramingError on a truncated envelope', () => {
    expect(() => openEnvelope(encryptFor().slice(0, 30), rsaKeyPair(2048).privateKey)).toThrow(FramingError);
  });

  it('should fail with FormatError on non-hex input', () => {
    expect(() => openEnvelope('not hex!', rsaKeyPair(2048).privateKey)).toThrow(FormatError);
  });
});
