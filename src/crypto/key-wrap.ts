/**
 * Asymmetric Key-Wrap Unit
 *
 * Wraps the per-call AES key under the recipient's RSA public key with
 * RSA-OAEP. The parameters are fixed: SHA-256 as the OAEP digest, MGF1 with
 * SHA-256, and the empty label. Node applies the OAEP digest to MGF1 as well,
 * which is the pairing a standard consumer expects.
 */

import {
  constants,
  createPublicKey,
  privateDecrypt,
  publicEncrypt,
  type KeyObject
} from 'node:crypto';

import { decodeHex } from '../codec/hex.js';
import { KeyFormatError, WrapError, errorMessage } from '../lib/errors.js';

export const OAEP_HASH = 'sha256';
const OAEP_HASH_LENGTH = 32;

/**
 * Largest payload RSA-OAEP-SHA256 can wrap under a modulus of the given size
 */
export function maxWrapPayload(modulusBits: number): number {
  return Math.ceil(modulusBits / 8) - 2 * OAEP_HASH_LENGTH - 2;
}

/**
 * Parse a hex-encoded DER SubjectPublicKeyInfo into an RSA public key
 */
export function parsePublicKey(encodedHex: string): KeyObject {
  let der: Buffer;
  try {
    der = decodeHex(encodedHex);
  } catch (error) {
    throw new KeyFormatError(`Failed to parse RSA public key: ${errorMessage(error)}`, {
      cause: error
    });
  }

  let publicKey: KeyObject;
  try {
    publicKey = createPublicKey({ key: der, format: 'der', type: 'spki' });
  } catch (error) {
    throw new KeyFormatError(`Failed to parse RSA public key: ${errorMessage(error)}`, {
      cause: error
    });
  }

  if (publicKey.asymmetricKeyType !== 'rsa') {
    throw new KeyFormatError(
      `Failed to parse RSA public key: unsupported key type ${publicKey.asymmetricKeyType ?? 'unknown'}`
    );
  }

  return publicKey;
}

/**
 * Encrypt key bytes under an RSA public key with OAEP/MGF1-SHA-256
 */
export function wrap(keyBytes: Buffer, publicKey: KeyObject): Buffer {
  const modulusBits = publicKey.asymmetricKeyDetails?.modulusLength;
  if (modulusBits !== undefined && keyBytes.length > maxWrapPayload(modulusBits)) {
    throw new WrapError(
      `Key of ${keyBytes.length} bytes exceeds the ${maxWrapPayload(modulusBits)}-byte OAEP limit for a ${modulusBits}-bit modulus`
    );
  }

  try {
    return publicEncrypt(
      {
        key: publicKey,
        padding: constants.RSA_PKCS1_OAEP_PADDING,
        oaepHash: OAEP_HASH
      },
      keyBytes
    );
  } catch (error) {
    throw new WrapError(`Failed to encrypt with RSA: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * Recover wrapped key bytes with the matching RSA private key
 */
export function unwrap(wrappedKey: Buffer, privateKey: KeyObject): Buffer {
  try {
    return privateDecrypt(
      {
        key: privateKey,
        padding: constants.RSA_PKCS1_OAEP_PADDING,
        oaepHash: OAEP_HASH
      },
      wrappedKey
    );
  } catch (error) {
    throw new WrapError(`Failed to decrypt with RSA: ${errorMessage(error)}`, { cause: error });
  }
}
