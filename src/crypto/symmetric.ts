/**
 * Symmetric Cipher Unit
 *
 * AES-256-GCM over the card payload. Each call to the engine draws its own
 * key and nonce; the sealed output is the ciphertext with the 16-byte GCM tag
 * appended, so its length is always plaintext length + 16.
 * No associated data is bound.
 */

import { createCipheriv, createDecipheriv, type DecipherGCM } from 'node:crypto';

import { AuthenticityError, CipherError, errorMessage } from '../lib/errors.js';

import { type CryptoProvider, defaultCryptoProvider } from './provider.js';

// AES-256-GCM parameters
export const ALGORITHM = 'aes-256-gcm';
export const KEY_LENGTH = 32; // 256 bits
export const NONCE_LENGTH = 12; // 96 bits (recommended for GCM)
export const TAG_LENGTH = 16; // 128 bits

/**
 * Generate a fresh 256-bit symmetric key
 */
export function generateKey(provider: CryptoProvider = defaultCryptoProvider): Buffer {
  return draw(provider, KEY_LENGTH, 'key');
}

/**
 * Generate a fresh 96-bit nonce, drawn separately from the key
 */
export function generateNonce(provider: CryptoProvider = defaultCryptoProvider): Buffer {
  return draw(provider, NONCE_LENGTH, 'nonce');
}

function draw(provider: CryptoProvider, size: number, label: string): Buffer {
  const bytes = provider.randomBytes(size);
  if (bytes.length !== size) {
    throw new CipherError(
      `Provider ${provider.name} returned a ${bytes.length}-byte ${label}, expected ${size} bytes`
    );
  }
  return bytes;
}

/**
 * Encrypt and authenticate plaintext, returning ciphertext || tag
 */
export function seal(plaintext: Buffer, key: Buffer, nonce: Buffer): Buffer {
  try {
    const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([ciphertext, cipher.getAuthTag()]);
  } catch (error) {
    throw new CipherError(`Failed to encrypt with AES-GCM: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

/**
 * Verify and decrypt ciphertext || tag
 */
export function open(sealed: Buffer, key: Buffer, nonce: Buffer): Buffer {
  if (sealed.length < TAG_LENGTH) {
    throw new CipherError(
      `Sealed payload too short. Expected at least ${TAG_LENGTH} bytes, got ${sealed.length}.`
    );
  }

  const ciphertext = sealed.subarray(0, sealed.length - TAG_LENGTH);
  const authTag = sealed.subarray(sealed.length - TAG_LENGTH);

  const decipher = createVerifyingDecipher(key, nonce, authTag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch (error) {
    throw new AuthenticityError('Authentication tag did not verify', { cause: error });
  }
}

function createVerifyingDecipher(key: Buffer, nonce: Buffer, authTag: Buffer): DecipherGCM {
  try {
    const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(authTag);
    return decipher;
  } catch (error) {
    throw new CipherError(`Failed to initialise AES-GCM: ${errorMessage(error)}`, {
      cause: error
    });
  }
}

/**
 * Securely zero out a key in memory
 */
export function zeroizeKey(key: Buffer): void {
  if (key.length > 0) {
    key.fill(0);
  }
}
