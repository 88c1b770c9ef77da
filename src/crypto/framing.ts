/**
 * Envelope Framer
 *
 * Format:
 * - Nonce length (4 bytes, big-endian)
 * - Nonce (variable)
 * - Sealed payload length (4 bytes, big-endian)
 * - Sealed payload: ciphertext || GCM tag (variable)
 * - Wrapped key (remaining bytes, no length prefix)
 *
 * The wrapped key carries no prefix because it is always the last field.
 * Field order and the missing trailing prefix are part of the wire format.
 */

import { FramingError } from '../lib/errors.js';

const LENGTH_PREFIX = 4;

export interface EnvelopeParts {
  nonce: Buffer;
  sealed: Buffer;
  wrappedKey: Buffer;
}

/**
 * Serialize nonce, sealed payload and wrapped key into one buffer
 */
export function frame(nonce: Buffer, sealed: Buffer, wrappedKey: Buffer): Buffer {
  const buffer = Buffer.allocUnsafe(
    LENGTH_PREFIX + nonce.length + LENGTH_PREFIX + sealed.length + wrappedKey.length
  );

  let offset = 0;

  buffer.writeUInt32BE(nonce.length, offset);
  offset += LENGTH_PREFIX;
  nonce.copy(buffer, offset);
  offset += nonce.length;

  buffer.writeUInt32BE(sealed.length, offset);
  offset += LENGTH_PREFIX;
  sealed.copy(buffer, offset);
  offset += sealed.length;

  wrappedKey.copy(buffer, offset);

  return buffer;
}

/**
 * Deserialize an envelope buffer into its parts
 */
export function unframe(buffer: Buffer): EnvelopeParts {
  let offset = 0;

  const nonceLength = readLength(buffer, offset, 'nonce');
  offset += LENGTH_PREFIX;
  const nonce = buffer.subarray(offset, offset + nonceLength);
  offset += nonceLength;

  const sealedLength = readLength(buffer, offset, 'sealed payload');
  offset += LENGTH_PREFIX;
  const sealed = buffer.subarray(offset, offset + sealedLength);
  offset += sealedLength;

  const wrappedKey = buffer.subarray(offset);

  return {
    nonce,
    sealed,
    wrappedKey
  };
}

function readLength(buffer: Buffer, offset: number, field: string): number {
  if (buffer.length - offset < LENGTH_PREFIX) {
    throw new FramingError(
      `Envelope truncated: missing ${field} length at offset ${offset} (buffer is ${buffer.length} bytes)`
    );
  }

  // Signed read so a corrupted high bit surfaces as a negative length
  const length = buffer.readInt32BE(offset);
  if (length < 0) {
    throw new FramingError(`Envelope declares a negative ${field} length (${length})`);
  }

  const remaining = buffer.length - offset - LENGTH_PREFIX;
  if (length > remaining) {
    throw new FramingError(
      `Envelope declares a ${field} of ${length} bytes but only ${remaining} remain`
    );
  }

  return length;
}
