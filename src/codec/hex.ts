/**
 * Hex codec used for the wire form of envelopes and public keys.
 * Encoding always emits uppercase; decoding accepts either case.
 */

import { FormatError } from '../lib/errors.js';

const NON_HEX = /[^0-9a-fA-F]/;

export function encodeHex(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
    .toString('hex')
    .toUpperCase();
}

export function decodeHex(text: string | null | undefined): Buffer {
  if (text == null) {
    throw new FormatError('Hex string cannot be null');
  }

  if (text.length % 2 !== 0) {
    throw new FormatError('Hex string must have even length');
  }

  const invalid = NON_HEX.exec(text);
  if (invalid) {
    throw new FormatError(`Invalid hex character at position ${invalid.index}`);
  }

  return Buffer.from(text, 'hex');
}
