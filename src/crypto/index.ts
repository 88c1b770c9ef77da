/**
 * Crypto module - hybrid envelope encryption primitives
 *
 * AES-256-GCM seals the payload under a per-call key, RSA-OAEP wraps that key
 * for the recipient, and the framer lays both out in one buffer.
 */

export { type CryptoProvider, createNodeCryptoProvider, defaultCryptoProvider } from './provider.js';
export {
  ALGORITHM,
  KEY_LENGTH,
  NONCE_LENGTH,
  TAG_LENGTH,
  generateKey,
  generateNonce,
  seal,
  open,
  zeroizeKey
} from './symmetric.js';
export { OAEP_HASH, maxWrapPayload, parsePublicKey, wrap, unwrap } from './key-wrap.js';
export { type EnvelopeParts, frame, unframe } from './framing.js';
