/**
 * Card Encryption Service
 *
 * Runs one hybrid encryption per call:
 * validating -> key_generated -> payload_sealed -> key_wrapped -> framed -> encoded
 *
 * Every failure is caught here and returned as a failure outcome carrying its
 * category and the state it happened in; nothing is retried or resumed.
 */

import { ulid } from 'ulid';

import { encodeHex } from '../codec/hex.js';
import { frame } from '../crypto/framing.js';
import { parsePublicKey, wrap } from '../crypto/key-wrap.js';
import { type CryptoProvider, defaultCryptoProvider } from '../crypto/provider.js';
import { generateKey, generateNonce, seal, zeroizeKey } from '../crypto/symmetric.js';
import { CipherError, KeyFormatError, WrapError, errorMessage } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import { maskCardNumber } from '../lib/masking.js';
import { describeRequestProblem } from '../lib/validation.js';
import type {
  EncryptionFailure,
  EncryptionOutcome,
  EncryptionRequest,
  EngineState,
  FailureCategory
} from '../types/index.js';

function classifyFailure(error: unknown): FailureCategory {
  if (error instanceof CipherError) return 'cipher';
  if (error instanceof KeyFormatError) return 'key_format';
  if (error instanceof WrapError) return 'wrap';
  return 'unexpected';
}

function failure(
  operationId: string,
  category: FailureCategory,
  message: string,
  failedAt: EngineState
): EncryptionFailure {
  return {
    success: false,
    operationId,
    category,
    message: `Encryption failed: ${message}`,
    failedAt
  };
}

export class CardEncryptionService {
  private readonly provider: CryptoProvider;

  constructor(provider: CryptoProvider = defaultCryptoProvider) {
    this.provider = provider;
  }

  /**
   * Generate a standalone AES-256 key from this service's provider
   */
  generateSymmetricKey(): Buffer {
    return generateKey(this.provider);
  }

  /**
   * Encrypt a card number for the holder of the given RSA public key.
   * Never throws.
   */
  encrypt(request: EncryptionRequest | null | undefined): EncryptionOutcome {
    let operationId = '';
    let state: EngineState = 'validating';
    let key: Buffer | null = null;

    try {
      operationId = ulid();

      const problem = describeRequestProblem(request);
      if (problem !== null || !request) {
        const message = problem ?? 'Request cannot be null';
        logger.warn({ operationId, reason: message }, 'Rejected encryption request');
        return failure(operationId, 'invalid_input', message, state);
      }

      const { cardNumber, rsaPublicKeyHex } = request;
      logger.debug({ operationId, card: maskCardNumber(cardNumber) }, 'Starting card encryption');

      key = generateKey(this.provider);
      const nonce = generateNonce(this.provider);
      state = 'key_generated';
      logger.debug(
        { operationId, keyBytes: key.length, nonceBytes: nonce.length },
        'Generated key and nonce'
      );

      const sealed = seal(Buffer.from(cardNumber, 'utf8'), key, nonce);
      state = 'payload_sealed';
      logger.debug({ operationId, sealedBytes: sealed.length }, 'Sealed card number');

      const publicKey = parsePublicKey(rsaPublicKeyHex);
      const wrappedKey = wrap(key, publicKey);
      state = 'key_wrapped';
      logger.debug({ operationId, wrappedKeyBytes: wrappedKey.length }, 'Wrapped key');

      const envelope = frame(nonce, sealed, wrappedKey);
      state = 'framed';

      const encryptedDataHex = encodeHex(envelope);
      state = 'encoded';

      logger.info(
        { operationId, envelopeBytes: envelope.length, hexChars: encryptedDataHex.length },
        'Card encryption completed'
      );

      return {
        success: true,
        operationId,
        encryptedDataHex
      };
    } catch (error) {
      const category = classifyFailure(error);
      logger.error({ operationId, category, failedAt: state, err: error }, 'Card encryption failed');
      return failure(operationId, category, errorMessage(error), state);
    } finally {
      if (key) {
        zeroizeKey(key);
      }
    }
  }
}

const defaultService = new CardEncryptionService();

/**
 * Encrypt with a service backed by the default Node crypto provider
 */
export function encryptCardNumber(request: EncryptionRequest | null | undefined): EncryptionOutcome {
  return defaultService.encrypt(request);
}
