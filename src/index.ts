import { generateKeyPairSync } from 'node:crypto';

import { encodeHex } from './codec/hex.js';
import { env, selfTestOnBoot } from './config/index.js';
import { type CryptoProvider, createNodeCryptoProvider } from './crypto/provider.js';
import { logger } from './lib/logger.js';
import { CardEncryptionService } from './services/card-encryption.js';
import { openEnvelope } from './services/envelope-reader.js';

export { encodeHex, decodeHex } from './codec/hex.js';
export * from './crypto/index.js';
export * from './lib/errors.js';
export { CardEncryptionService, encryptCardNumber } from './services/card-encryption.js';
export { openEnvelope } from './services/envelope-reader.js';
export type {
  EncryptionFailure,
  EncryptionOutcome,
  EncryptionRequest,
  EncryptionSuccess,
  EngineState,
  FailureCategory
} from './types/index.js';

const SELF_TEST_CARD = '4111111111111111';

/**
 * Encrypt a placeholder card for a throwaway key pair and open it again
 */
export function runSelfTest(service: CardEncryptionService, modulusBits: number): void {
  const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: modulusBits });
  const publicKeyHex = encodeHex(publicKey.export({ format: 'der', type: 'spki' }));

  const outcome = service.encrypt({ rsaPublicKeyHex: publicKeyHex, cardNumber: SELF_TEST_CARD });
  if (!outcome.success) {
    throw new Error(`Self-test encryption failed: ${outcome.message}`);
  }

  if (openEnvelope(outcome.encryptedDataHex, privateKey) !== SELF_TEST_CARD) {
    throw new Error('Self-test round trip returned a different card number');
  }

  logger.info({ modulusBits, operationId: outcome.operationId }, 'Crypto self-test passed');
}

export interface BootstrapOptions {
  provider?: CryptoProvider;
  selfTest?: boolean;
}

export function bootstrap(options: BootstrapOptions = {}): CardEncryptionService {
  const provider = options.provider ?? createNodeCryptoProvider();
  logger.info({ env: env.NODE_ENV, provider: provider.name }, 'Bootstrapping card encryption engine');

  try {
    const service = new CardEncryptionService(provider);

    if (options.selfTest ?? selfTestOnBoot()) {
      runSelfTest(service, env.CRYPTO_SELF_TEST_MODULUS_BITS);
    }

    logger.info('Card encryption engine ready');
    return service;
  } catch (error) {
    logger.error({ err: error }, 'Bootstrap failed');
    throw error;
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  try {
    bootstrap();
  } catch (error) {
    logger.error(error, 'Fatal error during bootstrap');
    process.exitCode = 1;
  }
}
