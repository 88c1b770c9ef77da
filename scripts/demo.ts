#!/usr/bin/env tsx
/**
 * Demo Script
 * Plays the recipient: generates an RSA key pair, encrypts a sample card
 * number through the engine, then opens the envelope with the private key
 */

import { generateKeyPairSync } from 'node:crypto';

import { encodeHex } from '../src/codec/hex.js';
import { bootstrap, openEnvelope } from '../src/index.js';
import { logger } from '../src/lib/logger.js';
import { maskCardNumber, previewHex } from '../src/lib/masking.js';

const CARD_NUMBER = '4532123456789012';

function main(): void {
  logger.info('Step 1: Generating RSA key pair');
  const { publicKey, privateKey } = generateKeyPairSync('rsa', { modulusLength: 2048 });
  const publicKeyHex = encodeHex(publicKey.export({ format: 'der', type: 'spki' }));
  logger.info({ publicKey: previewHex(publicKeyHex, 60) }, 'RSA public key (hex)');

  logger.info({ card: maskCardNumber(CARD_NUMBER) }, 'Step 2: Encrypting card number');
  const service = bootstrap({ selfTest: false });
  const outcome = service.encrypt({ rsaPublicKeyHex: publicKeyHex, cardNumber: CARD_NUMBER });

  if (!outcome.success) {
    logger.error({ category: outcome.category, failedAt: outcome.failedAt }, outcome.message);
    process.exitCode = 1;
    return;
  }

  logger.info(
    {
      envelope: previewHex(outcome.encryptedDataHex, 80),
      hexChars: outcome.encryptedDataHex.length
    },
    'Step 3: Encryption successful'
  );

  const recovered = openEnvelope(outcome.encryptedDataHex, privateKey);
  logger.info(
    { card: maskCardNumber(recovered), matches: recovered === CARD_NUMBER },
    'Step 4: Recipient opened the envelope'
  );
}

main();
