// Core type definitions for the card envelope encryption engine

export interface EncryptionRequest {
  rsaPublicKeyHex: string;
  cardNumber: string;
}

export type EngineState =
  | 'validating'
  | 'key_generated'
  | 'payload_sealed'
  | 'key_wrapped'
  | 'framed'
  | 'encoded';

export type FailureCategory = 'invalid_input' | 'key_format' | 'cipher' | 'wrap' | 'unexpected';

export interface EncryptionSuccess {
  success: true;
  operationId: string;
  encryptedDataHex: string;
}

export interface EncryptionFailure {
  success: false;
  operationId: string;
  category: FailureCategory;
  message: string;
  failedAt: EngineState;
}

export type EncryptionOutcome = EncryptionSuccess | EncryptionFailure;
