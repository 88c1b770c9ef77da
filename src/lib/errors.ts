export class CryptoError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CryptoError';
    this.code = code;
  }
}

// ── Codec / framing ──

export class FormatError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FORMAT', options);
    this.name = 'FormatError';
  }
}

export class FramingError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'FRAMING', options);
    this.name = 'FramingError';
  }
}

// ── Symmetric ──

export class CipherError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CIPHER', options);
    this.name = 'CipherError';
  }
}

/** GCM tag did not verify. */
export class AuthenticityError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'AUTHENTICITY', options);
    this.name = 'AuthenticityError';
  }
}

// ── Asymmetric ──

export class KeyFormatError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'KEY_FORMAT', options);
    this.name = 'KeyFormatError';
  }
}

export class WrapError extends CryptoError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'WRAP', options);
    this.name = 'WrapError';
  }
}

// ── Utilities ──

/** Extract error message string from unknown thrown value. */
export function errorMessage(value: unknown): string {
  if (value instanceof Error) return value.message;
  if (value == null) return 'Unknown error';
  return String(value);
}
