import { randomBytes } from 'node:crypto';

/**
 * Source of cryptographically secure randomness handed to the engine.
 * Created once by the bootstrap instead of registered globally.
 */
export interface CryptoProvider {
  readonly name: string;
  randomBytes(size: number): Buffer;
}

export function createNodeCryptoProvider(): CryptoProvider {
  return {
    name: 'node:crypto',
    randomBytes: size => randomBytes(size)
  };
}

export const defaultCryptoProvider: CryptoProvider = createNodeCryptoProvider();
