import { env } from './env.js';

export { env };
export type { AppEnvironment } from './env.js';

export const selfTestOnBoot = () => env.CRYPTO_SELF_TEST_ON_BOOT;
