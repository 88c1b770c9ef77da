import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  CRYPTO_SELF_TEST_ON_BOOT: z
    .string()
    .default('false')
    .transform(value => value === 'true'),
  CRYPTO_SELF_TEST_MODULUS_BITS: z
    .string()
    .default('2048')
    .transform(value => Number(value))
    .pipe(
      z
        .number()
        .int()
        .min(2048)
        .max(4096)
        .multipleOf(1024)
        .describe('CRYPTO_SELF_TEST_MODULUS_BITS must be 2048, 3072 or 4096')
    )
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
