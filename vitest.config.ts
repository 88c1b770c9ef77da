import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      CRYPTO_SELF_TEST_ON_BOOT: 'false',
      CRYPTO_SELF_TEST_MODULUS_BITS: '2048'
    },
    // RSA 4096 key generation can take several seconds
    testTimeout: 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
        'scripts/**'
      ]
    },
    include: ['tests/**/*.test.ts']
  }
});
