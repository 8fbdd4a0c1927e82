import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['./tests/setup.ts'],
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ATTR_CIPHER_ALGORITHM: 'aes-256-cbc',
      ATTR_CIPHER_ENCODE_FORMAT: 'base64',
      ATTR_CIPHER_IV_MODE: 'synthetic',
      ATTR_CIPHER_STORAGE_PREFIX: 'encrypted_',
      ATTR_CIPHER_STORAGE_SUFFIX: ''
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**'
      ]
    },
    include: ['tests/**/*.{test,spec}.ts']
  }
});
