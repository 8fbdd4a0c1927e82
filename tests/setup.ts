import { beforeAll } from 'vitest';

// Set up test environment variables before all tests
beforeAll(() => {
  process.env.NODE_ENV = 'test';
  process.env.LOG_LEVEL = 'silent'; // Disable logs during tests
  process.env.ATTR_CIPHER_IV_MODE = 'synthetic';
});
