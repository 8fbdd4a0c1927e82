import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

async function loadEnv() {
  const { env } = await import('../../src/config/env.js');
  return env;
}

describe('Environment configuration', () => {
  beforeEach(() => {
    vi.resetModules();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('should expose the test defaults', async () => {
    const env = await loadEnv();

    expect(env.isTest).toBe(true);
    expect(env.isProduction).toBe(false);
    expect(env.ATTR_CIPHER_ALGORITHM).toBe('aes-256-cbc');
    expect(env.ATTR_CIPHER_ENCODE_FORMAT).toBe('base64');
    expect(env.ATTR_CIPHER_IV_MODE).toBe('synthetic');
    expect(env.ATTR_CIPHER_STORAGE_PREFIX).toBe('encrypted_');
  });

  it('should read overrides from the environment', async () => {
    vi.stubEnv('ATTR_CIPHER_ALGORITHM', 'aes-128-gcm');
    vi.stubEnv('ATTR_CIPHER_IV_MODE', 'random');

    const env = await loadEnv();
    expect(env.ATTR_CIPHER_ALGORITHM).toBe('aes-128-gcm');
    expect(env.ATTR_CIPHER_IV_MODE).toBe('random');
  });

  it('should reject unknown encode formats', async () => {
    vi.stubEnv('ATTR_CIPHER_ENCODE_FORMAT', 'base32');

    await expect(loadEnv()).rejects.toThrow('Environment validation failed');
  });

  it('should reject storage affixes that are not identifier characters', async () => {
    vi.stubEnv('ATTR_CIPHER_STORAGE_PREFIX', 'enc-');

    await expect(loadEnv()).rejects.toThrow(
      'ATTR_CIPHER_STORAGE_PREFIX: ATTR_CIPHER_STORAGE_PREFIX must be identifier characters'
    );
  });

  it('should reject an empty prefix together with an empty suffix', async () => {
    vi.stubEnv('ATTR_CIPHER_STORAGE_PREFIX', '');
    vi.stubEnv('ATTR_CIPHER_STORAGE_SUFFIX', '');

    await expect(loadEnv()).rejects.toThrow('cannot both be empty');
  });
});
