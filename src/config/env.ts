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

export const encodeFormats = ['base64', 'base64url', 'hex'] as const;

export const ivModes = ['synthetic', 'random'] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  ATTR_CIPHER_ALGORITHM: z
    .string()
    .min(1, 'ATTR_CIPHER_ALGORITHM must name a cipher')
    .default('aes-256-cbc'),
  ATTR_CIPHER_ENCODE_FORMAT: z.enum(encodeFormats).default('base64'),
  ATTR_CIPHER_IV_MODE: z
    .enum(ivModes)
    .default('synthetic')
    .describe('synthetic IVs keep ciphertext deterministic so it can be queried'),
  ATTR_CIPHER_STORAGE_PREFIX: z
    .string()
    .regex(/^[A-Za-z0-9_$]*$/, 'ATTR_CIPHER_STORAGE_PREFIX must be identifier characters')
    .default('encrypted_'),
  ATTR_CIPHER_STORAGE_SUFFIX: z
    .string()
    .regex(/^[A-Za-z0-9_$]*$/, 'ATTR_CIPHER_STORAGE_SUFFIX must be identifier characters')
    .default('')
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

if (data.ATTR_CIPHER_STORAGE_PREFIX === '' && data.ATTR_CIPHER_STORAGE_SUFFIX === '') {
  throw new Error(
    'Environment validation failed:\nATTR_CIPHER_STORAGE_PREFIX and ATTR_CIPHER_STORAGE_SUFFIX cannot both be empty.'
  );
}

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
