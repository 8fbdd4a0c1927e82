import { z } from 'zod';

import { encodeFormats } from '../config/index.js';
import type { CipherProvider, Marshaler } from '../types/index.js';

/**
 * Validation schemas for declaration options
 */

export const AttributeNameSchema = z
  .string()
  .regex(/^[A-Za-z_$][A-Za-z0-9_$]*$/, 'Attribute names must be identifiers');

export const StorageAffixSchema = z
  .string()
  .regex(/^[A-Za-z0-9_$]*$/, 'Prefix and suffix must be identifier characters');

export const EncodeFormatSchema = z.enum(encodeFormats);

export const MarshalerSchema = z.custom<Marshaler>(
  value =>
    typeof value === 'object' &&
    value !== null &&
    typeof Reflect.get(value, 'dump') === 'function' &&
    typeof Reflect.get(value, 'load') === 'function',
  { message: 'marshaler must expose dump and load functions' }
);

export const CipherProviderSchema = z.custom<CipherProvider>(
  value => (typeof value === 'object' || typeof value === 'function') && value !== null,
  { message: 'cipherProvider must be an object' }
);

/**
 * Every option with a fixed shape. key and the predicates are normalized separately.
 */
export const StaticOptionsSchema = z.object({
  secretKeyParamName: z.string().min(1).optional(),
  attribute: AttributeNameSchema.optional(),
  storageAttribute: AttributeNameSchema.optional(),
  prefix: StorageAffixSchema.optional(),
  suffix: StorageAffixSchema.optional(),
  cipherProvider: CipherProviderSchema.optional(),
  encryptMethod: z.string().min(1).optional(),
  decryptMethod: z.string().min(1).optional(),
  algorithm: z.string().min(1).optional(),
  encode: z.union([z.boolean(), EncodeFormatSchema]).optional(),
  encodeFormat: EncodeFormatSchema.optional(),
  marshal: z.boolean().optional(),
  marshaler: MarshalerSchema.optional(),
  allowEmptyValue: z.boolean().optional(),
  install: z.boolean().optional(),
  extraOptions: z.record(z.unknown()).optional()
});

export type StaticOptions = z.infer<typeof StaticOptionsSchema>;

export const staticOptionKeys = Object.keys(StaticOptionsSchema.shape);

export const dynamicOptionKeys = ['key', 'if', 'unless', 'ifPredicate', 'unlessPredicate'] as const;

export function validateAttributeName(name: string): boolean {
  return AttributeNameSchema.safeParse(name).success;
}

/**
 * Flatten zod issues into a single line for error messages
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
