import { describe, it, expect } from 'vitest';
import {
  AttributeNameSchema,
  StaticOptionsSchema,
  describeIssues,
  validateAttributeName
} from '../../src/lib/validation.js';

describe('Validation', () => {
  describe('AttributeNameSchema', () => {
    it('should accept identifiers', () => {
      expect(validateAttributeName('email')).toBe(true);
      expect(validateAttributeName('_private')).toBe(true);
      expect(validateAttributeName('$ref2')).toBe(true);
    });

    it('should reject names that are not identifiers', () => {
      expect(validateAttributeName('2fa')).toBe(false);
      expect(validateAttributeName('e-mail')).toBe(false);
      expect(validateAttributeName('')).toBe(false);
      expect(AttributeNameSchema.safeParse(42).success).toBe(false);
    });
  });

  describe('StaticOptionsSchema', () => {
    it('should accept boolean and named encodings', () => {
      expect(StaticOptionsSchema.safeParse({ encode: true }).success).toBe(true);
      expect(StaticOptionsSchema.safeParse({ encode: 'base64url' }).success).toBe(true);
      expect(StaticOptionsSchema.safeParse({ encode: 'rot13' }).success).toBe(false);
    });

    it('should require marshalers to expose dump and load', () => {
      const result = StaticOptionsSchema.safeParse({ marshaler: { dump: () => '' } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(describeIssues(result.error)).toBe(
          'marshaler: marshaler must expose dump and load functions'
        );
      }
    });

    it('should reject providers that are not objects', () => {
      expect(StaticOptionsSchema.safeParse({ cipherProvider: 'aes' }).success).toBe(false);
    });

    it('should reject empty method names', () => {
      expect(StaticOptionsSchema.safeParse({ encryptMethod: '' }).success).toBe(false);
    });
  });

  describe('describeIssues', () => {
    it('should join every issue with its path', () => {
      const result = StaticOptionsSchema.safeParse({ marshal: 'yes', install: 1 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(describeIssues(result.error)).toBe(
          'marshal: Expected boolean, received string; install: Expected boolean, received number'
        );
      }
    });
  });
});
