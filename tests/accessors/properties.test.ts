/**
 * Property-based tests for the accessor pipeline.
 *
 * Round-trip: for any string, reading an attribute back after writing it
 * yields the same string. Key isolation: ciphertext written under one key
 * does not decrypt under another, and two attributes of one class with
 * different keys store different ciphertext for the same plaintext. Helper
 * equality: class helpers and instance setters store the same bytes.
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { AttributeCipher } from '../../src/accessors/attribute-cipher.js';
import { jsonMarshaler } from '../../src/pipeline/codecs.js';
import { decryptValue, encryptValue } from '../../src/pipeline/transform-pipeline.js';
import { NodeCipherProvider } from '../../src/crypto/node-cipher.js';
import type { ResolvedOptions } from '../../src/types/index.js';

const encodeArb = fc.constantFrom(
  'base64' as const,
  'base64url' as const,
  'hex' as const,
  false as const
);

const payloadArb = fc.record({
  name: fc.string(),
  count: fc.integer(),
  tags: fc.array(fc.string())
});

function gcmOptions(key: string): ResolvedOptions {
  return {
    attribute: 'secret',
    key,
    secretKeyParamName: 'key',
    algorithm: 'aes-256-gcm',
    encode: 'base64',
    marshal: false,
    marshaler: jsonMarshaler,
    allowEmptyValue: false,
    cipherProvider: new NodeCipherProvider({ ivMode: 'random' }),
    encryptMethod: 'encrypt',
    decryptMethod: 'decrypt',
    extraOptions: {}
  };
}

describe('Accessor properties', () => {
  it('should read back every string it wrote', () => {
    fc.assert(
      fc.property(fc.string(), encodeArb, (value, encode) => {
        class Entry {
          declare secret: string;
        }
        new AttributeCipher().forClass(Entry).declare('secret', { key: 'test-secret', encode });

        const record = new Entry();
        record.secret = value;
        expect(record.secret).toBe(value);
      }),
      { numRuns: 50 }
    );
  });

  it('should read back strings outside the ASCII range', () => {
    fc.assert(
      fc.property(fc.fullUnicodeString({ minLength: 1 }), value => {
        class Entry {
          declare secret: string;
        }
        new AttributeCipher().forClass(Entry).declare('secret', { key: 'test-secret' });

        const record = new Entry();
        record.secret = value;
        expect(record.secret).toBe(value);
      }),
      { numRuns: 50 }
    );
  });

  it('should read back structured values with marshal', () => {
    fc.assert(
      fc.property(payloadArb, value => {
        class Entry {
          declare payload: unknown;
        }
        new AttributeCipher()
          .forClass(Entry)
          .declare('payload', { key: 'test-secret', marshal: true, encode: true });

        const record = new Entry();
        record.payload = value;
        expect(record.payload).toEqual(value);
      }),
      { numRuns: 50 }
    );
  });

  it('should not decrypt under a different key', () => {
    fc.assert(
      fc.property(
        fc.string({ minLength: 1 }),
        fc.string({ minLength: 1 }),
        fc.string({ minLength: 1 }),
        (value, key, otherKey) => {
          fc.pre(key !== otherKey);

          const stored = encryptValue(value, gcmOptions(key));
          expect(() => decryptValue(stored, gcmOptions(otherKey))).toThrow();
        }
      ),
      { numRuns: 30 }
    );
  });

  it('should store different ciphertext for attributes with different keys', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), value => {
        class Entry {
          declare first: string;
          declare encrypted_first: unknown;
          declare second: string;
          declare encrypted_second: unknown;
        }
        new AttributeCipher()
          .forClass(Entry)
          .declare('first', { key: 'first-secret', encode: true })
          .declare('second', { key: 'second-secret', encode: true });

        const record = new Entry();
        record.first = value;
        record.second = value;
        expect(record.encrypted_first).not.toBe(record.encrypted_second);
        expect(record.first).toBe(value);
        expect(record.second).toBe(value);
      }),
      { numRuns: 50 }
    );
  });

  it('should store the same bytes through helpers and setters', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1 }), value => {
        class Entry {
          declare secret: string;
          declare encrypted_secret: unknown;
        }
        const table = new AttributeCipher()
          .forClass(Entry)
          .declare('secret', { key: 'test-secret', encode: true });

        const record = new Entry();
        record.secret = value;
        expect(table.encryptAttr('secret', value)).toBe(record.encrypted_secret);
      }),
      { numRuns: 50 }
    );
  });
});
