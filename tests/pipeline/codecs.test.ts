import { describe, it, expect } from 'vitest';
import { decodeText, encodeText, isEncodeFormat, jsonMarshaler } from '../../src/pipeline/codecs.js';

describe('Codecs', () => {
  describe('encodeText', () => {
    it('should encode in every supported format', () => {
      const data = Buffer.from('hi');

      expect(encodeText(data, 'hex')).toBe('6869');
      expect(encodeText(data, 'base64')).toBe('aGk=');
      expect(encodeText(data, 'base64url')).toBe('aGk');
    });
  });

  describe('decodeText', () => {
    it('should decode what encodeText produced', () => {
      expect(decodeText('6869', 'hex').toString()).toBe('hi');
      expect(decodeText('aGk=', 'base64').toString()).toBe('hi');
      expect(decodeText('aGk', 'base64url').toString()).toBe('hi');
    });

    it('should reject characters outside the alphabet', () => {
      expect(() => decodeText('zz', 'hex')).toThrow('not valid hex text');
      expect(() => decodeText('aGk', 'base64')).toThrow('not valid base64 text');
      expect(() => decodeText('a+b/', 'base64url')).toThrow('not valid base64url text');
    });

    it('should reject odd-length hex', () => {
      expect(() => decodeText('686', 'hex')).toThrow('not valid hex text');
    });

    it('should reject base64url with a dangling character', () => {
      expect(() => decodeText('aGkab', 'base64url')).toThrow('not valid base64url text');
    });
  });

  describe('isEncodeFormat', () => {
    it('should accept only known formats', () => {
      expect(isEncodeFormat('hex')).toBe(true);
      expect(isEncodeFormat('base32')).toBe(false);
      expect(isEncodeFormat(1)).toBe(false);
    });
  });

  describe('jsonMarshaler', () => {
    it('should serialize structured values', () => {
      expect(jsonMarshaler.dump({ user: 'a', tags: [1, 2] })).toBe('{"user":"a","tags":[1,2]}');
      expect(jsonMarshaler.load('{"user":"a"}')).toEqual({ user: 'a' });
    });

    it('should refuse values JSON cannot represent', () => {
      expect(() => jsonMarshaler.dump(undefined)).toThrow('undefined values cannot be serialized');
      expect(() => jsonMarshaler.dump(() => 1)).toThrow('function values cannot be serialized');
    });
  });
});
