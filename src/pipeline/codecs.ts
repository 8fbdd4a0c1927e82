import { encodeFormats } from '../config/index.js';
import type { Marshaler } from '../types/index.js';

export type EncodeFormat = (typeof encodeFormats)[number];

const patterns: Record<EncodeFormat, RegExp> = {
  base64: /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/,
  base64url: /^[A-Za-z0-9_-]*$/,
  hex: /^(?:[0-9a-fA-F]{2})*$/
};

export function isEncodeFormat(value: unknown): value is EncodeFormat {
  return encodeFormats.some(format => format === value);
}

/**
 * Encode cipher output as text
 */
export function encodeText(data: Buffer, format: EncodeFormat): string {
  return data.toString(format);
}

/**
 * Decode text produced by encodeText. Buffer.from silently skips characters
 * outside the alphabet, so the text is checked first.
 */
export function decodeText(text: string, format: EncodeFormat): Buffer {
  if (!patterns[format].test(text)) {
    throw new Error(`not valid ${format} text`);
  }

  // base64url has no padding, so a single trailing character is malformed
  if (format === 'base64url' && text.length % 4 === 1) {
    throw new Error('not valid base64url text');
  }

  return Buffer.from(text, format);
}

export const jsonMarshaler: Marshaler = {
  dump(value: unknown): string {
    const text = JSON.stringify(value);
    if (text === undefined) {
      throw new Error(`${typeof value} values cannot be serialized`);
    }
    return text;
  },
  load(text: string): unknown {
    return JSON.parse(text);
  }
};
