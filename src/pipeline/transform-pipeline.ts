/**
 * Transform Pipeline
 *
 * Write path: raw -> marshal? -> provider encrypt -> encode? -> stored
 * Read path:  stored -> decode? -> provider decrypt -> unmarshal? -> value
 *
 * Absent values (null, undefined, and '' unless allowEmptyValue is set) pass
 * through both paths untouched without reaching the provider. Errors thrown by
 * the provider itself propagate as-is; every other failure is a TransformError
 * tagged with its stage.
 */

import { entryPoint } from '../crypto/provider.js';
import { TransformError, type TransformStage } from '../lib/errors.js';
import type { CipherParams, ResolvedOptions } from '../types/index.js';
import { decodeText, encodeText, type EncodeFormat } from './codecs.js';

export function isAbsent(value: unknown, allowEmptyValue: boolean): boolean {
  return value === null || value === undefined || (!allowEmptyValue && value === '');
}

/**
 * Parameters forwarded to the provider: extra options, then algorithm and
 * the key under its configured parameter name
 */
export function cipherParams(options: ResolvedOptions): CipherParams {
  return {
    ...options.extraOptions,
    algorithm: options.algorithm,
    ...(options.key !== undefined && { [options.secretKeyParamName]: options.key })
  };
}

function describe(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  return Array.isArray(value) ? 'array' : typeof value;
}

function marshalStage(raw: unknown, options: ResolvedOptions): Buffer {
  if (!options.marshal) {
    if (typeof raw === 'string') {
      return Buffer.from(raw, 'utf8');
    }
    if (Buffer.isBuffer(raw)) {
      return raw;
    }
    throw new TransformError(
      'marshal',
      `expected a string or Buffer without marshal, got ${describe(raw)}`,
      options.attribute
    );
  }

  let text: unknown;
  try {
    text = options.marshaler.dump(raw);
  } catch (error) {
    throw new TransformError('marshal', errorMessage(error), options.attribute, { cause: error });
  }

  if (typeof text !== 'string') {
    throw new TransformError('marshal', `marshaler produced ${describe(text)}`, options.attribute);
  }
  return Buffer.from(text, 'utf8');
}

function cipherStage(
  stage: 'encrypt' | 'decrypt',
  value: Buffer,
  options: ResolvedOptions
): Buffer | string {
  const method = stage === 'encrypt' ? options.encryptMethod : options.decryptMethod;
  const call = entryPoint(options.cipherProvider, method);

  if (!call) {
    throw new TransformError(stage, `cipher provider does not expose ${method}`, options.attribute);
  }

  const output = call(value, cipherParams(options));
  if (typeof output === 'string' || Buffer.isBuffer(output)) {
    return output;
  }

  throw new TransformError(
    stage,
    `cipher provider returned ${describe(output)}, expected a string or Buffer`,
    options.attribute
  );
}

function encodeStage(ciphertext: Buffer | string, format: EncodeFormat): string {
  const bytes = typeof ciphertext === 'string' ? Buffer.from(ciphertext, 'utf8') : ciphertext;
  return encodeText(bytes, format);
}

function decodeStage(stored: unknown, format: EncodeFormat, attribute: string): Buffer {
  if (typeof stored !== 'string') {
    throw new TransformError('decode', `expected encoded text, got ${describe(stored)}`, attribute);
  }

  try {
    return decodeText(stored, format);
  } catch (error) {
    throw new TransformError('decode', errorMessage(error), attribute, { cause: error });
  }
}

function unmarshalStage(text: string, options: ResolvedOptions): unknown {
  try {
    return options.marshaler.load(text);
  } catch (error) {
    throw new TransformError('unmarshal', errorMessage(error), options.attribute, {
      cause: error
    });
  }
}

function storedBytes(stored: unknown, attribute: string): Buffer {
  if (typeof stored === 'string') {
    return Buffer.from(stored, 'utf8');
  }
  if (Buffer.isBuffer(stored)) {
    return stored;
  }
  throw new TransformError('decrypt', `expected stored ciphertext, got ${describe(stored)}`, attribute);
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the write path for a logical value
 */
export function encryptValue(raw: unknown, options: ResolvedOptions): unknown {
  if (isAbsent(raw, options.allowEmptyValue)) {
    return raw;
  }

  const plaintext = marshalStage(raw, options);
  const ciphertext = cipherStage('encrypt', plaintext, options);

  return options.encode ? encodeStage(ciphertext, options.encode) : ciphertext;
}

/**
 * Run the read path for a stored value
 */
export function decryptValue(stored: unknown, options: ResolvedOptions): unknown {
  if (isAbsent(stored, options.allowEmptyValue)) {
    return stored;
  }

  const ciphertext = options.encode
    ? decodeStage(stored, options.encode, options.attribute)
    : storedBytes(stored, options.attribute);
  const plaintext = cipherStage('decrypt', ciphertext, options);
  const text = typeof plaintext === 'string' ? plaintext : plaintext.toString('utf8');

  return options.marshal ? unmarshalStage(text, options) : text;
}

export type { TransformStage };
