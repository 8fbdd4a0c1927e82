/**
 * Built-in cipher provider over node:crypto
 *
 * Any block or stream cipher known to `getCipherInfo` can be used, and
 * AES-GCM is the only authenticated one (ChaCha20-Poly1305 is refused). The
 * default comes from ATTR_CIPHER_ALGORITHM (aes-256-cbc). Output layout:
 * - IV (cipher IV length, absent for ECB)
 * - Auth tag (16 bytes, GCM only)
 * - Ciphertext (remaining bytes)
 *
 * IV modes:
 * - synthetic: IV is an HMAC of the plaintext, so equal plaintexts under one
 *   key give equal ciphertext and stored values can be looked up
 * - random: fresh IV per call
 */

import {
  createCipheriv,
  createDecipheriv,
  createHash,
  createHmac,
  getCipherInfo,
  randomBytes,
  type CipherGCMTypes
} from 'node:crypto';

import { env, ivModes } from '../config/index.js';
import type { CipherParams, KeyMaterial } from '../types/index.js';

export type IvMode = (typeof ivModes)[number];

const AUTH_TAG_LENGTH = 16;

const SUPPORTED_MODES = new Set(['cbc', 'cfb', 'ctr', 'ecb', 'ofb', 'gcm', 'stream']);

/**
 * Geometry of a cipher as reported by OpenSSL
 */
export interface CipherSpec {
  algorithm: string;
  keyLength: number;
  ivLength: number;
  aead: boolean;
}

export function describeCipher(algorithm: string): CipherSpec {
  const info = getCipherInfo(algorithm);

  if (!info) {
    throw new Error(`Unknown cipher algorithm: ${algorithm}`);
  }

  if (!SUPPORTED_MODES.has(info.mode)) {
    throw new Error(`Unsupported cipher mode ${info.mode} for ${algorithm}`);
  }

  const aead = info.mode === 'gcm';
  // OpenSSL reports ChaCha20-Poly1305 as a plain stream cipher
  if ((aead && !isGcmAlgorithm(algorithm)) || /poly1305/i.test(info.name)) {
    throw new Error(`Unsupported authenticated cipher: ${algorithm}`);
  }

  return {
    algorithm,
    keyLength: info.keyLength,
    ivLength: info.ivLength ?? 0,
    aead
  };
}

function isGcmAlgorithm(algorithm: string): algorithm is CipherGCMTypes {
  return algorithm === 'aes-128-gcm' || algorithm === 'aes-192-gcm' || algorithm === 'aes-256-gcm';
}

/**
 * Turn key material into a key of the cipher's length. A Buffer of the exact
 * length is used as-is; anything else is stretched through SHA-256.
 */
export function deriveKey(material: KeyMaterial, keyLength: number): Buffer {
  if (Buffer.isBuffer(material) && material.length === keyLength) {
    return material;
  }

  if (keyLength > 32) {
    throw new Error(`Cannot derive a ${keyLength}-byte key from key material`);
  }

  return createHash('sha256').update(material).digest().subarray(0, keyLength);
}

function syntheticIv(key: Buffer, plaintext: Buffer, ivLength: number): Buffer {
  const macKey = createHash('sha256').update('synthetic-iv').update(key).digest();
  return createHmac('sha256', macKey).update(plaintext).digest().subarray(0, ivLength);
}

export function encryptBuffer(
  plaintext: Buffer,
  material: KeyMaterial,
  algorithm: string,
  ivMode: IvMode
): Buffer {
  const spec = describeCipher(algorithm);
  const key = deriveKey(material, spec.keyLength);
  const iv =
    ivMode === 'random' ? randomBytes(spec.ivLength) : syntheticIv(key, plaintext, spec.ivLength);

  if (isGcmAlgorithm(spec.algorithm)) {
    const cipher = createCipheriv(spec.algorithm, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
  }

  const cipher = createCipheriv(spec.algorithm, key, spec.ivLength > 0 ? iv : null);
  return Buffer.concat([iv, cipher.update(plaintext), cipher.final()]);
}

export function decryptBuffer(payload: Buffer, material: KeyMaterial, algorithm: string): Buffer {
  const spec = describeCipher(algorithm);
  const key = deriveKey(material, spec.keyLength);
  const tagLength = spec.aead ? AUTH_TAG_LENGTH : 0;

  if (payload.length < spec.ivLength + tagLength) {
    throw new Error('Ciphertext is shorter than its header');
  }

  const iv = payload.subarray(0, spec.ivLength);
  const ciphertext = payload.subarray(spec.ivLength + tagLength);

  if (isGcmAlgorithm(spec.algorithm)) {
    const decipher = createDecipheriv(spec.algorithm, key, iv);
    decipher.setAuthTag(payload.subarray(spec.ivLength, spec.ivLength + tagLength));
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  }

  const decipher = createDecipheriv(spec.algorithm, key, spec.ivLength > 0 ? iv : null);
  return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
}

export interface NodeCipherProviderOptions {
  /** Name of the parameter carrying the key, default "key" */
  keyParam?: string;
  ivMode?: IvMode;
}

/**
 * Default cipher provider. Reads the key from `params[keyParam]` and the IV
 * mode from the `ivMode` extra option.
 */
export class NodeCipherProvider {
  readonly requiresKey = true;
  private readonly keyParam: string;
  private readonly ivMode: IvMode;

  constructor(options: NodeCipherProviderOptions = {}) {
    this.keyParam = options.keyParam ?? 'key';
    this.ivMode = options.ivMode ?? env.ATTR_CIPHER_IV_MODE;
  }

  encrypt(value: Buffer, params: CipherParams): Buffer {
    return encryptBuffer(value, this.keyFrom(params), params.algorithm, this.ivModeFrom(params));
  }

  decrypt(value: Buffer, params: CipherParams): Buffer {
    return decryptBuffer(value, this.keyFrom(params), params.algorithm);
  }

  private keyFrom(params: CipherParams): KeyMaterial {
    const key = params[this.keyParam];
    if (typeof key === 'string' || Buffer.isBuffer(key)) {
      return key;
    }
    throw new Error(`Missing cipher key parameter "${this.keyParam}"`);
  }

  private ivModeFrom(params: CipherParams): IvMode {
    const mode = params['ivMode'];
    if (mode === undefined) {
      return this.ivMode;
    }
    if (mode === 'synthetic' || mode === 'random') {
      return mode;
    }
    throw new Error(`Unknown IV mode: ${String(mode)}`);
  }
}

export const defaultCipherProvider = new NodeCipherProvider();
