/**
 * Crypto module - cipher provider contract and the built-in node:crypto provider
 */

export {
  NodeCipherProvider,
  defaultCipherProvider,
  describeCipher,
  deriveKey,
  encryptBuffer,
  decryptBuffer,
  type CipherSpec,
  type IvMode,
  type NodeCipherProviderOptions
} from './node-cipher.js';

export { entryPoint, assertEntryPoints, requiresKey, type ProviderCall } from './provider.js';

export type {
  CipherFunction,
  CipherOutput,
  CipherParams,
  CipherProvider
} from '../types/index.js';
