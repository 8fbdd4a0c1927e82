import { DeclarationError } from '../lib/errors.js';
import type { CipherParams, CipherProvider } from '../types/index.js';

export type ProviderCall = (value: Buffer, params: CipherParams) => unknown;

/**
 * Look up a named entry point on a provider, bound to the provider
 */
export function entryPoint(provider: CipherProvider, name: string): ProviderCall | undefined {
  const fn: unknown = Reflect.get(provider, name);

  if (typeof fn !== 'function') {
    return undefined;
  }

  return (value, params) => {
    const output: unknown = fn.call(provider, value, params);
    return output;
  };
}

export function requiresKey(provider: CipherProvider): boolean {
  return Reflect.get(provider, 'requiresKey') === true;
}

export function assertEntryPoints(
  provider: CipherProvider,
  encryptMethod: string,
  decryptMethod: string,
  attribute: string
): void {
  const missing = [encryptMethod, decryptMethod].filter(name => !entryPoint(provider, name));

  if (missing.length > 0) {
    throw new DeclarationError(
      `Cipher provider for ${attribute} does not expose ${missing.join(', ')}`,
      attribute
    );
  }
}
