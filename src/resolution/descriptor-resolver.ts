import { env } from '../config/index.js';
import { defaultCipherProvider } from '../crypto/node-cipher.js';
import { ResolutionError } from '../lib/errors.js';
import { mergeLayers } from '../options/normalize.js';
import { jsonMarshaler } from '../pipeline/codecs.js';
import type {
  AttributeSpec,
  EncodeFormat,
  KeyMaterial,
  OptionLayer,
  ResolvedOptions
} from '../types/index.js';
import { resolveDynamic } from './dynamic.js';

export function mergedOptions<I extends object>(spec: AttributeSpec<I>): OptionLayer<I> {
  return mergeLayers(spec.layers.map(layer => layer.options));
}

function encodeFormatOf<I>(options: OptionLayer<I>): EncodeFormat | false {
  if (options.encode === true) {
    return options.encodeFormat ?? env.ATTR_CIPHER_ENCODE_FORMAT;
  }
  return options.encode ?? false;
}

function resolveKey<I extends object>(
  options: OptionLayer<I>,
  instance: I | undefined
): KeyMaterial | undefined {
  if (options.key === undefined) {
    return undefined;
  }

  const key = resolveDynamic(options.key, instance, 'key');
  if (typeof key === 'string' || Buffer.isBuffer(key)) {
    return key;
  }

  throw new ResolutionError(
    `key resolved to ${key === null ? 'null' : typeof key}, expected a string or Buffer`,
    'key'
  );
}

/**
 * Resolve the options of one accessor call. Runs every key resolution again
 * on each call since key material may depend on instance state.
 */
export function resolve<I extends object>(
  instance: I | undefined,
  spec: AttributeSpec<I>,
  merged: OptionLayer<I> = mergedOptions(spec)
): ResolvedOptions {
  return {
    attribute: spec.name,
    key: resolveKey(merged, instance),
    secretKeyParamName: merged.secretKeyParamName ?? 'key',
    algorithm: merged.algorithm ?? env.ATTR_CIPHER_ALGORITHM,
    encode: encodeFormatOf(merged),
    marshal: merged.marshal ?? false,
    marshaler: merged.marshaler ?? jsonMarshaler,
    allowEmptyValue: merged.allowEmptyValue ?? false,
    cipherProvider: merged.cipherProvider ?? defaultCipherProvider,
    encryptMethod: merged.encryptMethod ?? 'encrypt',
    decryptMethod: merged.decryptMethod ?? 'decrypt',
    extraOptions: { ...merged.extraOptions }
  };
}
