/**
 * attribute-cipher - transparent attribute-level encryption for plain objects
 * and mongoose documents
 */

export { AttributeCipher, EncryptedClass, propertyStorage } from './accessors/index.js';
export type {
  AttributeAccessor,
  AttributeHelpers,
  EncryptedClassOptions,
  ForClassOptions
} from './accessors/index.js';

export { OptionRegistry, DefaultLayer, builtinDefaults } from './options/index.js';

export {
  literal,
  methodRef,
  callable,
  resolve,
  evaluate,
  isAllowed
} from './resolution/index.js';

export {
  encryptValue,
  decryptValue,
  cipherParams,
  jsonMarshaler,
  encodeText,
  decodeText
} from './pipeline/index.js';

export { NodeCipherProvider, defaultCipherProvider } from './crypto/index.js';
export type { IvMode, NodeCipherProviderOptions } from './crypto/index.js';

export {
  encryptedAttributesPlugin,
  encryptedFilter,
  documentStorage,
  type EncryptedPluginOptions,
  type EncryptedModelStatics
} from './database/index.js';

export {
  AttributeCipherError,
  DeclarationError,
  ResolutionError,
  TransformError
} from './lib/errors.js';

export type * from './types/index.js';
