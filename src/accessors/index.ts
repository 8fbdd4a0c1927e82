export { AttributeCipher, type ForClassOptions } from './attribute-cipher.js';
export {
  EncryptedClass,
  propertyStorage,
  type AttributeAccessor,
  type AttributeHelpers,
  type EncryptedClassOptions
} from './encrypted-class.js';
