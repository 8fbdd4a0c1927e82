export {
  encryptedAttributesPlugin,
  encryptedFilter,
  documentStorage,
  type EncryptedPluginOptions,
  type EncryptedModelStatics
} from './encrypted-plugin.js';
