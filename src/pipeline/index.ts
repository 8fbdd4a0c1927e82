export {
  encryptValue,
  decryptValue,
  cipherParams,
  isAbsent,
  type TransformStage
} from './transform-pipeline.js';
export {
  encodeText,
  decodeText,
  isEncodeFormat,
  jsonMarshaler,
  type EncodeFormat
} from './codecs.js';
