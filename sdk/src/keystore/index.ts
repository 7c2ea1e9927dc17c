export { encodeHex, decodeHex } from "./codec";
export {
  KeyMaterialStore,
  nodeFileSystem,
  type KeyFileSystem,
  type SaveOptions,
  type WritableKeyFile,
} from "./KeyMaterialStore";
export {
  KEY_FILE_LAYOUTS,
  DEFAULT_KEY_DIR,
  DEFAULT_KEY_LAYOUT,
  isKeyFileLayout,
  resolveKeyPaths,
  type KeyFileLayout,
} from "./layout";
