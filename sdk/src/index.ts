/**
 * FHE Keyring SDK
 *
 * Subpath-friendly exports:
 * - ./fhe - key generation, serialization, loading and encryption
 * - ./keystore - hex key files on disk
 * - ./whitelist - vault whitelist contract client
 */

// FHE key lifecycle
export {
  FheKeyManager,
  Serializer,
  KeyPairGenerator,
  EncryptionEngine,
  KeyLoader,
  TfheScheme,
  TFHE_SERIALIZED_SIZE_LIMIT,
  FHE_OBJECT_KINDS,
  CIPHERTEXT_WIDTHS,
  ciphertextKind,
  maxValueForWidth,
  createTfheKeyManager,
  type TfheTypes,
  type FheObjectKind,
  type CiphertextWidth,
  type SchemeTypes,
  type ObjectCodec,
  type SchemeCodecs,
  type FheScheme,
  type KeyPair,
  type KeyPaths,
  type EncryptedSubmission,
  type CiphertextSubmitter,
} from "./fhe";

// Key files
export * from "./keystore";

// Whitelist ledger
export {
  WhitelistClient,
  WHITELIST_ABI,
  createWhitelistClient,
  resolveChain,
  type WhitelistClientConfig,
  type TransactionConfirmation,
} from "./whitelist/WhitelistClient";

export {
  loadLedgerConfig,
  DEFAULT_CHAIN_ID,
  LEDGER_ENV,
  type LedgerConfig,
  type LedgerOverrides,
  type EnvRecord,
} from "./config/ledger";

// Errors
export {
  KeyringError,
  KeyringErrorCode,
  ConfigurationError,
  StorageWriteError,
  StorageReadError,
  MalformedEncodingError,
  DeserializationError,
  SerializationError,
  EncryptionError,
  ValidationError,
  ContractError,
  NetworkError,
  parseContractError,
  isKeyringError,
  toError,
  type KeyringErrorCategory,
} from "./utils/errors";

// Validation
export {
  validate,
  validateAddress,
  validatePrivateKey,
  validateRpcUrl,
  validateChainId,
  validateCiphertextWidth,
  validateInteger,
  type ValidationResult,
  type Validator,
} from "./utils/validation";
