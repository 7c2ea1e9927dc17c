/**
 * FHE Keyring Error Classes
 *
 * Typed errors with numeric codes and contextual information, shared by the
 * key lifecycle core, the key store and the whitelist client.
 */

import type { FheObjectKind } from "../fhe/types";

/**
 * Base error code enum for all keyring errors
 */
export enum KeyringErrorCode {
  // General errors (1xxx)
  UNKNOWN_ERROR = 1000,
  INVALID_CONFIGURATION = 1001,
  NETWORK_ERROR = 1002,

  // Validation errors (2xxx)
  INVALID_INPUT = 2000,
  INVALID_ADDRESS = 2001,
  INVALID_PRIVATE_KEY = 2002,
  INVALID_RPC_URL = 2003,
  INVALID_CHAIN_ID = 2004,
  WALLET_REQUIRED = 2005,

  // Contract errors (3xxx)
  CONTRACT_CALL_FAILED = 3000,
  TRANSACTION_REVERTED = 3001,
  INSUFFICIENT_FUNDS = 3002,
  NONCE_TOO_LOW = 3003,
  REPLACEMENT_UNDERPRICED = 3004,

  // Cryptographic errors (4xxx)
  SCHEME_CONFIGURATION_FAILED = 4000,
  ENCRYPTION_FAILED = 4001,
  VALUE_OUT_OF_RANGE = 4002,
  SERIALIZATION_FAILED = 4003,
  DESERIALIZATION_FAILED = 4004,

  // Storage errors (5xxx)
  STORAGE_WRITE_FAILED = 5000,
  STORAGE_READ_FAILED = 5001,
  MALFORMED_ENCODING = 5002,
}

export type KeyringErrorCategory =
  | "general"
  | "validation"
  | "contract"
  | "crypto"
  | "storage";

const CATEGORY_RANGES: Record<KeyringErrorCategory, [number, number]> = {
  general: [1000, 1999],
  validation: [2000, 2999],
  contract: [3000, 3999],
  crypto: [4000, 4999],
  storage: [5000, 5999],
};

/**
 * Error metadata interface
 */
export interface KeyringErrorMetadata {
  code: KeyringErrorCode;
  timestamp: Date;
  context?: Record<string, unknown>;
  cause?: Error;
  retryable: boolean;
  suggestedAction?: string;
}

/**
 * Base keyring error
 */
export class KeyringError extends Error {
  public readonly code: KeyringErrorCode;
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;
  public readonly cause?: Error;
  public readonly retryable: boolean;
  public readonly suggestedAction?: string;

  constructor(
    message: string,
    code: KeyringErrorCode = KeyringErrorCode.UNKNOWN_ERROR,
    options: Partial<KeyringErrorMetadata> = {}
  ) {
    super(message);
    this.name = "KeyringError";
    this.code = code;
    this.timestamp = options.timestamp || new Date();
    this.context = options.context || {};
    this.cause = options.cause;
    this.retryable = options.retryable ?? false;
    this.suggestedAction = options.suggestedAction;

    // Maintains proper stack trace for where error was thrown
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Create a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      codeName: KeyringErrorCode[this.code],
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      retryable: this.retryable,
      suggestedAction: this.suggestedAction,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }

  /**
   * Check if error is of a specific type
   */
  isType(code: KeyringErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if error is in a category (by code range)
   */
  isCategory(category: KeyringErrorCategory): boolean {
    const [min, max] = CATEGORY_RANGES[category];
    return this.code >= min && this.code <= max;
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Scheme parameter configuration could not be built. Fatal.
 */
export class ConfigurationError extends KeyringError {
  constructor(message: string, options: { cause?: Error; context?: Record<string, unknown> } = {}) {
    super(message, KeyringErrorCode.SCHEME_CONFIGURATION_FAILED, {
      context: options.context,
      cause: options.cause,
      retryable: false,
      suggestedAction: "Abort: the FHE parameter set cannot be constructed on this host",
    });
    this.name = "ConfigurationError";
  }
}

/**
 * Storage Write Error
 */
export class StorageWriteError extends KeyringError {
  public readonly path: string;

  constructor(path: string, cause?: Error) {
    super(
      `Failed to write key material to ${path}${cause ? `: ${cause.message}` : ""}`,
      KeyringErrorCode.STORAGE_WRITE_FAILED,
      {
        context: { path },
        cause,
        retryable: true,
        suggestedAction: "Check permissions and free space, or choose another path",
      }
    );
    this.name = "StorageWriteError";
    this.path = path;
  }
}

/**
 * Storage Read Error
 */
export class StorageReadError extends KeyringError {
  public readonly path: string;

  constructor(path: string, cause?: Error) {
    super(
      `Failed to read key material from ${path}${cause ? `: ${cause.message}` : ""}`,
      KeyringErrorCode.STORAGE_READ_FAILED,
      {
        context: { path },
        cause,
        retryable: true,
        suggestedAction: "Verify the key file exists and is readable",
      }
    );
    this.name = "StorageReadError";
    this.path = path;
  }
}

/**
 * Hex text that cannot be decoded
 */
export class MalformedEncodingError extends KeyringError {
  public readonly reason: string;

  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Malformed hex encoding: ${reason}`, KeyringErrorCode.MALFORMED_ENCODING, {
      context: { ...context, reason },
      retryable: false,
      suggestedAction: "The stored key is corrupt; restore it from a backup or regenerate",
    });
    this.name = "MalformedEncodingError";
    this.reason = reason;
  }

  /**
   * Same error with extra context (e.g. the file it was read from)
   */
  withContext(context: Record<string, unknown>): MalformedEncodingError {
    return new MalformedEncodingError(this.reason, { ...this.context, ...context });
  }
}

/**
 * Byte layout does not match the requested object kind
 */
export class DeserializationError extends KeyringError {
  public readonly expectedKind: FheObjectKind;

  constructor(expectedKind: FheObjectKind, cause?: Error) {
    super(
      `Bytes are not a valid ${expectedKind}${cause ? `: ${cause.message}` : ""}`,
      KeyringErrorCode.DESERIALIZATION_FAILED,
      {
        context: { expectedKind },
        cause,
        retryable: false,
        suggestedAction:
          "Check that the blob was produced for this object kind and with the same scheme parameters",
      }
    );
    this.name = "DeserializationError";
    this.expectedKind = expectedKind;
  }
}

/**
 * Live object could not be serialized
 */
export class SerializationError extends KeyringError {
  public readonly kind: FheObjectKind;

  constructor(kind: FheObjectKind, cause?: Error) {
    super(
      `Failed to serialize ${kind}${cause ? `: ${cause.message}` : ""}`,
      KeyringErrorCode.SERIALIZATION_FAILED,
      { context: { kind }, cause, retryable: false }
    );
    this.name = "SerializationError";
    this.kind = kind;
  }
}

/**
 * Encryption rejected a value
 */
export class EncryptionError extends KeyringError {
  public readonly width: number;
  public readonly value: unknown;

  constructor(
    message: string,
    options: { width: number; value: unknown; cause?: Error }
  ) {
    super(
      message,
      options.cause ? KeyringErrorCode.ENCRYPTION_FAILED : KeyringErrorCode.VALUE_OUT_OF_RANGE,
      {
        context: { width: options.width, value: String(options.value) },
        cause: options.cause,
        retryable: false,
        suggestedAction: `Pass an unsigned integer that fits in ${options.width} bits`,
      }
    );
    this.name = "EncryptionError";
    this.width = options.width;
    this.value = options.value;
  }
}

/**
 * Validation Error
 */
export class ValidationError extends KeyringError {
  constructor(
    message: string,
    code: KeyringErrorCode = KeyringErrorCode.INVALID_INPUT,
    context?: Record<string, unknown>
  ) {
    super(message, code, {
      context,
      retryable: false,
      suggestedAction: "Check input parameters and try again",
    });
    this.name = "ValidationError";
  }
}

/**
 * Contract Error
 */
export class ContractError extends KeyringError {
  public readonly transactionHash?: string;
  public readonly revertReason?: string;

  constructor(
    message: string,
    code: KeyringErrorCode = KeyringErrorCode.CONTRACT_CALL_FAILED,
    options: {
      transactionHash?: string;
      revertReason?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, code, {
      context: {
        ...options.context,
        transactionHash: options.transactionHash,
        revertReason: options.revertReason,
      },
      cause: options.cause,
      retryable: [
        KeyringErrorCode.NONCE_TOO_LOW,
        KeyringErrorCode.REPLACEMENT_UNDERPRICED,
      ].includes(code),
      suggestedAction: options.revertReason
        ? `Transaction reverted: ${options.revertReason}`
        : "Check transaction parameters and signer balance",
    });
    this.name = "ContractError";
    this.transactionHash = options.transactionHash;
    this.revertReason = options.revertReason;
  }
}

/**
 * Network Error
 */
export class NetworkError extends KeyringError {
  public readonly endpoint?: string;
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: {
      endpoint?: string;
      statusCode?: number;
      cause?: Error;
    } = {}
  ) {
    super(message, KeyringErrorCode.NETWORK_ERROR, {
      context: {
        endpoint: options.endpoint,
        statusCode: options.statusCode,
      },
      cause: options.cause,
      retryable: true,
      suggestedAction: "Check network connectivity and try again",
    });
    this.name = "NetworkError";
    this.endpoint = options.endpoint;
    this.statusCode = options.statusCode;
  }
}

/**
 * Error factory for errors raised by whitelist contract calls
 */
export function parseContractError(error: Error): ContractError {
  const message = error.message || "Contract call failed";

  if (message.includes("OwnableUnauthorizedAccount") || message.includes("caller is not the owner")) {
    return new ContractError(
      "Signer is not allowed to modify the whitelist",
      KeyringErrorCode.TRANSACTION_REVERTED,
      { cause: error, revertReason: "OwnableUnauthorizedAccount" }
    );
  }

  if (message.includes("insufficient funds")) {
    return new ContractError(
      "Signer has insufficient funds for this transaction",
      KeyringErrorCode.INSUFFICIENT_FUNDS,
      { cause: error }
    );
  }

  if (message.includes("nonce too low")) {
    return new ContractError(
      "Transaction nonce too low",
      KeyringErrorCode.NONCE_TOO_LOW,
      { cause: error }
    );
  }

  if (message.includes("replacement transaction underpriced")) {
    return new ContractError(
      "Replacement transaction underpriced",
      KeyringErrorCode.REPLACEMENT_UNDERPRICED,
      { cause: error }
    );
  }

  if (message.includes("reverted")) {
    return new ContractError(message, KeyringErrorCode.TRANSACTION_REVERTED, {
      cause: error,
    });
  }

  // Default contract error
  return new ContractError(message, KeyringErrorCode.CONTRACT_CALL_FAILED, {
    cause: error,
  });
}

/**
 * Type guard for keyring errors
 */
export function isKeyringError(error: unknown): error is KeyringError {
  return error instanceof KeyringError;
}
