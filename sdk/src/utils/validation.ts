/**
 * FHE Keyring Input Validation
 *
 * Type-safe validators for addresses, credentials, endpoints and plaintext
 * arguments, plus helpers that turn a failed result into a ValidationError.
 */

import { isAddress, getAddress, type Address, type Hex } from "viem";
import { ValidationError, KeyringErrorCode } from "./errors";
import { CIPHERTEXT_WIDTHS, type CiphertextWidth } from "../fhe/types";

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: string };

/**
 * Validator function type
 */
export type Validator<T> = (value: unknown) => ValidationResult<T>;

/**
 * Validate Ethereum address
 */
export function validateAddress(value: unknown): ValidationResult<Address> {
  if (typeof value !== "string") {
    return { valid: false, error: "Address must be a string" };
  }

  if (!value || value.trim() === "") {
    return { valid: false, error: "Address cannot be empty" };
  }

  // Mixed-case input must carry a correct EIP-55 checksum
  if (!isAddress(value)) {
    return { valid: false, error: `Invalid Ethereum address: ${value}` };
  }

  // Return checksummed address
  return { valid: true, value: getAddress(value) };
}

/**
 * Validate a secp256k1 private key (32 bytes, hex, 0x optional)
 */
export function validatePrivateKey(value: unknown): ValidationResult<Hex> {
  if (typeof value !== "string") {
    return { valid: false, error: "Private key must be a string" };
  }

  const trimmed = value.trim();
  const normalized = trimmed.startsWith("0x") ? trimmed : `0x${trimmed}`;

  if (!/^0x[0-9a-fA-F]{64}$/.test(normalized)) {
    return {
      valid: false,
      error: "Private key must be 32 bytes of hex (64 characters, 0x optional)",
    };
  }

  if (/^0x0{64}$/.test(normalized)) {
    return { valid: false, error: "Private key cannot be zero" };
  }

  return { valid: true, value: `0x${normalized.slice(2).toLowerCase()}` };
}

/**
 * Validate an RPC endpoint URL (http, https, ws or wss)
 */
export function validateRpcUrl(value: unknown): ValidationResult<string> {
  if (typeof value !== "string" || value.trim() === "") {
    return { valid: false, error: "RPC URL is required" };
  }

  let url: URL;
  try {
    url = new URL(value.trim());
  } catch {
    return { valid: false, error: `Invalid RPC URL: ${value}` };
  }

  if (!["http:", "https:", "ws:", "wss:"].includes(url.protocol)) {
    return { valid: false, error: `Unsupported RPC URL protocol: ${url.protocol}` };
  }

  return { valid: true, value: url.toString() };
}

/**
 * Validate chain ID (positive safe integer, decimal string accepted)
 */
export function validateChainId(value: unknown): ValidationResult<number> {
  const numeric = typeof value === "string" && /^\d+$/.test(value.trim())
    ? Number(value.trim())
    : value;

  if (typeof numeric !== "number" || !Number.isSafeInteger(numeric) || numeric <= 0) {
    return { valid: false, error: `Invalid chain ID: ${String(value)}` };
  }

  return { valid: true, value: numeric };
}

/**
 * Validate a declared ciphertext width (8 or 32)
 */
export function validateCiphertextWidth(value: unknown): ValidationResult<CiphertextWidth> {
  const numeric = typeof value === "string" ? Number(value.trim()) : value;
  const width = CIPHERTEXT_WIDTHS.find((w) => w === numeric);

  if (width === undefined) {
    return {
      valid: false,
      error: `Unsupported width: ${String(value)} (expected ${CIPHERTEXT_WIDTHS.join(" or ")})`,
    };
  }

  return { valid: true, value: width };
}

/**
 * Validate an integer given as text. Range is the encryption engine's job.
 */
export function validateInteger(value: unknown): ValidationResult<number> {
  if (typeof value === "number") {
    return Number.isSafeInteger(value)
      ? { valid: true, value }
      : { valid: false, error: `Not an integer: ${value}` };
  }

  if (typeof value !== "string" || !/^-?\d+$/.test(value.trim())) {
    return { valid: false, error: `Not an integer: ${String(value)}` };
  }

  const parsed = Number(value.trim());
  if (!Number.isSafeInteger(parsed)) {
    return { valid: false, error: `Integer too large: ${value}` };
  }

  return { valid: true, value: parsed };
}

/**
 * Validation helper - throws on invalid
 */
export function validate<T>(
  value: unknown,
  validator: Validator<T>,
  fieldName: string,
  code: KeyringErrorCode = KeyringErrorCode.INVALID_INPUT
): T {
  const result = validator(value);
  if (!result.valid) {
    throw new ValidationError(
      `Validation failed for ${fieldName}: ${result.error}`,
      code,
      { field: fieldName, error: result.error }
    );
  }
  return result.value;
}
