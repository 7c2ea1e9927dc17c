/**
 * Core FHE types shared by the key lifecycle components.
 *
 * The core is generic over a {@link SchemeTypes} family so that the key
 * pipeline does not depend on one FHE library: a backend names the native
 * class used for each object kind and provides the primitives in
 * {@link FheScheme}.
 */

import type { Hash } from "viem";

// ============================================
// Object kinds
// ============================================

/**
 * Explicit target-type tag used wherever bytes are turned back into objects.
 */
export type FheObjectKind = "clientKey" | "serverKey" | "ciphertext8" | "ciphertext32";

export const FHE_OBJECT_KINDS: readonly FheObjectKind[] = [
  "clientKey",
  "serverKey",
  "ciphertext8",
  "ciphertext32",
] as const;

/** Supported plaintext widths, in bits */
export type CiphertextWidth = 8 | 32;

export const CIPHERTEXT_WIDTHS: readonly CiphertextWidth[] = [8, 32] as const;

export function ciphertextKind(width: CiphertextWidth): "ciphertext8" | "ciphertext32" {
  return width === 8 ? "ciphertext8" : "ciphertext32";
}

/** Largest plaintext representable at a width */
export function maxValueForWidth(width: CiphertextWidth): number {
  return 2 ** width - 1;
}

// ============================================
// Scheme backend port
// ============================================

/**
 * Native object type for every kind, as chosen by a backend.
 */
export interface SchemeTypes {
  clientKey: unknown;
  serverKey: unknown;
  ciphertext8: unknown;
  ciphertext32: unknown;
}

/**
 * Canonical binary codec for one object kind.
 */
export interface ObjectCodec<T> {
  serialize(obj: T): Uint8Array;
  deserialize(bytes: Uint8Array): T;
}

export type SchemeCodecs<T extends SchemeTypes> = {
  [K in FheObjectKind]: ObjectCodec<T[K]>;
};

/**
 * Primitives an FHE library has to provide. Everything here may throw;
 * the components wrapping it translate failures into the error taxonomy.
 */
export interface FheScheme<T extends SchemeTypes> {
  /** Backend identifier, e.g. "tfhe" */
  readonly name: string;
  /** Fresh client key under the backend's fixed parameter set */
  generateClientKey(): T["clientKey"];
  /** Server key bound to the given client key */
  deriveServerKey(clientKey: T["clientKey"]): T["serverKey"];
  encrypt8(clientKey: T["clientKey"], value: number): T["ciphertext8"];
  encrypt32(clientKey: T["clientKey"], value: number): T["ciphertext32"];
  readonly codecs: SchemeCodecs<T>;
}

// ============================================
// Data model
// ============================================

export interface KeyPair<T extends SchemeTypes> {
  /** Secret key: encrypts and decrypts. Never leaves its holder. */
  readonly clientKey: T["clientKey"];
  /** Public evaluation key for whoever runs the homomorphic circuit */
  readonly serverKey: T["serverKey"];
}

/**
 * Location of both key files. Naming is always chosen by the caller.
 */
export interface KeyPaths {
  clientKeyPath: string;
  serverKeyPath: string;
}

// ============================================
// Submission extension point
// ============================================

export interface EncryptedSubmission {
  width: CiphertextWidth;
  /** Serialized ciphertext */
  ciphertext: Uint8Array;
}

/**
 * Hands an encrypted value to whatever settles it (e.g. a vault contract).
 * The transaction format is owned by the implementation.
 */
export interface CiphertextSubmitter {
  submit(submission: EncryptedSubmission): Promise<Hash>;
}
