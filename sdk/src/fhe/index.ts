/**
 * FHE key lifecycle
 *
 * Key pair generation, canonical serialization, key loading and encryption
 * of 8/32-bit unsigned integers.
 */

import { FheKeyManager } from "./FheKeyManager";
import { TfheScheme, type TfheTypes } from "./tfhe";
import { KeyMaterialStore } from "../keystore/KeyMaterialStore";

export * from "./types";
export { Serializer } from "./Serializer";
export { KeyPairGenerator } from "./KeyPairGenerator";
export { EncryptionEngine } from "./EncryptionEngine";
export { KeyLoader } from "./KeyLoader";
export { FheKeyManager } from "./FheKeyManager";
export { TfheScheme, TFHE_SERIALIZED_SIZE_LIMIT, type TfheTypes } from "./tfhe";

// ============================================
// Factory
// ============================================

export function createTfheKeyManager(store?: KeyMaterialStore): FheKeyManager<TfheTypes> {
  return new FheKeyManager(new TfheScheme(), store ?? new KeyMaterialStore());
}
