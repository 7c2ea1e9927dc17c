/**
 * TFHE backend for the keyring, on top of Zama's `node-tfhe` bindings.
 *
 * Objects are encoded with the library's safe serialization: the blob embeds
 * the object's type and version, so decoding server key bytes as a client key
 * (or an 8-bit ciphertext as a 32-bit one) fails instead of yielding garbage.
 *
 * The server key is kept in its compressed form: the bindings only serialize
 * `TfheCompressedServerKey`. An evaluating party decompresses it before computing.
 */

import {
  FheUint32,
  FheUint8,
  TfheClientKey,
  TfheCompressedServerKey,
  type TfheConfig,
  TfheConfigBuilder,
} from "node-tfhe";
import type { FheScheme, SchemeCodecs, SchemeTypes } from "./types";

export interface TfheTypes extends SchemeTypes {
  clientKey: TfheClientKey;
  serverKey: TfheCompressedServerKey;
  ciphertext8: FheUint8;
  ciphertext32: FheUint32;
}

/** Upper bound on a serialized object, checked on both encode and decode */
export const TFHE_SERIALIZED_SIZE_LIMIT = 2n ** 31n;

export class TfheScheme implements FheScheme<TfheTypes> {
  readonly name = "tfhe";
  readonly codecs: SchemeCodecs<TfheTypes>;
  private config?: TfheConfig;

  constructor(private readonly sizeLimit: bigint = TFHE_SERIALIZED_SIZE_LIMIT) {
    const limit = this.sizeLimit;
    this.codecs = {
      clientKey: {
        serialize: (key) => key.safe_serialize(limit),
        deserialize: (bytes) => TfheClientKey.safe_deserialize(bytes, limit),
      },
      serverKey: {
        serialize: (key) => key.safe_serialize(limit),
        deserialize: (bytes) => TfheCompressedServerKey.safe_deserialize(bytes, limit),
      },
      ciphertext8: {
        serialize: (ct) => ct.safe_serialize(limit),
        deserialize: (bytes) => FheUint8.safe_deserialize(bytes, limit),
      },
      ciphertext32: {
        serialize: (ct) => ct.safe_serialize(limit),
        deserialize: (bytes) => FheUint32.safe_deserialize(bytes, limit),
      },
    };
  }

  generateClientKey(): TfheClientKey {
    return TfheClientKey.generate(this.parameters());
  }

  deriveServerKey(clientKey: TfheClientKey): TfheCompressedServerKey {
    return TfheCompressedServerKey.new(clientKey);
  }

  encrypt8(clientKey: TfheClientKey, value: number): FheUint8 {
    return FheUint8.encrypt_with_client_key(value, clientKey);
  }

  encrypt32(clientKey: TfheClientKey, value: number): FheUint32 {
    return FheUint32.encrypt_with_client_key(value, clientKey);
  }

  // Default parameter set; built once per scheme instance
  private parameters(): TfheConfig {
    if (!this.config) {
      this.config = TfheConfigBuilder.default().build();
    }
    return this.config;
  }
}
