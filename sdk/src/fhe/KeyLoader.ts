import type { SchemeTypes } from "./types";
import { Serializer } from "./Serializer";

/**
 * Rebuilds keys from their serialized bytes; the inverse of generation.
 */
export class KeyLoader<T extends SchemeTypes> {
  constructor(private readonly serializer: Serializer<T>) {}

  /** @throws DeserializationError */
  loadClientKey(bytes: Uint8Array): T["clientKey"] {
    return this.serializer.fromBytes("clientKey", bytes);
  }

  /** @throws DeserializationError */
  loadServerKey(bytes: Uint8Array): T["serverKey"] {
    return this.serializer.fromBytes("serverKey", bytes);
  }
}
