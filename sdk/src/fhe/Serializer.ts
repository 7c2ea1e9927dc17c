import type { FheObjectKind, SchemeCodecs, SchemeTypes } from "./types";
import { DeserializationError, SerializationError, toError } from "../utils/errors";

/**
 * Type-directed conversion between FHE objects and their canonical binary form.
 *
 * Blobs carry no type tag the caller can rely on, so every call names the
 * kind it expects. Asking for the wrong kind is a programmer error and is
 * reported as {@link DeserializationError}, never coerced.
 */
export class Serializer<T extends SchemeTypes> {
  constructor(private readonly codecs: SchemeCodecs<T>) {}

  /**
   * @throws SerializationError when the backend cannot encode the object
   */
  toBytes<K extends FheObjectKind>(kind: K, obj: T[K]): Uint8Array {
    try {
      return this.codecs[kind].serialize(obj);
    } catch (error) {
      throw new SerializationError(kind, toError(error));
    }
  }

  /**
   * @throws DeserializationError for truncated data, a different kind, or
   * data produced under another parameter set
   */
  fromBytes<K extends FheObjectKind>(kind: K, bytes: Uint8Array): T[K] {
    if (bytes.length === 0) {
      throw new DeserializationError(kind, new Error("empty blob"));
    }

    try {
      return this.codecs[kind].deserialize(bytes);
    } catch (error) {
      throw new DeserializationError(kind, toError(error));
    }
  }
}
