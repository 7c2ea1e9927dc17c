import {
  type CiphertextWidth,
  type FheScheme,
  type SchemeTypes,
  maxValueForWidth,
} from "./types";
import { Serializer } from "./Serializer";
import { EncryptionError, KeyringError, toError } from "../utils/errors";

/**
 * Encrypts fixed-width unsigned integers under a client key.
 *
 * Encryption is probabilistic: the same value under the same key yields
 * different ciphertext bytes on every call.
 */
export class EncryptionEngine<T extends SchemeTypes> {
  constructor(
    private readonly scheme: FheScheme<T>,
    private readonly serializer: Serializer<T>
  ) {}

  encrypt8(clientKey: T["clientKey"], value: number): T["ciphertext8"] {
    this.assertFits(8, value);
    try {
      return this.scheme.encrypt8(clientKey, value);
    } catch (error) {
      throw this.rejected(8, value, error);
    }
  }

  encrypt32(clientKey: T["clientKey"], value: number): T["ciphertext32"] {
    this.assertFits(32, value);
    try {
      return this.scheme.encrypt32(clientKey, value);
    } catch (error) {
      throw this.rejected(32, value, error);
    }
  }

  encrypt(
    clientKey: T["clientKey"],
    width: CiphertextWidth,
    value: number
  ): T["ciphertext8"] | T["ciphertext32"] {
    return width === 8 ? this.encrypt8(clientKey, value) : this.encrypt32(clientKey, value);
  }

  /**
   * Encrypt at a declared width and serialize the ciphertext for transport
   */
  encryptToBytes(clientKey: T["clientKey"], width: CiphertextWidth, value: number): Uint8Array {
    if (width === 8) {
      return this.serializer.toBytes("ciphertext8", this.encrypt8(clientKey, value));
    }
    return this.serializer.toBytes("ciphertext32", this.encrypt32(clientKey, value));
  }

  private assertFits(width: CiphertextWidth, value: number): void {
    if (!Number.isInteger(value)) {
      throw new EncryptionError(`Value ${value} is not an integer`, { width, value });
    }
    const max = maxValueForWidth(width);
    if (value < 0 || value > max) {
      throw new EncryptionError(
        `Value ${value} is out of range for a ${width}-bit unsigned integer (0..${max})`,
        { width, value }
      );
    }
  }

  private rejected(width: CiphertextWidth, value: number, error: unknown): KeyringError {
    const cause = toError(error);
    return new EncryptionError(`${this.scheme.name} rejected ${width}-bit value ${value}: ${cause.message}`, {
      width,
      value,
      cause,
    });
  }
}
