import { randomBytes } from "crypto";
import type {
  FheObjectKind,
  FheScheme,
  ObjectCodec,
  SchemeCodecs,
  SchemeTypes,
} from "../../src/fhe/types";

/**
 * In-process stand-in for an FHE backend.
 *
 * Objects are JSON records tagged with their kind, so decoding one kind as
 * another fails the way a real backend's typed deserialization does.
 * Ciphertexts carry a random nonce to keep encryption probabilistic.
 */

const MAGIC = "fake-fhe/v1";

export interface FakeObject {
  readonly tag: FheObjectKind;
  readonly keyId: string;
  readonly value?: number;
  readonly nonce?: string;
}

export interface FakeTypes extends SchemeTypes {
  clientKey: FakeObject;
  serverKey: FakeObject;
  ciphertext8: FakeObject;
  ciphertext32: FakeObject;
}

export interface FakeSchemeOptions {
  failKeyGeneration?: boolean;
  failEncryption?: boolean;
  failSerialization?: boolean;
}

function decodeObject(expected: FheObjectKind, bytes: Uint8Array): FakeObject {
  const parsed: unknown = JSON.parse(Buffer.from(bytes).toString("utf-8"));
  if (typeof parsed !== "object" || parsed === null || !("magic" in parsed) || parsed.magic !== MAGIC) {
    throw new Error("unrecognized blob");
  }
  if (!("tag" in parsed) || parsed.tag !== expected) {
    throw new Error(`expected ${expected}`);
  }
  if (!("keyId" in parsed) || typeof parsed.keyId !== "string") {
    throw new Error("missing key id");
  }

  const value = "value" in parsed && typeof parsed.value === "number" ? parsed.value : undefined;
  const nonce = "nonce" in parsed && typeof parsed.nonce === "string" ? parsed.nonce : undefined;

  return {
    tag: expected,
    keyId: parsed.keyId,
    ...(value !== undefined ? { value } : {}),
    ...(nonce !== undefined ? { nonce } : {}),
  };
}

export class FakeScheme implements FheScheme<FakeTypes> {
  readonly name = "fake";
  readonly codecs: SchemeCodecs<FakeTypes>;

  constructor(private readonly options: FakeSchemeOptions = {}) {
    this.codecs = {
      clientKey: this.codec("clientKey"),
      serverKey: this.codec("serverKey"),
      ciphertext8: this.codec("ciphertext8"),
      ciphertext32: this.codec("ciphertext32"),
    };
  }

  generateClientKey(): FakeObject {
    if (this.options.failKeyGeneration) {
      throw new Error("parameter set unavailable");
    }
    return { tag: "clientKey", keyId: randomBytes(8).toString("hex") };
  }

  deriveServerKey(clientKey: FakeObject): FakeObject {
    return { tag: "serverKey", keyId: clientKey.keyId };
  }

  encrypt8(clientKey: FakeObject, value: number): FakeObject {
    return this.encrypt("ciphertext8", clientKey, value);
  }

  encrypt32(clientKey: FakeObject, value: number): FakeObject {
    return this.encrypt("ciphertext32", clientKey, value);
  }

  /** Test-only inverse of encryption */
  decrypt(clientKey: FakeObject, ciphertext: FakeObject): number {
    if (ciphertext.keyId !== clientKey.keyId || ciphertext.value === undefined) {
      throw new Error("ciphertext was not produced under this client key");
    }
    return ciphertext.value;
  }

  private encrypt(tag: "ciphertext8" | "ciphertext32", clientKey: FakeObject, value: number): FakeObject {
    if (this.options.failEncryption) {
      throw new Error("backend refused");
    }
    return { tag, keyId: clientKey.keyId, value, nonce: randomBytes(8).toString("hex") };
  }

  private codec(kind: FheObjectKind): ObjectCodec<FakeObject> {
    return {
      serialize: (obj) => {
        if (this.options.failSerialization) {
          throw new Error("object is not serializable");
        }
        return new Uint8Array(Buffer.from(JSON.stringify({ magic: MAGIC, ...obj }), "utf-8"));
      },
      deserialize: (bytes) => decodeObject(kind, bytes),
    };
  }
}
