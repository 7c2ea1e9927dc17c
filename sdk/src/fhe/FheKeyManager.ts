import type {
  CiphertextSubmitter,
  CiphertextWidth,
  FheScheme,
  KeyPair,
  KeyPaths,
  SchemeTypes,
} from "./types";
import { Serializer } from "./Serializer";
import { KeyPairGenerator } from "./KeyPairGenerator";
import { EncryptionEngine } from "./EncryptionEngine";
import { KeyLoader } from "./KeyLoader";
import { KeyMaterialStore, type SaveOptions } from "../keystore/KeyMaterialStore";
import type { Hash } from "viem";

/**
 * Key lifecycle over one FHE backend: generate, persist, load, encrypt.
 *
 * @example
 * ```typescript
 * const keys = createTfheKeyManager();
 * const paths = resolveKeyPaths('./fhe-keys', 'bin');
 * await keys.generateAndPersist(paths);
 *
 * // later, possibly in another process
 * const clientKey = await keys.loadClientKeyFromFile(paths.clientKeyPath);
 * const ciphertext = keys.encrypt(clientKey, 8, 200);
 * ```
 */
export class FheKeyManager<T extends SchemeTypes> {
  readonly serializer: Serializer<T>;
  readonly generator: KeyPairGenerator<T>;
  readonly engine: EncryptionEngine<T>;
  readonly loader: KeyLoader<T>;

  constructor(
    readonly scheme: FheScheme<T>,
    readonly store: KeyMaterialStore = new KeyMaterialStore()
  ) {
    this.serializer = new Serializer<T>(scheme.codecs);
    this.generator = new KeyPairGenerator(scheme);
    this.engine = new EncryptionEngine(scheme, this.serializer);
    this.loader = new KeyLoader(this.serializer);
  }

  generateKeyPair(): KeyPair<T> {
    return this.generator.generate();
  }

  /**
   * Serialize both keys, then write them. Nothing is written unless both
   * keys serialized.
   */
  async persistKeyPair(pair: KeyPair<T>, paths: KeyPaths, options: SaveOptions = {}): Promise<void> {
    const clientKeyBytes = this.serializer.toBytes("clientKey", pair.clientKey);
    const serverKeyBytes = this.serializer.toBytes("serverKey", pair.serverKey);

    await this.store.save(paths.clientKeyPath, clientKeyBytes, options);
    await this.store.save(paths.serverKeyPath, serverKeyBytes, options);
  }

  async generateAndPersist(paths: KeyPaths, options: SaveOptions = {}): Promise<KeyPair<T>> {
    const pair = this.generateKeyPair();
    await this.persistKeyPair(pair, paths, options);
    return pair;
  }

  async loadClientKeyFromFile(filePath: string): Promise<T["clientKey"]> {
    return this.loader.loadClientKey(await this.store.load(filePath));
  }

  async loadServerKeyFromFile(filePath: string): Promise<T["serverKey"]> {
    return this.loader.loadServerKey(await this.store.load(filePath));
  }

  /**
   * Encrypt `value` at `width` bits and return the serialized ciphertext
   */
  encrypt(clientKey: T["clientKey"], width: CiphertextWidth, value: number): Uint8Array {
    return this.engine.encryptToBytes(clientKey, width, value);
  }

  /**
   * Encrypt, then hand the ciphertext to a submitter
   */
  async encryptAndSubmit(
    clientKey: T["clientKey"],
    width: CiphertextWidth,
    value: number,
    submitter: CiphertextSubmitter
  ): Promise<Hash> {
    const ciphertext = this.encrypt(clientKey, width, value);
    return submitter.submit({ width, ciphertext });
  }
}
