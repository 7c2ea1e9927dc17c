import * as fsp from "fs/promises";
import * as path from "path";
import * as crypto from "crypto";
import { decodeHex, encodeHex } from "./codec";
import {
  MalformedEncodingError,
  StorageReadError,
  StorageWriteError,
  toError,
} from "../utils/errors";

/** Open file handle as the store uses it */
export interface WritableKeyFile {
  writeFile(data: string, encoding: "utf-8"): Promise<void>;
  close(): Promise<void>;
}

/** The file operations the store performs; `fs/promises` by default */
export interface KeyFileSystem {
  mkdir(dirPath: string, options: { recursive: true }): Promise<unknown>;
  open(filePath: string, flags: "w"): Promise<WritableKeyFile>;
  rename(from: string, to: string): Promise<void>;
  rm(filePath: string, options: { force: true }): Promise<void>;
  readFile(filePath: string, encoding: "utf-8"): Promise<string>;
  access(filePath: string): Promise<void>;
}

export const nodeFileSystem: KeyFileSystem = fsp;

export interface SaveOptions {
  /**
   * Write to a sibling temporary file, then rename it over the destination.
   * Without it two writers on one path race and the last one wins.
   */
  atomic?: boolean;
}

/**
 * Reads and writes serialized key blobs as hex text files.
 *
 * Holds no cryptographic logic and is the only component of the keyring that
 * touches the file system.
 *
 * @example
 * ```typescript
 * const store = new KeyMaterialStore();
 * await store.save('./fhe-keys/fheClientKey.bin', clientKeyBytes);
 * const bytes = await store.load('./fhe-keys/fheClientKey.bin');
 * ```
 */
export class KeyMaterialStore {
  constructor(private readonly fs: KeyFileSystem = nodeFileSystem) {}

  /**
   * Persist a blob at `filePath`, creating missing parent directories.
   *
   * @throws StorageWriteError with the underlying I/O error as cause
   */
  async save(filePath: string, blob: Uint8Array, options: SaveOptions = {}): Promise<void> {
    const text = encodeHex(blob);

    try {
      await this.fs.mkdir(path.dirname(filePath), { recursive: true });
    } catch (error) {
      throw new StorageWriteError(filePath, toError(error));
    }

    if (!options.atomic) {
      await this.writeText(filePath, filePath, text);
      return;
    }

    const tempPath = path.join(
      path.dirname(filePath),
      `.${path.basename(filePath)}.${crypto.randomBytes(6).toString("hex")}.tmp`
    );
    try {
      await this.writeText(tempPath, filePath, text);
      await this.fs.rename(tempPath, filePath);
    } catch (error) {
      const failure =
        error instanceof StorageWriteError ? error : new StorageWriteError(filePath, toError(error));
      try {
        await this.fs.rm(tempPath, { force: true });
      } catch (cleanupError) {
        failure.context.cleanupError = toError(cleanupError).message;
      }
      throw failure;
    }
  }

  /**
   * Read the blob stored at `filePath`.
   *
   * @throws StorageReadError when the file is missing or unreadable
   * @throws MalformedEncodingError when the content is not hex text
   */
  async load(filePath: string): Promise<Uint8Array> {
    let text: string;
    try {
      text = await this.fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw new StorageReadError(filePath, toError(error));
    }

    try {
      return decodeHex(text);
    } catch (error) {
      if (error instanceof MalformedEncodingError) {
        throw error.withContext({ path: filePath });
      }
      throw error;
    }
  }

  /**
   * Whether something already exists at `filePath`
   */
  async exists(filePath: string): Promise<boolean> {
    try {
      await this.fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async writeText(target: string, reportedPath: string, text: string): Promise<void> {
    let handle: WritableKeyFile;
    try {
      handle = await this.fs.open(target, "w");
    } catch (error) {
      throw new StorageWriteError(reportedPath, toError(error));
    }

    try {
      await handle.writeFile(text, "utf-8");
    } catch (error) {
      const writeError = new StorageWriteError(reportedPath, toError(error));
      try {
        await handle.close();
      } catch (closeError) {
        // the write failure stays the reported one
        writeError.context.closeError = toError(closeError).message;
      }
      throw writeError;
    }

    try {
      await handle.close();
    } catch (error) {
      throw new StorageWriteError(reportedPath, toError(error));
    }
  }
}
