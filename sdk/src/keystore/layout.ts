import * as path from "path";
import type { KeyPaths } from "../fhe/types";

/**
 * File naming conventions for a key directory. Both store hex text.
 *
 * - `bin`: fheClientKey.bin / fheServerKey.bin
 * - `hex`: fhePublicKeyHex.hex / fhePrivateKeyHex.hex, the names earlier
 *   keygen tooling wrote the client and server key under (in that order)
 */
export type KeyFileLayout = "bin" | "hex";

export const KEY_FILE_LAYOUTS: Record<KeyFileLayout, { clientKeyFile: string; serverKeyFile: string }> = {
  bin: { clientKeyFile: "fheClientKey.bin", serverKeyFile: "fheServerKey.bin" },
  hex: { clientKeyFile: "fhePublicKeyHex.hex", serverKeyFile: "fhePrivateKeyHex.hex" },
};

export const DEFAULT_KEY_DIR = "fhe-keys";
export const DEFAULT_KEY_LAYOUT: KeyFileLayout = "bin";

export function isKeyFileLayout(value: string): value is KeyFileLayout {
  return Object.prototype.hasOwnProperty.call(KEY_FILE_LAYOUTS, value);
}

/**
 * Paths of both key files inside `dir` under the given naming convention
 */
export function resolveKeyPaths(dir: string, layout: KeyFileLayout = DEFAULT_KEY_LAYOUT): KeyPaths {
  const names = KEY_FILE_LAYOUTS[layout];
  return {
    clientKeyPath: path.join(dir, names.clientKeyFile),
    serverKeyPath: path.join(dir, names.serverKeyFile),
  };
}
