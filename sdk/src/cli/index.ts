#!/usr/bin/env node
/**
 * FHE Keyring CLI
 *
 * Key generation, local encryption and whitelist administration.
 */

import { Command } from "commander";
import { createTfheKeyManager } from "../fhe";
import type { FheKeyManager } from "../fhe/FheKeyManager";
import type { TfheTypes } from "../fhe/tfhe";
import type { KeyPaths, SchemeTypes } from "../fhe/types";
import { encodeHex } from "../keystore/codec";
import {
  DEFAULT_KEY_DIR,
  DEFAULT_KEY_LAYOUT,
  KEY_FILE_LAYOUTS,
  isKeyFileLayout,
  resolveKeyPaths,
} from "../keystore/layout";
import { loadLedgerConfig, type EnvRecord, type LedgerConfig, type LedgerOverrides } from "../config/ledger";
import { createWhitelistClient, type WhitelistClient } from "../whitelist/WhitelistClient";
import {
  ConfigurationError,
  ContractError,
  DeserializationError,
  EncryptionError,
  MalformedEncodingError,
  NetworkError,
  SerializationError,
  StorageReadError,
  StorageWriteError,
  ValidationError,
  KeyringErrorCode,
  toError,
} from "../utils/errors";
import {
  validate,
  validateAddress,
  validateCiphertextWidth,
  validateInteger,
} from "../utils/validation";

// ============================================
// Dependencies
// ============================================

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export interface CliDeps<T extends SchemeTypes> {
  keyManager(): FheKeyManager<T>;
  whitelist(config: LedgerConfig): WhitelistClient;
  env: EnvRecord;
  io: CliIo;
}

export const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

// ============================================
// Error reporting
// ============================================

const ERROR_LABELS: Array<[new (...args: never[]) => Error, string]> = [
  [ConfigurationError, "FHE parameter setup failed"],
  [StorageWriteError, "Could not write key file"],
  [StorageReadError, "Could not read key file"],
  [MalformedEncodingError, "Key file is corrupt"],
  [DeserializationError, "Key material does not match the expected type"],
  [SerializationError, "Could not serialize key material"],
  [EncryptionError, "Encryption rejected the value"],
  [ValidationError, "Invalid input"],
  [ContractError, "Transaction failed"],
  [NetworkError, "Network error"],
];

/**
 * One human readable line per error kind
 */
export function describeError(error: unknown): string {
  const err = toError(error);
  const match = ERROR_LABELS.find(([type]) => err instanceof type);
  return `${match ? match[1] : "Unexpected error"}: ${err.message}`;
}

/** Exit status for a failed command; 2 for bad arguments or configuration */
export function exitCodeFor(error: unknown): number {
  return error instanceof ValidationError ? 2 : 1;
}

async function run(io: CliIo, task: () => Promise<void>): Promise<void> {
  try {
    await task();
  } catch (error) {
    io.err(describeError(error));
    io.setExitCode(exitCodeFor(error));
  }
}

// ============================================
// Options
// ============================================

interface KeygenOptions {
  dir: string;
  layout: string;
  clientKey?: string;
  serverKey?: string;
  force?: boolean;
}

interface EncryptOptions {
  width: string;
  key: string;
}

interface LedgerOptions {
  rpcUrl?: string;
  privateKey?: string;
  whitelist?: string;
  chainId?: string;
  wait?: boolean;
}

function withLedgerOptions(cmd: Command): Command {
  return cmd
    .option("--rpc-url <url>", "RPC endpoint (env RPC_URL)")
    .option("--private-key <key>", "Signing key (env DEPLOYER_PRIVATE_KEY)")
    .option("--whitelist <address>", "Whitelist contract address (env WHITELIST_ADDRESS)")
    .option("--chain-id <id>", "Chain ID (env CHAIN_ID, default 11155111)");
}

function ledgerOverrides(options: LedgerOptions): LedgerOverrides {
  return {
    rpcUrl: options.rpcUrl,
    privateKey: options.privateKey,
    contractAddress: options.whitelist,
    chainId: options.chainId,
  };
}

function keygenPaths(options: KeygenOptions): KeyPaths {
  if (!isKeyFileLayout(options.layout)) {
    throw new ValidationError(
      `Unknown key file layout "${options.layout}" (expected ${Object.keys(KEY_FILE_LAYOUTS).join(" or ")})`
    );
  }
  const defaults = resolveKeyPaths(options.dir, options.layout);
  return {
    clientKeyPath: options.clientKey ?? defaults.clientKeyPath,
    serverKeyPath: options.serverKey ?? defaults.serverKeyPath,
  };
}

// ============================================
// Program
// ============================================

export function createProgram<T extends SchemeTypes>(deps: CliDeps<T>): Command {
  const { io } = deps;
  const program = new Command();

  program
    .name("fhe-keyring")
    .description("FHE key lifecycle and vault whitelist tooling")
    .version("1.0.0")
    .configureOutput({
      writeOut: (str) => io.out(str.trimEnd()),
      writeErr: (str) => io.err(str.trimEnd()),
    });

  program
    .command("keygen")
    .description("Generate a client/server key pair and write both key files")
    .option("-d, --dir <dir>", "Directory for the key files", DEFAULT_KEY_DIR)
    .option("-l, --layout <layout>", "File naming convention: bin or hex", DEFAULT_KEY_LAYOUT)
    .option("--client-key <path>", "Explicit client key file path")
    .option("--server-key <path>", "Explicit server key file path")
    .option("-f, --force", "Overwrite existing key files")
    .action((options: KeygenOptions) =>
      run(io, async () => {
        const paths = keygenPaths(options);
        const keys = deps.keyManager();

        if (!options.force) {
          for (const existing of [paths.clientKeyPath, paths.serverKeyPath]) {
            if (await keys.store.exists(existing)) {
              throw new ValidationError(
                `${existing} already exists; pass --force to overwrite`,
                KeyringErrorCode.INVALID_INPUT,
                { path: existing }
              );
            }
          }
        }

        await keys.generateAndPersist(paths, { atomic: true });

        io.out("✓ Keys generated");
        io.out(`  Client key: ${paths.clientKeyPath}`);
        io.out(`  Server key: ${paths.serverKeyPath}`);
      })
    );

  program
    .command("encrypt <value>")
    .description("Encrypt an unsigned integer and print the serialized ciphertext as hex")
    .option("-w, --width <bits>", "Plaintext width: 8 or 32", "8")
    .option("-k, --key <path>", "Client key file", resolveKeyPaths(DEFAULT_KEY_DIR).clientKeyPath)
    .action((value: string, options: EncryptOptions) =>
      run(io, async () => {
        const width = validate(options.width, validateCiphertextWidth, "width");
        const plaintext = validate(value, validateInteger, "value");

        const keys = deps.keyManager();
        const clientKey = await keys.loadClientKeyFromFile(options.key);
        io.out(encodeHex(keys.encrypt(clientKey, width, plaintext)));
      })
    );

  withLedgerOptions(
    program
      .command("add-to-whitelist <address>")
      .description("Submit addVault(address) to the whitelist contract")
      .option("--wait", "Wait for the transaction to be mined")
  ).action((address: string, options: LedgerOptions) =>
    run(io, async () => {
      const vault = validate(address, validateAddress, "address", KeyringErrorCode.INVALID_ADDRESS);
      const config = loadLedgerConfig(deps.env, ledgerOverrides(options), { requireSigner: true });
      const whitelist = deps.whitelist(config);

      const hash = await whitelist.submitWhitelistAdd(vault);
      io.out(`✓ Whitelist add submitted for ${vault}`);
      io.out(`  TX Hash: ${hash}`);

      if (options.wait) {
        const confirmation = await whitelist.waitForConfirmation(hash);
        if (confirmation.status !== "success") {
          throw new ContractError(`Transaction ${hash} reverted`, KeyringErrorCode.TRANSACTION_REVERTED, {
            transactionHash: hash,
          });
        }
        io.out(`  Mined in block ${confirmation.blockNumber}`);
      }
    })
  );

  withLedgerOptions(
    program
      .command("remove-from-whitelist <address>")
      .description("Submit removeVault(address) to the whitelist contract")
  ).action((address: string, options: LedgerOptions) =>
    run(io, async () => {
      const vault = validate(address, validateAddress, "address", KeyringErrorCode.INVALID_ADDRESS);
      const config = loadLedgerConfig(deps.env, ledgerOverrides(options), { requireSigner: true });

      const hash = await deps.whitelist(config).submitWhitelistRemove(vault);
      io.out(`✓ Whitelist removal submitted for ${vault}`);
      io.out(`  TX Hash: ${hash}`);
    })
  );

  withLedgerOptions(
    program
      .command("is-whitelisted <address>")
      .description("Check whether an address is on the whitelist")
  ).action((address: string, options: LedgerOptions) =>
    run(io, async () => {
      const vault = validate(address, validateAddress, "address", KeyringErrorCode.INVALID_ADDRESS);
      const config = loadLedgerConfig(deps.env, ledgerOverrides(options));

      const listed = await deps.whitelist(config).isWhitelisted(vault);
      io.out(`${vault} is ${listed ? "" : "not "}whitelisted`);
    })
  );

  return program;
}

export function defaultCliDeps(): CliDeps<TfheTypes> {
  return {
    keyManager: () => createTfheKeyManager(),
    whitelist: createWhitelistClient,
    env: process.env,
    io: consoleIo,
  };
}

if (require.main === module) {
  createProgram(defaultCliDeps())
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    });
}
