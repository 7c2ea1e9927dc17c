import type { Address, Hex } from "viem";
import { KeyringErrorCode } from "../utils/errors";
import {
  validate,
  validateAddress,
  validateChainId,
  validatePrivateKey,
  validateRpcUrl,
} from "../utils/validation";

/**
 * Connection settings for the whitelist contract. Passed explicitly to the
 * ledger client; the FHE core takes no configuration of its own.
 */
export interface LedgerConfig {
  rpcUrl: string;
  chainId: number;
  contractAddress: Address;
  /** Signing key; omit for read-only use */
  privateKey?: Hex;
}

/** Sepolia */
export const DEFAULT_CHAIN_ID = 11155111;

export const LEDGER_ENV = {
  rpcUrl: "RPC_URL",
  privateKey: "DEPLOYER_PRIVATE_KEY",
  contractAddress: "WHITELIST_ADDRESS",
  chainId: "CHAIN_ID",
} as const;

export type LedgerOverrides = Partial<Record<keyof typeof LEDGER_ENV, string>>;

export type EnvRecord = Record<string, string | undefined>;

/**
 * Build a {@link LedgerConfig} from environment variables, with explicit
 * overrides (e.g. CLI flags) taking precedence.
 *
 * @throws ValidationError (INVALID_CONFIGURATION) naming the bad setting
 */
export function loadLedgerConfig(
  env: EnvRecord,
  overrides: LedgerOverrides = {},
  options: { requireSigner?: boolean } = {}
): LedgerConfig {
  const pick = (key: keyof typeof LEDGER_ENV): string | undefined => {
    const value = overrides[key] ?? env[LEDGER_ENV[key]];
    return value === undefined || value.trim() === "" ? undefined : value;
  };

  const rpcUrl = validate(
    pick("rpcUrl"),
    validateRpcUrl,
    LEDGER_ENV.rpcUrl,
    KeyringErrorCode.INVALID_CONFIGURATION
  );
  const contractAddress = validate(
    pick("contractAddress"),
    validateAddress,
    LEDGER_ENV.contractAddress,
    KeyringErrorCode.INVALID_CONFIGURATION
  );
  const chainId = validate(
    pick("chainId") ?? String(DEFAULT_CHAIN_ID),
    validateChainId,
    LEDGER_ENV.chainId,
    KeyringErrorCode.INVALID_CONFIGURATION
  );

  const rawKey = pick("privateKey");
  if (rawKey === undefined && !options.requireSigner) {
    return { rpcUrl, chainId, contractAddress };
  }

  const privateKey = validate(
    rawKey,
    validatePrivateKey,
    LEDGER_ENV.privateKey,
    KeyringErrorCode.INVALID_CONFIGURATION
  );

  return { rpcUrl, chainId, contractAddress, privateKey };
}
