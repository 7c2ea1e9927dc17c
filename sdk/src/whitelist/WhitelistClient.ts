import {
  createPublicClient,
  createWalletClient,
  defineChain,
  http,
  parseAbi,
  BaseError,
  HttpRequestError,
  type Address,
  type Chain,
  type Hash,
  type PublicClient,
  type WalletClient,
} from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { mainnet, sepolia } from "viem/chains";
import type { LedgerConfig } from "../config/ledger";
import {
  KeyringErrorCode,
  NetworkError,
  ValidationError,
  isKeyringError,
  parseContractError,
  toError,
  type KeyringError,
} from "../utils/errors";
import { validate, validateAddress } from "../utils/validation";

/**
 * Whitelist Client
 *
 * SDK client for the vault whitelist contract: an on-chain registry of
 * approved vault addresses.
 *
 * @example
 * ```typescript
 * const whitelist = createWhitelistClient({
 *   rpcUrl: 'https://rpc.sepolia.org',
 *   chainId: 11155111,
 *   contractAddress: '0x...',
 *   privateKey: '0x...',
 * });
 * const hash = await whitelist.submitWhitelistAdd('0xVault...');
 * const listed = await whitelist.isWhitelisted('0xVault...');
 * ```
 */

export const WHITELIST_ABI = parseAbi([
  "function addVault(address vault) external",
  "function removeVault(address vault) external",
  "function isWhitelisted(address vault) view returns (bool)",
  "event VaultAdded(address indexed vault)",
  "event VaultRemoved(address indexed vault)",
]);

export interface WhitelistClientConfig {
  contractAddress: Address;
  publicClient: PublicClient;
  /** Required for submitWhitelistAdd / submitWhitelistRemove */
  walletClient?: WalletClient;
}

export interface TransactionConfirmation {
  hash: Hash;
  status: "success" | "reverted";
  blockNumber: bigint;
}

export class WhitelistClient {
  readonly contractAddress: Address;
  private readonly publicClient: PublicClient;
  private readonly walletClient?: WalletClient;

  constructor(config: WhitelistClientConfig) {
    this.contractAddress = validate(
      config.contractAddress,
      validateAddress,
      "contractAddress",
      KeyringErrorCode.INVALID_ADDRESS
    );
    this.publicClient = config.publicClient;
    this.walletClient = config.walletClient;
  }

  /**
   * Submit `addVault(address)`; resolves once the node accepted the transaction
   * @returns Transaction hash
   */
  async submitWhitelistAdd(vault: string): Promise<Hash> {
    return this.write("addVault", vault);
  }

  /**
   * Submit `removeVault(address)`
   * @returns Transaction hash
   */
  async submitWhitelistRemove(vault: string): Promise<Hash> {
    return this.write("removeVault", vault);
  }

  /**
   * Read the membership flag for an address
   */
  async isWhitelisted(vault: string): Promise<boolean> {
    const address = validate(vault, validateAddress, "vault", KeyringErrorCode.INVALID_ADDRESS);
    try {
      return await this.publicClient.readContract({
        address: this.contractAddress,
        abi: WHITELIST_ABI,
        functionName: "isWhitelisted",
        args: [address],
      });
    } catch (error) {
      throw this.mapError(error);
    }
  }

  /**
   * Wait for a submitted transaction to be mined
   */
  async waitForConfirmation(hash: Hash): Promise<TransactionConfirmation> {
    try {
      const receipt = await this.publicClient.waitForTransactionReceipt({ hash });
      return { hash, status: receipt.status, blockNumber: receipt.blockNumber };
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private async write(functionName: "addVault" | "removeVault", vault: string): Promise<Hash> {
    const address = validate(vault, validateAddress, "vault", KeyringErrorCode.INVALID_ADDRESS);

    const account = this.walletClient?.account;
    if (!this.walletClient || !account) {
      throw new ValidationError(
        "A wallet client with a signing account is required for write operations",
        KeyringErrorCode.WALLET_REQUIRED
      );
    }

    try {
      return await this.walletClient.writeContract({
        address: this.contractAddress,
        abi: WHITELIST_ABI,
        functionName,
        args: [address],
        account,
        chain: this.walletClient.chain,
      });
    } catch (error) {
      throw this.mapError(error);
    }
  }

  private mapError(error: unknown): KeyringError {
    if (isKeyringError(error)) {
      return error;
    }

    const cause = toError(error);
    const httpError = cause instanceof BaseError
      ? cause.walk((e) => e instanceof HttpRequestError)
      : null;

    if (httpError instanceof HttpRequestError) {
      return new NetworkError(`RPC request failed: ${httpError.shortMessage}`, {
        endpoint: httpError.url,
        statusCode: httpError.status,
        cause,
      });
    }

    return parseContractError(cause);
  }
}

// ============================================
// Factory
// ============================================

const KNOWN_CHAINS: Chain[] = [mainnet, sepolia];

/**
 * Resolve a chain definition for an RPC endpoint
 */
export function resolveChain(chainId: number, rpcUrl: string): Chain {
  return (
    KNOWN_CHAINS.find((chain) => chain.id === chainId) ??
    defineChain({
      id: chainId,
      name: `chain-${chainId}`,
      nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
      rpcUrls: { default: { http: [rpcUrl] } },
    })
  );
}

/**
 * Build a whitelist client from an explicit ledger configuration.
 * Without a private key the client is read-only.
 */
export function createWhitelistClient(config: LedgerConfig): WhitelistClient {
  const chain = resolveChain(config.chainId, config.rpcUrl);
  const transport = http(config.rpcUrl);

  const publicClient = createPublicClient({ chain, transport });
  const walletClient = config.privateKey
    ? createWalletClient({
        account: privateKeyToAccount(config.privateKey),
        chain,
        transport,
      })
    : undefined;

  return new WhitelistClient({
    contractAddress: config.contractAddress,
    publicClient,
    walletClient,
  });
}
