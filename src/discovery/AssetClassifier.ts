import { decodeFunctionResult, encodeFunctionData, type Address } from 'viem';
import { ERC20_ABI, ERC721_ABI } from '../contracts/abis.js';
import {
  NATIVE_ASSET,
  NATIVE_DECIMALS,
  type FungibleAsset,
  type NativeAsset,
  type NonFungibleAsset,
} from '../types/assets.js';
import type { EvmRpc } from '../types/EvmRpc.js';
import { RetryExhaustedError, RetryPolicy, type RetryConfig } from '../resilience/RetryPolicy.js';

const SPAM_PATTERNS = [
  /https?:\/\//i,         // URLs in name/symbol
  /\.com|\.io|\.live|\.xyz|\.finance/i, // Domain patterns
  /claim|reward|airdrop/i, // Airdrop scam keywords
  /visit|redeem/i,         // Call-to-action scam keywords
];

/**
 * Detects likely spam/scam tokens by name or symbol patterns
 */
export function isSpamToken(symbol: string, name: string): boolean {
  const combined = `${symbol} ${name}`;
  return SPAM_PATTERNS.some((pattern) => pattern.test(combined));
}

/**
 * Outcome of a single read that is allowed to fail
 */
export type ProbeResult<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Why a candidate was not kept
 */
export type ClassificationMiss = 'zero-balance' | 'unrecognized';

export type TokenHolding = (FungibleAsset | NonFungibleAsset) & { balance: bigint };

export type Classification =
  | { matched: true; asset: TokenHolding }
  | { matched: false; reason: ClassificationMiss };

export interface NativeAssetInfo {
  symbol: string;
  name: string;
}

const DEFAULT_NATIVE: NativeAssetInfo = { symbol: 'ETH', name: 'Ether' };

export interface AssetClassifierOptions {
  native?: NativeAssetInfo;
  /** Applied to every contract read */
  retry?: Partial<RetryConfig>;
}

/**
 * Decides what a candidate contract is for a given holder by probing it,
 * first as a fungible token, then as a non-fungible collection. A probe
 * that fails outright rejects that kind; it never stands in for a zero
 * balance. Transient failures are retried, and a read that stays
 * unavailable throws RetryExhaustedError instead of rejecting a kind.
 */
export class AssetClassifier {
  private rpc: EvmRpc;
  private native: NativeAssetInfo;
  private retryPolicy: RetryPolicy;

  constructor(rpc: EvmRpc, options: AssetClassifierOptions = {}) {
    this.rpc = rpc;
    this.native = options.native ?? DEFAULT_NATIVE;
    this.retryPolicy = new RetryPolicy(options.retry);
  }

  async classify(contract: Address, account: Address, signal?: AbortSignal): Promise<Classification> {
    const fungible = await this.probeFungible(contract, account, signal);
    if (fungible.ok && fungible.value.balance > 0n) {
      const symbol = await this.readSymbol(contract, signal);
      const name = await this.readName(contract, signal);
      const metadata = {
        symbol: withDefault(symbol, 'UNKNOWN'),
        name: withDefault(name, 'Unknown Token'),
      };
      return {
        matched: true,
        asset: {
          kind: 'fungible',
          address: contract,
          ...metadata,
          decimals: fungible.value.decimals,
          suspicious: isSpamToken(metadata.symbol, metadata.name),
          balance: fungible.value.balance,
        },
      };
    }

    const owned = await this.readOwnedCount(contract, account, signal);
    if (owned.ok && owned.value > 0n) {
      const symbol = await this.readSymbol(contract, signal);
      const name = await this.readName(contract, signal);
      const metadata = {
        symbol: withDefault(symbol, 'NFT'),
        name: withDefault(name, 'NFT Collection'),
      };
      return {
        matched: true,
        asset: {
          kind: 'non-fungible',
          address: contract,
          ...metadata,
          decimals: 0,
          suspicious: isSpamToken(metadata.symbol, metadata.name),
          balance: owned.value,
        },
      };
    }

    const answered = (fungible.ok && fungible.value.balance === 0n) || owned.ok;
    return { matched: false, reason: answered ? 'zero-balance' : 'unrecognized' };
  }

  /**
   * Direct native balance read; failures propagate to the caller
   */
  async readNativeBalance(account: Address): Promise<NativeAsset & { balance: bigint }> {
    const balance = await this.rpc.getBalance(account);
    return {
      kind: 'native',
      address: NATIVE_ASSET,
      symbol: this.native.symbol,
      name: this.native.name,
      decimals: NATIVE_DECIMALS,
      suspicious: false,
      balance,
    };
  }

  /**
   * Runs one read under the retry policy. Only a non-transient failure
   * (a revert, an undecodable answer) becomes a rejected probe.
   */
  private async probe<T>(read: () => Promise<T>, signal?: AbortSignal): Promise<ProbeResult<T>> {
    try {
      return { ok: true, value: await this.retryPolicy.execute(read, signal) };
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw error;
      }
      return { ok: false, error };
    }
  }

  /**
   * ERC721 owned count
   */
  private async readOwnedCount(
    contract: Address,
    owner: Address,
    signal?: AbortSignal
  ): Promise<ProbeResult<bigint>> {
    return this.probe(async () => {
      const data = await this.rpc.call({
        to: contract,
        data: encodeFunctionData({ abi: ERC721_ABI, functionName: 'balanceOf', args: [owner] }),
      });
      return decodeFunctionResult({ abi: ERC721_ABI, functionName: 'balanceOf', data });
    }, signal);
  }

  private async probeFungible(
    contract: Address,
    account: Address,
    signal?: AbortSignal
  ): Promise<ProbeResult<{ balance: bigint; decimals: number }>> {
    return this.probe(async () => {
      const balanceData = await this.rpc.call({
        to: contract,
        data: encodeFunctionData({ abi: ERC20_ABI, functionName: 'balanceOf', args: [account] }),
      });
      const balance = decodeFunctionResult({ abi: ERC20_ABI, functionName: 'balanceOf', data: balanceData });

      const decimalsData = await this.rpc.call({
        to: contract,
        data: encodeFunctionData({ abi: ERC20_ABI, functionName: 'decimals' }),
      });
      const decimals = decodeFunctionResult({ abi: ERC20_ABI, functionName: 'decimals', data: decimalsData });

      return { balance, decimals };
    }, signal);
  }

  private async readSymbol(contract: Address, signal?: AbortSignal): Promise<ProbeResult<string>> {
    return this.probe(async () => {
      const data = await this.rpc.call({
        to: contract,
        data: encodeFunctionData({ abi: ERC20_ABI, functionName: 'symbol' }),
      });
      return decodeFunctionResult({ abi: ERC20_ABI, functionName: 'symbol', data });
    }, signal);
  }

  private async readName(contract: Address, signal?: AbortSignal): Promise<ProbeResult<string>> {
    return this.probe(async () => {
      const data = await this.rpc.call({
        to: contract,
        data: encodeFunctionData({ abi: ERC20_ABI, functionName: 'name' }),
      });
      return decodeFunctionResult({ abi: ERC20_ABI, functionName: 'name', data });
    }, signal);
  }
}

/**
 * Metadata value, or the fallback when the read failed or came back blank
 */
function withDefault(result: ProbeResult<string>, fallback: string): string {
  if (!result.ok) return fallback;
  const cleaned = result.value.replace(/[\u0000-\u001f\u007f]/g, '').trim();
  return cleaned.length > 0 ? cleaned : fallback;
}
