/**
 * Asset model shared by discovery, aggregation and dispatch
 *
 * @module types/assets
 */

import type { Address } from 'viem';

/**
 * Sentinel address for the chain's native unit
 */
export const NATIVE_ASSET = 'NATIVE';

export type NativeAssetAddress = typeof NATIVE_ASSET;

/**
 * Decimal precision reported for the native unit
 */
export const NATIVE_DECIMALS = 18;

export type AssetKind = 'native' | 'fungible' | 'non-fungible';

interface AssetIdentityBase {
  readonly symbol: string;
  readonly name: string;
  /**
   * Set when the symbol or name matches known airdrop-scam patterns
   */
  readonly suspicious: boolean;
}

export interface NativeAsset extends AssetIdentityBase {
  readonly kind: 'native';
  readonly address: NativeAssetAddress;
  readonly decimals: number;
}

export interface FungibleAsset extends AssetIdentityBase {
  readonly kind: 'fungible';
  readonly address: Address;
  readonly decimals: number;
}

export interface NonFungibleAsset extends AssetIdentityBase {
  readonly kind: 'non-fungible';
  readonly address: Address;
  readonly decimals: 0;
}

/**
 * What an asset is, independent of who holds it
 */
export type AssetIdentity = NativeAsset | FungibleAsset | NonFungibleAsset;

export type AssetAddress = AssetIdentity['address'];

/**
 * One account's holding of one asset, as seen during discovery.
 * For non-fungible assets `balance` is the owned count.
 */
export type DiscoveredAsset = AssetIdentity & { readonly balance: bigint };

export interface AccountBalance {
  readonly account: Address;
  readonly balance: bigint;
}

/**
 * Cross-account inventory entry. `total` is the sum of `balances`.
 */
export type AssetRecord = AssetIdentity & {
  readonly balances: readonly AccountBalance[];
  readonly total: bigint;
};

/**
 * Normalized key used to compare asset addresses
 */
export function assetKey(address: AssetAddress): string {
  return address === NATIVE_ASSET ? NATIVE_ASSET : address.toLowerCase();
}

/**
 * Strips a holding or a record down to its identity
 */
export function toAssetIdentity(asset: AssetIdentity): AssetIdentity {
  switch (asset.kind) {
    case 'native':
      return {
        kind: 'native',
        address: asset.address,
        symbol: asset.symbol,
        name: asset.name,
        decimals: asset.decimals,
        suspicious: asset.suspicious,
      };
    case 'fungible':
      return {
        kind: 'fungible',
        address: asset.address,
        symbol: asset.symbol,
        name: asset.name,
        decimals: asset.decimals,
        suspicious: asset.suspicious,
      };
    case 'non-fungible':
      return {
        kind: 'non-fungible',
        address: asset.address,
        symbol: asset.symbol,
        name: asset.name,
        decimals: 0,
        suspicious: asset.suspicious,
      };
  }
}
