import type { Address } from 'viem';
import type { AssetKind, NativeAssetAddress } from './assets.js';

/**
 * Row of the inventory presented for selection
 */
export interface InventoryEntry {
  /** 1-based position in presentation order */
  index: number;
  address: Address | NativeAssetAddress;
  kind: AssetKind;
  symbol: string;
  name: string;
  total: bigint;
  totalFormatted: string;
  holders: number;
  suspicious: boolean;
}

/**
 * Chooses which asset to collect. Resolves to the chosen entry's
 * index, or null to cancel the run.
 */
export interface AssetSelector {
  select(entries: readonly InventoryEntry[]): Promise<number | null>;
}
