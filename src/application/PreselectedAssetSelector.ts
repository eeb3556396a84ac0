import type { Address } from 'viem';
import { NATIVE_ASSET, type NativeAssetAddress } from '../types/assets.js';
import type { AssetSelector, InventoryEntry } from '../types/AssetSelector.js';

/**
 * Picks the asset configured up front without asking. Cancels when no
 * account holds it.
 */
export class PreselectedAssetSelector implements AssetSelector {
  private target: Address | NativeAssetAddress;

  constructor(target: Address | NativeAssetAddress) {
    this.target = target;
  }

  async select(entries: readonly InventoryEntry[]): Promise<number | null> {
    const key = this.target === NATIVE_ASSET ? NATIVE_ASSET : this.target.toLowerCase();
    const match = entries.find((entry) =>
      entry.address === NATIVE_ASSET ? key === NATIVE_ASSET : entry.address.toLowerCase() === key
    );
    return match ? match.index : null;
  }
}
