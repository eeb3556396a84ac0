import { formatUnits, type Address } from 'viem';
import {
  assetKey,
  toAssetIdentity,
  type AccountBalance,
  type AssetIdentity,
  type AssetKind,
  type AssetRecord,
  type DiscoveredAsset,
} from '../types/assets.js';
import type { InventoryEntry } from '../types/AssetSelector.js';

const KIND_ORDER: readonly AssetKind[] = ['native', 'fungible', 'non-fungible'];

interface RecordDraft {
  identity: AssetIdentity;
  balances: AccountBalance[];
  total: bigint;
}

/**
 * Merges per-account holdings into one table keyed by asset address.
 * The first sighting fixes kind, symbol, name and decimals; later sightings
 * only add balances.
 */
export class InventoryAggregator {
  private drafts = new Map<string, RecordDraft>();

  add(account: Address, asset: DiscoveredAsset): void {
    const key = assetKey(asset.address);
    let draft = this.drafts.get(key);
    if (!draft) {
      draft = { identity: toAssetIdentity(asset), balances: [], total: 0n };
      this.drafts.set(key, draft);
    }
    draft.balances.push({ account, balance: asset.balance });
    draft.total += asset.balance;
  }

  addAll(account: Address, assets: readonly DiscoveredAsset[]): void {
    for (const asset of assets) {
      this.add(account, asset);
    }
  }

  /**
   * Frozen records, native first, then fungible, then non-fungible;
   * insertion order within each group
   */
  build(): AssetRecord[] {
    const drafts = [...this.drafts.values()];
    const records: AssetRecord[] = [];

    for (const kind of KIND_ORDER) {
      for (const draft of drafts) {
        if (draft.identity.kind !== kind) continue;
        records.push(
          Object.freeze({
            ...draft.identity,
            balances: Object.freeze(draft.balances.map((entry) => Object.freeze({ ...entry }))),
            total: draft.total,
          })
        );
      }
    }

    return records;
  }
}

/**
 * One-shot merge of per-account discoveries
 */
export function aggregateInventory(
  discoveries: ReadonlyArray<{ account: Address; assets: readonly DiscoveredAsset[] }>
): AssetRecord[] {
  const aggregator = new InventoryAggregator();
  for (const discovery of discoveries) {
    aggregator.addAll(discovery.account, discovery.assets);
  }
  return aggregator.build();
}

/**
 * Records whose total differs from the sum of their balances
 */
export function findTotalMismatches(records: readonly AssetRecord[]): AssetRecord[] {
  return records.filter(
    (record) => record.balances.reduce((sum, entry) => sum + entry.balance, 0n) !== record.total
  );
}

/**
 * Presentation rows for the asset selector
 */
export function toInventoryEntries(records: readonly AssetRecord[]): InventoryEntry[] {
  return records.map((record, i) => ({
    index: i + 1,
    address: record.address,
    kind: record.kind,
    symbol: record.symbol,
    name: record.name,
    total: record.total,
    totalFormatted: formatUnits(record.total, record.decimals),
    holders: record.balances.length,
    suspicious: record.suspicious,
  }));
}
