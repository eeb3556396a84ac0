import type { RunReport } from '../application/CollectionOrchestrator.js';
import type { AssetKind } from '../types/assets.js';
import type { InventoryEntry } from '../types/AssetSelector.js';

const KIND_LABELS: Record<AssetKind, string> = {
  native: 'native',
  fungible: 'ERC-20',
  'non-fungible': 'ERC-721',
};

/**
 * One line per inventory entry, e.g. `2. USDC (ERC-20) 1.5 across 1 account`
 */
export function formatInventoryEntry(entry: InventoryEntry): string {
  const holders = `${entry.holders} ${entry.holders === 1 ? 'account' : 'accounts'}`;
  const flag = entry.suspicious ? ' [suspicious]' : '';
  return `${entry.index}. ${entry.symbol} (${KIND_LABELS[entry.kind]}) ${entry.totalFormatted} across ${holders}${flag}`;
}

export function formatInventory(entries: readonly InventoryEntry[]): string[] {
  return entries.map(formatInventoryEntry);
}

/**
 * Closing lines printed after a run
 */
export function formatSummary(report: RunReport): string[] {
  const lines = [`Status: ${report.status}`];
  if (report.error) {
    lines.push(`Error: ${report.error.message}`);
  }
  if (!report.selected) {
    return lines;
  }

  const { summary, selected } = report;
  lines.push(
    `Asset: ${selected.symbol} (${selected.address})`,
    `Accounts processed: ${summary.accountsProcessed}, skipped: ${summary.accountsSkipped}`,
    `Transfers confirmed: ${summary.succeeded}, failed: ${summary.failed}, timed out: ${summary.timedOut}`
  );
  if (selected.kind === 'non-fungible') {
    lines.push(`NFTs dispatched: ${summary.nftsDispatched}`);
  }
  lines.push(`Collected: ${summary.collectedFormatted} ${selected.symbol}`);
  return lines;
}
