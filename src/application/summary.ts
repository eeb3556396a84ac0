import { formatUnits } from 'viem';
import type { AssetRecord } from '../types/assets.js';
import type { AccountDispatchResult, TransferOutcome } from '../types/transfers.js';

/**
 * Totals reported at the end of a run
 */
export interface RunSummary {
  /** Accounts dispatch ran for, skipped ones included */
  accountsProcessed: number;
  accountsSkipped: number;
  succeeded: number;
  failed: number;
  timedOut: number;
  /** Base units confirmed; for collections, the number of tokens moved */
  collected: bigint;
  collectedFormatted: string;
  /** Non-fungible transfers issued, whatever their outcome */
  nftsDispatched: number;
  outcomes: TransferOutcome[];
}

export function emptySummary(): RunSummary {
  return {
    accountsProcessed: 0,
    accountsSkipped: 0,
    succeeded: 0,
    failed: 0,
    timedOut: 0,
    collected: 0n,
    collectedFormatted: '0',
    nftsDispatched: 0,
    outcomes: [],
  };
}

/**
 * Folds per-account dispatch results into run totals
 */
export function summarize(asset: AssetRecord, results: readonly AccountDispatchResult[]): RunSummary {
  const summary = emptySummary();
  summary.accountsProcessed = results.length;

  for (const result of results) {
    if (result.skipReason !== undefined && result.outcomes.length === 0) {
      summary.accountsSkipped++;
    }

    for (const outcome of result.outcomes) {
      summary.outcomes.push(outcome);
      if (outcome.intent.kind === 'non-fungible') {
        summary.nftsDispatched++;
      }

      switch (outcome.status.state) {
        case 'confirmed':
          summary.succeeded++;
          summary.collected += outcome.intent.kind === 'non-fungible' ? 1n : outcome.intent.amount;
          break;
        case 'failed':
          summary.failed++;
          break;
        case 'timed-out':
          summary.timedOut++;
          break;
      }
    }
  }

  summary.collectedFormatted = formatUnits(summary.collected, asset.decimals);
  return summary;
}
