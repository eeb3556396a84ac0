/**
 * Collection orchestrator
 *
 * Drives one run end to end: select an endpoint, discover what every
 * account holds, merge it into one inventory, let the selector choose an
 * asset, then sweep that asset from each account in turn.
 *
 * @module application/CollectionOrchestrator
 */

import type { Address, LocalAccount } from 'viem';
import { AccountDiscoveryService, type AccountDiscovery } from '../discovery/AccountDiscovery.js';
import { AssetClassifier, type NativeAssetInfo } from '../discovery/AssetClassifier.js';
import { LogScanner } from '../discovery/LogScanner.js';
import { TransferDispatcher } from '../dispatch/TransferDispatcher.js';
import { InventoryAggregator, toInventoryEntries } from '../inventory/InventoryAggregator.js';
import { EndpointSelector } from '../rpc/EndpointSelector.js';
import type { AssetRecord, NativeAssetAddress } from '../types/assets.js';
import type { AssetSelector } from '../types/AssetSelector.js';
import type { RpcFactory } from '../types/EvmRpc.js';
import type { Reporter } from '../types/Reporter.js';
import type { AccountDispatchResult } from '../types/transfers.js';
import { sleep as defaultSleep, type Sleep } from '../utils/delay.js';
import { ErrorUtils, PreconditionError } from '../utils/errors.js';
import { emptySummary, summarize, type RunSummary } from './summary.js';

export type RunPhase =
  | 'init'
  | 'endpoint-selected'
  | 'scanning'
  | 'aggregated'
  | 'awaiting-selection'
  | 'dispatching'
  | 'summarized'
  | 'halted';

export type RunStatus = 'completed' | 'cancelled' | 'interrupted' | 'halted';

export interface ScanSettings {
  lookback: bigint;
  windowSize: bigint;
  windowDelayMs: number;
  maxAttempts: number;
  backoffMs: number;
}

/**
 * Everything a run needs besides its collaborators
 */
export interface CollectionSettings {
  rpcUrls: string[];
  accounts: LocalAccount[];
  destination?: Address;
  /** When set, an endpoint on another chain halts the run */
  chainId?: number;
  /** Skip scanning and collect only this asset */
  preselectedAsset?: Address | NativeAssetAddress;
  gasPrice: bigint;
  gasLimit: bigint;
  /** Pause between transfers and between accounts (ms) */
  operationDelayMs: number;
  confirmationTimeoutMs: number;
  pollIntervalMs: number;
  scan: ScanSettings;
  native?: NativeAssetInfo;
}

export interface CollectionDependencies {
  rpcFactory: RpcFactory;
  selector: AssetSelector;
  reporter: Reporter;
  sleep?: Sleep;
  now?: () => number;
}

export interface RunReport {
  status: RunStatus;
  exitCode: 0 | 1;
  phases: RunPhase[];
  endpoint?: { url: string; chainId: number; head: bigint };
  discoveries: AccountDiscovery[];
  inventory: AssetRecord[];
  selected?: AssetRecord;
  summary: RunSummary;
  error?: Error;
}

export class CollectionOrchestrator {
  private settings: CollectionSettings;
  private deps: Required<CollectionDependencies>;
  private phases: RunPhase[] = [];

  constructor(settings: CollectionSettings, deps: CollectionDependencies) {
    this.settings = settings;
    this.deps = {
      ...deps,
      sleep: deps.sleep ?? defaultSleep,
      now: deps.now ?? Date.now,
    };
  }

  /**
   * Runs to a terminal status. Only an unexpected error escapes as a
   * `halted` report; nothing is thrown.
   */
  async run(signal?: AbortSignal): Promise<RunReport> {
    this.phases = [];
    const report: RunReport = {
      status: 'completed',
      exitCode: 0,
      phases: this.phases,
      discoveries: [],
      inventory: [],
      summary: emptySummary(),
    };

    try {
      return await this.execute(report, signal);
    } catch (error) {
      const failure = error instanceof Error ? error : new Error(ErrorUtils.describe(error));
      this.deps.reporter.error(`Run halted: ${failure.message}`);
      this.enter('halted');
      return { ...report, status: 'halted', exitCode: 1, error: failure };
    }
  }

  private async execute(report: RunReport, signal?: AbortSignal): Promise<RunReport> {
    const { reporter } = this.deps;
    this.enter('init');

    const accounts = dedupeAccounts(this.settings.accounts);
    if (accounts.length === 0) {
      throw PreconditionError.noCredentials();
    }
    const destination = this.settings.destination;
    if (destination === undefined) {
      throw PreconditionError.noDestination();
    }
    reporter.info(`Loaded ${accounts.length} accounts; collecting to ${destination}`);

    const endpoints = new EndpointSelector(this.settings.rpcUrls, this.deps.rpcFactory, reporter, this.deps.now);
    const endpoint = await endpoints.select();
    if (this.settings.chainId !== undefined && endpoint.chainId !== this.settings.chainId) {
      throw PreconditionError.chainMismatch(this.settings.chainId, endpoint.chainId, endpoint.url);
    }
    report.endpoint = { url: endpoint.url, chainId: endpoint.chainId, head: endpoint.head };
    this.enter('endpoint-selected');

    this.enter('scanning');
    const discovery = new AccountDiscoveryService(
      new LogScanner(endpoint.rpc, reporter, { ...this.settings.scan, sleep: this.deps.sleep }),
      new AssetClassifier(endpoint.rpc, {
        native: this.settings.native,
        retry: {
          maxAttempts: this.settings.scan.maxAttempts,
          baseDelay: this.settings.scan.backoffMs,
          sleep: this.deps.sleep,
        },
      }),
      reporter,
      { preselected: this.settings.preselectedAsset }
    );
    const aggregator = new InventoryAggregator();

    for (let i = 0; i < accounts.length; i++) {
      if (signal?.aborted) break;
      const account = accounts[i].address;
      reporter.info(`Discovering assets of account ${i + 1}/${accounts.length}: ${account}`);

      const found = await discovery.discover(account, endpoint.head, signal);
      report.discoveries.push(found);
      aggregator.addAll(account, found.assets);
    }

    report.inventory = aggregator.build();
    this.enter('aggregated');

    if (signal?.aborted || report.discoveries.some((d) => d.interrupted)) {
      reporter.warn('Interrupted during discovery; nothing was sent');
      return this.finish(report, 'interrupted');
    }

    if (report.inventory.length === 0) {
      reporter.info('No assets found on any account');
      return this.finish(report, 'completed');
    }

    this.enter('awaiting-selection');
    const entries = toInventoryEntries(report.inventory);
    const choice = await this.deps.selector.select(entries);
    const selected = choice === null ? undefined : report.inventory[choice - 1];
    if (selected === undefined) {
      if (choice !== null) {
        reporter.warn(`Selection ${choice} is not in the inventory`);
      }
      reporter.info('No asset selected; nothing to send');
      return this.finish(report, 'cancelled');
    }
    report.selected = selected;
    reporter.info(`Collecting ${selected.symbol} (${selected.address}) from ${selected.balances.length} accounts`);

    this.enter('dispatching');
    const dispatcher = new TransferDispatcher(endpoint.rpc, reporter, {
      destination,
      chainId: endpoint.chainId,
      gasPrice: this.settings.gasPrice,
      gasLimit: this.settings.gasLimit,
      confirmationTimeoutMs: this.settings.confirmationTimeoutMs,
      pollIntervalMs: this.settings.pollIntervalMs,
      operationDelayMs: this.settings.operationDelayMs,
      sleep: this.deps.sleep,
      now: this.deps.now,
    });

    const results: AccountDispatchResult[] = [];
    let interrupted = false;
    for (let i = 0; i < accounts.length; i++) {
      if (signal?.aborted) {
        interrupted = true;
        break;
      }

      const result = await dispatcher.dispatch(accounts[i], selected, signal);
      results.push(result);
      if (signal?.aborted) {
        interrupted = true;
        break;
      }

      if (result.outcomes.length > 0 && i < accounts.length - 1) {
        await this.deps.sleep(this.settings.operationDelayMs, signal);
      }
    }

    report.summary = summarize(selected, results);
    return this.finish(report, interrupted ? 'interrupted' : 'completed');
  }

  private finish(report: RunReport, status: Exclude<RunStatus, 'halted'>): RunReport {
    this.enter('summarized');
    return { ...report, status, exitCode: 0 };
  }

  private enter(phase: RunPhase): void {
    this.phases.push(phase);
    this.deps.reporter.debug(`Phase: ${phase}`);
  }
}

/**
 * First occurrence of each address wins
 */
function dedupeAccounts(accounts: readonly LocalAccount[]): LocalAccount[] {
  const seen = new Set<string>();
  return accounts.filter((account) => {
    const key = account.address.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
