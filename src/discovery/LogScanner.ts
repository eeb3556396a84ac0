/**
 * Transfer log scanner
 *
 * Reconstructs which contracts an account has interacted with by replaying
 * Transfer events over a bounded block range. The range is split into fixed
 * windows; each window asks the node twice, once with the account as
 * receiver (topic 2) and once as sender (topic 1).
 *
 * A window that keeps failing with overload errors is skipped after the
 * retry budget is spent. Any other error abandons that window only. The scan
 * itself always runs to the chain head unless aborted; an abort during a
 * backoff pause stops the scan at that window.
 *
 * @module discovery/LogScanner
 */

import { pad, type Address, type Hex } from 'viem';
import { TRANSFER_TOPIC } from '../contracts/abis.js';
import { RetryExhaustedError, RetryPolicy } from '../resilience/RetryPolicy.js';
import type { EvmRpc, TopicFilter } from '../types/EvmRpc.js';
import type { Reporter } from '../types/Reporter.js';
import { sleep as defaultSleep, type Sleep } from '../utils/delay.js';
import { ErrorUtils } from '../utils/errors.js';

export interface ScanWindow {
  fromBlock: bigint;
  toBlock: bigint;
}

export interface LogScannerConfig {
  /**
   * How far back from the head to scan (blocks)
   * @default 50000n
   */
  lookback: bigint;

  /**
   * Blocks per eth_getLogs query
   * @default 5000n
   */
  windowSize: bigint;

  /**
   * Pause between windows (ms), applied whatever the window's outcome
   * @default 1000
   */
  windowDelayMs: number;

  /**
   * Attempts per window on transient failure
   * @default 3
   */
  maxAttempts: number;

  /**
   * Linear backoff step (ms): 2s, 4s, ...
   * @default 2000
   */
  backoffMs: number;

  sleep: Sleep;
}

export type WindowOutcome = 'scanned' | 'skipped' | 'failed' | 'interrupted';

export interface ScanStats {
  windows: number;
  scanned: number;
  /** Gave up after exhausting retries on transient errors */
  skipped: number;
  /** Abandoned on a non-transient error */
  failed: number;
  logs: number;
  interrupted: boolean;
}

export interface ScanResult {
  account: Address;
  fromBlock: bigint;
  toBlock: bigint;
  /** Distinct emitting contracts in first-seen order */
  candidates: Address[];
  stats: ScanStats;
}

/**
 * Splits `[max(0, head - lookback), head]` into contiguous windows of
 * `windowSize` blocks. The last window ends at `head` and absorbs the
 * remainder, so a lookback of D yields ceil(D / windowSize) windows.
 */
export function planWindows(head: bigint, lookback: bigint, windowSize: bigint): ScanWindow[] {
  if (windowSize <= 0n) {
    throw new Error('windowSize must be > 0');
  }
  if (lookback < 0n || head < 0n) {
    throw new Error('head and lookback must be >= 0');
  }

  const start = head > lookback ? head - lookback : 0n;
  const depth = head - start;
  const count = depth === 0n ? 1n : (depth + windowSize - 1n) / windowSize;

  const windows: ScanWindow[] = [];
  for (let i = 0n; i < count; i++) {
    const fromBlock = start + i * windowSize;
    const toBlock = i === count - 1n ? head : fromBlock + windowSize - 1n;
    windows.push({ fromBlock, toBlock });
  }
  return windows;
}

/**
 * Topic filters for Transfer events naming `account` as receiver and as sender
 */
export function transferTopicFilters(account: Address): { incoming: TopicFilter[]; outgoing: TopicFilter[] } {
  const accountTopic: Hex = pad(account, { size: 32 });
  return {
    incoming: [TRANSFER_TOPIC, null, accountTopic],
    outgoing: [TRANSFER_TOPIC, accountTopic],
  };
}

export class LogScanner {
  private rpc: EvmRpc;
  private reporter: Reporter;
  private config: LogScannerConfig;
  private retryPolicy: RetryPolicy;

  constructor(rpc: EvmRpc, reporter: Reporter, config: Partial<LogScannerConfig> = {}) {
    this.rpc = rpc;
    this.reporter = reporter;
    this.config = {
      lookback: config.lookback ?? 50000n,
      windowSize: config.windowSize ?? 5000n,
      windowDelayMs: config.windowDelayMs ?? 1000,
      maxAttempts: config.maxAttempts ?? 3,
      backoffMs: config.backoffMs ?? 2000,
      sleep: config.sleep ?? defaultSleep,
    };
    this.retryPolicy = new RetryPolicy({
      maxAttempts: this.config.maxAttempts,
      baseDelay: this.config.backoffMs,
      sleep: this.config.sleep,
    });
  }

  /**
   * Collects every contract that emitted a Transfer naming `account`
   * between `head - lookback` and `head`
   */
  async scan(account: Address, head: bigint, signal?: AbortSignal): Promise<ScanResult> {
    const windows = planWindows(head, this.config.lookback, this.config.windowSize);
    const filters = transferTopicFilters(account);
    const seen = new Set<string>();
    const candidates: Address[] = [];
    const stats: ScanStats = {
      windows: windows.length,
      scanned: 0,
      skipped: 0,
      failed: 0,
      logs: 0,
      interrupted: false,
    };

    const first = windows[0];
    const last = windows[windows.length - 1];
    this.reporter.info(
      `Scanning ${windows.length} windows (blocks ${first.fromBlock}-${last.toBlock}) for ${account}`
    );

    for (let i = 0; i < windows.length; i++) {
      if (signal?.aborted) {
        stats.interrupted = true;
        this.reporter.warn(`Scan of ${account} interrupted after ${i} of ${windows.length} windows`);
        break;
      }

      const window = windows[i];
      const progress = Math.floor((i * 100) / windows.length);
      this.reporter.debug(
        `[${progress}%] Fetching logs for ${account} in blocks ${window.fromBlock}-${window.toBlock}`
      );

      const outcome = await this.scanWindow(account, window, filters, signal);
      if (outcome.status === 'interrupted') {
        stats.interrupted = true;
        this.reporter.warn(`Scan of ${account} interrupted after ${i} of ${windows.length} windows`);
        break;
      }
      stats[outcome.status]++;
      stats.logs += outcome.logs;
      for (const address of outcome.addresses) {
        const key = address.toLowerCase();
        if (!seen.has(key)) {
          seen.add(key);
          candidates.push(address);
        }
      }

      if (i < windows.length - 1) {
        await this.config.sleep(this.config.windowDelayMs, signal);
      }
    }

    this.reporter.info(
      `Scan of ${account} found ${candidates.length} candidate contracts ` +
        `(${stats.scanned} windows scanned, ${stats.skipped} skipped, ${stats.failed} failed)`
    );

    return {
      account,
      fromBlock: first.fromBlock,
      toBlock: last.toBlock,
      candidates,
      stats,
    };
  }

  private async scanWindow(
    account: Address,
    window: ScanWindow,
    filters: { incoming: TopicFilter[]; outgoing: TopicFilter[] },
    signal?: AbortSignal
  ): Promise<{ status: WindowOutcome; addresses: Address[]; logs: number }> {
    const context = {
      account,
      fromBlock: window.fromBlock.toString(),
      toBlock: window.toBlock.toString(),
    };

    try {
      const [logs] = await this.retryPolicy.executeWithStats(async () => {
        const incoming = await this.rpc.getLogs({ ...window, topics: filters.incoming });
        const outgoing = await this.rpc.getLogs({ ...window, topics: filters.outgoing });
        return [...incoming, ...outgoing];
      }, signal);

      return { status: 'scanned', addresses: logs.map((log) => log.address), logs: logs.length };
    } catch (error) {
      if (error instanceof RetryExhaustedError && error.stats.aborted) {
        return { status: 'interrupted', addresses: [], logs: 0 };
      }
      if (error instanceof RetryExhaustedError) {
        this.reporter.warn(
          `Skipping blocks ${window.fromBlock}-${window.toBlock} after ${error.stats.attempts} attempts: ` +
            ErrorUtils.describe(error.lastError),
          context
        );
        return { status: 'skipped', addresses: [], logs: 0 };
      }

      this.reporter.warn(
        `Abandoning blocks ${window.fromBlock}-${window.toBlock}: ${ErrorUtils.describe(error)}`,
        context
      );
      return { status: 'failed', addresses: [], logs: 0 };
    }
  }
}
