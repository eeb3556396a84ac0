import type { Address } from 'viem';
import { NATIVE_ASSET, type DiscoveredAsset, type NativeAssetAddress } from '../types/assets.js';
import type { Reporter } from '../types/Reporter.js';
import { ErrorUtils } from '../utils/errors.js';
import type { AssetClassifier } from './AssetClassifier.js';
import type { LogScanner, ScanStats } from './LogScanner.js';

export type DiscoveryIssueStage = 'native' | 'classify';

export interface DiscoveryIssue {
  stage: DiscoveryIssueStage;
  contract?: Address;
  message: string;
}

/**
 * Everything discovery learned about one account
 */
export interface AccountDiscovery {
  account: Address;
  assets: DiscoveredAsset[];
  /** Absent in pre-selected mode, where no logs are scanned */
  scan?: ScanStats;
  candidates: number;
  issues: DiscoveryIssue[];
  interrupted: boolean;
}

export interface AccountDiscoveryOptions {
  /**
   * Skip log scanning and classify only this asset
   */
  preselected?: Address | NativeAssetAddress;
}

/**
 * Runs discovery for one account: native balance first, then every
 * contract the log scan turned up.
 */
export class AccountDiscoveryService {
  private scanner: LogScanner;
  private classifier: AssetClassifier;
  private reporter: Reporter;
  private options: AccountDiscoveryOptions;

  constructor(
    scanner: LogScanner,
    classifier: AssetClassifier,
    reporter: Reporter,
    options: AccountDiscoveryOptions = {}
  ) {
    this.scanner = scanner;
    this.classifier = classifier;
    this.reporter = reporter;
    this.options = options;
  }

  async discover(account: Address, head: bigint, signal?: AbortSignal): Promise<AccountDiscovery> {
    const result: AccountDiscovery = {
      account,
      assets: [],
      candidates: 0,
      issues: [],
      interrupted: false,
    };
    const preselected = this.options.preselected;

    if (preselected === undefined || preselected === NATIVE_ASSET) {
      await this.discoverNative(result);
    }
    if (preselected === NATIVE_ASSET) {
      return result;
    }

    let candidates: Address[];
    if (preselected !== undefined) {
      candidates = [preselected];
    } else {
      const scan = await this.scanner.scan(account, head, signal);
      result.scan = scan.stats;
      result.interrupted = scan.stats.interrupted;
      candidates = scan.candidates;
    }
    result.candidates = candidates.length;

    for (const contract of candidates) {
      if (signal?.aborted) {
        result.interrupted = true;
        break;
      }

      try {
        const classification = await this.classifier.classify(contract, account, signal);
        if (classification.matched) {
          result.assets.push(classification.asset);
          this.reporter.debug(
            `${account} holds ${classification.asset.balance} of ${classification.asset.symbol} (${contract})`
          );
        } else {
          this.reporter.debug(`Discarding ${contract} for ${account}: ${classification.reason}`);
        }
      } catch (error) {
        const message = ErrorUtils.describe(error);
        result.issues.push({ stage: 'classify', contract, message });
        this.reporter.warn(`Could not classify ${contract} for ${account}: ${message}`, {
          account,
          asset: contract,
        });
      }
    }

    return result;
  }

  private async discoverNative(result: AccountDiscovery): Promise<void> {
    try {
      const native = await this.classifier.readNativeBalance(result.account);
      if (native.balance > 0n) {
        result.assets.push(native);
      }
    } catch (error) {
      const message = ErrorUtils.describe(error);
      result.issues.push({ stage: 'native', message });
      this.reporter.warn(`Native balance unavailable for ${result.account}: ${message}`, {
        account: result.account,
        asset: NATIVE_ASSET,
      });
    }
  }
}
