/**
 * Transfer dispatcher
 *
 * Moves one account's holding of the selected asset to the destination.
 * Every transfer follows the same contract: read the nonce, build, sign,
 * submit, then poll for the receipt until it lands or the timeout passes.
 * Failures are recorded as outcomes; nothing here is retried.
 *
 * @module dispatch/TransferDispatcher
 */

import {
  decodeFunctionResult,
  encodeFunctionData,
  formatUnits,
  type Address,
  type Hash,
  type Hex,
  type LocalAccount,
} from 'viem';
import { ERC20_ABI, ERC721_ABI } from '../contracts/abis.js';
import type { AssetRecord, FungibleAsset, NativeAsset, NonFungibleAsset } from '../types/assets.js';
import type { EvmRpc, ReceiptSummary } from '../types/EvmRpc.js';
import type { Reporter } from '../types/Reporter.js';
import type {
  AccountDispatchResult,
  NonFungibleTransferIntent,
  TransferIntent,
  TransferOutcome,
} from '../types/transfers.js';
import { sleep as defaultSleep, type Sleep } from '../utils/delay.js';
import { ConfirmationTimeout, DispatchFailure, ErrorUtils } from '../utils/errors.js';

export interface TransferDispatcherConfig {
  destination: Address;

  /** Legacy gas price (wei) */
  gasPrice: bigint;

  /**
   * Gas limit for token transfers
   * @default 100000n
   */
  gasLimit: bigint;

  /**
   * Gas limit for plain value transfers
   * @default 21000n
   */
  nativeGasLimit: bigint;

  chainId: number;

  /**
   * How long to wait for a receipt (ms)
   * @default 120000
   */
  confirmationTimeoutMs: number;

  /**
   * @default 2000
   */
  pollIntervalMs: number;

  /**
   * Pause between consecutive transfers from one account (ms)
   * @default 2000
   */
  operationDelayMs: number;

  sleep: Sleep;
  now: () => number;
}

export type DispatcherOptions = Pick<TransferDispatcherConfig, 'destination' | 'gasPrice' | 'chainId'> &
  Partial<TransferDispatcherConfig>;

interface SignedTransfer {
  hash: Hash;
  nonce: number;
}

export class TransferDispatcher {
  private rpc: EvmRpc;
  private reporter: Reporter;
  private config: TransferDispatcherConfig;

  constructor(rpc: EvmRpc, reporter: Reporter, options: DispatcherOptions) {
    this.rpc = rpc;
    this.reporter = reporter;
    this.config = {
      destination: options.destination,
      gasPrice: options.gasPrice,
      chainId: options.chainId,
      gasLimit: options.gasLimit ?? 100000n,
      nativeGasLimit: options.nativeGasLimit ?? 21000n,
      confirmationTimeoutMs: options.confirmationTimeoutMs ?? 120000,
      pollIntervalMs: options.pollIntervalMs ?? 2000,
      operationDelayMs: options.operationDelayMs ?? 2000,
      sleep: options.sleep ?? defaultSleep,
      now: options.now ?? Date.now,
    };
  }

  /**
   * Sends everything `signer` holds of `record` to the destination.
   * Balances for native and fungible assets come from discovery;
   * token ids are enumerated fresh.
   */
  async dispatch(signer: LocalAccount, record: AssetRecord, signal?: AbortSignal): Promise<AccountDispatchResult> {
    const account = signer.address;
    if (signal?.aborted) {
      return { account, outcomes: [], skipReason: 'interrupted' };
    }

    const holding = record.balances.find((entry) => entry.account.toLowerCase() === account.toLowerCase());
    if (!holding || holding.balance <= 0n) {
      this.reporter.info(`${account} holds no ${record.symbol}, skipping`);
      return { account, outcomes: [], skipReason: 'no-balance' };
    }

    switch (record.kind) {
      case 'native': {
        const fee = this.config.nativeGasLimit * this.config.gasPrice;
        const amount = holding.balance - fee;
        if (amount <= 0n) {
          this.reporter.warn(
            `${account} balance ${formatUnits(holding.balance, record.decimals)} ${record.symbol} does not cover gas`,
            { account, asset: record.address }
          );
          return { account, outcomes: [], skipReason: 'insufficient-for-gas' };
        }
        const asset: NativeAsset = {
          kind: record.kind,
          address: record.address,
          symbol: record.symbol,
          name: record.name,
          decimals: record.decimals,
          suspicious: record.suspicious,
        };
        const outcome = await this.execute(signer, {
          kind: 'native',
          account,
          destination: this.config.destination,
          asset,
          amount,
        });
        return { account, outcomes: [outcome] };
      }
      case 'fungible': {
        const asset: FungibleAsset = {
          kind: record.kind,
          address: record.address,
          symbol: record.symbol,
          name: record.name,
          decimals: record.decimals,
          suspicious: record.suspicious,
        };
        const outcome = await this.execute(signer, {
          kind: 'fungible',
          account,
          destination: this.config.destination,
          asset,
          amount: holding.balance,
        });
        return { account, outcomes: [outcome] };
      }
      case 'non-fungible':
        return this.dispatchCollection(signer, record, signal);
    }
  }

  /**
   * Runs one transfer to a terminal outcome
   */
  async execute(signer: LocalAccount, intent: TransferIntent): Promise<TransferOutcome> {
    const context = {
      account: intent.account,
      asset: intent.asset.address,
      ...(intent.kind === 'non-fungible' ? { tokenId: intent.tokenId.toString() } : {}),
    };
    this.reporter.info(`Sending ${describeIntent(intent)} from ${intent.account} to ${intent.destination}`);

    let sent: SignedTransfer;
    try {
      sent = await this.submit(signer, intent);
    } catch (error) {
      const failure = error instanceof DispatchFailure ? error : new DispatchFailure('submit', context, error);
      this.reporter.error(`Transfer of ${describeIntent(intent)} from ${intent.account} failed: ${failure.message}`, context);
      return { intent, status: { state: 'failed', reason: failure.message } };
    }

    this.reporter.debug(`Submitted ${sent.hash} with nonce ${sent.nonce}`);

    try {
      const receipt = await this.waitForReceipt(sent.hash, context);
      if (receipt.status === 'reverted') {
        this.reporter.error(`Transaction ${sent.hash} reverted in block ${receipt.blockNumber}`, context);
        return {
          intent,
          nonce: sent.nonce,
          status: { state: 'failed', reason: 'reverted', hash: sent.hash },
        };
      }

      this.reporter.success(`Confirmed ${sent.hash} in block ${receipt.blockNumber}`);
      return {
        intent,
        nonce: sent.nonce,
        status: { state: 'confirmed', hash: sent.hash, blockNumber: receipt.blockNumber },
      };
    } catch (error) {
      if (error instanceof ConfirmationTimeout) {
        this.reporter.warn(`${error.message}; it may still be included later`, context);
        return { intent, nonce: sent.nonce, status: { state: 'timed-out', hash: sent.hash } };
      }
      throw error;
    }
  }

  /**
   * Token ids `owner` holds in `collection`, by index. An index that cannot
   * be read is logged and left out.
   */
  async enumerateTokenIds(collection: Address, owner: Address): Promise<bigint[]> {
    const countData = await this.rpc.call({
      to: collection,
      data: encodeFunctionData({ abi: ERC721_ABI, functionName: 'balanceOf', args: [owner] }),
    });
    const count = decodeFunctionResult({ abi: ERC721_ABI, functionName: 'balanceOf', data: countData });

    const ids: bigint[] = [];
    for (let index = 0n; index < count; index++) {
      try {
        const data = await this.rpc.call({
          to: collection,
          data: encodeFunctionData({ abi: ERC721_ABI, functionName: 'tokenOfOwnerByIndex', args: [owner, index] }),
        });
        ids.push(decodeFunctionResult({ abi: ERC721_ABI, functionName: 'tokenOfOwnerByIndex', data }));
      } catch (error) {
        this.reporter.warn(`Could not read token at index ${index} of ${collection}: ${ErrorUtils.describe(error)}`, {
          account: owner,
          asset: collection,
          index: index.toString(),
        });
      }
    }
    return ids;
  }

  private async dispatchCollection(
    signer: LocalAccount,
    record: AssetRecord & NonFungibleAsset,
    signal?: AbortSignal
  ): Promise<AccountDispatchResult> {
    const account = signer.address;
    let ids: bigint[];
    try {
      ids = await this.enumerateTokenIds(record.address, account);
    } catch (error) {
      const failure = new DispatchFailure('enumerate', { account, asset: record.address }, error);
      this.reporter.error(`Cannot list ${record.symbol} tokens of ${account}: ${failure.message}`, failure.context);
      return { account, outcomes: [], skipReason: 'no-token-ids' };
    }

    if (ids.length === 0) {
      this.reporter.warn(`No ${record.symbol} token ids found for ${account}`, { account, asset: record.address });
      return { account, outcomes: [], skipReason: 'no-token-ids' };
    }

    this.reporter.info(`${account} holds ${ids.length} ${record.symbol} tokens: ${ids.join(', ')}`);

    const asset: NonFungibleAsset = {
      kind: 'non-fungible',
      address: record.address,
      symbol: record.symbol,
      name: record.name,
      decimals: 0,
      suspicious: record.suspicious,
    };
    const outcomes: TransferOutcome[] = [];
    for (let i = 0; i < ids.length; i++) {
      if (signal?.aborted) {
        this.reporter.warn(`Stopping after ${i} of ${ids.length} ${record.symbol} transfers from ${account}`);
        return { account, outcomes, skipReason: outcomes.length === 0 ? 'interrupted' : undefined };
      }

      const intent: NonFungibleTransferIntent = {
        kind: 'non-fungible',
        account,
        destination: this.config.destination,
        asset,
        tokenId: ids[i],
      };
      outcomes.push(await this.execute(signer, intent));

      if (i < ids.length - 1) {
        await this.config.sleep(this.config.operationDelayMs, signal);
      }
    }
    return { account, outcomes };
  }

  private async submit(signer: LocalAccount, intent: TransferIntent): Promise<SignedTransfer> {
    const context = { account: intent.account, asset: intent.asset.address };

    let nonce: number;
    try {
      nonce = await this.rpc.getTransactionCount(intent.account);
    } catch (error) {
      throw new DispatchFailure('nonce', context, error);
    }

    let call: { to: Address; value: bigint; data: Hex; gas: bigint };
    try {
      call = this.buildCall(intent);
    } catch (error) {
      throw new DispatchFailure('build', context, error);
    }

    let serialized: Hex;
    try {
      serialized = await signer.signTransaction({
        type: 'legacy',
        chainId: this.config.chainId,
        nonce,
        gasPrice: this.config.gasPrice,
        ...call,
      });
    } catch (error) {
      throw new DispatchFailure('sign', context, error);
    }

    try {
      const hash = await this.rpc.sendRawTransaction(serialized);
      return { hash, nonce };
    } catch (error) {
      throw new DispatchFailure('submit', { ...context, nonce }, error);
    }
  }

  private buildCall(intent: TransferIntent): { to: Address; value: bigint; data: Hex; gas: bigint } {
    switch (intent.kind) {
      case 'native':
        return {
          to: intent.destination,
          value: intent.amount,
          data: '0x',
          gas: this.config.nativeGasLimit,
        };
      case 'fungible':
        return {
          to: intent.asset.address,
          value: 0n,
          data: encodeFunctionData({
            abi: ERC20_ABI,
            functionName: 'transfer',
            args: [intent.destination, intent.amount],
          }),
          gas: this.config.gasLimit,
        };
      case 'non-fungible':
        return {
          to: intent.asset.address,
          value: 0n,
          data: encodeFunctionData({
            abi: ERC721_ABI,
            functionName: 'safeTransferFrom',
            args: [intent.account, intent.destination, intent.tokenId],
          }),
          gas: this.config.gasLimit,
        };
    }
  }

  /**
   * Polls until the receipt appears. Read errors while polling are logged
   * and polling goes on until the deadline.
   * @throws ConfirmationTimeout
   */
  private async waitForReceipt(hash: Hash, context: Record<string, unknown>): Promise<ReceiptSummary> {
    const deadline = this.config.now() + this.config.confirmationTimeoutMs;

    for (;;) {
      try {
        const receipt = await this.rpc.getTransactionReceipt(hash);
        if (receipt) return receipt;
      } catch (error) {
        this.reporter.debug(`Receipt lookup for ${hash} failed: ${ErrorUtils.describe(error)}`);
      }

      if (this.config.now() >= deadline) {
        throw new ConfirmationTimeout(hash, this.config.confirmationTimeoutMs, context);
      }
      // Not tied to the run's signal: a submitted transaction is always followed to an outcome
      await this.config.sleep(this.config.pollIntervalMs);
    }
  }
}

function describeIntent(intent: TransferIntent): string {
  switch (intent.kind) {
    case 'native':
    case 'fungible':
      return `${formatUnits(intent.amount, intent.asset.decimals)} ${intent.asset.symbol}`;
    case 'non-fungible':
      return `${intent.asset.symbol} #${intent.tokenId}`;
  }
}
