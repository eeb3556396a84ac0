/**
 * Transfer intents and their terminal outcomes
 *
 * @module types/transfers
 */

import type { Address, Hash } from 'viem';
import type { FungibleAsset, NativeAsset, NonFungibleAsset } from './assets.js';

interface TransferIntentBase {
  readonly account: Address;
  readonly destination: Address;
}

export interface NativeTransferIntent extends TransferIntentBase {
  readonly kind: 'native';
  readonly asset: NativeAsset;
  readonly amount: bigint;
}

export interface FungibleTransferIntent extends TransferIntentBase {
  readonly kind: 'fungible';
  readonly asset: FungibleAsset;
  readonly amount: bigint;
}

export interface NonFungibleTransferIntent extends TransferIntentBase {
  readonly kind: 'non-fungible';
  readonly asset: NonFungibleAsset;
  readonly tokenId: bigint;
}

export type TransferIntent =
  | NativeTransferIntent
  | FungibleTransferIntent
  | NonFungibleTransferIntent;

export type TransferStatus =
  | { readonly state: 'confirmed'; readonly hash: Hash; readonly blockNumber: bigint }
  | { readonly state: 'failed'; readonly reason: string; readonly hash?: Hash }
  | { readonly state: 'timed-out'; readonly hash: Hash };

export type TransferState = TransferStatus['state'];

export interface TransferOutcome {
  readonly intent: TransferIntent;
  readonly status: TransferStatus;
  /**
   * Nonce the transaction was built with, when one was read
   */
  readonly nonce?: number;
}

/**
 * Result of dispatching the selected asset from one account
 */
export interface AccountDispatchResult {
  readonly account: Address;
  readonly outcomes: readonly TransferOutcome[];
  /**
   * Why nothing was sent from this account, when nothing was
   */
  readonly skipReason?: 'no-balance' | 'insufficient-for-gas' | 'no-token-ids' | 'interrupted';
}
