/**
 * RPC capability consumed by discovery and dispatch
 *
 * @module types/EvmRpc
 */

import type { Address, Hash, Hex } from 'viem';

/**
 * Topic filter slot: a single topic, any of several, or a wildcard
 */
export type TopicFilter = Hex | Hex[] | null;

export interface LogQuery {
  fromBlock: bigint;
  toBlock: bigint;
  topics: TopicFilter[];
  address?: Address;
}

export interface LogEntry {
  address: Address;
  topics: Hex[];
  blockNumber: bigint | null;
  transactionHash: Hash | null;
}

export interface ReceiptSummary {
  status: 'success' | 'reverted';
  blockNumber: bigint;
}

/**
 * JSON-RPC surface used by the collector. Implementations throw
 * TransientRpcError or PermanentRpcError on failure.
 */
export interface EvmRpc {
  /** Endpoint this client talks to */
  readonly url: string;

  getBlockNumber(): Promise<bigint>;

  getChainId(): Promise<number>;

  getLogs(query: LogQuery): Promise<LogEntry[]>;

  getBalance(address: Address): Promise<bigint>;

  /** Read-only contract call; returns the raw return data */
  call(request: { to: Address; data: Hex }): Promise<Hex>;

  /** Pending transaction count, used as the next nonce */
  getTransactionCount(address: Address): Promise<number>;

  sendRawTransaction(serializedTransaction: Hex): Promise<Hash>;

  /** Resolves to null while the transaction is not yet included */
  getTransactionReceipt(hash: Hash): Promise<ReceiptSummary | null>;
}

export type RpcFactory = (url: string) => EvmRpc;
