import {
  createPublicClient,
  hexToBigInt,
  http,
  numberToHex,
  TransactionReceiptNotFoundError,
  type Address,
  type Hash,
  type Hex,
  type PublicClient,
  type Transport,
} from 'viem';
import type { EvmRpc, LogEntry, LogQuery, ReceiptSummary } from '../types/EvmRpc.js';
import { ErrorUtils } from '../utils/errors.js';

export interface ViemRpcClientOptions {
  /**
   * Per-request timeout (ms)
   * @default 30000
   */
  timeoutMs?: number;

  /**
   * Transport override; defaults to http(url) with viem's own retries off
   */
  transport?: Transport;
}

/**
 * EvmRpc backed by a viem PublicClient over a single endpoint.
 * viem's transport-level retries are disabled: retry decisions belong to
 * the caller, which knows whether a window or a transfer is at stake.
 */
export class ViemRpcClient implements EvmRpc {
  readonly url: string;
  private client: PublicClient;

  constructor(url: string, options: ViemRpcClientOptions = {}) {
    this.url = url;
    this.client = createPublicClient({
      transport:
        options.transport ?? http(url, { timeout: options.timeoutMs ?? 30000, retryCount: 0 }),
    });
  }

  getBlockNumber(): Promise<bigint> {
    return this.invoke('eth_blockNumber', () => this.client.getBlockNumber({ cacheTime: 0 }));
  }

  getChainId(): Promise<number> {
    return this.invoke('eth_chainId', () => this.client.getChainId());
  }

  getLogs(query: LogQuery): Promise<LogEntry[]> {
    return this.invoke(
      'eth_getLogs',
      async () => {
        const logs = await this.client.request({
          method: 'eth_getLogs',
          params: [
            {
              address: query.address,
              topics: query.topics,
              fromBlock: numberToHex(query.fromBlock),
              toBlock: numberToHex(query.toBlock),
            },
          ],
        });

        return logs.map(
          (log): LogEntry => ({
            address: log.address,
            topics: [...log.topics],
            blockNumber: log.blockNumber ? hexToBigInt(log.blockNumber) : null,
            transactionHash: log.transactionHash,
          })
        );
      },
      { fromBlock: query.fromBlock.toString(), toBlock: query.toBlock.toString() }
    );
  }

  getBalance(address: Address): Promise<bigint> {
    return this.invoke('eth_getBalance', () => this.client.getBalance({ address }), { address });
  }

  call(request: { to: Address; data: Hex }): Promise<Hex> {
    return this.invoke(
      'eth_call',
      async () => {
        const { data } = await this.client.call({ to: request.to, data: request.data });
        return data ?? '0x';
      },
      { to: request.to }
    );
  }

  getTransactionCount(address: Address): Promise<number> {
    return this.invoke(
      'eth_getTransactionCount',
      () => this.client.getTransactionCount({ address, blockTag: 'pending' }),
      { address }
    );
  }

  sendRawTransaction(serializedTransaction: Hex): Promise<Hash> {
    return this.invoke('eth_sendRawTransaction', () =>
      this.client.sendRawTransaction({ serializedTransaction })
    );
  }

  getTransactionReceipt(hash: Hash): Promise<ReceiptSummary | null> {
    return this.invoke(
      'eth_getTransactionReceipt',
      async () => {
        try {
          const receipt = await this.client.getTransactionReceipt({ hash });
          return { status: receipt.status, blockNumber: receipt.blockNumber };
        } catch (error) {
          if (error instanceof TransactionReceiptNotFoundError) {
            return null;
          }
          throw error;
        }
      },
      { hash }
    );
  }

  private async invoke<T>(
    method: string,
    operation: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw ErrorUtils.toRpcError(error, method, this.url, context);
    }
  }
}

/**
 * Default RpcFactory for the CLI
 */
export function createViemRpc(url: string, options?: ViemRpcClientOptions): EvmRpc {
  return new ViemRpcClient(url, options);
}
