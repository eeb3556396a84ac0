/**
 * In-process chain that answers the collector's RPC surface.
 * Raw transactions are decoded with viem and attributed to a registered
 * signer, so nonces, balances and ownership move the way a node would
 * move them.
 */

import {
  decodeFunctionData,
  encodeFunctionResult,
  keccak256,
  numberToHex,
  pad,
  parseTransaction,
  type Address,
  type Hash,
  type Hex,
  type LocalAccount,
} from 'viem';
import { ERC20_ABI, ERC721_ABI, TRANSFER_TOPIC } from '../contracts/abis.js';
import type { EvmRpc, LogEntry, LogQuery, ReceiptSummary, RpcFactory } from '../types/EvmRpc.js';
import { PermanentRpcError } from '../utils/errors.js';

export type FakeMethod =
  | 'getBlockNumber'
  | 'getChainId'
  | 'getLogs'
  | 'getBalance'
  | 'call'
  | 'getTransactionCount'
  | 'sendRawTransaction'
  | 'getTransactionReceipt';

export type ReceiptPolicy = 'mined' | 'reverted' | 'pending';

export interface SentTransaction {
  hash: Hash;
  from: Address;
  to: Address | null;
  nonce: number;
  value: bigint;
  data: Hex;
  gas: bigint;
  gasPrice: bigint;
}

interface Fault {
  method: FakeMethod;
  error: Error;
  remaining: number;
  when?: (query: LogQuery) => boolean;
}

interface Erc20State {
  kind: 'erc20';
  symbol?: string;
  name?: string;
  decimals: number;
  balances: Map<string, bigint>;
}

interface Erc721State {
  kind: 'erc721';
  symbol?: string;
  name?: string;
  tokens: Array<{ id: bigint; owner: string }>;
  unreadableIndices: Set<number>;
}

interface RevertingState {
  kind: 'reverting';
}

type ContractState = Erc20State | Erc721State | RevertingState;

export interface Erc20Options {
  symbol?: string;
  name?: string;
  decimals?: number;
  balances?: Array<[Address, bigint]>;
}

export interface Erc721Options {
  symbol?: string;
  name?: string;
  tokens?: Array<[bigint, Address]>;
  /** tokenOfOwnerByIndex reverts at these indices */
  unreadableIndices?: number[];
}

export interface FakeChainOptions {
  url?: string;
  chainId?: number;
  head?: bigint;
}

const METHODS: FakeMethod[] = [
  'getBlockNumber',
  'getChainId',
  'getLogs',
  'getBalance',
  'call',
  'getTransactionCount',
  'sendRawTransaction',
  'getTransactionReceipt',
];

export class FakeChain implements EvmRpc {
  readonly url: string;
  chainId: number;
  head: bigint;

  /** Calls per method, faulted ones included */
  readonly calls: Record<FakeMethod, number>;
  readonly logQueries: LogQuery[] = [];
  readonly sent: SentTransaction[] = [];

  private balances = new Map<string, bigint>();
  private contracts = new Map<string, ContractState>();
  private logs: LogEntry[] = [];
  private nonces = new Map<string, number>();
  private receipts = new Map<string, ReceiptSummary>();
  private signers: LocalAccount[] = [];
  private faults: Fault[] = [];
  private receiptPolicy: (tx: SentTransaction) => ReceiptPolicy = () => 'mined';

  constructor(options: FakeChainOptions = {}) {
    this.url = options.url ?? 'https://rpc.test';
    this.chainId = options.chainId ?? 8453;
    this.head = options.head ?? 100000n;
    this.calls = {
      getBlockNumber: 0,
      getChainId: 0,
      getLogs: 0,
      getBalance: 0,
      call: 0,
      getTransactionCount: 0,
      sendRawTransaction: 0,
      getTransactionReceipt: 0,
    };
  }

  // ---- setup ----

  registerSigner(...signers: LocalAccount[]): this {
    this.signers.push(...signers);
    return this;
  }

  setBalance(address: Address, balance: bigint): this {
    this.balances.set(address.toLowerCase(), balance);
    return this;
  }

  addErc20(address: Address, options: Erc20Options = {}): this {
    this.contracts.set(address.toLowerCase(), {
      kind: 'erc20',
      symbol: options.symbol,
      name: options.name,
      decimals: options.decimals ?? 18,
      balances: new Map((options.balances ?? []).map(([holder, amount]): [string, bigint] => [holder.toLowerCase(), amount])),
    });
    return this;
  }

  addErc721(address: Address, options: Erc721Options = {}): this {
    this.contracts.set(address.toLowerCase(), {
      kind: 'erc721',
      symbol: options.symbol,
      name: options.name,
      tokens: (options.tokens ?? []).map(([id, owner]) => ({ id, owner: owner.toLowerCase() })),
      unreadableIndices: new Set(options.unreadableIndices ?? []),
    });
    return this;
  }

  /** A contract whose every call reverts */
  addRevertingContract(address: Address): this {
    this.contracts.set(address.toLowerCase(), { kind: 'reverting' });
    return this;
  }

  /**
   * Seeds a Transfer event. Passing `tokenId` indexes it as ERC-721 does.
   */
  addTransferLog(entry: { contract: Address; from: Address; to: Address; blockNumber: bigint; tokenId?: bigint }): this {
    const topics: Hex[] = [TRANSFER_TOPIC, pad(entry.from, { size: 32 }), pad(entry.to, { size: 32 })];
    if (entry.tokenId !== undefined) {
      topics.push(numberToHex(entry.tokenId, { size: 32 }));
    }
    this.logs.push({
      address: entry.contract,
      topics,
      blockNumber: entry.blockNumber,
      transactionHash: null,
    });
    return this;
  }

  /**
   * Makes the next `times` calls to `method` throw `error`
   */
  fail(method: FakeMethod, error: Error, times: number = Number.POSITIVE_INFINITY): this {
    this.faults.push({ method, error, remaining: times });
    return this;
  }

  /**
   * Makes getLogs throw for queries matching `when`
   */
  failLogs(when: (query: LogQuery) => boolean, error: Error, times: number = Number.POSITIVE_INFINITY): this {
    this.faults.push({ method: 'getLogs', error, remaining: times, when });
    return this;
  }

  setReceiptPolicy(policy: (tx: SentTransaction) => ReceiptPolicy): this {
    this.receiptPolicy = policy;
    return this;
  }

  // ---- inspection ----

  balanceOf(address: Address): bigint {
    return this.balances.get(address.toLowerCase()) ?? 0n;
  }

  tokenBalanceOf(contract: Address, holder: Address): bigint {
    const state = this.contracts.get(contract.toLowerCase());
    if (state?.kind === 'erc20') return state.balances.get(holder.toLowerCase()) ?? 0n;
    if (state?.kind === 'erc721') {
      return BigInt(state.tokens.filter((token) => token.owner === holder.toLowerCase()).length);
    }
    return 0n;
  }

  ownerOf(contract: Address, tokenId: bigint): string | undefined {
    const state = this.contracts.get(contract.toLowerCase());
    if (state?.kind !== 'erc721') return undefined;
    return state.tokens.find((token) => token.id === tokenId)?.owner;
  }

  totalCalls(): number {
    return METHODS.reduce((sum, method) => sum + this.calls[method], 0);
  }

  // ---- EvmRpc ----

  async getBlockNumber(): Promise<bigint> {
    this.enter('getBlockNumber');
    return this.head;
  }

  async getChainId(): Promise<number> {
    this.enter('getChainId');
    return this.chainId;
  }

  async getLogs(query: LogQuery): Promise<LogEntry[]> {
    this.logQueries.push(query);
    this.enter('getLogs', query);

    return this.logs.filter((log) => {
      if (log.blockNumber === null || log.blockNumber < query.fromBlock || log.blockNumber > query.toBlock) {
        return false;
      }
      if (query.address && log.address.toLowerCase() !== query.address.toLowerCase()) {
        return false;
      }
      return query.topics.every((filter, i) => {
        if (filter === null) return true;
        const topic = log.topics[i]?.toLowerCase();
        if (topic === undefined) return false;
        const wanted = Array.isArray(filter) ? filter : [filter];
        return wanted.some((candidate) => candidate.toLowerCase() === topic);
      });
    });
  }

  async getBalance(address: Address): Promise<bigint> {
    this.enter('getBalance');
    return this.balanceOf(address);
  }

  async call(request: { to: Address; data: Hex }): Promise<Hex> {
    this.enter('call');
    const state = this.contracts.get(request.to.toLowerCase());
    if (!state) return '0x';

    switch (state.kind) {
      case 'reverting':
        throw this.revert('eth_call');
      case 'erc20':
        return this.callErc20(state, request.data);
      case 'erc721':
        return this.callErc721(state, request.data);
    }
  }

  async getTransactionCount(address: Address): Promise<number> {
    this.enter('getTransactionCount');
    return this.nonces.get(address.toLowerCase()) ?? 0;
  }

  async sendRawTransaction(serializedTransaction: Hex): Promise<Hash> {
    this.enter('sendRawTransaction');

    const tx = parseTransaction(serializedTransaction);
    if (tx.type !== 'legacy') {
      throw this.reject('only legacy transactions are accepted');
    }
    const chainId = tx.chainId;
    if (chainId === undefined || chainId !== this.chainId) {
      throw this.reject(`invalid chain id ${chainId}`);
    }

    const unsigned = {
      type: 'legacy' as const,
      chainId,
      nonce: tx.nonce ?? 0,
      gas: tx.gas ?? 0n,
      gasPrice: tx.gasPrice ?? 0n,
      to: tx.to ?? null,
      value: tx.value ?? 0n,
      data: tx.data ?? '0x',
    };
    const from = await this.identifySender(serializedTransaction, unsigned);

    const expected = this.nonces.get(from.toLowerCase()) ?? 0;
    if (unsigned.nonce !== expected) {
      throw this.reject(`nonce ${unsigned.nonce} does not match expected ${expected}`);
    }
    this.nonces.set(from.toLowerCase(), expected + 1);

    const sent: SentTransaction = {
      hash: keccak256(serializedTransaction),
      from,
      to: unsigned.to,
      nonce: unsigned.nonce,
      value: unsigned.value,
      data: unsigned.data,
      gas: unsigned.gas,
      gasPrice: unsigned.gasPrice,
    };
    this.sent.push(sent);

    const policy = this.receiptPolicy(sent);
    if (policy !== 'pending') {
      this.head += 1n;
      const applied = policy === 'mined' && this.apply(sent);
      this.receipts.set(sent.hash, { status: applied ? 'success' : 'reverted', blockNumber: this.head });
    }
    return sent.hash;
  }

  async getTransactionReceipt(hash: Hash): Promise<ReceiptSummary | null> {
    this.enter('getTransactionReceipt');
    return this.receipts.get(hash) ?? null;
  }

  // ---- internals ----

  private enter(method: FakeMethod, query?: LogQuery): void {
    this.calls[method]++;
    const fault = this.faults.find(
      (f) => f.method === method && f.remaining > 0 && (!f.when || (query !== undefined && f.when(query)))
    );
    if (fault) {
      fault.remaining--;
      throw fault.error;
    }
  }

  private decodeCall<T>(decode: () => T): T {
    try {
      return decode();
    } catch (error) {
      throw new PermanentRpcError('eth_call', this.url, error);
    }
  }

  private revert(method: string): PermanentRpcError {
    return new PermanentRpcError(method, this.url, new Error('execution reverted'));
  }

  private reject(reason: string): PermanentRpcError {
    return new PermanentRpcError('eth_sendRawTransaction', this.url, new Error(reason));
  }

  private async identifySender(
    raw: Hex,
    unsigned: {
      type: 'legacy';
      chainId: number;
      nonce: number;
      gas: bigint;
      gasPrice: bigint;
      to: Address | null;
      value: bigint;
      data: Hex;
    }
  ): Promise<Address> {
    for (const signer of this.signers) {
      const signed = await signer.signTransaction(unsigned);
      if (signed.toLowerCase() === raw.toLowerCase()) {
        return signer.address;
      }
    }
    throw this.reject('transaction signed by an unknown account');
  }

  private callErc20(state: Erc20State, data: Hex): Hex {
    const decoded = this.decodeCall(() => decodeFunctionData({ abi: ERC20_ABI, data }));

    switch (decoded.functionName) {
      case 'balanceOf':
        return encodeFunctionResult({
          abi: ERC20_ABI,
          functionName: 'balanceOf',
          result: state.balances.get(decoded.args[0].toLowerCase()) ?? 0n,
        });
      case 'decimals':
        return encodeFunctionResult({ abi: ERC20_ABI, functionName: 'decimals', result: state.decimals });
      case 'symbol':
        if (state.symbol === undefined) throw this.revert('eth_call');
        return encodeFunctionResult({ abi: ERC20_ABI, functionName: 'symbol', result: state.symbol });
      case 'name':
        if (state.name === undefined) throw this.revert('eth_call');
        return encodeFunctionResult({ abi: ERC20_ABI, functionName: 'name', result: state.name });
      case 'transfer':
        return encodeFunctionResult({ abi: ERC20_ABI, functionName: 'transfer', result: true });
    }
  }

  private callErc721(state: Erc721State, data: Hex): Hex {
    const decoded = this.decodeCall(() => decodeFunctionData({ abi: ERC721_ABI, data }));

    switch (decoded.functionName) {
      case 'balanceOf': {
        const owner = decoded.args[0].toLowerCase();
        const count = state.tokens.filter((token) => token.owner === owner).length;
        return encodeFunctionResult({ abi: ERC721_ABI, functionName: 'balanceOf', result: BigInt(count) });
      }
      case 'symbol':
        if (state.symbol === undefined) throw this.revert('eth_call');
        return encodeFunctionResult({ abi: ERC721_ABI, functionName: 'symbol', result: state.symbol });
      case 'name':
        if (state.name === undefined) throw this.revert('eth_call');
        return encodeFunctionResult({ abi: ERC721_ABI, functionName: 'name', result: state.name });
      case 'tokenOfOwnerByIndex': {
        const owner = decoded.args[0].toLowerCase();
        const index = Number(decoded.args[1]);
        const owned = state.tokens.filter((token) => token.owner === owner);
        const token = owned[index];
        if (state.unreadableIndices.has(index) || token === undefined) {
          throw this.revert('eth_call');
        }
        return encodeFunctionResult({ abi: ERC721_ABI, functionName: 'tokenOfOwnerByIndex', result: token.id });
      }
      case 'safeTransferFrom':
        return '0x';
    }
  }

  /**
   * State change of a mined transaction; false means it reverted
   */
  private apply(tx: SentTransaction): boolean {
    const from = tx.from.toLowerCase();
    if (tx.to === null) return false;

    if (tx.value > 0n) {
      const balance = this.balanceOf(tx.from);
      if (balance < tx.value) return false;
      this.balances.set(from, balance - tx.value);
      this.balances.set(tx.to.toLowerCase(), this.balanceOf(tx.to) + tx.value);
    }
    if (tx.data === '0x') return true;

    const state = this.contracts.get(tx.to.toLowerCase());
    const data = tx.data;
    if (state?.kind === 'erc20') {
      const decoded = this.decodeCall(() => decodeFunctionData({ abi: ERC20_ABI, data }));
      if (decoded.functionName !== 'transfer') return false;
      const [recipient, amount] = decoded.args;
      const held = state.balances.get(from) ?? 0n;
      if (held < amount) return false;
      state.balances.set(from, held - amount);
      state.balances.set(recipient.toLowerCase(), (state.balances.get(recipient.toLowerCase()) ?? 0n) + amount);
      return true;
    }
    if (state?.kind === 'erc721') {
      const decoded = this.decodeCall(() => decodeFunctionData({ abi: ERC721_ABI, data }));
      if (decoded.functionName !== 'safeTransferFrom') return false;
      const [owner, recipient, tokenId] = decoded.args;
      const token = state.tokens.find((t) => t.id === tokenId);
      if (!token || token.owner !== from || owner.toLowerCase() !== from) return false;
      token.owner = recipient.toLowerCase();
      return true;
    }
    return false;
  }
}

/**
 * Factory resolving URLs to fake chains; unknown URLs fail like an
 * unreachable host
 */
export function createFakeRpcFactory(...chains: FakeChain[]): RpcFactory {
  return (url) => {
    const chain = chains.find((c) => c.url === url);
    if (!chain) {
      throw new PermanentRpcError('connect', url, new Error('getaddrinfo ENOTFOUND'));
    }
    return chain;
  };
}
