import { describe, it, expect, beforeEach } from 'vitest';
import { parseEther, parseGwei } from 'viem';
import { TransferDispatcher, type DispatcherOptions } from './TransferDispatcher.js';
import { aggregateInventory } from '../inventory/InventoryAggregator.js';
import type { AssetRecord, DiscoveredAsset } from '../types/assets.js';
import { PermanentRpcError, TransientRpcError } from '../utils/errors.js';
import {
  FakeChain,
  RecordingReporter,
  createManualClock,
  createMockAddress,
  testAccount,
  type ManualClock,
} from '../test-utils/index.js';

const DESTINATION = createMockAddress(0xdd);
const OTHER = createMockAddress(2);
const TOKEN = createMockAddress(0xa1);
const COLLECTION = createMockAddress(0xb1);
const GAS_PRICE = parseGwei('0.1');
const NATIVE_FEE = 21000n * GAS_PRICE;

const signer = testAccount(1);

function recordOf(asset: DiscoveredAsset, account = signer.address): AssetRecord {
  const [record] = aggregateInventory([{ account, assets: [asset] }]);
  return record;
}

const nativeHolding = (balance: bigint): DiscoveredAsset => ({
  kind: 'native',
  address: 'NATIVE',
  symbol: 'ETH',
  name: 'Ether',
  decimals: 18,
  suspicious: false,
  balance,
});

const usdcHolding = (balance: bigint): DiscoveredAsset => ({
  kind: 'fungible',
  address: TOKEN,
  symbol: 'USDC',
  name: 'USD Coin',
  decimals: 6,
  suspicious: false,
  balance,
});

const punkHolding = (balance: bigint): DiscoveredAsset => ({
  kind: 'non-fungible',
  address: COLLECTION,
  symbol: 'PUNK',
  name: 'Punks',
  decimals: 0,
  suspicious: false,
  balance,
});

describe('TransferDispatcher', () => {
  let chain: FakeChain;
  let reporter: RecordingReporter;
  let clock: ManualClock;

  beforeEach(() => {
    chain = new FakeChain().registerSigner(signer);
    reporter = new RecordingReporter();
    clock = createManualClock();
  });

  function dispatcher(options: Partial<DispatcherOptions> = {}) {
    return new TransferDispatcher(chain, reporter, {
      destination: DESTINATION,
      gasPrice: GAS_PRICE,
      chainId: 8453,
      sleep: clock.sleep,
      now: clock.now,
      ...options,
    });
  }

  describe('native', () => {
    it('should send the balance minus the transfer fee', async () => {
      chain.setBalance(signer.address, parseEther('1'));

      const result = await dispatcher().dispatch(signer, recordOf(nativeHolding(parseEther('1'))));

      expect(chain.sent).toHaveLength(1);
      const [tx] = chain.sent;
      expect(tx).toMatchObject({
        from: signer.address,
        to: DESTINATION,
        nonce: 0,
        value: parseEther('1') - NATIVE_FEE,
        data: '0x',
        gas: 21000n,
        gasPrice: GAS_PRICE,
      });
      expect(result.skipReason).toBeUndefined();
      expect(result.outcomes).toHaveLength(1);
      expect(result.outcomes[0].nonce).toBe(0);
      expect(result.outcomes[0].status).toEqual({ state: 'confirmed', hash: tx.hash, blockNumber: 100001n });
      expect(chain.balanceOf(DESTINATION)).toBe(parseEther('1') - NATIVE_FEE);
    });

    it('should skip a balance that does not cover the fee', async () => {
      const result = await dispatcher().dispatch(signer, recordOf(nativeHolding(NATIVE_FEE)));

      expect(result).toEqual({ account: signer.address, outcomes: [], skipReason: 'insufficient-for-gas' });
      expect(chain.calls.sendRawTransaction).toBe(0);
    });
  });

  describe('fungible', () => {
    it('should transfer the whole discovered balance', async () => {
      chain.addErc20(TOKEN, { symbol: 'USDC', decimals: 6, balances: [[signer.address, 1_500_000n]] });

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(1_500_000n)));

      const [tx] = chain.sent;
      expect(tx).toMatchObject({ to: TOKEN, value: 0n, gas: 100000n });
      expect(chain.tokenBalanceOf(TOKEN, DESTINATION)).toBe(1_500_000n);
      expect(chain.tokenBalanceOf(TOKEN, signer.address)).toBe(0n);
      expect(result.outcomes[0].status.state).toBe('confirmed');
      expect(reporter.messages('info')).toContain(`Sending 1.5 USDC from ${signer.address} to ${DESTINATION}`);
      expect(reporter.messages('success')).toEqual([`Confirmed ${tx.hash} in block 100001`]);
    });

    it('should skip an account that is not in the record', async () => {
      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n), OTHER));

      expect(result).toEqual({ account: signer.address, outcomes: [], skipReason: 'no-balance' });
      expect(reporter.messages('info')).toEqual([`${signer.address} holds no USDC, skipping`]);
    });

    it('should record a reverted transfer as failed with its hash', async () => {
      chain.addErc20(TOKEN, { decimals: 6, balances: [[signer.address, 5n]] });
      chain.setReceiptPolicy(() => 'reverted');

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)));

      expect(result.outcomes[0].nonce).toBe(0);
      expect(result.outcomes[0].status).toEqual({ state: 'failed', reason: 'reverted', hash: chain.sent[0].hash });
    });

    it('should report a mined transfer that the contract rejected as reverted', async () => {
      chain.addErc20(TOKEN, { decimals: 6, balances: [[signer.address, 1n]] });

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)));

      expect(result.outcomes[0].status).toMatchObject({ state: 'failed', reason: 'reverted' });
    });

    it('should time out when no receipt appears', async () => {
      chain.addErc20(TOKEN, { decimals: 6, balances: [[signer.address, 5n]] });
      chain.setReceiptPolicy(() => 'pending');

      const result = await dispatcher({ confirmationTimeoutMs: 10000, pollIntervalMs: 2000 }).dispatch(
        signer,
        recordOf(usdcHolding(5n))
      );

      const hash = chain.sent[0].hash;
      expect(result.outcomes[0].status).toEqual({ state: 'timed-out', hash });
      expect(clock.sleeps).toEqual([2000, 2000, 2000, 2000, 2000]);
      expect(chain.calls.getTransactionReceipt).toBe(6);
      expect(reporter.messages('warn')).toEqual([
        `Transaction ${hash} not included after 10000ms; it may still be included later`,
      ]);
    });

    it('should keep polling through receipt read errors', async () => {
      chain.addErc20(TOKEN, { decimals: 6, balances: [[signer.address, 5n]] });
      chain.fail('getTransactionReceipt', new TransientRpcError('eth_getTransactionReceipt', chain.url), 2);

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)));

      expect(result.outcomes[0].status.state).toBe('confirmed');
      expect(clock.sleeps).toEqual([2000, 2000]);
    });

    it('should record a rejected submission without a nonce', async () => {
      chain.fail(
        'sendRawTransaction',
        new PermanentRpcError('eth_sendRawTransaction', chain.url, new Error('insufficient funds for gas'))
      );

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)));

      expect(result.outcomes).toHaveLength(1);
      expect(result.outcomes[0].nonce).toBeUndefined();
      expect(result.outcomes[0].status).toEqual({
        state: 'failed',
        reason: 'submit failed: eth_sendRawTransaction failed: insufficient funds for gas',
      });
    });

    it('should fail the transfer when the nonce cannot be read', async () => {
      chain.fail(
        'getTransactionCount',
        new TransientRpcError('eth_getTransactionCount', chain.url, new Error('overloaded'))
      );

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)));

      expect(result.outcomes[0].status).toEqual({
        state: 'failed',
        reason: 'nonce failed: eth_getTransactionCount temporarily unavailable: overloaded',
      });
      expect(chain.calls.sendRawTransaction).toBe(0);
    });

    it('should not start when already interrupted', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await dispatcher().dispatch(signer, recordOf(usdcHolding(5n)), controller.signal);

      expect(result).toEqual({ account: signer.address, outcomes: [], skipReason: 'interrupted' });
    });
  });

  describe('non-fungible', () => {
    beforeEach(() => {
      chain.addErc721(COLLECTION, {
        symbol: 'PUNK',
        tokens: [
          [7n, signer.address],
          [9n, signer.address],
          [11n, OTHER],
        ],
      });
    });

    it('should transfer every owned token with increasing nonces', async () => {
      const result = await dispatcher().dispatch(signer, recordOf(punkHolding(2n)));

      expect(chain.sent.map((tx) => tx.nonce)).toEqual([0, 1]);
      expect(result.outcomes.map((outcome) => outcome.status.state)).toEqual(['confirmed', 'confirmed']);
      expect(chain.ownerOf(COLLECTION, 7n)).toBe(DESTINATION);
      expect(chain.ownerOf(COLLECTION, 9n)).toBe(DESTINATION);
      expect(chain.ownerOf(COLLECTION, 11n)).toBe(OTHER);
      expect(clock.sleeps).toEqual([2000]);
      expect(reporter.messages('info')).toContain(`${signer.address} holds 2 PUNK tokens: 7, 9`);
    });

    it('should keep going after one token fails', async () => {
      chain.setReceiptPolicy((tx) => (tx.nonce === 0 ? 'reverted' : 'mined'));

      const result = await dispatcher().dispatch(signer, recordOf(punkHolding(2n)));

      expect(result.outcomes.map((outcome) => outcome.status.state)).toEqual(['failed', 'confirmed']);
      expect(chain.ownerOf(COLLECTION, 7n)).toBe(signer.address.toLowerCase());
      expect(chain.ownerOf(COLLECTION, 9n)).toBe(DESTINATION);
    });

    it('should skip an index that cannot be read', async () => {
      chain.addErc721(COLLECTION, {
        symbol: 'PUNK',
        tokens: [
          [7n, signer.address],
          [9n, signer.address],
        ],
        unreadableIndices: [0],
      });

      const result = await dispatcher().dispatch(signer, recordOf(punkHolding(2n)));

      expect(result.outcomes).toHaveLength(1);
      expect(chain.ownerOf(COLLECTION, 9n)).toBe(DESTINATION);
      expect(reporter.messages('warn')).toEqual([
        `Could not read token at index 0 of ${COLLECTION}: eth_call failed: execution reverted`,
      ]);
    });

    it('should skip the account when no token id can be read', async () => {
      chain.addErc721(COLLECTION, { symbol: 'PUNK', tokens: [[7n, signer.address]], unreadableIndices: [0] });

      const result = await dispatcher().dispatch(signer, recordOf(punkHolding(1n)));

      expect(result).toEqual({ account: signer.address, outcomes: [], skipReason: 'no-token-ids' });
    });

    it('should skip the account when the owned count cannot be read', async () => {
      chain.fail('call', new PermanentRpcError('eth_call', chain.url, new Error('execution reverted')));

      const result = await dispatcher().dispatch(signer, recordOf(punkHolding(2n)));

      expect(result).toEqual({ account: signer.address, outcomes: [], skipReason: 'no-token-ids' });
      expect(reporter.messages('error')).toEqual([
        `Cannot list PUNK tokens of ${signer.address}: enumerate failed: eth_call failed: execution reverted`,
      ]);
    });

    it('should stop between tokens when interrupted', async () => {
      const controller = new AbortController();
      const interrupting = dispatcher({
        sleep: async () => {
          controller.abort();
        },
      });

      const result = await interrupting.dispatch(signer, recordOf(punkHolding(2n)), controller.signal);

      expect(result.outcomes).toHaveLength(1);
      expect(result.skipReason).toBeUndefined();
      expect(chain.sent).toHaveLength(1);
      expect(reporter.messages('warn')).toEqual([
        `Stopping after 1 of 2 PUNK transfers from ${signer.address}`,
      ]);
    });
  });
});
