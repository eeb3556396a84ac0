import { describe, it, expect, beforeEach } from 'vitest';
import { AssetClassifier, isSpamToken } from './AssetClassifier.js';
import { RetryExhaustedError } from '../resilience/RetryPolicy.js';
import { TransientRpcError } from '../utils/errors.js';
import { FakeChain, createManualClock, createMockAddress, type ManualClock } from '../test-utils/index.js';

const ACCOUNT = createMockAddress(1);
const TOKEN = createMockAddress(0xa1);
const COLLECTION = createMockAddress(0xb1);
const NOTHING = createMockAddress(0xc1);

describe('isSpamToken', () => {
  it('should flag airdrop and link patterns', () => {
    expect(isSpamToken('AIRDROP', 'Free tokens')).toBe(true);
    expect(isSpamToken('VISIT', 'rewards.xyz')).toBe(true);
    expect(isSpamToken('X', 'https://example.test')).toBe(true);
  });

  it('should accept ordinary names', () => {
    expect(isSpamToken('USDC', 'USD Coin')).toBe(false);
    expect(isSpamToken('PUNK', 'Punks')).toBe(false);
  });
});

describe('AssetClassifier', () => {
  let chain: FakeChain;
  let clock: ManualClock;
  let classifier: AssetClassifier;

  const rateLimited = () => new TransientRpcError('eth_call', chain.url, new Error('429 too many requests'));

  beforeEach(() => {
    chain = new FakeChain();
    clock = createManualClock();
    classifier = new AssetClassifier(chain, { retry: { sleep: clock.sleep } });
  });

  it('should classify a token with a positive balance as fungible', async () => {
    chain.addErc20(TOKEN, { symbol: 'USDC', name: 'USD Coin', decimals: 6, balances: [[ACCOUNT, 1_500_000n]] });

    const result = await classifier.classify(TOKEN, ACCOUNT);

    expect(result).toEqual({
      matched: true,
      asset: {
        kind: 'fungible',
        address: TOKEN,
        symbol: 'USDC',
        name: 'USD Coin',
        decimals: 6,
        suspicious: false,
        balance: 1_500_000n,
      },
    });
  });

  it('should discard a token the account no longer holds', async () => {
    chain.addErc20(TOKEN, { symbol: 'USDC', decimals: 6 });

    expect(await classifier.classify(TOKEN, ACCOUNT)).toEqual({ matched: false, reason: 'zero-balance' });
  });

  it('should fall through to non-fungible when decimals is missing', async () => {
    chain.addErc721(COLLECTION, {
      symbol: 'PUNK',
      name: 'Punks',
      tokens: [
        [7n, ACCOUNT],
        [9n, ACCOUNT],
      ],
    });

    const result = await classifier.classify(COLLECTION, ACCOUNT);

    expect(result).toEqual({
      matched: true,
      asset: {
        kind: 'non-fungible',
        address: COLLECTION,
        symbol: 'PUNK',
        name: 'Punks',
        decimals: 0,
        suspicious: false,
        balance: 2n,
      },
    });
  });

  it('should report an empty collection as zero balance', async () => {
    chain.addErc721(COLLECTION, { symbol: 'PUNK' });

    expect(await classifier.classify(COLLECTION, ACCOUNT)).toEqual({ matched: false, reason: 'zero-balance' });
  });

  it('should not mistake an address without code for a zero balance', async () => {
    expect(await classifier.classify(NOTHING, ACCOUNT)).toEqual({ matched: false, reason: 'unrecognized' });
  });

  it('should treat a contract that reverts everything as unrecognized', async () => {
    chain.addRevertingContract(NOTHING);

    expect(await classifier.classify(NOTHING, ACCOUNT)).toEqual({ matched: false, reason: 'unrecognized' });
  });

  it('should retry a rate-limited balance read instead of trying the next kind', async () => {
    chain
      .addErc20(TOKEN, { symbol: 'HLD', name: 'Held', decimals: 6, balances: [[ACCOUNT, 5n]] })
      .fail('call', rateLimited(), 1);

    const result = await classifier.classify(TOKEN, ACCOUNT);

    expect(result).toMatchObject({
      matched: true,
      asset: { kind: 'fungible', symbol: 'HLD', decimals: 6, balance: 5n },
    });
    expect(clock.sleeps).toEqual([2000]);
  });

  it('should keep a token that is rate limited twice before answering', async () => {
    chain
      .addErc20(TOKEN, { symbol: 'HLD', name: 'Held', decimals: 6, balances: [[ACCOUNT, 5n]] })
      .fail('call', rateLimited(), 2);

    const result = await classifier.classify(TOKEN, ACCOUNT);

    expect(result).toMatchObject({ matched: true, asset: { kind: 'fungible', balance: 5n } });
    expect(clock.sleeps).toEqual([2000, 4000]);
  });

  it('should throw once a read stays unavailable', async () => {
    chain
      .addErc20(TOKEN, { symbol: 'HLD', decimals: 6, balances: [[ACCOUNT, 5n]] })
      .fail('call', rateLimited(), 3);

    const error = await classifier.classify(TOKEN, ACCOUNT).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    if (!(error instanceof RetryExhaustedError)) return;
    expect(error.message).toBe('Gave up after 3 attempts: eth_call temporarily unavailable: 429 too many requests');
    expect(chain.calls.call).toBe(3);
  });

  it('should fall back to placeholders when metadata cannot be read', async () => {
    chain
      .addErc20(TOKEN, { decimals: 18, balances: [[ACCOUNT, 1n]] })
      .addErc721(COLLECTION, { tokens: [[1n, ACCOUNT]] });

    const token = await classifier.classify(TOKEN, ACCOUNT);
    const collection = await classifier.classify(COLLECTION, ACCOUNT);

    expect(token).toMatchObject({ matched: true, asset: { symbol: 'UNKNOWN', name: 'Unknown Token' } });
    expect(collection).toMatchObject({ matched: true, asset: { symbol: 'NFT', name: 'NFT Collection' } });
  });

  it('should strip control characters from metadata', async () => {
    chain.addErc20(TOKEN, { symbol: 'US\tDC', name: ' USD Coin ', balances: [[ACCOUNT, 1n]] });

    const result = await classifier.classify(TOKEN, ACCOUNT);

    expect(result).toMatchObject({ matched: true, asset: { symbol: 'USDC', name: 'USD Coin' } });
  });

  it('should mark scam-looking tokens as suspicious', async () => {
    chain.addErc20(TOKEN, { symbol: 'CLAIM', name: 'Visit claim-rewards.xyz', balances: [[ACCOUNT, 1n]] });

    const result = await classifier.classify(TOKEN, ACCOUNT);

    expect(result).toMatchObject({ matched: true, asset: { suspicious: true } });
  });

  it('should read the native balance with the configured currency', async () => {
    chain.setBalance(ACCOUNT, 5n);
    const polygon = new AssetClassifier(chain, { native: { symbol: 'POL', name: 'POL' } });

    expect(await polygon.readNativeBalance(ACCOUNT)).toEqual({
      kind: 'native',
      address: 'NATIVE',
      symbol: 'POL',
      name: 'POL',
      decimals: 18,
      suspicious: false,
      balance: 5n,
    });
  });

  it('should let native read failures propagate', async () => {
    chain.fail('getBalance', new TransientRpcError('eth_getBalance', chain.url, new Error('overloaded')));

    await expect(classifier.readNativeBalance(ACCOUNT)).rejects.toBeInstanceOf(TransientRpcError);
  });
});
