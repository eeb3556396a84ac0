import { parseGwei, type Address, type LocalAccount } from 'viem';
import type { CollectionSettings } from '../../application/CollectionOrchestrator.js';
import { NATIVE_ASSET, type NativeAssetAddress } from '../../types/assets.js';
import { ValidationError } from '../../utils/errors.js';
import { Validators } from '../../utils/validators.js';

export interface ChainConfig {
  id: number;
  name: string;
  rpcUrls: string[];
  nativeCurrency: {
    name: string;
    symbol: string;
    decimals: number;
  };
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

/**
 * consola numeric levels for each accepted LOG_LEVEL
 */
export const LOG_LEVELS: Record<LogLevelName, number> = {
  error: 0,
  warn: 1,
  info: 3,
  debug: 4,
};

export interface CollectorConfig {
  chain: ChainConfig;
  /** Only set when CHAIN_ID was given; the selected endpoint must then match */
  expectedChainId?: number;
  rpcUrl: string;
  alternativeRpcUrls: string[];
  recipient?: Address;
  tokenAddress?: Address | NativeAssetAddress;
  /** Legacy gas price (wei) */
  gasPrice: bigint;
  gasLimit: bigint;
  /** Pause between transfers and between accounts (ms) */
  delayMs: number;
  scanLookbackBlocks: bigint;
  scanWindowSize: bigint;
  scanWindowDelayMs: number;
  confirmationTimeoutMs: number;
  receiptPollIntervalMs: number;
  keysFile: string;
  logLevel: LogLevelName;
}

/**
 * Values that take precedence over the environment, typically CLI flags
 */
export interface ConfigOverrides {
  rpcUrl?: string;
  recipient?: string;
  tokenAddress?: string;
  keysFile?: string;
  scanLookbackBlocks?: string;
  logLevel?: LogLevelName;
}

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CHAIN_ID = 8453;

const KNOWN_CHAINS: ChainConfig[] = [
  {
    id: 8453,
    name: 'Base',
    rpcUrls: ['https://mainnet.base.org', 'https://base-rpc.publicnode.com', 'https://base.llamarpc.com'],
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
  },
  {
    id: 1,
    name: 'Ethereum',
    rpcUrls: ['https://ethereum-rpc.publicnode.com'],
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
  },
  {
    id: 10,
    name: 'Optimism',
    rpcUrls: ['https://optimism-rpc.publicnode.com'],
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
  },
  {
    id: 137,
    name: 'Polygon',
    rpcUrls: ['https://polygon-bor-rpc.publicnode.com'],
    nativeCurrency: { name: 'POL', symbol: 'POL', decimals: 18 },
  },
  {
    id: 42161,
    name: 'Arbitrum One',
    rpcUrls: ['https://arbitrum-one-rpc.publicnode.com'],
    nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
  },
  {
    id: 56,
    name: 'BNB Smart Chain',
    rpcUrls: ['https://bsc-dataseed.binance.org'],
    nativeCurrency: { name: 'BNB', symbol: 'BNB', decimals: 18 },
  },
];

const DEFAULTS = {
  gasPriceGwei: '0.1',
  gasLimit: 100000,
  delayMs: 2000,
  scanLookbackBlocks: 50000,
  scanWindowSize: 5000,
  scanWindowDelaySeconds: '1',
  confirmationTimeoutSeconds: 120,
  receiptPollIntervalMs: 2000,
  keysFile: 'keys.txt',
  logLevel: 'info',
} as const;

/**
 * Collector configuration read from environment variables, with CLI
 * overrides on top. Every value is validated on load.
 */
export class ConfigurationService {
  private config: CollectorConfig;

  private constructor(config: CollectorConfig) {
    this.config = config;
  }

  /**
   * @throws ValidationError on a malformed value
   */
  static fromEnvironment(env: Environment, overrides: ConfigOverrides = {}): ConfigurationService {
    const explicitChainId = present(env.CHAIN_ID);
    const expectedChainId =
      explicitChainId === undefined ? undefined : Validators.parseInteger('CHAIN_ID', explicitChainId, 1);
    const chain = ConfigurationService.getChainConfig(expectedChainId ?? DEFAULT_CHAIN_ID);

    const rpcUrl = present(overrides.rpcUrl) ?? present(env.RPC_URL) ?? chain.rpcUrls.at(0);
    if (rpcUrl === undefined) {
      throw ValidationError.invalidParameter('RPC_URL', `an RPC URL for chain ${chain.id}`, '');
    }
    const alternatives = present(env.ALTERNATIVE_RPC_URLS);
    const alternativeRpcUrls =
      alternatives === undefined
        ? chain.rpcUrls.filter((url) => url !== rpcUrl)
        : splitList(alternatives);
    for (const url of [rpcUrl, ...alternativeRpcUrls]) {
      Validators.validateRpcUrl(url);
    }

    const gasLimit = Validators.parseInteger('GAS_LIMIT', present(env.GAS_LIMIT) ?? String(DEFAULTS.gasLimit), 21000);
    const lookback = Validators.parseInteger(
      'SCAN_LOOKBACK_BLOCKS',
      present(overrides.scanLookbackBlocks) ?? present(env.SCAN_LOOKBACK_BLOCKS) ?? String(DEFAULTS.scanLookbackBlocks)
    );
    const windowSize = Validators.parseInteger(
      'SCAN_WINDOW_SIZE',
      present(env.SCAN_WINDOW_SIZE) ?? String(DEFAULTS.scanWindowSize),
      1
    );
    const windowDelay = Validators.parseDecimal(
      'SCAN_WINDOW_DELAY',
      present(env.SCAN_WINDOW_DELAY) ?? DEFAULTS.scanWindowDelaySeconds
    );
    const confirmationTimeout = Validators.parseInteger(
      'CONFIRMATION_TIMEOUT',
      present(env.CONFIRMATION_TIMEOUT) ?? String(DEFAULTS.confirmationTimeoutSeconds),
      1
    );

    return new ConfigurationService({
      chain,
      expectedChainId,
      rpcUrl,
      alternativeRpcUrls,
      recipient: parseRecipient(present(overrides.recipient) ?? env.RECIPIENT_ADDRESS),
      tokenAddress: parseTokenAddress(present(overrides.tokenAddress) ?? env.TOKEN_ADDRESS),
      gasPrice: parseGwei(Validators.parseDecimal('GAS_PRICE', present(env.GAS_PRICE) ?? DEFAULTS.gasPriceGwei)),
      gasLimit: BigInt(gasLimit),
      delayMs: Validators.parseInteger('DELAY', present(env.DELAY) ?? String(DEFAULTS.delayMs)),
      scanLookbackBlocks: BigInt(lookback),
      scanWindowSize: BigInt(windowSize),
      scanWindowDelayMs: Math.round(Number(windowDelay) * 1000),
      confirmationTimeoutMs: confirmationTimeout * 1000,
      receiptPollIntervalMs: DEFAULTS.receiptPollIntervalMs,
      keysFile: present(overrides.keysFile) ?? present(env.KEYS_FILE) ?? DEFAULTS.keysFile,
      logLevel: overrides.logLevel ?? parseLogLevel(env.LOG_LEVEL),
    });
  }

  /**
   * Known chain by id; unknown ids get no default endpoints
   */
  static getChainConfig(chainId: number): ChainConfig {
    const known = KNOWN_CHAINS.find((chain) => chain.id === chainId);
    return (
      known ?? {
        id: chainId,
        name: `Chain ${chainId}`,
        rpcUrls: [],
        nativeCurrency: { name: 'Ether', symbol: 'ETH', decimals: 18 },
      }
    );
  }

  getConfig(): CollectorConfig {
    return { ...this.config, alternativeRpcUrls: [...this.config.alternativeRpcUrls] };
  }

  /**
   * Primary endpoint first, then fallbacks
   */
  getRpcUrls(): string[] {
    return [this.config.rpcUrl, ...this.config.alternativeRpcUrls];
  }

  toCollectionSettings(accounts: LocalAccount[]): CollectionSettings {
    const config = this.config;
    return {
      rpcUrls: this.getRpcUrls(),
      accounts,
      destination: config.recipient,
      chainId: config.expectedChainId,
      preselectedAsset: config.tokenAddress,
      gasPrice: config.gasPrice,
      gasLimit: config.gasLimit,
      operationDelayMs: config.delayMs,
      confirmationTimeoutMs: config.confirmationTimeoutMs,
      pollIntervalMs: config.receiptPollIntervalMs,
      scan: {
        lookback: config.scanLookbackBlocks,
        windowSize: config.scanWindowSize,
        windowDelayMs: config.scanWindowDelayMs,
        maxAttempts: 3,
        backoffMs: 2000,
      },
      native: {
        symbol: config.chain.nativeCurrency.symbol,
        name: config.chain.nativeCurrency.name,
      },
    };
  }
}

/**
 * Blank values count as unset
 */
function present(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

// '0x...' is the placeholder shipped in example env files
function isPlaceholder(value: string): boolean {
  return value === '0x...';
}

function parseRecipient(raw: string | undefined): Address | undefined {
  const value = present(raw);
  if (value === undefined || isPlaceholder(value)) return undefined;
  return Validators.toChecksumAddress(value, 'RECIPIENT_ADDRESS');
}

function parseTokenAddress(raw: string | undefined): Address | NativeAssetAddress | undefined {
  const value = present(raw);
  if (value === undefined || isPlaceholder(value)) return undefined;
  if (value.toUpperCase() === NATIVE_ASSET) return NATIVE_ASSET;
  return Validators.toChecksumAddress(value, 'TOKEN_ADDRESS');
}

function parseLogLevel(raw: string | undefined): LogLevelName {
  const value = present(raw)?.toLowerCase() ?? DEFAULTS.logLevel;
  switch (value) {
    case 'debug':
    case 'info':
    case 'warn':
    case 'error':
      return value;
    default:
      throw ValidationError.invalidParameter('LOG_LEVEL', 'one of debug, info, warn, error', raw);
  }
}
