/**
 * Test utilities for collector testing
 */

import type { Address, Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import type { Reporter } from '../types/Reporter.js';
import type { Sleep } from '../utils/delay.js';

export * from './FakeChain.js';

export type ReportLevel = keyof Reporter;

export interface ReportEntry {
  level: ReportLevel;
  message: string;
  args: unknown[];
}

/**
 * Reporter that keeps every entry in memory
 */
export class RecordingReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  debug = (message: string, ...args: unknown[]): void => this.push('debug', message, args);
  info = (message: string, ...args: unknown[]): void => this.push('info', message, args);
  warn = (message: string, ...args: unknown[]): void => this.push('warn', message, args);
  error = (message: string, ...args: unknown[]): void => this.push('error', message, args);
  success = (message: string, ...args: unknown[]): void => this.push('success', message, args);

  messages(level?: ReportLevel): string[] {
    return this.entries.filter((entry) => level === undefined || entry.level === level).map((entry) => entry.message);
  }

  private push(level: ReportLevel, message: string, args: unknown[]): void {
    this.entries.push({ level, message, args });
  }
}

export interface ManualClock {
  now: () => number;
  /** Advances the clock instead of waiting */
  sleep: Sleep;
  /** Every requested pause, in order */
  sleeps: number[];
}

export function createManualClock(start: number = 0): ManualClock {
  let time = start;
  const sleeps: number[] = [];
  return {
    now: () => time,
    sleep: async (ms) => {
      sleeps.push(ms);
      time += ms;
    },
    sleeps,
  };
}

/**
 * Creates a mock address
 */
export function createMockAddress(seed: number = 0): Address {
  return `0x${seed.toString(16).padStart(40, '0')}`;
}

/**
 * Placeholder private key; seed must be > 0
 */
export function testKey(seed: number): Hex {
  return `0x${seed.toString(16).padStart(64, '0')}`;
}

export function testAccount(seed: number): PrivateKeyAccount {
  return privateKeyToAccount(testKey(seed));
}
