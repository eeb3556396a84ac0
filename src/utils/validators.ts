import { getAddress, type Address, type Hex } from 'viem';
import { ValidationError } from './errors.js';

const ADDRESS_PATTERN = /^0x[a-fA-F0-9]{40}$/;
const PRIVATE_KEY_PATTERN = /^(0x)?[a-fA-F0-9]{64}$/;

/**
 * Input validation utilities
 */
export class Validators {
  /**
   * Validates Ethereum address format
   * @throws ValidationError if invalid
   */
  static validateAddress(address: string, field: string = 'address'): asserts address is Address {
    if (!address || !ADDRESS_PATTERN.test(address)) {
      throw ValidationError.invalidAddress(field, address);
    }
  }

  /**
   * Validates and returns the EIP-55 checksummed form
   */
  static toChecksumAddress(address: string, field: string = 'address'): Address {
    Validators.validateAddress(address, field);
    return getAddress(address);
  }

  /**
   * Normalizes a private key to 0x-prefixed lowercase hex
   * @param line - 1-based source line, used in the error
   * @throws ValidationError if the key is not 32 bytes of hex
   */
  static normalizePrivateKey(raw: string, line: number): Hex {
    const key = raw.trim();
    if (!PRIVATE_KEY_PATTERN.test(key)) {
      throw ValidationError.invalidPrivateKey(line);
    }
    const body = key.startsWith('0x') ? key.slice(2) : key;
    if (/^0+$/.test(body)) {
      throw ValidationError.invalidPrivateKey(line);
    }
    return `0x${body.toLowerCase()}`;
  }

  /**
   * Parses a non-negative integer setting
   * @throws ValidationError if not a base-10 integer >= min
   */
  static parseInteger(field: string, raw: string, min: number = 0): number {
    const trimmed = raw.trim();
    if (!/^\d+$/.test(trimmed)) {
      throw ValidationError.invalidParameter(field, `integer >= ${min}`, raw);
    }
    const value = Number.parseInt(trimmed, 10);
    if (!Number.isSafeInteger(value) || value < min) {
      throw ValidationError.invalidParameter(field, `integer >= ${min}`, raw);
    }
    return value;
  }

  /**
   * Parses a non-negative decimal setting such as a gwei amount or seconds
   */
  static parseDecimal(field: string, raw: string): string {
    const trimmed = raw.trim();
    if (!/^\d+(\.\d+)?$/.test(trimmed)) {
      throw ValidationError.invalidParameter(field, 'non-negative decimal number', raw);
    }
    return trimmed;
  }

  /**
   * Validates RPC URL format
   * @throws ValidationError if invalid
   */
  static validateRpcUrl(url: string): void {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw ValidationError.invalidParameter('rpcUrl', 'valid HTTP(S) URL', url);
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw ValidationError.invalidParameter('rpcUrl', 'valid HTTP(S) URL', url);
    }
  }
}
