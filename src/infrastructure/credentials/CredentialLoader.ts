import { readFile } from 'node:fs/promises';
import type { Hex } from 'viem';
import { privateKeyToAccount, type PrivateKeyAccount } from 'viem/accounts';
import { ValidationError } from '../../utils/errors.js';
import { Validators } from '../../utils/validators.js';

export interface CredentialIssue {
  /** 1-based line number in the source */
  line: number;
  message: string;
}

export interface ParsedCredentials {
  keys: Hex[];
  issues: CredentialIssue[];
}

function isSkippedLine(line: string): boolean {
  return line.length === 0 || line.startsWith('#') || line.startsWith('//');
}

/**
 * One private key per line. Blank lines and lines starting with `#` or `//`
 * are ignored; malformed keys are reported by line number and left out.
 */
export function parseCredentials(text: string): ParsedCredentials {
  const keys: Hex[] = [];
  const issues: CredentialIssue[] = [];

  text.split(/\r?\n/).forEach((raw, i) => {
    const line = raw.trim();
    if (isSkippedLine(line)) return;

    try {
      keys.push(Validators.normalizePrivateKey(line, i + 1));
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      issues.push({ line: i + 1, message: error.message });
    }
  });

  return { keys, issues };
}

export function toAccounts(keys: readonly Hex[]): PrivateKeyAccount[] {
  return keys.map((key) => privateKeyToAccount(key));
}

/**
 * Reads and parses a credentials file. A missing file yields no keys;
 * the orchestrator turns that into a precondition failure.
 */
export async function loadCredentials(path: string): Promise<ParsedCredentials & { found: boolean }> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return { keys: [], issues: [], found: false };
    }
    throw error;
  }
  return { ...parseCredentials(text), found: true };
}
