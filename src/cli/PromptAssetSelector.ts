import { consola } from 'consola';
import type { AssetSelector, InventoryEntry } from '../types/AssetSelector.js';
import { formatInventoryEntry } from './format.js';

export interface SelectOption {
  label: string;
  value: string;
  hint?: string;
}

/**
 * Asks the operator to pick one option; resolves to the chosen value
 */
export type PromptFn = (message: string, options: SelectOption[]) => Promise<unknown>;

export const CANCEL_VALUE = '0';

const consolaPrompt: PromptFn = (message, options) =>
  consola.prompt(message, { type: 'select', options, cancel: 'null' });

/**
 * Maps a prompt answer to a 1-based inventory index, or null to cancel
 */
export function parseSelection(answer: unknown, count: number): number | null {
  if (typeof answer !== 'string') return null;
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const index = Number.parseInt(trimmed, 10);
  return index >= 1 && index <= count ? index : null;
}

export function toSelectOptions(entries: readonly InventoryEntry[]): SelectOption[] {
  const options: SelectOption[] = entries.map((entry) => ({
    label: formatInventoryEntry(entry),
    value: String(entry.index),
    hint: entry.address,
  }));
  options.push({ label: 'Cancel', value: CANCEL_VALUE });
  return options;
}

export interface PromptAssetSelectorOptions {
  /** Pick the only asset without asking */
  autoSelectSingle?: boolean;
  prompt?: PromptFn;
}

/**
 * Interactive selection on the terminal
 */
export class PromptAssetSelector implements AssetSelector {
  private prompt: PromptFn;
  private autoSelectSingle: boolean;

  constructor(options: PromptAssetSelectorOptions = {}) {
    this.prompt = options.prompt ?? consolaPrompt;
    this.autoSelectSingle = options.autoSelectSingle ?? false;
  }

  async select(entries: readonly InventoryEntry[]): Promise<number | null> {
    if (entries.length === 0) return null;
    if (this.autoSelectSingle && entries.length === 1) return entries[0].index;

    const answer = await this.prompt('Which asset should be collected?', toSelectOptions(entries));
    return parseSelection(answer, entries.length);
  }
}
