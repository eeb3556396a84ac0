#!/usr/bin/env node
/**
 * sweep-collector
 *
 * Collects one asset from many accounts into a single destination.
 *
 * USAGE:
 *   sweep-collector [--to <address>] [--token <address|NATIVE>] [options]
 *
 * Settings come from the environment (a .env file is loaded first); flags
 * override them. Private keys are read from KEYS_FILE, one per line.
 *
 * EXAMPLES:
 *   # Scan the last 50000 blocks and choose what to collect
 *   sweep-collector --to 0x1234567890123456789012345678901234567890
 *
 *   # Collect the native balance only, no scan, no prompt
 *   sweep-collector --token NATIVE
 */

import 'dotenv/config';
import { defineCommand, runMain } from 'citty';
import { createConsola } from 'consola';
import { CollectionOrchestrator } from '../application/CollectionOrchestrator.js';
import { PreselectedAssetSelector } from '../application/PreselectedAssetSelector.js';
import {
  ConfigurationService,
  LOG_LEVELS,
  type ConfigOverrides,
} from '../infrastructure/config/ConfigurationService.js';
import { loadCredentials, toAccounts } from '../infrastructure/credentials/CredentialLoader.js';
import { createViemRpc } from '../rpc/ViemRpcClient.js';
import type { AssetSelector } from '../types/AssetSelector.js';
import { formatInventory, formatSummary } from './format.js';
import { PromptAssetSelector } from './PromptAssetSelector.js';

const main = defineCommand({
  meta: {
    name: 'sweep-collector',
    description: 'Collects one asset from many accounts into a single destination',
  },
  args: {
    rpc: {
      type: 'string',
      description: 'Primary RPC URL (overrides RPC_URL)',
      required: false,
    },
    to: {
      type: 'string',
      description: 'Destination address (overrides RECIPIENT_ADDRESS)',
      required: false,
    },
    token: {
      type: 'string',
      description: 'Collect only this contract, or NATIVE; skips the log scan (overrides TOKEN_ADDRESS)',
      required: false,
    },
    keys: {
      type: 'string',
      description: 'File with one private key per line (overrides KEYS_FILE)',
      required: false,
    },
    lookback: {
      type: 'string',
      description: 'Blocks to scan back from the head (overrides SCAN_LOOKBACK_BLOCKS)',
      required: false,
    },
    yes: {
      type: 'boolean',
      description: 'Collect without asking when only one asset is found',
      default: false,
    },
    verbose: {
      type: 'boolean',
      description: 'Debug logging',
      default: false,
    },
  },
  async run({ args }) {
    const overrides: ConfigOverrides = {
      rpcUrl: args.rpc,
      recipient: args.to,
      tokenAddress: args.token,
      keysFile: args.keys,
      scanLookbackBlocks: args.lookback,
      logLevel: args.verbose ? 'debug' : undefined,
    };
    const configuration = ConfigurationService.fromEnvironment(process.env, overrides);
    const config = configuration.getConfig();
    const reporter = createConsola({ level: LOG_LEVELS[config.logLevel] });

    const credentials = await loadCredentials(config.keysFile);
    if (!credentials.found) {
      reporter.error(`Key file ${config.keysFile} not found`);
    }
    for (const issue of credentials.issues) {
      reporter.warn(`${config.keysFile}: ${issue.message}`);
    }

    const selector: AssetSelector =
      config.tokenAddress !== undefined
        ? new PreselectedAssetSelector(config.tokenAddress)
        : new PromptAssetSelector({ autoSelectSingle: args.yes });

    const inventoryPrinter: AssetSelector = {
      async select(entries) {
        reporter.box(['Inventory', ...formatInventory(entries)].join('\n'));
        return selector.select(entries);
      },
    };

    const controller = new AbortController();
    const onInterrupt = () => {
      if (controller.signal.aborted) {
        process.exit(130);
      }
      reporter.warn('Interrupt received; finishing the current step (press Ctrl+C again to quit now)');
      controller.abort();
    };
    process.on('SIGINT', onInterrupt);

    try {
      const orchestrator = new CollectionOrchestrator(
        configuration.toCollectionSettings(toAccounts(credentials.keys)),
        {
          rpcFactory: (url) => createViemRpc(url),
          selector: inventoryPrinter,
          reporter,
        }
      );
      const report = await orchestrator.run(controller.signal);

      for (const line of formatSummary(report)) {
        if (report.status === 'halted') reporter.error(line);
        else reporter.info(line);
      }
      process.exitCode = report.exitCode;
    } finally {
      process.off('SIGINT', onInterrupt);
    }
  },
});

void runMain(main);
