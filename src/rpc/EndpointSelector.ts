import type { EvmRpc, RpcFactory } from '../types/EvmRpc.js';
import type { Reporter } from '../types/Reporter.js';
import { ErrorUtils, NoReachableEndpointError } from '../utils/errors.js';

export type EndpointLiveness = 'untested' | 'reachable' | 'unreachable';

/**
 * Per-endpoint probe result
 */
export interface EndpointStatus {
  url: string;
  liveness: EndpointLiveness;
  blockNumber?: bigint;
  chainId?: number;
  responseTime?: number;
  error?: string;
}

/**
 * The endpoint every later call goes through
 */
export interface SelectedEndpoint {
  url: string;
  rpc: EvmRpc;
  head: bigint;
  chainId: number;
}

/**
 * Walks RPC endpoints in priority order and settles on the first one that
 * answers. There are no retries within an endpoint: a failed probe
 * disqualifies it for the rest of the run.
 */
export class EndpointSelector {
  private statuses: EndpointStatus[];
  private factory: RpcFactory;
  private reporter: Reporter;
  private now: () => number;

  constructor(urls: string[], factory: RpcFactory, reporter: Reporter, now: () => number = Date.now) {
    const unique = [...new Set(urls.map((url) => url.trim()).filter((url) => url.length > 0))];
    this.statuses = unique.map((url): EndpointStatus => ({ url, liveness: 'untested' }));
    this.factory = factory;
    this.reporter = reporter;
    this.now = now;
  }

  getEndpointUrls(): string[] {
    return this.statuses.map((s) => s.url);
  }

  getStatuses(): EndpointStatus[] {
    return this.statuses.map((s) => ({ ...s }));
  }

  /**
   * Probes endpoints in order and returns the first reachable one
   * @throws NoReachableEndpointError if every endpoint fails
   */
  async select(): Promise<SelectedEndpoint> {
    const attempts: Array<{ url: string; error: string }> = [];

    for (const status of this.statuses) {
      this.reporter.info(`Connecting to ${status.url}`);
      const started = this.now();

      try {
        const rpc = this.factory(status.url);
        const head = await rpc.getBlockNumber();
        const chainId = await rpc.getChainId();

        status.liveness = 'reachable';
        status.blockNumber = head;
        status.chainId = chainId;
        status.responseTime = this.now() - started;

        this.reporter.info(`Connected to chain ${chainId}, latest block ${head}`, {
          endpoint: status.url,
        });
        return { url: status.url, rpc, head, chainId };
      } catch (error) {
        const message = ErrorUtils.describe(error);
        status.liveness = 'unreachable';
        status.error = message;
        status.responseTime = this.now() - started;
        attempts.push({ url: status.url, error: message });

        this.reporter.warn(`Endpoint ${status.url} unreachable: ${message}`);
      }
    }

    throw new NoReachableEndpointError(attempts);
  }
}
