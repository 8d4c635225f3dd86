/* src/engine.ts */

/**
 * Wires the shared limiter, throttle, store, executor and scheduler from
 * configuration. Every transfer shares the same limiter and throttle.
 */

import { type Config, getConfig } from "../config";
import type { Clock } from "./core/clock";
import { HttpClient } from "./core/http-client";
import { createDownloadScheduler, type DownloadScheduler } from "./scheduler/download-scheduler";
import { type NetworkMonitor, StaticNetworkMonitor } from "./scheduler/network-monitor";
import { FileTaskStore, type TaskStore } from "./storage/task-store";
import { type BandwidthThrottle, createBandwidthThrottle } from "./throttle/bandwidth-throttle";
import { createRateLimiter, type RateLimiter } from "./throttle/rate-limiter";
import { createTransferExecutor, type ResumableTransferExecutor } from "./transfer/resumable-executor";

export interface TransferEngine {
  config: Config;
  scheduler: DownloadScheduler;
  executor: ResumableTransferExecutor;
  store: TaskStore;
  rateLimiter: RateLimiter;
  throttle: BandwidthThrottle;
  network: NetworkMonitor;
}

export interface EngineOverrides {
  store?: TaskStore;
  network?: NetworkMonitor;
  clock?: Clock;
  httpClient?: HttpClient;
}

export function createTransferEngine(config: Config, overrides: EngineOverrides = {}): TransferEngine {
  const silent = config.logging.silent;
  const { clock } = overrides;

  const store = overrides.store ?? new FileTaskStore(config.storage.stateDir, { clock, silent });
  const network = overrides.network ?? new StaticNetworkMonitor();
  const rateLimiter = createRateLimiter(config.rateLimiter, { clock, silent });
  const throttle = createBandwidthThrottle(config.bandwidth, { clock, silent });
  const httpClient =
    overrides.httpClient ??
    new HttpClient({ timeout: config.transfer.requestTimeoutMs, maxRedirects: config.transfer.maxRedirects, silent });

  const executor = createTransferExecutor(config.transfer, {
    store,
    httpClient,
    rateLimiter,
    throttle,
    clock,
    silent,
  });
  const scheduler = createDownloadScheduler(config, { store, executor, network, clock });

  return { config, scheduler, executor, store, rateLimiter, throttle, network };
}

// ============================================================================
// SINGLETON INSTANCE
// ============================================================================

let engineInstance: TransferEngine | null = null;

/**
 * Get the process-wide engine built from the environment configuration
 */
export function getTransferEngine(): TransferEngine {
  if (!engineInstance) {
    engineInstance = createTransferEngine(getConfig());
  }
  return engineInstance;
}
