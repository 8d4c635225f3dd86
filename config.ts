/* config.ts */

// ============================================================================
// IMPORTS & ENVIRONMENT SETUP
// ============================================================================

import * as path from "node:path";
import * as dotenv from "dotenv";
import { z } from "zod";
import {
  ByteCount,
  CancelPolicySchema,
  DirectoryPath,
  Milliseconds,
  NonNegativeInt,
  PositiveInt,
} from "./schemas";

dotenv.config({ quiet: true });

type EnvSource = Record<string, string | undefined>;

// ============================================================================
// UTILITY FUNCTIONS
// ============================================================================

function envString(env: EnvSource, name: string): string | undefined {
  const value = env[name];
  return value ? value : undefined;
}

function envNumber(env: EnvSource, name: string): number | undefined {
  const value = env[name];
  if (!value) return undefined;
  const num = Number(value);
  return Number.isNaN(num) ? undefined : num;
}

function envBoolean(env: EnvSource, name: string): boolean | undefined {
  const value = env[name];
  if (!value) return undefined;
  return value.toLowerCase() === "true" || value === "1";
}

// ============================================================================
// ZOD SCHEMA DEFINITIONS
// ============================================================================

const SchedulerConfigSchema = z.strictObject({
  maxConcurrent: PositiveInt,
  tickIntervalMs: PositiveInt,
  maxRetries: NonNegativeInt,
  backoffBaseMs: Milliseconds,
  backoffMaxMs: Milliseconds,
});

const RateLimiterConfigSchema = z.strictObject({
  maxConcurrent: PositiveInt,
  minDelayMs: Milliseconds,
});

const BandwidthConfigSchema = z.strictObject({
  // 0 = unlimited
  bytesPerSecond: ByteCount,
  // 0 = twice the rate
  burstSize: ByteCount,
});

const TransferConfigSchema = z.strictObject({
  chunkSize: PositiveInt,
  requestTimeoutMs: PositiveInt,
  maxRedirects: NonNegativeInt,
  partialSuffix: z.string().min(1),
  cancelPolicy: CancelPolicySchema,
});

const StorageConfigSchema = z.strictObject({
  stateDir: DirectoryPath,
  downloadsDir: DirectoryPath,
});

const LoggingConfigSchema = z.strictObject({
  silent: z.boolean(),
});

// Main Configuration Schema
const ConfigSchema = z
  .strictObject({
    scheduler: SchedulerConfigSchema,
    rateLimiter: RateLimiterConfigSchema,
    bandwidth: BandwidthConfigSchema,
    transfer: TransferConfigSchema,
    storage: StorageConfigSchema,
    logging: LoggingConfigSchema,
  })
  .superRefine((data, ctx) => {
    if (data.scheduler.backoffMaxMs < data.scheduler.backoffBaseMs) {
      ctx.addIssue({
        code: "custom",
        path: ["scheduler", "backoffMaxMs"],
        message: "Backoff cap must not be smaller than the backoff base",
      });
    }

    if (
      data.bandwidth.bytesPerSecond > 0 &&
      data.bandwidth.burstSize > 0 &&
      data.bandwidth.burstSize < data.bandwidth.bytesPerSecond
    ) {
      ctx.addIssue({
        code: "custom",
        path: ["bandwidth", "burstSize"],
        message: "Burst size must be at least one second of bandwidth",
      });
    }

    if (path.resolve(data.storage.stateDir) === path.resolve(data.storage.downloadsDir)) {
      ctx.addIssue({
        code: "custom",
        message: "State and downloads directories must be different",
      });
    }
  });

// ============================================================================
// 4-PILLAR CONFIGURATION PATTERN
// ============================================================================

// Pillar 1: Default Values
const defaultConfig: Config = {
  scheduler: {
    maxConcurrent: 3,
    tickIntervalMs: 5000,
    maxRetries: 5,
    backoffBaseMs: 2000,
    backoffMaxMs: 64000,
  },
  rateLimiter: {
    maxConcurrent: 3,
    minDelayMs: 150,
  },
  bandwidth: {
    bytesPerSecond: 0,
    burstSize: 0,
  },
  transfer: {
    chunkSize: 1024 * 1024,
    requestTimeoutMs: 30000,
    maxRedirects: 5,
    partialSuffix: ".part",
    cancelPolicy: "delete",
  },
  storage: {
    stateDir: "./.transfer-state",
    downloadsDir: "./downloads",
  },
  logging: {
    silent: false,
  },
};

// Pillar 2: Environment Variable Mapping
const envVarMapping = {
  scheduler: {
    maxConcurrent: "MAX_CONCURRENT_DOWNLOADS",
    tickIntervalMs: "SCHEDULER_TICK_MS",
    maxRetries: "MAX_RETRIES",
    backoffBaseMs: "RETRY_BACKOFF_BASE_MS",
    backoffMaxMs: "RETRY_BACKOFF_MAX_MS",
  },
  rateLimiter: {
    maxConcurrent: "RATE_LIMIT_MAX_CONCURRENT",
    minDelayMs: "RATE_LIMIT_MIN_DELAY_MS",
  },
  bandwidth: {
    bytesPerSecond: "BANDWIDTH_BYTES_PER_SECOND",
    burstSize: "BANDWIDTH_BURST_SIZE",
  },
  transfer: {
    chunkSize: "TRANSFER_CHUNK_SIZE",
    requestTimeoutMs: "TRANSFER_TIMEOUT_MS",
    maxRedirects: "TRANSFER_MAX_REDIRECTS",
    partialSuffix: "TRANSFER_PARTIAL_SUFFIX",
    cancelPolicy: "TRANSFER_CANCEL_POLICY",
  },
  storage: {
    stateDir: "STATE_DIR",
    downloadsDir: "DOWNLOADS_DIR",
  },
  logging: {
    silent: "LOG_SILENT",
  },
} as const;

// Pillar 3: Environment Loading
function loadConfigFromEnv(env: EnvSource) {
  const m = envVarMapping;
  const d = defaultConfig;

  return {
    scheduler: {
      maxConcurrent: envNumber(env, m.scheduler.maxConcurrent) ?? d.scheduler.maxConcurrent,
      tickIntervalMs: envNumber(env, m.scheduler.tickIntervalMs) ?? d.scheduler.tickIntervalMs,
      maxRetries: envNumber(env, m.scheduler.maxRetries) ?? d.scheduler.maxRetries,
      backoffBaseMs: envNumber(env, m.scheduler.backoffBaseMs) ?? d.scheduler.backoffBaseMs,
      backoffMaxMs: envNumber(env, m.scheduler.backoffMaxMs) ?? d.scheduler.backoffMaxMs,
    },
    rateLimiter: {
      maxConcurrent: envNumber(env, m.rateLimiter.maxConcurrent) ?? d.rateLimiter.maxConcurrent,
      minDelayMs: envNumber(env, m.rateLimiter.minDelayMs) ?? d.rateLimiter.minDelayMs,
    },
    bandwidth: {
      bytesPerSecond: envNumber(env, m.bandwidth.bytesPerSecond) ?? d.bandwidth.bytesPerSecond,
      burstSize: envNumber(env, m.bandwidth.burstSize) ?? d.bandwidth.burstSize,
    },
    transfer: {
      chunkSize: envNumber(env, m.transfer.chunkSize) ?? d.transfer.chunkSize,
      requestTimeoutMs: envNumber(env, m.transfer.requestTimeoutMs) ?? d.transfer.requestTimeoutMs,
      maxRedirects: envNumber(env, m.transfer.maxRedirects) ?? d.transfer.maxRedirects,
      partialSuffix: envString(env, m.transfer.partialSuffix) ?? d.transfer.partialSuffix,
      cancelPolicy: envString(env, m.transfer.cancelPolicy)?.toLowerCase() ?? d.transfer.cancelPolicy,
    },
    storage: {
      stateDir: envString(env, m.storage.stateDir) ?? d.storage.stateDir,
      downloadsDir: envString(env, m.storage.downloadsDir) ?? d.storage.downloadsDir,
    },
    logging: {
      silent: envBoolean(env, m.logging.silent) ?? d.logging.silent,
    },
  };
}

// Pillar 4: Configuration Initialization
export function initializeConfig(env: EnvSource = process.env): Config {
  const mergedConfig = loadConfigFromEnv(env);
  const result = ConfigSchema.safeParse(mergedConfig);

  if (!result.success) {
    console.error("[CONFIG] Configuration validation failed:");
    console.error(z.prettifyError(result.error));

    const issues = result.error.issues
      .map((issue) => {
        const issuePath = issue.path.length > 0 ? issue.path.join(".") : "root";
        return `  - ${issuePath}: ${issue.message}`;
      })
      .join("\n");

    throw new Error(
      `Invalid configuration:\n${issues}\n\nPlease check your environment variables and default configuration.`
    );
  }

  if (!result.data.logging.silent) {
    console.log("[CONFIG] Configuration loaded successfully");
    console.log(`  Max concurrent downloads: ${result.data.scheduler.maxConcurrent}`);
    console.log(`  Downloads dir: ${result.data.storage.downloadsDir}`);
    console.log(`  State dir: ${result.data.storage.stateDir}`);
  }

  return result.data;
}

// ============================================================================
// EXPORTS
// ============================================================================

let configInstance: Config | null = null;

/**
 * Get the process-wide configuration, loading it from the environment on first use
 */
export function getConfig(): Config {
  if (!configInstance) {
    configInstance = initializeConfig();
  }
  return configInstance;
}

// Type Definitions
export type Config = z.infer<typeof ConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type RateLimiterConfig = z.infer<typeof RateLimiterConfigSchema>;
export type BandwidthConfig = z.infer<typeof BandwidthConfigSchema>;
export type TransferConfig = z.infer<typeof TransferConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

// Utility Functions
export const validateConfiguration = (data: unknown): Config => {
  const result = ConfigSchema.safeParse(data);
  if (!result.success) {
    throw new Error(JSON.stringify(result.error.issues, null, 2));
  }
  return result.data;
};

export { defaultConfig };
