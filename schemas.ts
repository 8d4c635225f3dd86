/* schemas.ts */

import { z } from "zod";

// ============================================================================
// BASIC ENUMS
// ============================================================================

export const TransferStatusSchema = z.enum([
  "queued",
  "active",
  "paused",
  "completed",
  "failed",
  "cancelled",
]);
export const TransferPrioritySchema = z.enum(["high", "normal", "low"]);
export const NetworkRequirementSchema = z.enum(["any", "unmetered", "local"]);
export const NetworkClassSchema = z.enum(["local", "unmetered", "metered", "offline"]);
export const TransferErrorCategorySchema = z.enum([
  "network",
  "httpError",
  "localIO",
  "rangeNotSatisfiable",
  "cancelled",
  "exhaustedRetries",
  "unknown",
]);
export const CancelPolicySchema = z.enum(["delete", "retain"]);
export const PausedBySchema = z.enum(["user", "network"]);

// ============================================================================
// FORMAT FUNCTIONS
// ============================================================================

export const TransferUrl = z.url({ protocol: /^https?$/ });
export const PositiveInt = z.int().min(1);
export const NonNegativeInt = z.int().min(0);
export const ByteCount = z.int().min(0);
export const Milliseconds = z.int().min(0);
export const EpochMillis = z.int().min(0);

// ============================================================================
// COMPLEX VALIDATORS
// ============================================================================

export const DirectoryPath = z
  .string()
  .refine((val) => val.startsWith("./") || val.startsWith("/") || val.startsWith("../"), {
    message: "Directory path must be relative (./) or absolute (/)",
  });

// Task ids double as record file names
export const TaskId = z
  .string()
  .min(1)
  .max(128)
  .regex(/^[A-Za-z0-9._-]+$/, { message: "Task id may only contain letters, digits, '.', '_' and '-'" })
  .refine((val) => val !== "." && val !== "..", { message: "Task id cannot be a relative path" });

export const FilePath = z.string().min(1);

// ============================================================================
// TASK RECORD SCHEMAS
// ============================================================================

const FailureDetailSchema = z.object({
  category: TransferErrorCategorySchema,
  message: z.string(),
  statusCode: z.int().min(100).max(599).optional(),
});

export const TransferFailureSchema = FailureDetailSchema.extend({
  cause: FailureDetailSchema.optional(),
}).describe("Last error recorded for a task");

export const TransferTaskSchema = z
  .strictObject({
    id: TaskId,
    url: TransferUrl,
    destinationPath: FilePath,
    totalSize: ByteCount.nullable(),
    bytesTransferred: ByteCount,
    status: TransferStatusSchema,
    priority: TransferPrioritySchema,
    notBefore: EpochMillis.nullable(),
    networkRequirement: NetworkRequirementSchema,
    retryCount: NonNegativeInt,
    lastRetryAt: EpochMillis.nullable(),
    maxRetries: NonNegativeInt,
    createdAt: EpochMillis,
    updatedAt: EpochMillis,
    startedAt: EpochMillis.nullable(),
    completedAt: EpochMillis.nullable(),
    etag: z.string().nullable(),
    lastError: TransferFailureSchema.nullable(),
    pausedBy: PausedBySchema.nullable(),
    rangeRestarted: z.boolean(),
  })
  .refine((task) => task.totalSize === null || task.bytesTransferred <= task.totalSize, {
    message: "bytesTransferred cannot exceed totalSize",
    path: ["bytesTransferred"],
  })
  .describe("Persisted transfer task record");

export const EnqueueRequestSchema = z
  .strictObject({
    id: TaskId.optional(),
    url: TransferUrl,
    destinationPath: FilePath,
    priority: TransferPrioritySchema.default("normal"),
    notBefore: EpochMillis.nullable().optional(),
    networkRequirement: NetworkRequirementSchema.default("any"),
    maxRetries: NonNegativeInt.optional(),
    totalSize: ByteCount.nullable().optional(),
  })
  .describe("Request to add a transfer to the queue");

// ============================================================================
// SCHEMA REGISTRY
// ============================================================================

export const SchemaRegistry = {
  TransferTask: TransferTaskSchema,
  TransferFailure: TransferFailureSchema,
  EnqueueRequest: EnqueueRequestSchema,
  TaskId,
} as const;
