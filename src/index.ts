/* src/index.ts */

export { type Config, getConfig, initializeConfig } from "../config";
export * from "./core";
export { createTransferEngine, type EngineOverrides, getTransferEngine, type TransferEngine } from "./engine";
export * from "./scheduler";
export * from "./storage";
export * from "./throttle";
export * from "./transfer";
export { formatEta, formatFileSize, formatSpeed } from "./utils";
