/**
 * マージン最適化エンジン - 公開API
 */

export * from "./metrics";
export * from "./optimizer";
export * from "./store";
export * from "./sources";
export * from "./sinks";
export * from "./runner";
export * from "./analysis";
export type { AppConfig } from "./config";
export { loadConfig, validateConfig } from "./config";
export * from "./errors";
export { logger, createChildLogger, StructuredLogger } from "./logger";
