/**
 * マージンオプティマイザー - エントリーポイント
 */

export * from "./types";
export * from "./guarded-optimizer";
export * from "./state-codec";
export { MarginOptimizer } from "./margin-optimizer";
export type { MarginOptimizerOptions } from "./margin-optimizer";
