/**
 * メトリクス計算モジュール
 */

export * from "./derivedMetrics";
