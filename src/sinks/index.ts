/**
 * マージン適用・実行ログ - エントリーポイント
 */

export * from "./margin-api-client";
export * from "./run-log";
