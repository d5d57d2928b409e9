/**
 * A/Bテスト分析 - エントリーポイント
 */

export * from "./margin-test-analyzer";
export * from "./margin-bracket";
