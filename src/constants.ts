/**
 * マージン最適化エンジン - 定数定義
 */

// =============================================================================
// オプティマイザーのデフォルト値
// =============================================================================
export const OPTIMIZER_DEFAULTS = {
  /** 初期マージン（%） */
  BASELINE_MARGIN: 35.0,
  /** 探索ステップ幅（%ポイント） */
  STEP: 1.0,
  /** ステップ幅の下限 */
  MIN_STEP: 0.25,
  /** ガードレール: ベースライン比で許容する低下率（%） */
  GUARDRAIL_DROP_PCT: 10.0,
  /** 採用に必要な利益改善率（%） */
  MIN_PROFIT_IMPROVEMENT_PCT: 2.0,
  /** 判定に必要な最小インプレッション数（現状は判定に使わない） */
  MIN_IMPRESSIONS_PER_DECISION: 0,
  /** 判定に必要な最小利益（現状は判定に使わない） */
  MIN_PROFIT_PER_DECISION: 0.0,
} as const;

// =============================================================================
// 状態・履歴
// =============================================================================
export const STATE = {
  /** 永続化する履歴の最大件数 */
  HISTORY_LIMIT: 100,
  /** 状態スキーマのバージョン */
  SCHEMA_VERSION: 1,
  /** デフォルトのローカル状態ファイル */
  DEFAULT_STATE_PATH: "optimizer_state.json",
  /** CSV実行用のローカル状態ファイル */
  CSV_RUN_STATE_PATH: "optimizer_state_csv_run.json",
  /** CSV実行時のリモート状態キーに付ける接尾辞 */
  CSV_RUN_ARM_SUFFIX: "-csv",
} as const;

// =============================================================================
// 指標計算
// =============================================================================
export const METRICS = {
  /** 1,000インプレッションあたりに換算する係数 */
  PER_MILLE: 1000.0,
} as const;

// =============================================================================
// BigQuery設定
// =============================================================================
export const BIGQUERY = {
  DATASET_ID: "margin_optimizer",
  LOCATION: "US",
  TABLES: {
    OPTIMIZER_STATE: "optimizer_state",
    OPTIMIZER_RUNS: "optimizer_runs",
  },
} as const;

// =============================================================================
// 外部API
// =============================================================================
export const PLATFORM_API = {
  /** リクエストタイムアウト（ミリ秒） */
  TIMEOUT_MS: 30000,
} as const;

// =============================================================================
// サーバー設定
// =============================================================================
export const SERVER = {
  DEFAULT_PORT: 8080,
} as const;

// =============================================================================
// A/Bテスト分析のデフォルト値
// =============================================================================
export const ANALYSIS_DEFAULTS = {
  MIN_IMPRESSIONS_PER_ARM: 50000,
  MIN_PROFIT_PER_ARM: 50.0,
  MAX_IMPRESSIONS_DROP_PCT: 10.0,
  MAX_SRPM_DROP_PCT: 10.0,
  MIN_SRPM_PCT_OF_CONTROL: 90.0,
} as const;
