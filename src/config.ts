/**
 * マージン最適化エンジン - 環境変数設定
 *
 * 環境変数はエントリポイント（CLI / サーバー）でのみ読み込み、
 * コアには明示的な設定オブジェクトとして渡す。
 */

import { z } from "zod";
import { BIGQUERY, OPTIMIZER_DEFAULTS, SERVER, STATE } from "./constants";
import { ConfigurationError } from "./errors";
import { OptimizerSettings } from "./optimizer/types";

// =============================================================================
// 型定義
// =============================================================================

/**
 * アプリケーション設定
 */
export interface AppConfig {
  // サーバー設定
  port: number;
  nodeEnv: string;

  /** 最適化対象アームの識別子（リモート状態のキー） */
  armId: string;

  // 状態ストア設定
  /** ローカル状態ファイルのパス */
  stateStorePath: string;
  /**
   * リモート（BigQuery）状態ストアを使うか
   * - 環境変数 REMOTE_STORE_ENABLED="true" で有効化
   * - 有効時はローカルに状態が無い場合のみリモートから読み込む
   */
  remoteStoreEnabled: boolean;

  // オプティマイザー設定
  optimizer: OptimizerSettings;

  // BigQuery設定
  bigqueryProjectId?: string;
  bigqueryDatasetId: string;
  bigqueryLocation: string;
  /** 実行ログを BigQuery に保存するか */
  runLogEnabled: boolean;

  // 外部API設定（未設定ならモック動作）
  metricsApiUrl?: string;
  updateMarginApiUrl?: string;
  /** 外部APIへ送る Bearer トークン */
  apiKey?: string;
  /** /cron エンドポイントの受け付け用キー（未設定なら認証なし） */
  cronApiKey?: string;
}

// =============================================================================
// スキーマ
// =============================================================================

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== "" ? value.trim() : undefined));

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => value === "true");

function numberWithDefault(defaultValue: number) {
  return z
    .string()
    .optional()
    .transform((value) => (value === undefined || value.trim() === "" ? defaultValue : Number(value)))
    .pipe(z.number().finite());
}

const EnvSchema = z.object({
  PORT: numberWithDefault(SERVER.DEFAULT_PORT).pipe(z.number().int().min(1).max(65535)),
  NODE_ENV: z.string().optional().default("development"),
  ARM_ID: z.string().optional().default("default"),

  STATE_STORE_PATH: z.string().optional().default(STATE.DEFAULT_STATE_PATH),
  REMOTE_STORE_ENABLED: booleanFlag,

  BASELINE_MARGIN: numberWithDefault(OPTIMIZER_DEFAULTS.BASELINE_MARGIN),
  STEP: numberWithDefault(OPTIMIZER_DEFAULTS.STEP).pipe(z.number().positive()),
  MIN_STEP: numberWithDefault(OPTIMIZER_DEFAULTS.MIN_STEP).pipe(z.number().positive()),
  GUARDRAIL_DROP_PCT: numberWithDefault(OPTIMIZER_DEFAULTS.GUARDRAIL_DROP_PCT).pipe(
    z.number().min(0).max(100)
  ),
  MIN_PROFIT_IMPROVEMENT_PCT: numberWithDefault(OPTIMIZER_DEFAULTS.MIN_PROFIT_IMPROVEMENT_PCT),
  MIN_IMPRESSIONS_PER_DECISION: numberWithDefault(
    OPTIMIZER_DEFAULTS.MIN_IMPRESSIONS_PER_DECISION
  ).pipe(z.number().min(0)),
  MIN_PROFIT_PER_DECISION: numberWithDefault(OPTIMIZER_DEFAULTS.MIN_PROFIT_PER_DECISION),

  BIGQUERY_PROJECT_ID: optionalString,
  BIGQUERY_DATASET_ID: z.string().optional().default(BIGQUERY.DATASET_ID),
  BIGQUERY_LOCATION: z.string().optional().default(BIGQUERY.LOCATION),
  RUN_LOG_ENABLED: booleanFlag,

  METRICS_API_URL: optionalString.pipe(z.string().url().optional()),
  UPDATE_MARGIN_API_URL: optionalString.pipe(z.string().url().optional()),
  API_KEY: optionalString,
  CRON_API_KEY: optionalString,
}).superRefine((env, ctx) => {
  if (env.MIN_STEP > env.STEP) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["MIN_STEP"],
      message: "MIN_STEP must not exceed STEP",
    });
  }
});

// =============================================================================
// 読み込み
// =============================================================================

/**
 * 環境変数を検証し、設定オブジェクトを返す
 * @throws {ConfigurationError} 値が不正な場合
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const invalid = result.error.issues.map((issue) => issue.path.join("."));
    throw new ConfigurationError(
      `Invalid environment configuration: ${invalid.join(", ")}`,
      invalid
    );
  }

  const e = result.data;

  // リモートストア / 実行ログには BigQuery プロジェクトが必要
  const missing: string[] = [];
  if ((e.REMOTE_STORE_ENABLED || e.RUN_LOG_ENABLED) && !e.BIGQUERY_PROJECT_ID) {
    missing.push("BIGQUERY_PROJECT_ID");
  }
  if (missing.length > 0) {
    throw new ConfigurationError(
      "BIGQUERY_PROJECT_ID is required when REMOTE_STORE_ENABLED or RUN_LOG_ENABLED is true",
      missing
    );
  }

  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    armId: e.ARM_ID,
    stateStorePath: e.STATE_STORE_PATH,
    remoteStoreEnabled: e.REMOTE_STORE_ENABLED,
    optimizer: {
      baselineMargin: e.BASELINE_MARGIN,
      step: e.STEP,
      minStep: e.MIN_STEP,
      guardrailDropPct: e.GUARDRAIL_DROP_PCT,
      minProfitImprovementPct: e.MIN_PROFIT_IMPROVEMENT_PCT,
      historyLimit: STATE.HISTORY_LIMIT,
      minImpressionsPerDecision: e.MIN_IMPRESSIONS_PER_DECISION,
      minProfitPerDecision: e.MIN_PROFIT_PER_DECISION,
    },
    bigqueryProjectId: e.BIGQUERY_PROJECT_ID,
    bigqueryDatasetId: e.BIGQUERY_DATASET_ID,
    bigqueryLocation: e.BIGQUERY_LOCATION,
    runLogEnabled: e.RUN_LOG_ENABLED,
    metricsApiUrl: e.METRICS_API_URL,
    updateMarginApiUrl: e.UPDATE_MARGIN_API_URL,
    apiKey: e.API_KEY,
    cronApiKey: e.CRON_API_KEY,
  };
}

/**
 * 環境変数を検証のみ行う（起動時チェック用）
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): {
  valid: boolean;
  errors: string[];
} {
  try {
    loadConfig(env);
    return { valid: true, errors: [] };
  } catch (error) {
    if (error instanceof ConfigurationError) {
      return { valid: false, errors: [error.message] };
    }
    throw error;
  }
}
