/**
 * マージンオプティマイザー - 型定義
 */

import { WindowMetrics } from "../metrics";
import { OPTIMIZER_DEFAULTS, STATE } from "../constants";

// =============================================================================
// 設定
// =============================================================================

/**
 * オプティマイザーの設定
 */
export interface OptimizerSettings {
  /** 初期マージン（%）。状態が無いときの開始点 */
  baselineMargin: number;
  /** 初期ステップ幅 */
  step: number;
  /** ステップ幅の下限 */
  minStep: number;
  /** sRPM / 入札率がベースラインから何%まで下がってよいか */
  guardrailDropPct: number;
  /** 採用に必要な利益改善率（%） */
  minProfitImprovementPct: number;
  /** 永続化する履歴件数 */
  historyLimit: number;
  /**
   * 判定に必要な最小インプレッション数。
   * 値は保持・検証するが、判定には影響しない
   */
  minImpressionsPerDecision: number;
  /** 判定に必要な最小利益。判定には影響しない */
  minProfitPerDecision: number;
}

export const DEFAULT_OPTIMIZER_SETTINGS: OptimizerSettings = {
  baselineMargin: OPTIMIZER_DEFAULTS.BASELINE_MARGIN,
  step: OPTIMIZER_DEFAULTS.STEP,
  minStep: OPTIMIZER_DEFAULTS.MIN_STEP,
  guardrailDropPct: OPTIMIZER_DEFAULTS.GUARDRAIL_DROP_PCT,
  minProfitImprovementPct: OPTIMIZER_DEFAULTS.MIN_PROFIT_IMPROVEMENT_PCT,
  historyLimit: STATE.HISTORY_LIMIT,
  minImpressionsPerDecision: OPTIMIZER_DEFAULTS.MIN_IMPRESSIONS_PER_DECISION,
  minProfitPerDecision: OPTIMIZER_DEFAULTS.MIN_PROFIT_PER_DECISION,
};

// =============================================================================
// 状態
// =============================================================================

/**
 * 履歴エントリ（監査用。判定ロジックは参照しない）
 */
export interface HistoryEntry {
  margin: number;
  impressions: number;
  revenue: number;
  cost: number;
  bidRate: number;
  responses: number;
  profit: number;
  profitPer1k: number;
  revenuePer1k: number;
  costPer1k: number;
  srpm: number;
  impressionRate: number;
}

/**
 * 永続化されるオプティマイザー状態
 *
 * baselineSrpm / baselineBidRate / baselineProfit は最初のウィンドウを
 * 処理するまで null。採用（ACCEPT）時にのみ更新される。
 */
export interface OptimizerState {
  version: typeof STATE.SCHEMA_VERSION;
  baselineMargin: number;
  lastSafeMargin: number;
  currentMargin: number;
  step: number;
  baselineSrpm: number | null;
  baselineBidRate: number | null;
  baselineProfit: number | null;
  history: HistoryEntry[];
}

// =============================================================================
// 判定結果
// =============================================================================

/**
 * 1回の判定で起きた遷移
 * - COLD_START: ベースライン未設定。初回ウィンドウをベースラインに採用
 * - ROLLBACK: ガードレール違反。最後の安全マージンに戻しステップ半減
 * - ACCEPT: 利益改善。ベースラインを更新し、さらに上を探索
 * - HOLD: 改善不足。最後の安全マージンに戻しステップ半減
 */
export type DecisionTransition = "COLD_START" | "ROLLBACK" | "ACCEPT" | "HOLD";

/**
 * ガードレール判定結果
 */
export interface GuardrailResult {
  passed: boolean;
  /** 1 - guardrailDropPct / 100 */
  threshold: number;
  srpmOk: boolean;
  bidRateOk: boolean;
  srpmFloor: number;
  bidRateFloor: number;
}

/**
 * 状態遷移の結果（純粋関数の戻り値）
 */
export interface TransitionOutcome {
  state: OptimizerState;
  transition: DecisionTransition;
  guardrails?: GuardrailResult;
  profitImprovementPct?: number;
}

/**
 * decide() の戻り値
 */
export interface DecisionResult extends TransitionOutcome {
  nextMargin: number;
  metrics: WindowMetrics;
}
