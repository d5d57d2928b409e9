/**
 * ガード付きヒルクライム（純粋関数）
 *
 * 1ウィンドウごとに以下の順で判定する:
 *   1. コールドスタート: ベースライン未設定なら初回ウィンドウを採用
 *   2. ガードレール: sRPM と入札率がベースラインの threshold 倍以上か
 *   3. 利益改善: ベースライン利益からの改善率が閾値以上か
 *
 * 探索は上方向のみ（step を加算するだけ）。step は縮小のみで拡大しない。
 */

import { PerformanceWindow, WindowMetrics } from "../metrics";
import { STATE } from "../constants";
import {
  GuardrailResult,
  HistoryEntry,
  OptimizerSettings,
  OptimizerState,
  TransitionOutcome,
} from "./types";

// =============================================================================
// 状態の生成
// =============================================================================

/**
 * 設定値から新しい状態を作成
 */
export function createInitialState(
  settings: Pick<OptimizerSettings, "baselineMargin" | "step">
): OptimizerState {
  return {
    version: STATE.SCHEMA_VERSION,
    baselineMargin: settings.baselineMargin,
    lastSafeMargin: settings.baselineMargin,
    currentMargin: settings.baselineMargin,
    step: settings.step,
    baselineSrpm: null,
    baselineBidRate: null,
    baselineProfit: null,
    history: [],
  };
}

/**
 * 履歴を直近 limit 件に切り詰める
 */
export function trimHistory(history: HistoryEntry[], limit: number): HistoryEntry[] {
  if (limit <= 0) {
    return [];
  }
  return history.length > limit ? history.slice(history.length - limit) : history;
}

/**
 * ウィンドウと指標を履歴に追加した状態を返す
 */
export function ingestWindow(
  state: OptimizerState,
  window: PerformanceWindow,
  metrics: WindowMetrics,
  historyLimit: number
): OptimizerState {
  const entry: HistoryEntry = {
    margin: window.margin,
    impressions: window.impressions,
    revenue: window.revenue,
    cost: window.cost,
    bidRate: window.bidRate,
    responses: window.responses,
    profit: metrics.profit,
    profitPer1k: metrics.profitPer1k,
    revenuePer1k: metrics.revenuePer1k,
    costPer1k: metrics.costPer1k,
    srpm: metrics.srpm,
    impressionRate: metrics.impressionRate,
  };

  return {
    ...state,
    history: trimHistory([...state.history, entry], historyLimit),
  };
}

// =============================================================================
// 判定ヘルパー
// =============================================================================

/**
 * ガードレール判定
 * 両方の条件を満たしたときのみ合格
 */
export function evaluateGuardrails(
  metrics: Pick<WindowMetrics, "srpm" | "bidRate">,
  baseline: { srpm: number; bidRate: number },
  guardrailDropPct: number
): GuardrailResult {
  const threshold = 1.0 - guardrailDropPct / 100.0;
  const srpmFloor = threshold * baseline.srpm;
  const bidRateFloor = threshold * baseline.bidRate;
  const srpmOk = metrics.srpm >= srpmFloor;
  const bidRateOk = metrics.bidRate >= bidRateFloor;

  return {
    passed: srpmOk && bidRateOk,
    threshold,
    srpmOk,
    bidRateOk,
    srpmFloor,
    bidRateFloor,
  };
}

/**
 * ベースライン利益に対する改善率（%）
 *
 * ベースライン利益が 0 以下なら割り算せず、
 * 今回の利益が正なら 100、そうでなければ 0 とする。
 */
export function computeProfitImprovementPct(profit: number, baselineProfit: number): number {
  if (baselineProfit > 0) {
    return ((profit - baselineProfit) / baselineProfit) * 100.0;
  }
  return profit > 0 ? 100.0 : 0.0;
}

/**
 * ステップ幅を半減（下限あり）
 *
 * 現在のステップが既に minStep 未満なら据え置き、拡大はしない。
 */
export function shrinkStep(step: number, minStep: number): number {
  return Math.min(step, Math.max(step / 2, minStep));
}

// =============================================================================
// 状態遷移
// =============================================================================

/**
 * 取り込み済みの状態に対して判定を行い、次の状態を返す
 */
export function applyDecision(
  state: OptimizerState,
  metrics: WindowMetrics,
  settings: Pick<OptimizerSettings, "minStep" | "guardrailDropPct" | "minProfitImprovementPct">
): TransitionOutcome {
  const { baselineSrpm, baselineBidRate, baselineProfit } = state;

  // コールドスタート: ベースラインを初回ウィンドウで確定し、最初の探索を提案
  if (baselineSrpm === null || baselineBidRate === null || baselineProfit === null) {
    return {
      transition: "COLD_START",
      state: {
        ...state,
        baselineSrpm: metrics.srpm,
        baselineBidRate: metrics.bidRate,
        baselineProfit: metrics.profit,
        lastSafeMargin: metrics.margin,
        currentMargin: metrics.margin + state.step,
      },
    };
  }

  const guardrails = evaluateGuardrails(
    metrics,
    { srpm: baselineSrpm, bidRate: baselineBidRate },
    settings.guardrailDropPct
  );

  // ガードレール違反: このマージンは不採用
  if (!guardrails.passed) {
    return {
      transition: "ROLLBACK",
      guardrails,
      state: {
        ...state,
        currentMargin: state.lastSafeMargin,
        step: shrinkStep(state.step, settings.minStep),
      },
    };
  }

  const profitImprovementPct = computeProfitImprovementPct(metrics.profit, baselineProfit);

  if (profitImprovementPct >= settings.minProfitImprovementPct) {
    return {
      transition: "ACCEPT",
      guardrails,
      profitImprovementPct,
      state: {
        ...state,
        lastSafeMargin: metrics.margin,
        baselineSrpm: metrics.srpm,
        baselineBidRate: metrics.bidRate,
        baselineProfit: metrics.profit,
        currentMargin: metrics.margin + state.step,
      },
    };
  }

  // 改善不足: ベースラインは据え置き
  return {
    transition: "HOLD",
    guardrails,
    profitImprovementPct,
    state: {
      ...state,
      currentMargin: state.lastSafeMargin,
      step: shrinkStep(state.step, settings.minStep),
    },
  };
}
