/**
 * 派生指標（利益・1,000インプレッションあたり指標・sRPM）の計算
 *
 * CSV分析とマージンオプティマイザーの両方が使う唯一の計算経路。
 * 分母が 0 以下のときは 1 に置き換え、例外を投げない。
 */

import { METRICS } from "../constants";

// =============================================================================
// 型定義
// =============================================================================

/**
 * 1つの観測ウィンドウ（1アーム・1期間の集計値）
 */
export interface PerformanceWindow {
  /** このウィンドウを生んだマージン（%） */
  margin: number;
  impressions: number;
  revenue: number;
  cost: number;
  /** 入札率（%） */
  bidRate: number;
  responses: number;
}

/**
 * 派生指標
 */
export interface DerivedMetrics {
  profit: number;
  profitPer1k: number;
  revenuePer1k: number;
  costPer1k: number;
  /** revenuePer1k と同値。ガードレール判定ではこちらを参照する */
  srpm: number;
  impressionRate: number;
}

/**
 * オプティマイザーが比較に使うウィンドウ単位の指標
 */
export interface WindowMetrics extends DerivedMetrics {
  impressions: number;
  responses: number;
  bidRate: number;
  margin: number;
}

// =============================================================================
// 計算
// =============================================================================

/**
 * 派生指標を計算
 *
 * インプレッション側とレスポンス側の分母はそれぞれ独立に 1 で下限処理する。
 * インプレッション 0 のときは per-1k 指標が分子 × 1000 になる。
 */
export function computeDerivedMetrics(
  impressions: number,
  revenue: number,
  cost: number,
  responses: number = 0
): DerivedMetrics {
  const denomImpr = impressions > 0 ? impressions : 1.0;
  const denomResp = responses > 0 ? responses : 1.0;

  const profit = revenue - cost;

  return {
    profit,
    profitPer1k: (profit / denomImpr) * METRICS.PER_MILLE,
    revenuePer1k: (revenue / denomImpr) * METRICS.PER_MILLE,
    costPer1k: (cost / denomImpr) * METRICS.PER_MILLE,
    srpm: (revenue / denomImpr) * METRICS.PER_MILLE,
    impressionRate: impressions / denomResp,
  };
}

/**
 * ウィンドウから WindowMetrics を計算
 */
export function computeWindowMetrics(window: PerformanceWindow): WindowMetrics {
  const derived = computeDerivedMetrics(
    window.impressions,
    window.revenue,
    window.cost,
    window.responses
  );

  return {
    ...derived,
    impressions: window.impressions,
    responses: window.responses,
    bidRate: window.bidRate,
    margin: window.margin,
  };
}
