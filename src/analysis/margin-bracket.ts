/**
 * 次ラウンドのマージンブラケット
 *
 * アームをマージン昇順に並べ、隣接アーム間で
 * マージン1ポイントあたりの利益（profit/1k）の伸びを求める。
 * 最もマージンの高いアームを中心に、平均マージン間隔で
 * 下・同じ・上のマージンを次ラウンドの候補として割り当てる。
 */

import Papa from "papaparse";
import { ANALYSIS_DEFAULTS } from "../constants";
import { AnalyticsCsvRow, CSV_COLUMNS } from "../sources/analytics-csv";
import { ArmMetrics } from "./margin-test-analyzer";

// =============================================================================
// 型定義
// =============================================================================

export interface MarginTrendStep {
  from: string;
  to: string;
  fromMarginPct: number;
  toMarginPct: number;
  marginGap: number;
  profitPer1kGap: number;
  /** マージン1ポイントあたりの profit/1k の変化（間隔 0 なら 0） */
  profitPerPoint: number;
}

export interface MarginRecommendation {
  demandId: string;
  demandName: string;
  recommendedMarginPct: number;
}

export interface MarginBracketPlan {
  /** マージン昇順 */
  armsByMargin: ArmMetrics[];
  trend: MarginTrendStep[];
  /** すべての区間で利益が伸びているか（区間が無ければ false） */
  profitStillGrowing: boolean;
  avgMarginGap: number;
  /** 最高マージンのアームの sRPM（コントロール比 %） */
  srpmRatioPct: number;
  srpmGuardrailPct: number;
  /** 最高マージンのアーム */
  anchor: ArmMetrics;
  recommendations: MarginRecommendation[];
}

export const RECOMMENDATION_CSV_COLUMNS = [
  "demand_id",
  "demand_name",
  "recommended_margin_pct",
] as const;

// =============================================================================
// 計算
// =============================================================================

export function computeMarginTrend(armsByMargin: ArmMetrics[]): MarginTrendStep[] {
  const steps: MarginTrendStep[] = [];
  for (let i = 1; i < armsByMargin.length; i++) {
    const prev = armsByMargin[i - 1];
    const curr = armsByMargin[i];
    const marginGap = curr.marginPct - prev.marginPct;
    const profitPer1kGap = curr.profitPer1k - prev.profitPer1k;
    steps.push({
      from: prev.name,
      to: curr.name,
      fromMarginPct: prev.marginPct,
      toMarginPct: curr.marginPct,
      marginGap,
      profitPer1kGap,
      profitPerPoint: marginGap > 0 ? profitPer1kGap / marginGap : 0,
    });
  }
  return steps;
}

/**
 * 次ラウンドのマージンを割り当てる
 *
 * マージン昇順で i 番目のアームに anchor + (i - 1) * avgMarginGap を割り当てる。
 * 3アームなら 下 / 同じ / 上 になる。
 *
 * @param rows Demand ID を引くための元のCSV行
 * @param control sRPM 比較の基準。null なら最低マージンのアーム
 */
export function planNextMarginBracket(
  arms: ArmMetrics[],
  rows: AnalyticsCsvRow[],
  control: ArmMetrics | null,
  srpmGuardrailPct: number = ANALYSIS_DEFAULTS.MIN_SRPM_PCT_OF_CONTROL
): MarginBracketPlan {
  if (arms.length === 0) {
    throw new RangeError("planNextMarginBracket requires at least one arm");
  }

  const armsByMargin = [...arms].sort((a, b) => a.marginPct - b.marginPct);
  const lowest = armsByMargin[0];
  const anchor = armsByMargin[armsByMargin.length - 1];

  const trend = computeMarginTrend(armsByMargin);
  const profitStillGrowing = trend.length > 0 && trend.every((step) => step.profitPerPoint > 0);
  const avgMarginGap = (anchor.marginPct - lowest.marginPct) / Math.max(armsByMargin.length - 1, 1);

  const baseSrpm = control ? control.srpm : lowest.srpm;
  const srpmRatioPct = baseSrpm > 0 ? (anchor.srpm / baseSrpm) * 100 : 100.0;

  const rowByName = new Map<string, AnalyticsCsvRow>();
  for (const row of rows) {
    rowByName.set((row[CSV_COLUMNS.DEMAND_NAME] ?? "").trim(), row);
  }

  const recommendations = armsByMargin.map((arm, i) => {
    const row = rowByName.get(arm.name) ?? rows[0];
    return {
      demandId: (row?.[CSV_COLUMNS.DEMAND_ID] ?? "").trim(),
      demandName: arm.name,
      recommendedMarginPct: Math.round(anchor.marginPct + (i - 1) * avgMarginGap),
    };
  });

  return {
    armsByMargin,
    trend,
    profitStillGrowing,
    avgMarginGap,
    srpmRatioPct,
    srpmGuardrailPct,
    anchor,
    recommendations,
  };
}

// =============================================================================
// 出力
// =============================================================================

/**
 * 推奨マージンCSV（demand_id, demand_name, recommended_margin_pct）
 */
export function formatRecommendationsCsv(recommendations: MarginRecommendation[]): string {
  return Papa.unparse(
    recommendations.map((r) => ({
      demand_id: r.demandId,
      demand_name: r.demandName,
      recommended_margin_pct: r.recommendedMarginPct,
    })),
    { columns: [...RECOMMENDATION_CSV_COLUMNS], newline: "\n" }
  );
}

export function formatMarginBracketPlan(plan: MarginBracketPlan): string {
  const lines: string[] = [];

  lines.push("Cross-arm profit trend:");
  for (const step of plan.trend) {
    lines.push(
      `- ${step.from} (${step.fromMarginPct.toFixed(1)}%) -> ${step.to} (${step.toMarginPct.toFixed(1)}%): ` +
        `margin +${step.marginGap.toFixed(2)}pp, profit/1k +${step.profitPer1kGap.toFixed(4)} ` +
        `(${step.profitPerPoint.toFixed(4)}/pp)`
    );
  }

  lines.push("");
  lines.push(`Profit trend: ${plan.profitStillGrowing ? "still growing" : "plateauing/declining"}`);
  lines.push(
    `sRPM ratio (highest margin vs control): ${plan.srpmRatioPct.toFixed(1)}% (guardrail: >=${plan.srpmGuardrailPct.toFixed(0)}%)`
  );
  lines.push(`Avg margin gap between arms: ${plan.avgMarginGap.toFixed(2)}pp`);

  lines.push("");
  lines.push(`Next round bracket around ${plan.anchor.name} (${plan.anchor.marginPct.toFixed(1)}%):`);
  plan.armsByMargin.forEach((arm, i) => {
    lines.push(
      `- ${arm.name}: current=${arm.marginPct.toFixed(2)}% -> recommended=${plan.recommendations[i].recommendedMarginPct}%`
    );
  });

  return lines.join("\n");
}
