/**
 * マージン A/B テスト分析
 *
 * アーム別集計CSVから派生指標を計算し、
 * 1,000インプレッションあたり利益で勝者を選ぶ。
 * sRPM ガードレール（コントロール比）を満たすアームだけを推奨候補にする。
 */

import { ANALYSIS_DEFAULTS } from "../constants";
import { computeDerivedMetrics } from "../metrics";
import { AnalyticsCsvRow, CSV_COLUMNS, readNumber } from "../sources/analytics-csv";

// =============================================================================
// 型定義
// =============================================================================

/**
 * アーム別の指標
 */
export interface ArmMetrics {
  name: string;
  impressions: number;
  responses: number;
  marginPct: number;
  winRatePct: number;
  profit: number;
  profitPer1k: number;
  revenuePer1k: number;
  costPer1k: number;
  impressionRate: number;
  ourBidfloor: number;
  supplyBidfloor: number;
  demandEcpm: number;
  srpm: number;
}

export interface MarginTestAnalysisOptions {
  /** コントロールアームを特定する Demand Name の部分文字列 */
  controlContains?: string;
  minImpressionsPerArm: number;
  minProfitPerArm: number;
  maxImpressionsDropPct: number;
  maxSrpmDropPct: number;
  minSrpmPctOfControl: number;
}

export const DEFAULT_ANALYSIS_OPTIONS: MarginTestAnalysisOptions = {
  minImpressionsPerArm: ANALYSIS_DEFAULTS.MIN_IMPRESSIONS_PER_ARM,
  minProfitPerArm: ANALYSIS_DEFAULTS.MIN_PROFIT_PER_ARM,
  maxImpressionsDropPct: ANALYSIS_DEFAULTS.MAX_IMPRESSIONS_DROP_PCT,
  maxSrpmDropPct: ANALYSIS_DEFAULTS.MAX_SRPM_DROP_PCT,
  minSrpmPctOfControl: ANALYSIS_DEFAULTS.MIN_SRPM_PCT_OF_CONTROL,
};

export interface MarginTestReport {
  /** profitPer1k の降順 */
  arms: ArmMetrics[];
  winner: ArmMetrics;
  control: ArmMetrics | null;
  /** コントロール指定時、ガードレールを満たすアームが無ければ null */
  recommended: ArmMetrics | null;
  enoughData: boolean;
  enoughDataReasons: string[];
  guardrailWarnings: string[];
  options: MarginTestAnalysisOptions;
}

// =============================================================================
// 指標計算
// =============================================================================

/**
 * CSV行からアーム別指標を計算
 */
export function computeArmMetrics(rows: AnalyticsCsvRow[]): ArmMetrics[] {
  return rows.map((row) => {
    const impressions = readNumber(row, CSV_COLUMNS.SUPPLY_IMPRESSIONS);
    const responses = readNumber(row, CSV_COLUMNS.SUPPLY_RESPONSES);
    const cost = readNumber(row, CSV_COLUMNS.COST);
    const revenue = readNumber(row, CSV_COLUMNS.REVENUE);

    const derived = computeDerivedMetrics(impressions, revenue, cost, responses);

    return {
      name: (row[CSV_COLUMNS.DEMAND_NAME] ?? "").trim() || "<unnamed>",
      impressions,
      responses,
      marginPct: readNumber(row, CSV_COLUMNS.MARGIN_PCT),
      winRatePct: readNumber(row, CSV_COLUMNS.WIN_RATE_PCT),
      profit: derived.profit,
      profitPer1k: derived.profitPer1k,
      revenuePer1k: derived.revenuePer1k,
      costPer1k: derived.costPer1k,
      impressionRate: derived.impressionRate,
      ourBidfloor: readNumber(row, CSV_COLUMNS.OUR_BIDFLOOR),
      supplyBidfloor: readNumber(row, CSV_COLUMNS.SUPPLY_BIDFLOOR),
      demandEcpm: readNumber(row, CSV_COLUMNS.DEMAND_ECPM),
      srpm: derived.srpm,
    };
  });
}

// =============================================================================
// 勝者判定
// =============================================================================

function maxByProfitPer1k(arms: ArmMetrics[]): ArmMetrics {
  // 同値の場合は先に出現したアームを優先
  return arms.reduce((best, arm) => (arm.profitPer1k > best.profitPer1k ? arm : best));
}

/**
 * 1,000インプレッションあたり利益が最大のアーム
 */
export function pickWinner(arms: ArmMetrics[]): ArmMetrics {
  if (arms.length === 0) {
    throw new RangeError("pickWinner requires at least one arm");
  }
  return maxByProfitPer1k(arms);
}

/**
 * Demand Name に部分一致するコントロールアーム
 */
export function findControl(
  arms: ArmMetrics[],
  controlContains: string | undefined
): ArmMetrics | null {
  if (!controlContains) {
    return null;
  }
  const needle = controlContains.toLowerCase();
  return arms.find((arm) => arm.name.toLowerCase().includes(needle)) ?? null;
}

/**
 * 推奨アーム: sRPM がコントロールの minSrpmPctOfControl% 以上のアームのうち利益最大
 *
 * コントロールが無い、またはコントロールの sRPM が 0 以下なら単純な勝者を返す。
 * 条件を満たすアームが無ければ null（コントロール維持を推奨）。
 */
export function pickRecommendedWinner(
  arms: ArmMetrics[],
  control: ArmMetrics | null,
  minSrpmPctOfControl: number = ANALYSIS_DEFAULTS.MIN_SRPM_PCT_OF_CONTROL
): ArmMetrics | null {
  if (!control || control.srpm <= 0) {
    return pickWinner(arms);
  }
  const threshold = control.srpm * (minSrpmPctOfControl / 100.0);
  const qualified = arms.filter((arm) => arm.srpm >= threshold);
  if (qualified.length === 0) {
    return null;
  }
  return maxByProfitPer1k(qualified);
}

// =============================================================================
// データ量・ガードレールチェック
// =============================================================================

export function assessEnoughData(
  arms: ArmMetrics[],
  minImpressionsPerArm: number,
  minProfitPerArm: number
): { ok: boolean; reasons: string[] } {
  const reasons: string[] = [];
  for (const arm of arms) {
    if (arm.impressions < minImpressionsPerArm) {
      reasons.push(
        `'${arm.name}': impressions ${Math.trunc(arm.impressions)} < min ${minImpressionsPerArm}`
      );
    }
    if (arm.profit < minProfitPerArm) {
      reasons.push(
        `'${arm.name}': profit $${arm.profit.toFixed(4)} < min $${minProfitPerArm.toFixed(4)}`
      );
    }
  }
  return { ok: reasons.length === 0, reasons };
}

export function assessGuardrailsVsControl(
  arms: ArmMetrics[],
  control: ArmMetrics,
  maxImpressionsDropPct: number,
  maxSrpmDropPct: number
): string[] {
  const warnings: string[] = [];
  for (const arm of arms) {
    if (arm.name === control.name) {
      continue;
    }
    if (control.impressions > 0) {
      const imprDrop = ((control.impressions - arm.impressions) / control.impressions) * 100.0;
      if (imprDrop > maxImpressionsDropPct) {
        warnings.push(
          `Guardrail: '${arm.name}' impressions drop ${imprDrop.toFixed(1)}% vs control (>${maxImpressionsDropPct.toFixed(1)}%)`
        );
      }
    }
    if (control.srpm > 0) {
      const srpmDrop = ((control.srpm - arm.srpm) / control.srpm) * 100.0;
      if (srpmDrop > maxSrpmDropPct) {
        warnings.push(
          `Guardrail: '${arm.name}' sRPM drop ${srpmDrop.toFixed(1)}% vs control (>${maxSrpmDropPct.toFixed(1)}%)`
        );
      }
    }
  }
  return warnings;
}

// =============================================================================
// レポート
// =============================================================================

/**
 * CSV行を分析してレポートを作成
 */
export function analyzeMarginTest(
  rows: AnalyticsCsvRow[],
  options: Partial<MarginTestAnalysisOptions> = {}
): MarginTestReport {
  const opts: MarginTestAnalysisOptions = { ...DEFAULT_ANALYSIS_OPTIONS, ...options };

  const computed = computeArmMetrics(rows);
  const arms = [...computed].sort((a, b) => b.profitPer1k - a.profitPer1k);
  const winner = pickWinner(arms);
  const control = findControl(computed, opts.controlContains);
  const recommended = control
    ? pickRecommendedWinner(computed, control, opts.minSrpmPctOfControl)
    : winner;

  const enough = assessEnoughData(computed, opts.minImpressionsPerArm, opts.minProfitPerArm);
  const guardrailWarnings = control
    ? assessGuardrailsVsControl(computed, control, opts.maxImpressionsDropPct, opts.maxSrpmDropPct)
    : [];

  return {
    arms,
    winner,
    control,
    recommended,
    enoughData: enough.ok,
    enoughDataReasons: enough.reasons,
    guardrailWarnings,
    options: opts,
  };
}

export const SIGNIFICANCE_NOTE =
  "Note: This analysis cannot compute statistical significance from fully-aggregated rows.\n" +
  "For real stopping rules, export event-level or time-bucketed data (e.g., per hour/day) per arm.";

/**
 * レポートをテキストに整形（CLI出力用）
 */
export function formatMarginTestReport(report: MarginTestReport): string {
  const lines: string[] = [];
  const { arms, winner, control, recommended, options } = report;

  lines.push("Derived KPIs (sorted by profit/1k impressions):");
  for (const m of arms) {
    lines.push(`- ${m.name}`);
    lines.push(
      `  impressions=${Math.trunc(m.impressions)} responses=${Math.trunc(m.responses)} impression_rate=${(m.impressionRate * 100).toFixed(4)}%`
    );
    lines.push(`  margin%=${m.marginPct.toFixed(2)} win%=${m.winRatePct.toFixed(2)}`);
    lines.push(
      `  profit=${m.profit.toFixed(4)} profit/1k=${m.profitPer1k.toFixed(4)} rev/1k=${m.revenuePer1k.toFixed(4)} cost/1k=${m.costPer1k.toFixed(4)}`
    );
    lines.push(
      `  our_bidfloor=${m.ourBidfloor.toFixed(2)} supply_bidfloor=${m.supplyBidfloor.toFixed(2)} demand_eCPM=${m.demandEcpm.toFixed(2)} sRPM=${m.srpm.toFixed(4)}`
    );
  }

  lines.push("");
  lines.push("Winner by profit/1k impressions:");
  lines.push(
    `- ${winner.name} (profit/1k=${winner.profitPer1k.toFixed(4)}, profit=${winner.profit.toFixed(4)}, margin%=${winner.marginPct.toFixed(2)})`
  );

  lines.push("");
  lines.push("Recommendation (profit + sRPM guardrail):");
  const pct = options.minSrpmPctOfControl.toFixed(0);
  if (control) {
    if (recommended) {
      const srpmVsControl = control.srpm > 0 ? (recommended.srpm / control.srpm) * 100.0 : 100.0;
      lines.push(`- RECOMMEND: ${recommended.name}`);
      lines.push(`  Reason: highest profit among arms with sRPM at/above ${pct}% of control.`);
      lines.push(
        `  sRPM=${recommended.srpm.toFixed(4)} (${srpmVsControl.toFixed(1)}% of control) - supply/revenue performance preserved.`
      );
    } else {
      lines.push(`- KEEP CONTROL: ${control.name}`);
      lines.push(
        `  Reason: no arm has sRPM >= ${pct}% of control. Winner (${winner.name}) would hurt supply performance.`
      );
    }
  } else {
    lines.push(`- No control specified; raw winner = ${winner.name}`);
  }

  lines.push("");
  lines.push("Enough data check:");
  if (report.enoughData) {
    lines.push("- PASS: meets minimum per-arm thresholds");
  } else {
    lines.push("- FAIL: not enough data yet");
    for (const reason of report.enoughDataReasons) {
      lines.push(`  - ${reason}`);
    }
  }

  lines.push("");
  if (control) {
    lines.push("Guardrails vs control:");
    if (report.guardrailWarnings.length === 0) {
      lines.push("- OK");
    } else {
      for (const warning of report.guardrailWarnings) {
        lines.push(`- ${warning}`);
      }
    }
  } else {
    lines.push("Guardrails vs control: skipped (no control arm provided)");
  }

  lines.push("");
  lines.push(SIGNIFICANCE_NOTE);

  return lines.join("\n");
}
