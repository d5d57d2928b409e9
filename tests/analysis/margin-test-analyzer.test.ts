/**
 * マージンA/Bテスト分析のテスト
 */

import { promises as fs } from "fs";
import * as path from "path";
import {
  analyzeMarginTest,
  ArmMetrics,
  assessEnoughData,
  assessGuardrailsVsControl,
  computeArmMetrics,
  findControl,
  formatMarginTestReport,
  pickRecommendedWinner,
  pickWinner,
} from "../../src/analysis/margin-test-analyzer";
import { AnalyticsCsvRow, parseAnalyticsCsv } from "../../src/sources/analytics-csv";

const FIXTURE = path.join(__dirname, "..", "fixtures", "margin-test.csv");

async function loadRows(): Promise<AnalyticsCsvRow[]> {
  return parseAnalyticsCsv(await fs.readFile(FIXTURE, "utf-8"));
}

function arm(name: string, overrides: Partial<ArmMetrics> = {}): ArmMetrics {
  return {
    name,
    impressions: 100000,
    responses: 50000,
    marginPct: 35,
    winRatePct: 10,
    profit: 100,
    profitPer1k: 1,
    revenuePer1k: 3,
    costPer1k: 2,
    impressionRate: 2,
    ourBidfloor: 0,
    supplyBidfloor: 0,
    demandEcpm: 0,
    srpm: 3,
    ...overrides,
  };
}

describe("computeArmMetrics", () => {
  it("CSV行からアーム別指標を計算", async () => {
    const arms = computeArmMetrics(await loadRows());

    expect(arms.map((a) => a.name)).toEqual(["Control 35%", "LowMar 30%", "HighMar 40%"]);

    const high = arms[2];
    expect(high.impressions).toBe(50000);
    expect(high.responses).toBe(26000);
    expect(high.profit).toBe(11);
    expect(high.profitPer1k).toBeCloseTo(0.22, 10);
    expect(high.srpm).toBeCloseTo(0.52, 10);
    expect(high.costPer1k).toBeCloseTo(0.3, 10);
    expect(high.marginPct).toBe(40);
    expect(high.winRatePct).toBe(11);
    expect(high.ourBidfloor).toBe(0.22);
    expect(high.supplyBidfloor).toBe(0.1);
    expect(high.demandEcpm).toBe(0.52);
  });

  it("Demand Name が空なら <unnamed>", () => {
    const [m] = computeArmMetrics([{ "Demand Name": "  ", "Supply Impressions": "10" }]);

    expect(m.name).toBe("<unnamed>");
    expect(m.impressions).toBe(10);
    expect(m.profit).toBe(0);
  });
});

describe("pickWinner", () => {
  it("profitPer1k が最大のアーム", () => {
    const winner = pickWinner([arm("a", { profitPer1k: 1 }), arm("b", { profitPer1k: 3 }), arm("c", { profitPer1k: 2 })]);

    expect(winner.name).toBe("b");
  });

  it("同値なら先のアーム", () => {
    expect(pickWinner([arm("a"), arm("b")]).name).toBe("a");
  });

  it("空なら RangeError", () => {
    expect(() => pickWinner([])).toThrow(RangeError);
  });
});

describe("findControl", () => {
  const arms = [arm("LowMar 30%"), arm("Control 35%")];

  it("部分一致（大文字小文字無視）", () => {
    expect(findControl(arms, "CONTROL")?.name).toBe("Control 35%");
  });

  it("未指定・不一致なら null", () => {
    expect(findControl(arms, undefined)).toBeNull();
    expect(findControl(arms, "")).toBeNull();
    expect(findControl(arms, "HighMar")).toBeNull();
  });
});

describe("pickRecommendedWinner", () => {
  const control = arm("control", { srpm: 1.0, profitPer1k: 1 });

  it("sRPM がコントロールの90%以上のアームから利益最大を選ぶ", () => {
    const arms = [
      control,
      arm("greedy", { srpm: 0.5, profitPer1k: 5 }),
      arm("balanced", { srpm: 0.95, profitPer1k: 2 }),
    ];

    expect(pickRecommendedWinner(arms, control)?.name).toBe("balanced");
  });

  it("条件を満たすアームが無ければ null", () => {
    const arms = [arm("a", { srpm: 0.5 }), arm("b", { srpm: 0.6 })];

    expect(pickRecommendedWinner(arms, control)).toBeNull();
  });

  it("コントロールが無い、または sRPM が 0 以下なら単純な勝者", () => {
    const arms = [arm("a", { profitPer1k: 1 }), arm("b", { profitPer1k: 2, srpm: 0 })];

    expect(pickRecommendedWinner(arms, null)?.name).toBe("b");
    expect(pickRecommendedWinner(arms, arm("zero", { srpm: 0 }))?.name).toBe("b");
  });
});

describe("assessEnoughData", () => {
  it("しきい値未満の理由を列挙", () => {
    const result = assessEnoughData([arm("a", { impressions: 1000.7, profit: 2.5 }), arm("b")], 50000, 50);

    expect(result.ok).toBe(false);
    expect(result.reasons).toEqual([
      "'a': impressions 1000 < min 50000",
      "'a': profit $2.5000 < min $50.0000",
    ]);
  });

  it("すべて満たせば ok", () => {
    expect(assessEnoughData([arm("a"), arm("b")], 50000, 50)).toEqual({ ok: true, reasons: [] });
  });
});

describe("assessGuardrailsVsControl", () => {
  it("インプレッションと sRPM の低下を警告", () => {
    const control = arm("control", { impressions: 100000, srpm: 2 });
    const warnings = assessGuardrailsVsControl(
      [control, arm("drop", { impressions: 80000, srpm: 1.5 }), arm("ok", { impressions: 95000, srpm: 1.9 })],
      control,
      10,
      10
    );

    expect(warnings).toEqual([
      "Guardrail: 'drop' impressions drop 20.0% vs control (>10.0%)",
      "Guardrail: 'drop' sRPM drop 25.0% vs control (>10.0%)",
    ]);
  });

  it("コントロールの値が 0 なら比較しない", () => {
    const control = arm("control", { impressions: 0, srpm: 0 });

    expect(assessGuardrailsVsControl([arm("x", { impressions: 0, srpm: 0 })], control, 10, 10)).toEqual([]);
  });
});

describe("analyzeMarginTest", () => {
  it("コントロール無しなら勝者をそのまま推奨", async () => {
    const report = analyzeMarginTest(await loadRows());

    expect(report.arms.map((a) => a.name)).toEqual(["HighMar 40%", "Control 35%", "LowMar 30%"]);
    expect(report.winner.name).toBe("HighMar 40%");
    expect(report.control).toBeNull();
    expect(report.recommended?.name).toBe("HighMar 40%");
    expect(report.guardrailWarnings).toEqual([]);
  });

  it("コントロール比のガードレールとデータ量を評価", async () => {
    const report = analyzeMarginTest(await loadRows(), { controlContains: "control" });

    expect(report.control?.name).toBe("Control 35%");
    expect(report.recommended?.name).toBe("HighMar 40%");
    expect(report.enoughData).toBe(false);
    expect(report.enoughDataReasons).toEqual([
      "'Control 35%': profit $9.0000 < min $50.0000",
      "'LowMar 30%': profit $7.0000 < min $50.0000",
      "'HighMar 40%': profit $11.0000 < min $50.0000",
    ]);
    expect(report.guardrailWarnings).toEqual([
      "Guardrail: 'LowMar 30%' sRPM drop 23.0% vs control (>10.0%)",
    ]);
  });

  it("オプションでしきい値を上書き", async () => {
    const report = analyzeMarginTest(await loadRows(), {
      controlContains: "control",
      minProfitPerArm: 5,
      minSrpmPctOfControl: 150,
    });

    expect(report.enoughData).toBe(true);
    expect(report.recommended).toBeNull();
    expect(report.options.minImpressionsPerArm).toBe(50000);
  });
});

describe("formatMarginTestReport", () => {
  it("推奨アームとチェック結果を出力", async () => {
    const lines = formatMarginTestReport(
      analyzeMarginTest(await loadRows(), { controlContains: "control" })
    ).split("\n");

    expect(lines[0]).toBe("Derived KPIs (sorted by profit/1k impressions):");
    expect(lines[1]).toBe("- HighMar 40%");
    expect(lines[3]).toBe("  margin%=40.00 win%=11.00");
    expect(lines).toContain("- HighMar 40% (profit/1k=0.2200, profit=11.0000, margin%=40.00)");
    expect(lines).toContain("- RECOMMEND: HighMar 40%");
    expect(lines).toContain("  Reason: highest profit among arms with sRPM at/above 90% of control.");
    expect(lines).toContain("  sRPM=0.5200 (114.4% of control) - supply/revenue performance preserved.");
    expect(lines).toContain("- FAIL: not enough data yet");
    expect(lines).toContain("  - 'LowMar 30%': profit $7.0000 < min $50.0000");
    expect(lines.slice(-5)).toEqual([
      "Guardrails vs control:",
      "- Guardrail: 'LowMar 30%' sRPM drop 23.0% vs control (>10.0%)",
      "",
      "Note: This analysis cannot compute statistical significance from fully-aggregated rows.",
      "For real stopping rules, export event-level or time-bucketed data (e.g., per hour/day) per arm.",
    ]);
  });

  it("推奨が無ければコントロール維持", async () => {
    const text = formatMarginTestReport(
      analyzeMarginTest(await loadRows(), { controlContains: "control", minSrpmPctOfControl: 150 })
    );

    expect(text).toContain("- KEEP CONTROL: Control 35%");
    expect(text).toContain(
      "  Reason: no arm has sRPM >= 150% of control. Winner (HighMar 40%) would hurt supply performance."
    );
  });

  it("コントロール無しならガードレール比較をスキップ", async () => {
    const lines = formatMarginTestReport(
      analyzeMarginTest(await loadRows(), { minImpressionsPerArm: 0, minProfitPerArm: 0 })
    ).split("\n");

    expect(lines).toContain("- No control specified; raw winner = HighMar 40%");
    expect(lines.slice(-7)).toEqual([
      "Enough data check:",
      "- PASS: meets minimum per-arm thresholds",
      "",
      "Guardrails vs control: skipped (no control arm provided)",
      "",
      "Note: This analysis cannot compute statistical significance from fully-aggregated rows.",
      "For real stopping rules, export event-level or time-bucketed data (e.g., per hour/day) per arm.",
    ]);
  });

  it("ガードレール違反が無ければ OK", async () => {
    const lines = formatMarginTestReport(
      analyzeMarginTest(await loadRows(), { controlContains: "control", maxSrpmDropPct: 30 })
    ).split("\n");

    const index = lines.indexOf("Guardrails vs control:");
    expect(lines[index + 1]).toBe("- OK");
  });
});
