/**
 * マージン A/B テストCSVの分析スクリプト
 *
 *   npx tsx scripts/analyze-margin-test.ts --csv report.csv --control-contains LowMar
 *
 * 次ラウンドの推奨マージンCSVも書き出す:
 *   npx tsx scripts/analyze-margin-test.ts --csv report.csv --latest-hour --recommendations margin_recommendations.csv
 */

import { cac } from "cac";
import { promises as fs } from "fs";
import {
  analyzeMarginTest,
  DEFAULT_ANALYSIS_OPTIONS,
  formatMarginBracketPlan,
  formatMarginTestReport,
  formatRecommendationsCsv,
  planNextMarginBracket,
} from "../src/analysis";
import { logger } from "../src/logger";
import { parseAnalyticsCsv, selectLatestHourRows } from "../src/sources";

function toNumberOption(value: unknown, fallback: number, name: string): number {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`--${name} must be a number: ${String(value)}`);
  }
  return parsed;
}

async function main(): Promise<number> {
  const cli = cac("analyze-margin-test");
  cli.option("--csv <path>", "Analytics CSV export with one row per arm");
  cli.option("--control-contains <name>", "Demand Name substring of the control arm");
  cli.option("--latest-hour", "Use only the last hour with impressions");
  cli.option("--recommendations <path>", "Write next-round margin recommendations CSV");
  cli.option("--min-impressions <n>", "Minimum impressions per arm");
  cli.option("--min-profit <n>", "Minimum profit per arm");
  cli.option("--max-impr-drop-pct <n>", "Maximum impressions drop vs control (%)");
  cli.option("--max-srpm-drop-pct <n>", "Maximum sRPM drop vs control (%)");
  cli.option("--min-srpm-pct-of-control <n>", "Minimum sRPM of a recommended arm (% of control)");
  cli.help();

  const { options } = cli.parse(process.argv);
  if (options.help) {
    return 0;
  }

  if (options.csv === undefined) {
    console.error("--csv is required");
    return 2;
  }

  let rows = parseAnalyticsCsv(await fs.readFile(String(options.csv), "utf-8"));
  if (options.latestHour) {
    rows = selectLatestHourRows(rows);
  }

  const report = analyzeMarginTest(rows, {
    controlContains: options.controlContains === undefined ? undefined : String(options.controlContains),
    minImpressionsPerArm: toNumberOption(
      options.minImpressions,
      DEFAULT_ANALYSIS_OPTIONS.minImpressionsPerArm,
      "min-impressions"
    ),
    minProfitPerArm: toNumberOption(options.minProfit, DEFAULT_ANALYSIS_OPTIONS.minProfitPerArm, "min-profit"),
    maxImpressionsDropPct: toNumberOption(
      options.maxImprDropPct,
      DEFAULT_ANALYSIS_OPTIONS.maxImpressionsDropPct,
      "max-impr-drop-pct"
    ),
    maxSrpmDropPct: toNumberOption(
      options.maxSrpmDropPct,
      DEFAULT_ANALYSIS_OPTIONS.maxSrpmDropPct,
      "max-srpm-drop-pct"
    ),
    minSrpmPctOfControl: toNumberOption(
      options.minSrpmPctOfControl,
      DEFAULT_ANALYSIS_OPTIONS.minSrpmPctOfControl,
      "min-srpm-pct-of-control"
    ),
  });

  console.log(formatMarginTestReport(report));

  if (options.recommendations !== undefined) {
    const plan = planNextMarginBracket(
      report.arms,
      rows,
      report.control,
      report.options.minSrpmPctOfControl
    );
    const outputPath = String(options.recommendations);
    await fs.writeFile(outputPath, `${formatRecommendationsCsv(plan.recommendations)}\n`, "utf-8");

    console.log("");
    console.log(formatMarginBracketPlan(plan));
    console.log(`\nRecommendations written to ${outputPath}`);
  }

  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Margin test analysis failed", { error });
    process.exit(1);
  });
