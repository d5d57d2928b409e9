/**
 * マージン最適化 1ティック実行スクリプト
 *
 * cron で毎時実行:
 *   npx tsx scripts/run-optimizer.ts
 *
 * CSVのみで実行:
 *   npx tsx scripts/run-optimizer.ts --csv "path/to/report.csv" --arm LowMar [--latest-hour]
 */

import * as dotenv from "dotenv";
dotenv.config();

import { cac } from "cac";
import { loadConfig } from "../src/config";
import { logger } from "../src/logger";
import { createOptimizerTickDeps, runOptimizerTick, toCsvRunConfig } from "../src/runner";
import { CsvWindowSource } from "../src/sources";

interface RunOptimizerArgs {
  csv?: string;
  arm: string;
  latestHour: boolean;
}

function parseArgs(): RunOptimizerArgs | null {
  const cli = cac("run-optimizer");
  cli.option("--csv <path>", "Analytics CSV export to read the window from");
  cli.option("--arm <name>", "Demand Name substring of the arm to optimize", { default: "LowMar" });
  cli.option("--latest-hour", "Use only the last hour with impressions");
  cli.help();

  const { options } = cli.parse(process.argv);
  if (options.help) {
    return null;
  }

  return {
    csv: options.csv === undefined ? undefined : String(options.csv),
    arm: String(options.arm),
    latestHour: Boolean(options.latestHour),
  };
}

async function main(): Promise<number> {
  const args = parseArgs();
  if (!args) {
    return 0;
  }
  const config = loadConfig();

  // CSV実行は本番の状態（ローカル・リモートとも）と分ける
  const runConfig = args.csv ? toCsvRunConfig(config) : config;

  const source = args.csv
    ? await CsvWindowSource.fromFile(args.csv, args.arm, args.latestHour)
    : undefined;

  const deps = await createOptimizerTickDeps(runConfig, source);
  const result = await runOptimizerTick(deps);

  if (!result.success) {
    console.error("Warning: failed to update margin");
    return 1;
  }

  console.log(`Margin updated: ${result.currentMargin}% -> ${result.nextMargin}% (${result.transition})`);
  return 0;
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.error("Optimizer run failed", { error });
    process.exit(1);
  });
