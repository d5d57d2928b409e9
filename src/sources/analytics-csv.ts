/**
 * 分析レポートCSV（アーム別の集計エクスポート）の読み込み
 */

import Papa from "papaparse";
import { NotFoundError, ValidationError } from "../errors";
import { parseLenientNumber } from "./window-parser";

/**
 * CSVカラム名
 */
export const CSV_COLUMNS = {
  DEMAND_ID: "Demand ID",
  DEMAND_NAME: "Demand Name",
  HOUR: "Hour",
  COST: "Cost",
  REVENUE: "Revenue",
  PROFIT: "Profit $",
  MARGIN_PCT: "Margin %",
  BID_RATE_PCT: "Demand Bid Rate %",
  SUPPLY_RESPONSES: "Supply Responses",
  SUPPLY_IMPRESSIONS: "Supply Impressions",
  WIN_RATE_PCT: "Demand Win Rate %",
  SRPM: "sRPM $",
  SUPPLY_BIDFLOOR: "Supply Bidfloor",
  OUR_BIDFLOOR: "Our Bidfloor",
  DEMAND_ECPM: "Demand eCPM",
} as const;

export type AnalyticsCsvRow = Record<string, string | undefined>;

/**
 * CSVテキストを行の配列に変換
 * @throws {ValidationError} CSVとして読めない、またはデータ行が無い場合
 */
export function parseAnalyticsCsv(csvText: string): AnalyticsCsvRow[] {
  const parsed = Papa.parse<AnalyticsCsvRow>(csvText, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
    transformHeader: (header) => header.trim(),
  });

  const fatal = parsed.errors.filter((e) => e.type === "Quotes" || e.type === "Delimiter");
  if (fatal.length > 0) {
    throw new ValidationError(
      fatal.map((e) => ({ field: `row ${e.row ?? "?"}`, message: e.message })),
      "Failed to parse analytics CSV"
    );
  }

  if (parsed.data.length === 0) {
    throw new ValidationError(
      [{ field: "csv", message: "CSV contains no data rows" }],
      "CSV contains no data rows."
    );
  }

  return parsed.data;
}

/**
 * 行の数値カラムを取得（欠落・空は 0）
 */
export function readNumber(row: AnalyticsCsvRow, column: string): number {
  return parseLenientNumber(row[column], column);
}

/**
 * インプレッションがある最後の時間帯の行だけを返す
 */
export function selectLatestHourRows(rows: AnalyticsCsvRow[]): AnalyticsCsvRow[] {
  let latestHour: number | null = null;
  for (const row of rows) {
    if (readNumber(row, CSV_COLUMNS.SUPPLY_IMPRESSIONS) > 0) {
      const hour = readNumber(row, CSV_COLUMNS.HOUR);
      if (latestHour === null || hour > latestHour) {
        latestHour = hour;
      }
    }
  }

  if (latestHour === null) {
    throw new NotFoundError("Hour with impressions");
  }

  const hour = latestHour;
  return rows.filter((row) => readNumber(row, CSV_COLUMNS.HOUR) === hour);
}

/**
 * Demand Name に部分一致（大文字小文字無視）する最初の行
 */
export function findArmRow(rows: AnalyticsCsvRow[], arm: string): AnalyticsCsvRow | undefined {
  const needle = arm.toLowerCase();
  return rows.find((row) => (row[CSV_COLUMNS.DEMAND_NAME] ?? "").toLowerCase().includes(needle));
}
