/**
 * CSVエクスポートからのウィンドウ取得
 */

import { promises as fs } from "fs";
import { NotFoundError } from "../errors";
import { PerformanceWindow } from "../metrics";
import {
  CSV_COLUMNS,
  findArmRow,
  parseAnalyticsCsv,
  readNumber,
  selectLatestHourRows,
} from "./analytics-csv";
import { WindowSource } from "./types";

export interface CsvWindowSourceOptions {
  csvText: string;
  /** Demand Name に含まれる文字列（例: "LowMar"） */
  arm: string;
  /** インプレッションがある最後の Hour の行だけを対象にする */
  latestHourOnly?: boolean;
}

export class CsvWindowSource implements WindowSource {
  readonly name = "csv";

  constructor(private readonly options: CsvWindowSourceOptions) {}

  static async fromFile(
    csvPath: string,
    arm: string,
    latestHourOnly: boolean = false
  ): Promise<CsvWindowSource> {
    const csvText = await fs.readFile(csvPath, "utf-8");
    return new CsvWindowSource({ csvText, arm, latestHourOnly });
  }

  async fetchWindow(): Promise<PerformanceWindow> {
    let rows = parseAnalyticsCsv(this.options.csvText);
    if (this.options.latestHourOnly) {
      rows = selectLatestHourRows(rows);
    }

    const row = findArmRow(rows, this.options.arm);
    if (!row) {
      throw new NotFoundError("CSV row for arm", this.options.arm);
    }

    return {
      impressions: readNumber(row, CSV_COLUMNS.SUPPLY_IMPRESSIONS),
      revenue: readNumber(row, CSV_COLUMNS.REVENUE),
      cost: readNumber(row, CSV_COLUMNS.COST),
      margin: readNumber(row, CSV_COLUMNS.MARGIN_PCT),
      bidRate: readNumber(row, CSV_COLUMNS.BID_RATE_PCT),
      responses: readNumber(row, CSV_COLUMNS.SUPPLY_RESPONSES),
    };
  }
}
