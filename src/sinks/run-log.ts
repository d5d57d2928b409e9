/**
 * 実行ログ（監査用）
 *
 * 1回の実行ごとに、元のマージン・次のマージン・ウィンドウ指標・成否を記録する。
 * 記録の失敗は実行結果に影響させない。
 */

import { BigQuery } from "@google-cloud/bigquery";
import { v4 as uuidv4 } from "uuid";
import { BIGQUERY } from "../constants";
import { logger } from "../logger";
import { PerformanceWindow } from "../metrics";
import { DecisionTransition } from "../optimizer/types";
import { withRetry } from "../utils/retry";

// =============================================================================
// 型定義
// =============================================================================

export interface RunLogEntry {
  timestamp: Date;
  currentMargin: number;
  nextMargin: number;
  metrics: PerformanceWindow;
  success: boolean;
  transition?: DecisionTransition;
}

/**
 * optimizer_runs テーブルの行
 */
export interface RunLogRow {
  run_id: string;
  arm_id: string;
  timestamp: string;
  current_margin: number;
  next_margin: number;
  transition: string | null;
  metrics: string;
  success: boolean;
}

export interface RunLogSink {
  saveRunLog(entry: RunLogEntry): Promise<void>;
}

export interface BigQueryRunLogSinkOptions {
  projectId: string;
  dataset: string;
  armId: string;
}

// =============================================================================
// BigQuery 実装
// =============================================================================

export class BigQueryRunLogSink implements RunLogSink {
  private bigquery: BigQuery;
  private options: BigQueryRunLogSinkOptions;

  constructor(options: BigQueryRunLogSinkOptions) {
    this.bigquery = new BigQuery({ projectId: options.projectId });
    this.options = options;
  }

  async saveRunLog(entry: RunLogEntry): Promise<void> {
    const row = toRunLogRow(entry, this.options.armId, uuidv4());

    try {
      await withRetry(
        () =>
          this.bigquery
            .dataset(this.options.dataset)
            .table(BIGQUERY.TABLES.OPTIMIZER_RUNS)
            .insert([row]),
        { name: "bigquery-run-log" }
      );
      logger.info("Run log saved", { runId: row.run_id, armId: row.arm_id });
    } catch (error) {
      // ログ失敗は実行を止めない
      logger.error("Failed to save run log", {
        runId: row.run_id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * RunLogEntry を BigQuery 行に変換
 */
export function toRunLogRow(entry: RunLogEntry, armId: string, runId: string): RunLogRow {
  return {
    run_id: runId,
    arm_id: armId,
    timestamp: entry.timestamp.toISOString(),
    current_margin: entry.currentMargin,
    next_margin: entry.nextMargin,
    transition: entry.transition ?? null,
    metrics: JSON.stringify({
      margin: entry.metrics.margin,
      impressions: entry.metrics.impressions,
      revenue: entry.metrics.revenue,
      cost: entry.metrics.cost,
      bid_rate: entry.metrics.bidRate,
      responses: entry.metrics.responses,
    }),
    success: entry.success,
  };
}
