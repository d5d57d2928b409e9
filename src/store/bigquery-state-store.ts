/**
 * BigQuery 状態ストア（リモート）
 *
 * optimizer_state テーブルに arm_id ごとの状態を追記し、
 * 読み込み時は updated_at が最新の行を使う。
 */

import { BigQuery } from "@google-cloud/bigquery";
import { BIGQUERY } from "../constants";
import { BigQueryError } from "../errors";
import { logger } from "../logger";
import { withRetry } from "../utils/retry";
import { StateStore } from "./types";

export interface BigQueryStateStoreOptions {
  projectId: string;
  dataset: string;
  armId: string;
  location?: string;
}

/**
 * optimizer_state テーブルの行
 */
export interface OptimizerStateRow {
  arm_id: string;
  state_json: string;
  updated_at: string;
}

export class BigQueryStateStore implements StateStore {
  readonly kind = "remote" as const;

  private bigquery: BigQuery;
  private options: BigQueryStateStoreOptions;

  constructor(options: BigQueryStateStoreOptions) {
    this.bigquery = new BigQuery({ projectId: options.projectId });
    this.options = options;
  }

  private tableRef(): string {
    return `\`${this.options.projectId}.${this.options.dataset}.${BIGQUERY.TABLES.OPTIMIZER_STATE}\``;
  }

  async load(): Promise<string | null> {
    const query = `
      SELECT state_json
      FROM ${this.tableRef()}
      WHERE arm_id = @armId
      ORDER BY updated_at DESC
      LIMIT 1
    `;

    try {
      const [rows] = await withRetry(
        () =>
          this.bigquery.query({
            query,
            params: { armId: this.options.armId },
            location: this.options.location ?? BIGQUERY.LOCATION,
          }),
        { name: "bigquery-state-store" }
      );

      const first: unknown = rows[0];
      if (typeof first !== "object" || first === null || !("state_json" in first)) {
        return null;
      }
      return typeof first.state_json === "string" ? first.state_json : null;
    } catch (error) {
      throw error instanceof Error ? BigQueryError.fromError(error) : error;
    }
  }

  async save(blob: string): Promise<void> {
    const row: OptimizerStateRow = {
      arm_id: this.options.armId,
      state_json: blob,
      updated_at: new Date().toISOString(),
    };

    try {
      await withRetry(
        () =>
          this.bigquery
            .dataset(this.options.dataset)
            .table(BIGQUERY.TABLES.OPTIMIZER_STATE)
            .insert([row]),
        { name: "bigquery-state-store" }
      );
      logger.debug("Optimizer state synced to BigQuery", { armId: this.options.armId });
    } catch (error) {
      throw error instanceof Error ? BigQueryError.fromError(error) : error;
    }
  }
}
