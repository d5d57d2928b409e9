/**
 * optimizer_state / optimizer_runs テーブルを作成するスクリプト
 *
 * 実行方法: npx tsx scripts/create-optimizer-tables.ts
 */

import * as dotenv from "dotenv";
dotenv.config();

import { BigQuery, TableField } from "@google-cloud/bigquery";
import { loadConfig } from "../src/config";
import { BIGQUERY } from "../src/constants";

const TABLE_SCHEMAS: Record<string, TableField[]> = {
  [BIGQUERY.TABLES.OPTIMIZER_STATE]: [
    { name: "arm_id", type: "STRING", mode: "REQUIRED" },
    { name: "state_json", type: "STRING", mode: "REQUIRED" },
    { name: "updated_at", type: "TIMESTAMP", mode: "REQUIRED" },
  ],
  [BIGQUERY.TABLES.OPTIMIZER_RUNS]: [
    { name: "run_id", type: "STRING", mode: "REQUIRED" },
    { name: "arm_id", type: "STRING", mode: "REQUIRED" },
    { name: "timestamp", type: "TIMESTAMP", mode: "REQUIRED" },
    { name: "current_margin", type: "FLOAT64", mode: "REQUIRED" },
    { name: "next_margin", type: "FLOAT64", mode: "REQUIRED" },
    { name: "transition", type: "STRING", mode: "NULLABLE" },
    { name: "metrics", type: "STRING", mode: "REQUIRED" },
    { name: "success", type: "BOOL", mode: "REQUIRED" },
  ],
};

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.bigqueryProjectId) {
    throw new Error("BIGQUERY_PROJECT_ID is required");
  }

  const bigquery = new BigQuery({ projectId: config.bigqueryProjectId });
  const dataset = bigquery.dataset(config.bigqueryDatasetId);

  for (const [tableName, schema] of Object.entries(TABLE_SCHEMAS)) {
    const table = dataset.table(tableName);

    // テーブルが存在するか確認
    const [exists] = await table.exists();
    if (exists) {
      console.log(`Table ${tableName} already exists.`);
      continue;
    }

    await dataset.createTable(tableName, { schema, location: config.bigqueryLocation });
    console.log(`Table ${tableName} created successfully.`);
  }
}

main().catch((error: unknown) => {
  console.error("Error creating tables:", error);
  process.exit(1);
});
