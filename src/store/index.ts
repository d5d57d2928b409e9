/**
 * 状態ストア - エントリーポイント
 */

import { AppConfig } from "../config";
import { BIGQUERY } from "../constants";
import { ConfigurationError } from "../errors";
import { BigQueryStateStore } from "./bigquery-state-store";
import { LayeredStateStore } from "./layered-state-store";
import { LocalFileStateStore } from "./local-file-state-store";
import { StateStore } from "./types";

export * from "./types";
export { LocalFileStateStore } from "./local-file-state-store";
export { LayeredStateStore } from "./layered-state-store";
export { BigQueryStateStore } from "./bigquery-state-store";
export type { BigQueryStateStoreOptions, OptimizerStateRow } from "./bigquery-state-store";

/**
 * 設定から状態ストアを生成
 * remoteStoreEnabled に応じて local / local-with-remote を選ぶ
 */
export function createStateStore(
  config: Pick<
    AppConfig,
    | "stateStorePath"
    | "remoteStoreEnabled"
    | "armId"
    | "bigqueryProjectId"
    | "bigqueryDatasetId"
    | "bigqueryLocation"
  >
): StateStore {
  const local = new LocalFileStateStore(config.stateStorePath);
  if (!config.remoteStoreEnabled) {
    return local;
  }

  if (!config.bigqueryProjectId) {
    throw new ConfigurationError("Remote state store requires a BigQuery project", [
      "BIGQUERY_PROJECT_ID",
    ]);
  }

  const remote = new BigQueryStateStore({
    projectId: config.bigqueryProjectId,
    dataset: config.bigqueryDatasetId || BIGQUERY.DATASET_ID,
    armId: config.armId,
    location: config.bigqueryLocation,
  });
  return new LayeredStateStore(local, remote);
}
