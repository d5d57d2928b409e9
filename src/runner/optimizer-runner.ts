/**
 * 1ティック分の実行（ウィンドウ取得 → 判定 → マージン適用 → 実行ログ）
 *
 * 同じアームに対する実行は呼び出し側で直列化すること。
 */

import * as path from "path";
import { AppConfig } from "../config";
import { BIGQUERY, STATE } from "../constants";
import { createChildLogger } from "../logger";
import { MarginOptimizer } from "../optimizer/margin-optimizer";
import { DecisionTransition } from "../optimizer/types";
import { MarginApiClient, MarginSink } from "../sinks/margin-api-client";
import { BigQueryRunLogSink, RunLogSink } from "../sinks/run-log";
import { ApiWindowSource } from "../sources/api-window-source";
import { WindowSource } from "../sources/types";
import { createStateStore } from "../store";

// =============================================================================
// 型定義
// =============================================================================

export interface OptimizerTickDeps {
  source: WindowSource;
  optimizer: MarginOptimizer;
  marginSink: MarginSink;
  runLogSink?: RunLogSink;
}

export interface OptimizerTickResult {
  /** 入力ウィンドウのマージン */
  currentMargin: number;
  nextMargin: number;
  transition: DecisionTransition;
  success: boolean;
}

// =============================================================================
// 実行
// =============================================================================

export async function runOptimizerTick(deps: OptimizerTickDeps): Promise<OptimizerTickResult> {
  const log = createChildLogger({ source: deps.source.name });

  const window = await deps.source.fetchWindow();
  const decision = await deps.optimizer.decide(window);

  const success = await deps.marginSink.updateMargin(decision.nextMargin);
  if (!success) {
    log.warn("Failed to update margin", { nextMargin: decision.nextMargin });
  }

  if (deps.runLogSink) {
    await deps.runLogSink.saveRunLog({
      timestamp: new Date(),
      currentMargin: window.margin,
      nextMargin: decision.nextMargin,
      metrics: window,
      success,
      transition: decision.transition,
    });
  }

  log.info("Optimizer tick finished", {
    currentMargin: window.margin,
    nextMargin: decision.nextMargin,
    transition: decision.transition,
    success,
  });

  return {
    currentMargin: window.margin,
    nextMargin: decision.nextMargin,
    transition: decision.transition,
    success,
  };
}

// =============================================================================
// 依存関係の組み立て
// =============================================================================

/**
 * CSV実行用の設定
 *
 * ローカル状態ファイルとリモート状態の arm_id を本番と分ける。
 */
export function toCsvRunConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    armId: `${config.armId}${STATE.CSV_RUN_ARM_SUFFIX}`,
    stateStorePath: path.join(path.dirname(config.stateStorePath), STATE.CSV_RUN_STATE_PATH),
  };
}

/**
 * 設定から実行に必要な依存関係を組み立てる
 *
 * source を省略した場合はメトリクスAPI（未設定ならモック）を使う。
 */
export async function createOptimizerTickDeps(
  config: AppConfig,
  source?: WindowSource
): Promise<OptimizerTickDeps> {
  const store = createStateStore(config);
  const optimizer = await MarginOptimizer.create({
    settings: config.optimizer,
    store,
    logger: createChildLogger({ armId: config.armId }),
  });

  const runLogSink =
    config.runLogEnabled && config.bigqueryProjectId
      ? new BigQueryRunLogSink({
          projectId: config.bigqueryProjectId,
          dataset: config.bigqueryDatasetId || BIGQUERY.DATASET_ID,
          armId: config.armId,
        })
      : undefined;

  return {
    source:
      source ??
      new ApiWindowSource({ metricsApiUrl: config.metricsApiUrl, apiKey: config.apiKey }),
    optimizer,
    marginSink: new MarginApiClient({
      updateMarginApiUrl: config.updateMarginApiUrl,
      apiKey: config.apiKey,
    }),
    runLogSink,
  };
}
