/**
 * マージンオプティマイザー
 *
 * 総利益を最大化しつつ、sRPM と入札率がベースラインから
 * guardrailDropPct% 以上下がらないようにマージンを調整する。
 * 状態は StateStore に永続化し、判定のたびに上書きする。
 */

import { computeWindowMetrics, PerformanceWindow, WindowMetrics } from "../metrics";
import { logger, StructuredLogger } from "../logger";
import { StateStore } from "../store/types";
import { applyDecision, createInitialState, ingestWindow } from "./guarded-optimizer";
import { encodeState, tryDecodeState } from "./state-codec";
import {
  DecisionResult,
  DEFAULT_OPTIMIZER_SETTINGS,
  OptimizerSettings,
  OptimizerState,
} from "./types";

export interface MarginOptimizerOptions {
  settings?: Partial<OptimizerSettings>;
  store: StateStore;
  logger?: StructuredLogger;
}

export class MarginOptimizer {
  private state: OptimizerState;
  private readonly settings: OptimizerSettings;
  private readonly store: StateStore;
  private readonly log: StructuredLogger;

  private constructor(
    settings: OptimizerSettings,
    store: StateStore,
    state: OptimizerState,
    log: StructuredLogger
  ) {
    this.settings = settings;
    this.store = store;
    this.state = state;
    this.log = log;
  }

  /**
   * ストアから状態を読み込んでオプティマイザーを生成
   *
   * 状態が無い、または壊れている場合は設定値から新しい状態で開始する。
   */
  static async create(options: MarginOptimizerOptions): Promise<MarginOptimizer> {
    const settings: OptimizerSettings = { ...DEFAULT_OPTIMIZER_SETTINGS, ...options.settings };
    const log = options.logger ?? logger;
    const state = await MarginOptimizer.loadState(options.store, settings, log);
    return new MarginOptimizer(settings, options.store, state, log);
  }

  private static async loadState(
    store: StateStore,
    settings: OptimizerSettings,
    log: StructuredLogger
  ): Promise<OptimizerState> {
    const blob = await store.load();
    if (blob === null) {
      log.info("No persisted optimizer state, starting fresh", {
        store: store.kind,
        baselineMargin: settings.baselineMargin,
      });
      return createInitialState(settings);
    }

    const decoded = tryDecodeState(blob, settings);
    if (!decoded.ok) {
      log.warn("Persisted optimizer state is malformed, starting fresh", {
        store: store.kind,
        reason: decoded.reason,
      });
      return createInitialState(settings);
    }

    return decoded.state;
  }

  private async persist(): Promise<void> {
    await this.store.save(encodeState(this.state, this.settings.historyLimit));
  }

  getState(): OptimizerState {
    return { ...this.state, history: [...this.state.history] };
  }

  getSettings(): OptimizerSettings {
    return { ...this.settings };
  }

  /**
   * ウィンドウを取り込み、履歴に追加して永続化する（判定は行わない）
   */
  async update(window: PerformanceWindow): Promise<WindowMetrics> {
    const metrics = computeWindowMetrics(window);
    this.state = ingestWindow(this.state, window, metrics, this.settings.historyLimit);
    await this.persist();
    return metrics;
  }

  /**
   * 最新ウィンドウを処理し、次に適用するマージンを決める
   */
  async decide(window: PerformanceWindow): Promise<DecisionResult> {
    // 判定前に取り込み結果を必ず永続化する
    const metrics = await this.update(window);

    const outcome = applyDecision(this.state, metrics, this.settings);
    this.state = outcome.state;
    await this.persist();

    this.log.info("Margin decision", {
      transition: outcome.transition,
      windowMargin: window.margin,
      nextMargin: this.state.currentMargin,
      lastSafeMargin: this.state.lastSafeMargin,
      step: this.state.step,
      srpm: metrics.srpm,
      bidRate: metrics.bidRate,
      profit: metrics.profit,
      profitImprovementPct: outcome.profitImprovementPct,
    });

    return {
      ...outcome,
      state: this.getState(),
      nextMargin: this.state.currentMargin,
      metrics,
    };
  }

  /**
   * decide() の結果のうち次のマージンだけを返す
   */
  async suggestNextMargin(window: PerformanceWindow): Promise<number> {
    const result = await this.decide(window);
    return result.nextMargin;
  }
}
